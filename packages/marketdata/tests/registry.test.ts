/**
 * Data Source Registry Tests
 */

import { describe, expect, it } from "vitest";
import { DatasetKindError, DuplicateDatasetError, UnknownDatasetError } from "../src/errors.js";
import { createDataSourceRegistry } from "../src/registry.js";
import { createStaticOhlcvSource, createStaticSeriesSource } from "../src/static.js";

const rsi = createStaticSeriesSource({ id: "rsi", label: "RSI", color: "#5856D6" }, []);
const atr = createStaticSeriesSource({ id: "atr", label: "ATR", invertInComposite: true }, []);
const btc = createStaticOhlcvSource({ id: "btc", label: "Bitcoin", unit: "USD" }, []);

describe("createDataSourceRegistry", () => {
	const registry = createDataSourceRegistry([rsi, atr, btc]);

	it("looks sources up by id", () => {
		expect(registry.get("rsi")).toBe(rsi);
		expect(registry.getSeries("atr")).toBe(atr);
		expect(registry.getOhlcv("btc")).toBe(btc);
		expect(registry.has("btc")).toBe(true);
		expect(registry.has("eth")).toBe(false);
	});

	it("lists metadata in registration order", () => {
		expect(registry.list()).toEqual([
			{ id: "rsi", label: "RSI", color: "#5856D6", kind: "series" },
			{ id: "atr", label: "ATR", invertInComposite: true, kind: "series" },
			{ id: "btc", label: "Bitcoin", unit: "USD", kind: "ohlcv" },
		]);
	});

	it("throws for unknown ids", () => {
		expect(() => registry.get("eth")).toThrow(UnknownDatasetError);
		expect(() => registry.getSeries("eth")).toThrow('Unknown dataset "eth"');
	});

	it("throws when the kind does not match", () => {
		expect(() => registry.getSeries("btc")).toThrow(DatasetKindError);
		expect(() => registry.getOhlcv("rsi")).toThrow('Dataset "rsi" is series, expected ohlcv');
	});

	it("rejects duplicate ids", () => {
		expect(() => createDataSourceRegistry([rsi, rsi])).toThrow(DuplicateDatasetError);
	});

	it("builds an empty registry", () => {
		expect(createDataSourceRegistry([]).list()).toEqual([]);
	});
});
