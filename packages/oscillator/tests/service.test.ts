/**
 * Oscillator Service Tests
 *
 * In-memory sources only; every dataset shares the asset's daily timestamps.
 */

import { defaultConfig, type OscilloConfig } from "@oscillo/config";
import type { DateRange, SerializedPoint } from "@oscillo/indicators";
import {
	createDataSourceRegistry,
	createStaticOhlcvSource,
	createStaticSeriesSource,
	type DataSourceRegistry,
	type OhlcvSource,
	UnknownDatasetError,
} from "@oscillo/marketdata";
import {
	BASE_TIMESTAMP,
	createSeededRandom,
	DAY_MS,
	dailyTimestamps,
	regimeBars,
	seriesFromValues,
} from "@oscillo/test-utils";
import { describe, expect, it } from "vitest";
import { NoOscillatorDataError, RequestValidationError } from "../src/errors.js";
import { OscillatorService } from "../src/service.js";

// ============================================
// Fixtures
// ============================================

const uncachedConfig = (): OscilloConfig => ({
	...defaultConfig(),
	cache: { enabled: false, ttl_ms: 1_000, max_entries: 10 },
});

function buildRegistry(days: number, asset?: OhlcvSource): DataSourceRegistry {
	const bars = regimeBars(
		[
			{ length: Math.ceil(days / 2), rangePct: 0.005 },
			{ length: Math.floor(days / 2), rangePct: 0.04 },
		],
		5
	);
	const random = createSeededRandom(21);
	const closes = bars.map((bar) => bar.close);

	return createDataSourceRegistry([
		asset ?? createStaticOhlcvSource({ id: "btc", label: "Bitcoin", unit: "USD" }, bars),
		createStaticSeriesSource(
			{ id: "rsi", label: "RSI" },
			seriesFromValues(closes.map((close) => 0.5 * close + (random() - 0.5) * 4))
		),
		createStaticSeriesSource(
			{ id: "atr", label: "ATR", invertInComposite: true },
			seriesFromValues(bars.map((bar) => bar.high - bar.low + random() * 0.5))
		),
		createStaticSeriesSource(
			{ id: "funding", label: "Funding Rate" },
			seriesFromValues(closes.map(() => random() - 0.5))
		),
	]);
}

/** Last 30 of 120 days */
const RANGE: DateRange = { start: BASE_TIMESTAMP + 90 * DAY_MS, end: BASE_TIMESTAMP + 119 * DAY_MS };

const RANGE_TIMESTAMPS = dailyTimestamps(30, RANGE.start);

function valueAt(data: readonly SerializedPoint[], timestamp: number): number {
	const value = data.find(([t]) => t === timestamp)?.[1];
	if (value === undefined || value === null) {
		throw new Error(`no value at ${timestamp}`);
	}
	return value;
}

// ============================================
// Individual Mode
// ============================================

describe("getOscillators", () => {
	const service = new OscillatorService({ registry: buildRegistry(120), config: uncachedConfig() });

	it("normalizes each dataset over the requested range", async () => {
		const response = await service.getOscillators({
			asset: "btc",
			datasets: ["rsi", "funding"],
			range: RANGE,
			window: 14,
		});

		expect(response.mode).toBe("individual");
		expect(response.method).toBe("regression");
		expect(Object.keys(response.datasets)).toEqual(["rsi", "funding"]);

		const rsi = response.datasets.rsi;
		expect(rsi?.data.map(([timestamp]) => timestamp)).toEqual(RANGE_TIMESTAMPS);
		expect(rsi?.data.every(([, value]) => value !== null && Number.isFinite(value))).toBe(true);
		expect(rsi?.metadata).toEqual({
			id: "rsi",
			label: "RSI",
			kind: "series",
			normalizer: "Regression Divergence",
			window: 14,
		});
	});

	it("uses the configured window and method by default", async () => {
		const response = await service.getOscillators({ asset: "btc", datasets: ["rsi"], range: RANGE });

		expect(response.window).toBe(30);
		expect(response.method).toBe("regression");
	});

	it("supports the percent-change variant", async () => {
		const response = await service.getOscillators({
			asset: "btc",
			datasets: ["rsi"],
			range: RANGE,
			window: 14,
			method: "pct_change",
		});

		expect(response.datasets.rsi?.metadata.normalizer).toBe("Velocity Regression Divergence");
		expect(response.datasets.rsi?.data).toHaveLength(30);
	});

	it("skips unknown datasets", async () => {
		const response = await service.getOscillators({
			asset: "btc",
			datasets: ["rsi", "open_interest"],
			range: RANGE,
			window: 14,
		});

		expect(response.skipped).toEqual(["open_interest"]);
		expect(Object.keys(response.datasets)).toEqual(["rsi"]);
	});

	it("rejects an unknown asset", async () => {
		await expect(
			service.getOscillators({ asset: "doge", datasets: ["rsi"], range: RANGE, window: 14 })
		).rejects.toThrow(UnknownDatasetError);
	});

	it("rejects invalid requests", async () => {
		await expect(
			service.getOscillators({ asset: "btc", datasets: ["rsi"], range: RANGE, window: 15 })
		).rejects.toThrow(RequestValidationError);
		await expect(
			service.getOscillators({ asset: "btc", datasets: [], range: RANGE, window: 14 })
		).rejects.toThrow(RequestValidationError);
		await expect(
			service.getOscillators({ asset: "btc", datasets: ["rsi"], range: { start: 10, end: 5 } })
		).rejects.toThrow("range.start must not be after range.end");
	});
});

// ============================================
// Composite Mode
// ============================================

describe("getComposite", () => {
	const service = new OscillatorService({ registry: buildRegistry(120), config: uncachedConfig() });

	it("averages the breakdown with inversion", async () => {
		const response = await service.getComposite({
			asset: "btc",
			datasets: ["rsi", "atr", "funding"],
			range: RANGE,
			window: 14,
		});

		expect(response.composite.metadata.components).toEqual(["rsi", "atr", "funding"]);
		expect(response.composite.metadata.weights).toEqual({
			rsi: { weight: 1, invert: false },
			atr: { weight: 1, invert: true },
			funding: { weight: 1, invert: false },
		});
		expect(response.composite.data.map(([timestamp]) => timestamp)).toEqual(RANGE_TIMESTAMPS);

		for (const [timestamp, value] of response.composite.data) {
			const expected =
				(valueAt(response.breakdown.rsi?.data ?? [], timestamp) -
					valueAt(response.breakdown.atr?.data ?? [], timestamp) +
					valueAt(response.breakdown.funding?.data ?? [], timestamp)) /
				3;
			expect(value).toBeCloseTo(expected, 12);
		}
	});

	it("aligns the regime overlay to the composite timestamps", async () => {
		const response = await service.getComposite({
			asset: "btc",
			datasets: ["rsi", "atr"],
			range: RANGE,
			window: 14,
		});

		expect(response.regime.unavailable).toBeUndefined();
		expect(response.regime.data.map(([timestamp]) => timestamp)).toEqual(
			response.composite.data.map(([timestamp]) => timestamp)
		);
		expect(response.regime.data.every(([, state]) => state === 0 || state === 1)).toBe(true);
		expect(response.regime.metadata.states[1].label).toBe("High Volatility");
	});

	it("honours request weights", async () => {
		const response = await service.getComposite({
			asset: "btc",
			datasets: ["rsi", "atr"],
			range: RANGE,
			window: 14,
			weights: { atr: { weight: 0, invert: true } },
		});

		expect(response.composite.metadata.components).toEqual(["rsi"]);
		expect(response.composite.data).toEqual(response.breakdown.rsi?.data);
	});

	it("uses the configured composite window by default", async () => {
		const response = await service.getComposite({ asset: "btc", datasets: ["rsi"], range: RANGE });
		expect(response.window).toBe(50);
		expect(response.composite.metadata.window).toBe(50);
	});

	it("reports skipped datasets", async () => {
		const response = await service.getComposite({
			asset: "btc",
			datasets: ["rsi", "open_interest"],
			range: RANGE,
			window: 14,
		});

		expect(response.skipped).toEqual(["open_interest"]);
		expect(response.composite.metadata.missing).toEqual(["open_interest"]);
	});

	it("fails when no dataset can be normalized", async () => {
		await expect(
			service.getComposite({ asset: "btc", datasets: ["open_interest"], range: RANGE, window: 14 })
		).rejects.toThrow(NoOscillatorDataError);
	});

	it("marks the regime unavailable on short history", async () => {
		const short = new OscillatorService({ registry: buildRegistry(20), config: uncachedConfig() });
		const range = { start: BASE_TIMESTAMP, end: BASE_TIMESTAMP + 19 * DAY_MS };

		const response = await short.getComposite({ asset: "btc", datasets: ["rsi"], range, window: 14 });

		expect(response.regime.data).toEqual([]);
		expect(response.regime.unavailable).toBe("[regime] Insufficient data: need 30 observations, got 20");
		expect(response.regime.metadata.states[0].name).toBe("low-vol");
		expect(response.composite.data.filter(([, value]) => value !== null)).toHaveLength(11);
	});
});

// ============================================
// Tension Mode
// ============================================

describe("getTension", () => {
	const service = new OscillatorService({ registry: buildRegistry(120), config: uncachedConfig() });

	it("returns both tension levels over the range", async () => {
		const response = await service.getTension({
			asset: "btc",
			range: RANGE,
			window: 14,
			pairs: [{ name: "funding_vs_rsi", sentiment: "funding", mechanics: "rsi" }],
		});

		const pair = response.pairs.funding_vs_rsi;
		expect(response.threshold).toBe(2);
		expect(pair?.tension1.map(([timestamp]) => timestamp)).toEqual(RANGE_TIMESTAMPS);
		expect(pair?.tension2.map(([timestamp]) => timestamp)).toEqual(RANGE_TIMESTAMPS);
		expect(pair?.tension2.every(([, value]) => value !== null)).toBe(true);
		for (const signal of pair?.signals ?? []) {
			expect(signal.tension2).toBeGreaterThan(2);
			expect(signal.signal).toBe(signal.tension1 > 0 ? "sell_pressure" : "buy_pressure");
		}
	});

	it("subtracts mechanics from sentiment", async () => {
		const [tension, oscillators] = await Promise.all([
			service.getTension({
				asset: "btc",
				range: RANGE,
				window: 14,
				pairs: [{ name: "pair", sentiment: "funding", mechanics: "rsi" }],
			}),
			service.getOscillators({ asset: "btc", datasets: ["funding", "rsi"], range: RANGE, window: 14 }),
		]);
		const timestamp = RANGE.start;

		const tension1 = valueAt(tension.pairs.pair?.tension1 ?? [], timestamp);

		// same window ending at the same timestamp, so the scores match
		expect(tension1).toBeCloseTo(
			valueAt(oscillators.datasets.funding?.data ?? [], timestamp) -
				valueAt(oscillators.datasets.rsi?.data ?? [], timestamp),
			12
		);
	});

	it("skips pairs with a missing leg", async () => {
		const response = await service.getTension({
			asset: "btc",
			range: RANGE,
			window: 14,
			pairs: [
				{ name: "ok", sentiment: "funding", mechanics: "rsi" },
				{ name: "broken", sentiment: "long_short_ratio", mechanics: "rsi" },
			],
		});

		expect(Object.keys(response.pairs)).toEqual(["ok"]);
		expect(response.skipped).toEqual(["broken"]);
	});
});

// ============================================
// Memoization
// ============================================

describe("caching", () => {
	function countingAsset(): { source: OhlcvSource; calls: () => number } {
		const bars = regimeBars([{ length: 120, rangePct: 0.01 }], 9);
		const inner = createStaticOhlcvSource({ id: "btc", label: "Bitcoin" }, bars);
		let calls = 0;
		return {
			source: {
				...inner,
				fetch: async (range) => {
					calls++;
					return inner.fetch(range);
				},
			},
			calls: () => calls,
		};
	}

	it("shares one computation between identical concurrent requests", async () => {
		const asset = countingAsset();
		const service = new OscillatorService({ registry: buildRegistry(120, asset.source) });
		const request = { asset: "btc", datasets: ["rsi", "atr"], range: RANGE, window: 14 };

		const [first, second] = await Promise.all([service.getComposite(request), service.getComposite(request)]);
		const third = await service.getComposite(request);

		expect(asset.calls()).toBe(1);
		expect(second).toBe(first);
		expect(third).toBe(first);
		expect(service.cacheMetrics().composite).toMatchObject({ misses: 1, coalesced: 1, hits: 1 });
	});

	it("hands every caller a frozen response", async () => {
		const service = new OscillatorService({ registry: buildRegistry(120) });
		const request = { asset: "btc", datasets: ["rsi", "atr"], range: RANGE, window: 14 };

		const first = await service.getComposite(request);
		expect(() => {
			first.regime.metadata.states[1].color = "#00FF00";
		}).toThrow(TypeError);
		expect(() => {
			first.composite.data.push([0, 999]);
		}).toThrow(TypeError);
		expect(Object.isFrozen(first.composite.data[5])).toBe(true);

		const second = await service.getComposite(request);
		expect(second.regime.metadata.states[1].color).toBe("#FF3B30");
		expect(second.composite.data).toHaveLength(30);
	});

	it("recomputes after the cache is cleared", async () => {
		const asset = countingAsset();
		const service = new OscillatorService({ registry: buildRegistry(120, asset.source) });
		const request = { asset: "btc", datasets: ["rsi"], range: RANGE, window: 14 };

		await service.getOscillators(request);
		service.clearCache();
		await service.getOscillators(request);

		expect(asset.calls()).toBe(2);
		expect(service.cacheMetrics().individual).toMatchObject({ misses: 2, size: 1 });
	});

	it("treats reordered weights as the same request", async () => {
		const asset = countingAsset();
		const service = new OscillatorService({ registry: buildRegistry(120, asset.source) });
		const base = { asset: "btc", datasets: ["rsi", "atr"], range: RANGE, window: 14 };

		await service.getComposite({
			...base,
			weights: { rsi: { weight: 2, invert: false }, atr: { weight: 1, invert: true } },
		});
		await service.getComposite({
			...base,
			weights: { atr: { weight: 1, invert: true }, rsi: { weight: 2, invert: false } },
		});

		expect(asset.calls()).toBe(1);
		expect(service.cacheMetrics().composite).toMatchObject({ misses: 1, hits: 1 });
	});

	it("keys results by window", async () => {
		const asset = countingAsset();
		const service = new OscillatorService({ registry: buildRegistry(120, asset.source) });

		await service.getOscillators({ asset: "btc", datasets: ["rsi"], range: RANGE, window: 14 });
		await service.getOscillators({ asset: "btc", datasets: ["rsi"], range: RANGE, window: 30 });

		expect(asset.calls()).toBe(2);
	});

	it("computes every time when caching is disabled", async () => {
		const asset = countingAsset();
		const service = new OscillatorService({ registry: buildRegistry(120, asset.source), config: uncachedConfig() });
		const request = { asset: "btc", datasets: ["rsi"], range: RANGE, window: 14 };

		await service.getOscillators(request);
		await service.getOscillators(request);

		expect(asset.calls()).toBe(2);
		expect(service.cacheMetrics()).toEqual({});
	});
});
