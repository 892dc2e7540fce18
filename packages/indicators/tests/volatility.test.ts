/**
 * Garman-Klass Volatility Tests
 */

import { barsFromCloses, BASE_TIMESTAMP, DAY_MS } from "@oscillo/test-utils";
import { describe, expect, it } from "vitest";
import type { OHLCVBar } from "../src/types.js";
import { garmanKlassVariance, garmanKlassVolatility } from "../src/volatility/garmanKlass.js";

const bar = (overrides: Partial<OHLCVBar> = {}): OHLCVBar => ({
	timestamp: BASE_TIMESTAMP,
	open: 100,
	high: 105,
	low: 95,
	close: 102,
	volume: 1000,
	...overrides,
});

const EXPECTED_VARIANCE = 0.5 * Math.log(105 / 95) ** 2 - (2 * Math.LN2 - 1) * Math.log(1.02) ** 2;

describe("garmanKlassVariance", () => {
	it("matches the closed form", () => {
		expect(garmanKlassVariance(bar())).toBeCloseTo(EXPECTED_VARIANCE, 15);
	});

	it("is null for an invalid bar", () => {
		expect(garmanKlassVariance(bar({ high: 90 }))).toBeNull();
	});
});

describe("garmanKlassVolatility", () => {
	it("annualizes with 252 periods by default", () => {
		const [point] = garmanKlassVolatility([bar()]);
		expect(point?.value).toBeCloseTo(Math.sqrt(EXPECTED_VARIANCE * 252), 12);
	});

	it("accepts another annualization factor", () => {
		const [point] = garmanKlassVolatility([bar()], { annualizationFactor: 365 });
		expect(point?.value).toBeCloseTo(Math.sqrt(EXPECTED_VARIANCE * 365), 12);
	});

	it("is zero for a bar with no range", () => {
		const [point] = garmanKlassVolatility([bar({ open: 100, high: 100, low: 100, close: 100 })]);
		expect(point?.value).toBe(0);
	});

	const INVALID: [string, Partial<OHLCVBar>][] = [
		["high below low", { high: 94, low: 95 }],
		["high below close", { high: 101 }],
		["low above open", { low: 100.5 }],
		["non-positive price", { low: 0 }],
		["non-finite price", { close: Number.NaN }],
	];

	it.each(INVALID)("emits null for %s", (_label, overrides) => {
		const [point] = garmanKlassVolatility([bar(overrides)]);
		expect(point).toEqual({ timestamp: BASE_TIMESTAMP, value: null });
	});

	it("emits one point per bar in order", () => {
		const bars = barsFromCloses([100, 101, 99, 102]);
		const broken = bars.map((b, i) => (i === 2 ? { ...b, high: b.low / 2 } : b));

		const points = garmanKlassVolatility(broken);

		expect(points.map((p) => p.timestamp)).toEqual([0, 1, 2, 3].map((i) => BASE_TIMESTAMP + i * DAY_MS));
		expect(points[2]?.value).toBeNull();
		expect(points.filter((p) => p.value !== null)).toHaveLength(3);
		for (const point of points) {
			expect(point.value === null || point.value >= 0).toBe(true);
		}
	});
});
