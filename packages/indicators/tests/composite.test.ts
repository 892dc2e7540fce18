/**
 * Composite Aggregator Tests
 */

import { describe, expect, it } from "vitest";
import { aggregateComposite, equalWeightConfig } from "../src/composite.js";
import { ValidationError } from "../src/errors.js";
import type { Series } from "../src/types.js";

const series = (entries: [number, number | null][]): Series =>
	entries.map(([timestamp, value]) => ({ timestamp, value }));

describe("aggregateComposite", () => {
	it("averages over the components observed at each timestamp", () => {
		const result = aggregateComposite(
			{ a: series([[1, 2]]), b: series([[1, 0]]) },
			{ a: { weight: 1, invert: false }, b: { weight: 1, invert: false } }
		);

		expect(result.points).toEqual([{ timestamp: 1, value: 1 }]);
	});

	it("keeps a timestamp with no observed component as null", () => {
		const result = aggregateComposite({ a: series([[1, null]]), b: series([[1, null]]) });

		expect(result.points).toEqual([{ timestamp: 1, value: null }]);
	});

	it("divides by the active count only", () => {
		const result = aggregateComposite({
			a: series([
				[1, 2],
				[2, 4],
			]),
			b: series([
				[1, 0],
				[3, 6],
			]),
		});

		expect(result.points).toEqual([
			{ timestamp: 1, value: 1 },
			{ timestamp: 2, value: 4 },
			{ timestamp: 3, value: 6 },
		]);
	});

	it("negates inverted components", () => {
		const result = aggregateComposite(
			{ a: series([[1, 2]]), b: series([[1, 1]]) },
			{ b: { weight: 1, invert: true } }
		);

		expect(result.points[0]?.value).toBe(0.5);
	});

	it("does not renormalize weights", () => {
		const result = aggregateComposite(
			{ a: series([[1, 2]]), b: series([[1, 0]]) },
			{ a: { weight: 3, invert: false }, b: { weight: 1, invert: false } }
		);

		expect(result.points[0]?.value).toBe(3);
	});

	it("drops zero-weight components from the sum and the divisor", () => {
		const result = aggregateComposite(
			{ a: series([[1, 2]]), b: series([[1, 100]]) },
			{ b: { weight: 0, invert: false } }
		);

		expect(result.points).toEqual([{ timestamp: 1, value: 2 }]);
		expect(result.components).toEqual(["a"]);
		expect(result.weights).toEqual({ a: { weight: 1, invert: false } });
	});

	it("reports configured components that have no series", () => {
		const result = aggregateComposite({ a: series([[1, 1]]) }, equalWeightConfig(["a", "funding"]));
		expect(result.missing).toEqual(["funding"]);
	});

	it("ignores non-finite values", () => {
		const result = aggregateComposite({ a: series([[1, Number.NaN]]), b: series([[1, 3]]) });
		expect(result.points).toEqual([{ timestamp: 1, value: 3 }]);
	});

	it("returns nothing for no components", () => {
		expect(aggregateComposite({})).toEqual({ points: [], components: [], weights: {}, missing: [] });
	});

	it("rejects an unsorted component", () => {
		expect(() =>
			aggregateComposite({
				a: series([
					[2, 1],
					[1, 1],
				]),
			})
		).toThrow(ValidationError);
	});
});

describe("equalWeightConfig", () => {
	it("weights every component equally", () => {
		expect(equalWeightConfig(["rsi", "atr"], ["atr"])).toEqual({
			rsi: { weight: 1, invert: false },
			atr: { weight: 1, invert: true },
		});
	});
});
