/**
 * Regime Run Statistics Tests
 */

import { describe, expect, it } from "vitest";
import { calculateTransitionMatrix, findSegments, summarizeRegimes } from "../src/transitions.js";
import type { RegimeLabel, RegimeState } from "../src/types.js";

const labelsOf = (states: RegimeState[]): RegimeLabel[] =>
	states.map((state, i) => ({ timestamp: i + 1, state }));

describe("findSegments", () => {
	it("groups consecutive equal states", () => {
		expect(findSegments(labelsOf([0, 0, 1, 1, 1, 0]))).toEqual([
			{ state: 0, start: 1, end: 2, length: 2 },
			{ state: 1, start: 3, end: 5, length: 3 },
			{ state: 0, start: 6, end: 6, length: 1 },
		]);
	});
});

describe("calculateTransitionMatrix", () => {
	it("estimates row-normalized transition shares", () => {
		expect(calculateTransitionMatrix(labelsOf([0, 0, 1, 1, 1, 0]))).toEqual([
			[0.5, 0.5],
			[1 / 3, 2 / 3],
		]);
	});

	it("leaves unvisited rows at zero", () => {
		expect(calculateTransitionMatrix(labelsOf([0, 0, 0]))).toEqual([
			[1, 0],
			[0, 0],
		]);
	});
});

describe("summarizeRegimes", () => {
	it("summarizes a label sequence", () => {
		const summary = summarizeRegimes(labelsOf([0, 0, 1, 1, 1, 0]));

		expect(summary.transitions).toBe(2);
		expect(summary.averageDuration).toBe(2);
		expect(summary.counts).toEqual({ 0: 3, 1: 3 });
		expect(summary.shares).toEqual({ 0: 0.5, 1: 0.5 });
		expect(summary.segments).toHaveLength(3);
	});

	it("summarizes no labels", () => {
		expect(summarizeRegimes([])).toEqual({
			segments: [],
			transitions: 0,
			averageDuration: 0,
			counts: { 0: 0, 1: 0 },
			shares: { 0: 0, 1: 0 },
			transitionMatrix: [
				[0, 0],
				[0, 0],
			],
		});
	});
});
