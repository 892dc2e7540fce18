/**
 * Regime Run Statistics
 *
 * Segments, transitions and empirical transition probabilities of a label
 * sequence.
 */

import type { RegimeLabel, RegimeState, StatePair } from "./types.js";

export interface RegimeSegment {
	state: RegimeState;
	start: number;
	end: number;
	/** Observations in the segment */
	length: number;
}

export interface RegimeSummary {
	segments: RegimeSegment[];
	transitions: number;
	/** Observations per segment */
	averageDuration: number;
	counts: Record<RegimeState, number>;
	shares: Record<RegimeState, number>;
	/** matrix[i][j] = share of observations in i followed by j */
	transitionMatrix: [StatePair, StatePair];
}

export function findSegments(labels: readonly RegimeLabel[]): RegimeSegment[] {
	const segments: RegimeSegment[] = [];
	let current: RegimeSegment | undefined;

	for (const { timestamp, state } of labels) {
		if (current && current.state === state) {
			current.end = timestamp;
			current.length++;
			continue;
		}
		current = { state, start: timestamp, end: timestamp, length: 1 };
		segments.push(current);
	}

	return segments;
}

export function calculateTransitionMatrix(labels: readonly RegimeLabel[]): [StatePair, StatePair] {
	const counts: [StatePair, StatePair] = [
		[0, 0],
		[0, 0],
	];
	for (let i = 1; i < labels.length; i++) {
		const from = labels[i - 1];
		const to = labels[i];
		if (from && to) {
			counts[from.state][to.state]++;
		}
	}

	const row = (state: RegimeState): StatePair => {
		const [toLow, toHigh] = counts[state];
		const total = toLow + toHigh;
		return total > 0 ? [toLow / total, toHigh / total] : [0, 0];
	};
	return [row(0), row(1)];
}

export function summarizeRegimes(labels: readonly RegimeLabel[]): RegimeSummary {
	const segments = findSegments(labels);
	const counts: Record<RegimeState, number> = { 0: 0, 1: 0 };
	for (const label of labels) {
		counts[label.state]++;
	}
	const total = labels.length;

	return {
		segments,
		transitions: Math.max(segments.length - 1, 0),
		averageDuration: segments.length > 0 ? total / segments.length : 0,
		counts,
		shares: { 0: total > 0 ? counts[0] / total : 0, 1: total > 0 ? counts[1] / total : 0 },
		transitionMatrix: calculateTransitionMatrix(labels),
	};
}
