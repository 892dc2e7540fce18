/**
 * Log-Change Transform
 *
 * Velocity view of a series: ln(P_t / P_{t-1}) between consecutive
 * observations.
 */

import type { Series, TimePoint } from "../types.js";

/**
 * Log change between two levels; null when either is missing or not positive.
 */
export function logChange(current: number | null, previous: number | null): number | null {
	if (current === null || previous === null) {
		return null;
	}
	if (!(current > 0) || !(previous > 0)) {
		return null;
	}
	const change = Math.log(current / previous);
	return Number.isFinite(change) ? change : null;
}

/**
 * Log change of each point relative to the point before it.
 *
 * The output keeps the input's timestamps. The first point, and any point
 * next to a gap, is null.
 */
export function logChanges(series: Series): TimePoint[] {
	return series.map((point, i) => ({
		timestamp: point.timestamp,
		value: logChange(point.value, series[i - 1]?.value ?? null),
	}));
}
