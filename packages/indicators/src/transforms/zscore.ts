/**
 * Rolling Z-Score Transform
 *
 * Self-standardization of a series against its own trailing window:
 *   Z = (X - μ) / σ
 *   where μ = rolling mean, σ = rolling sample standard deviation
 *
 * Same null policy as the regression normalizer: too few observations or a
 * zero deviation give null, never 0.
 *
 * @see https://en.wikipedia.org/wiki/Standard_score
 */

import type { NormalizedSeries, Series, TimePoint } from "../types.js";
import { assertWindow } from "../validation.js";

// ============================================
// Parameters
// ============================================

export interface ZScoreParams {
	/** Rolling window length in observations */
	windowSize: number;
	/** Minimum observations required for a score */
	minPeriods: number;
}

export const ZSCORE_DEFAULTS: ZScoreParams = {
	windowSize: 30,
	minPeriods: 10,
};

// ============================================
// Statistical Functions
// ============================================

export function calculateMean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Standard deviation with `ddof` delta degrees of freedom (0 = population, 1 = sample).
 */
export function calculateStdDev(values: readonly number[], mean?: number, ddof = 0): number {
	if (values.length - ddof <= 0 || values.length < 2) return 0;

	const m = mean ?? calculateMean(values);
	const sumSquares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);

	return Math.sqrt(sumSquares / (values.length - ddof));
}

// ============================================
// Z-Score Calculation
// ============================================

/**
 * Rolling self z-score of a series, one point per input point.
 *
 * The window holds the last `windowSize` observed (non-null) values up to
 * and including t. Null inputs stay null.
 */
export function rollingZScore(series: Series, params: Partial<ZScoreParams> = {}): NormalizedSeries {
	const { windowSize, minPeriods } = { ...ZSCORE_DEFAULTS, ...params };
	assertWindow(windowSize, minPeriods, 2);

	const history: number[] = [];
	const points = series.map((point): TimePoint => {
		const { timestamp, value } = point;
		if (value === null || !Number.isFinite(value)) {
			return { timestamp, value: null };
		}

		history.push(value);
		if (history.length > windowSize) {
			history.shift();
		}
		const window = history;
		if (window.length < minPeriods) {
			return { timestamp, value: null };
		}

		const mean = calculateMean(window);
		const std = calculateStdDev(window, mean, 1);
		const zscore = (value - mean) / std;

		return { timestamp, value: std > 0 && Number.isFinite(zscore) ? zscore : null };
	});

	return { points, metadata: { windowSize, minPeriods, method: "rolling_zscore" } };
}
