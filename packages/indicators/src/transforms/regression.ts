/**
 * Regression-Residual Normalizer
 *
 * Scores how far an indicator sits from where its rolling linear
 * relationship with a reference series (usually price) says it should be.
 *
 * Per aligned timestamp t, over the trailing window W ending at t:
 *   indicator ≈ α·reference + β          (OLS over W, t included)
 *   se = sqrt(Σ residual² / (n − 2))
 *   z_t = residual_t / se
 *
 * A score is either a finite z-score or null. Null when:
 *   - W holds fewer than minPeriods points
 *   - the reference is constant over W (singular fit)
 *   - the indicator is constant over W, or the fit is exact (se = 0)
 *   - any intermediate is not finite
 *
 * Interpretation:
 *   0   relationship holds
 *   ±2  significant divergence
 *   ±3  relationship breakdown
 */

import { alignSeries } from "../alignment.js";
import type { AlignedPair, NormalizationMethod, NormalizedSeries, Series, TimePoint } from "../types.js";
import { assertWindow } from "../validation.js";
import { logChanges } from "./returns.js";

// ============================================
// Parameters
// ============================================

export interface RegressionParams {
	/** Trailing window length in aligned observations */
	windowSize: number;
	/** Minimum observations in the window for a score */
	minPeriods: number;
}

export const REGRESSION_DEFAULTS: RegressionParams = {
	windowSize: 30,
	minPeriods: 10,
};

/**
 * Deviation from the window mean, in units of machine epsilon times |mean|,
 * below which a column counts as constant. Rounding in the window mean leaves
 * residue of a few ulp(mean).
 */
const CONSTANT_ULPS = 8;

/**
 * Residual sum of squares, relative to the indicator's variation, below
 * which the fit is treated as exact.
 */
const EXACT_FIT_TOLERANCE = 1e-14;

// ============================================
// Window Fit
// ============================================

export interface WindowFit {
	slope: number;
	intercept: number;
	/** Residual standard error with n − 2 degrees of freedom */
	standardError: number;
	/** Residual of the last point in the window */
	residual: number;
	zscore: number;
}

function isConstant(sumSquares: number, n: number, mean: number): boolean {
	return sumSquares <= n * (CONSTANT_ULPS * Number.EPSILON * Math.abs(mean)) ** 2;
}

/**
 * One aligned observation: reference x, indicator y.
 */
export interface Observation {
	x: number;
	y: number;
}

/**
 * Fit y against x over the window and score its last observation.
 *
 * @returns the fit, or null when it is underdetermined
 */
export function fitWindow(window: readonly Observation[]): WindowFit | null {
	const n = window.length;
	const last = window.at(-1);
	if (n < 3 || last === undefined) {
		return null;
	}

	let sumX = 0;
	let sumY = 0;
	for (const { x, y } of window) {
		sumX += x;
		sumY += y;
	}
	const meanX = sumX / n;
	const meanY = sumY / n;

	let sxx = 0;
	let sxy = 0;
	let syy = 0;
	for (const { x, y } of window) {
		const dx = x - meanX;
		const dy = y - meanY;
		sxx += dx * dx;
		sxy += dx * dy;
		syy += dy * dy;
	}

	if (!Number.isFinite(sxx) || !Number.isFinite(sxy) || !Number.isFinite(syy)) {
		return null;
	}
	if (sxx === 0 || isConstant(sxx, n, meanX)) {
		return null;
	}
	if (syy === 0 || isConstant(syy, n, meanY)) {
		return null;
	}

	const slope = sxy / sxx;
	const intercept = meanY - slope * meanX;

	let ssr = 0;
	for (const { x, y } of window) {
		const residual = y - (slope * x + intercept);
		ssr += residual * residual;
	}
	if (!Number.isFinite(ssr) || ssr <= EXACT_FIT_TOLERANCE * syy) {
		return null;
	}

	const standardError = Math.sqrt(ssr / (n - 2));
	if (!(standardError > 0)) {
		return null;
	}

	const residual = last.y - (slope * last.x + intercept);
	const zscore = residual / standardError;
	if (!Number.isFinite(zscore)) {
		return null;
	}

	return { slope, intercept, standardError, residual, zscore };
}

// ============================================
// Rolling Normalization
// ============================================

/**
 * Rolling z-scores over an already aligned pair, one point per aligned timestamp.
 */
export function scoreAlignedPair(pair: AlignedPair, params: RegressionParams = REGRESSION_DEFAULTS): TimePoint[] {
	const { windowSize, minPeriods } = params;
	assertWindow(windowSize, minPeriods);

	const observations = pair.reference.map((x, i): Observation => ({ x, y: pair.indicator[i] ?? Number.NaN }));

	return pair.timestamps.map((timestamp, t) => {
		const window = observations.slice(Math.max(0, t - windowSize + 1), t + 1);
		if (window.length < minPeriods) {
			return { timestamp, value: null };
		}
		return { timestamp, value: fitWindow(window)?.zscore ?? null };
	});
}

function normalized(points: TimePoint[], params: RegressionParams, method: NormalizationMethod): NormalizedSeries {
	return {
		points,
		metadata: { windowSize: params.windowSize, minPeriods: params.minPeriods, method },
	};
}

/**
 * Normalize an indicator against the level of a reference series.
 *
 * @param indicator - Raw indicator series, ascending
 * @param reference - Reference series (close price), ascending
 * @throws ValidationError for unsorted input or an invalid window
 */
export function normalizeRegression(
	indicator: Series,
	reference: Series,
	params: Partial<RegressionParams> = {}
): NormalizedSeries {
	const resolved = { ...REGRESSION_DEFAULTS, ...params };
	const pair = alignSeries(indicator, reference);
	return normalized(scoreAlignedPair(pair, resolved), resolved, "ols_residual");
}

/**
 * Normalize an indicator against the log change of the reference
 * (velocity-anchored). The reference is transformed over its own consecutive
 * observations before alignment.
 */
export function normalizePctChange(
	indicator: Series,
	reference: Series,
	params: Partial<RegressionParams> = {}
): NormalizedSeries {
	const resolved = { ...REGRESSION_DEFAULTS, ...params };
	const pair = alignSeries(indicator, logChanges(reference));
	return normalized(scoreAlignedPair(pair, resolved), resolved, "ols_residual_pct_change");
}

/**
 * Score thresholds and descriptive statistics for a normalized series.
 */
export interface NormalizationSummary {
	count: number;
	mean: number | null;
	stdDev: number | null;
	sigmaBands: readonly [1, 2, 3];
}

export function summarizeScores(series: NormalizedSeries): NormalizationSummary {
	const values = series.points.flatMap((point) => (point.value === null ? [] : [point.value]));
	if (values.length === 0) {
		return { count: 0, mean: null, stdDev: null, sigmaBands: [1, 2, 3] };
	}
	const mean = values.reduce((a, b) => a + b, 0) / values.length;
	const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
	return { count: values.length, mean, stdDev: Math.sqrt(variance), sigmaBands: [1, 2, 3] };
}

/**
 * Normalize and summarize in one pass, for views that draw sigma bands.
 */
export function normalizeWithThresholds(
	indicator: Series,
	reference: Series,
	params: Partial<RegressionParams> = {}
): { series: NormalizedSeries; summary: NormalizationSummary } {
	const series = normalizeRegression(indicator, reference, params);
	return { series, summary: summarizeScores(series) };
}

export interface Outlier {
	timestamp: number;
	zscore: number;
}

/**
 * Points whose |z| reaches the threshold.
 */
export function detectOutliers(series: NormalizedSeries, threshold = 2): Outlier[] {
	const outliers: Outlier[] = [];
	for (const point of series.points) {
		if (point.value !== null && Math.abs(point.value) >= threshold) {
			outliers.push({ timestamp: point.timestamp, zscore: point.value });
		}
	}
	return outliers;
}

/**
 * Display metadata for the regression normalizer.
 */
export function describeNormalizer(method: "regression" | "pct_change" = "regression") {
	const velocity = method === "pct_change";
	return {
		name: velocity ? "Velocity Regression Divergence" : "Regression Divergence",
		shortName: method,
		formula: velocity
			? "ε_t / se(ε) from rolling OLS of indicator on ln(P_t / P_t-1)"
			: "ε_t / se(ε) from rolling OLS of indicator on price",
		zeroLineMeaning: velocity ? "Expected velocity relationship holds" : "Expected relationship holds",
		positiveMeaning: "Indicator higher than predicted",
		negativeMeaning: "Indicator lower than predicted",
		unit: "σ",
	} as const;
}
