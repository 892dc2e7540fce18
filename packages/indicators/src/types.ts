/**
 * Series Types
 *
 * Plain numeric time series consumed and produced by the normalization engine.
 */

// ============================================
// Raw Series
// ============================================

/**
 * One observation. `null` means "no observation" (e.g. a non-trading day),
 * never a zero signal.
 */
export interface TimePoint {
	/** Unix timestamp in milliseconds (UTC) */
	timestamp: number;
	value: number | null;
}

/**
 * Ordered observations with strictly increasing, unique timestamps.
 */
export type Series = readonly TimePoint[];

/**
 * OHLCV bar for volatility estimation.
 */
export interface OHLCVBar {
	/** Unix timestamp in milliseconds */
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Inclusive timestamp range (milliseconds).
 */
export interface DateRange {
	start: number;
	end: number;
}

// ============================================
// Derived Series
// ============================================

/**
 * Two series joined on their shared, non-null timestamps.
 */
export interface AlignedPair {
	timestamps: number[];
	indicator: number[];
	reference: number[];
}

export type NormalizationMethod = "ols_residual" | "ols_residual_pct_change" | "rolling_zscore";

export interface NormalizedSeriesMetadata {
	windowSize: number;
	minPeriods: number;
	method: NormalizationMethod;
}

/**
 * Z-scores with the settings that produced them. A point is `null` whenever
 * the score was underdetermined at that timestamp.
 */
export interface NormalizedSeries {
	points: Series;
	metadata: NormalizedSeriesMetadata;
}

/**
 * Weight and sign of one composite component.
 */
export interface CompositeWeighting {
	weight: number;
	invert: boolean;
}

export type CompositeConfig = Readonly<Record<string, CompositeWeighting>>;

// ============================================
// Wire Shapes
// ============================================

/**
 * `[timestamp_ms, value_or_null]`, the point shape the chart layer plots.
 */
export type SerializedPoint = [number, number | null];

export function toTuples(series: Series): SerializedPoint[] {
	return series.map((point) => [point.timestamp, point.value]);
}

export function fromTuples(tuples: readonly (readonly [number, number | null])[]): TimePoint[] {
	return tuples.map(([timestamp, value]) => ({ timestamp, value }));
}

/**
 * Keep only points inside the inclusive range.
 */
export function clipToRange<T extends { timestamp: number }>(points: readonly T[], range: DateRange): T[] {
	return points.filter((point) => point.timestamp >= range.start && point.timestamp <= range.end);
}

export function isFiniteNumber(value: number | null | undefined): value is number {
	return typeof value === "number" && Number.isFinite(value);
}
