/**
 * @oscillo/indicators
 *
 * Normalization engine: alignment, regression-residual z-scores, rolling
 * z-scores, composites, Garman-Klass volatility and pair tension.
 *
 * @example
 * ```ts
 * import { aggregateComposite, normalizeRegression } from "@oscillo/indicators";
 *
 * const rsi = normalizeRegression(rsiSeries, closeSeries, { windowSize: 50 });
 * const macd = normalizeRegression(macdSeries, closeSeries, { windowSize: 50 });
 * const composite = aggregateComposite({ rsi: rsi.points, macd: macd.points });
 * ```
 */

export { type AlignedGroup, alignMany, alignSeries, reindex } from "./alignment.js";
export {
	type CompositeResult,
	aggregateComposite,
	DEFAULT_COMPONENT_WEIGHTING,
	equalWeightConfig,
} from "./composite.js";
export { DataInsufficientError, InsufficientDataError, ValidationError } from "./errors.js";
export {
	analyzeTension,
	calculateTension1,
	classifyTension,
	DEFAULT_SIGNAL_THRESHOLD,
	identifyTensionSignals,
	type TensionPair,
	type TensionResult,
	type TensionSignal,
	type TensionSignalPoint,
} from "./tension.js";
export * from "./transforms/index.js";
export * from "./types.js";
export { assertStrictlyIncreasing, assertWindow, validateBar } from "./validation.js";
export * from "./volatility/index.js";
