/**
 * Volatility Regime Package
 *
 * 2-state Markov-switching classification of Garman-Klass volatility into
 * low-vol and high-vol regimes, with display helpers and run statistics.
 *
 * @example
 * ```ts
 * import { clipToTimestamps, detectRegimes, summarizeRegimes } from "@oscillo/regime";
 *
 * const { labels, metadata } = detectRegimes(bars, { minObservations: 30 });
 * const visible = clipToTimestamps(labels, composite.map((p) => p.timestamp));
 * const { transitions, averageDuration } = summarizeRegimes(visible);
 * ```
 */

// Classifier
export {
	classifyRegimes,
	DEFAULT_REGIME_OPTIONS,
	detectRegimes,
	type RegimeClassifierOptions,
	type RegimeDetectionOptions,
	regimeOptionsFromConfig,
	thresholdRegimes,
} from "./classifier.js";
// Display
export { clipToRange, clipToTimestamps, type SerializedRegime, toRegimeTuples } from "./display.js";
// Model
export {
	DegenerateFitError,
	decodeSmoothed,
	decodeViterbi,
	fitMarkovSwitching,
	hamiltonFilter,
	kimSmoother,
	MARKOV_SWITCHING_DEFAULTS,
	type MarkovSwitchingFit,
	type MarkovSwitchingParams,
	quantile,
} from "./markovSwitching.js";
export { getRegimeMetadata, REGIME_METADATA } from "./metadata.js";
// Run statistics
export {
	calculateTransitionMatrix,
	findSegments,
	type RegimeSegment,
	type RegimeSummary,
	summarizeRegimes,
} from "./transitions.js";
export type * from "./types.js";
