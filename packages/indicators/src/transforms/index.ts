/**
 * Normalization Transforms
 */

// Log changes
export { logChange, logChanges } from "./returns.js";

// Regression residual
export {
	describeNormalizer,
	detectOutliers,
	fitWindow,
	type NormalizationSummary,
	normalizePctChange,
	normalizeRegression,
	normalizeWithThresholds,
	type Observation,
	type Outlier,
	REGRESSION_DEFAULTS,
	type RegressionParams,
	scoreAlignedPair,
	summarizeScores,
	type WindowFit,
} from "./regression.js";

// Rolling z-score
export {
	calculateMean,
	calculateStdDev,
	rollingZScore,
	ZSCORE_DEFAULTS,
	type ZScoreParams,
} from "./zscore.js";
