/**
 * Regime Classifier
 *
 * Labels each volatility observation as low-vol (0) or high-vol (1) from a
 * 2-state Markov-switching fit over the whole series. State 0 always has the
 * lower conditional mean volatility. When the fit degenerates the series is
 * split at its median instead.
 */

import type { RegimeConfig } from "@oscillo/config";
import {
	garmanKlassVolatility,
	InsufficientDataError,
	isFiniteNumber,
	type OHLCVBar,
	type Series,
	TRADING_DAYS_PER_YEAR,
} from "@oscillo/indicators";
import { log } from "./logger.js";
import {
	DegenerateFitError,
	decodeSmoothed,
	decodeViterbi,
	fitMarkovSwitching,
	MARKOV_SWITCHING_DEFAULTS,
	quantile,
} from "./markovSwitching.js";
import { getRegimeMetadata } from "./metadata.js";
import type {
	MarkovSwitchingModel,
	RegimeClassification,
	RegimeDecodingMethod,
	RegimeLabel,
	RegimeState,
} from "./types.js";

// ============================================
// Options
// ============================================

export interface RegimeClassifierOptions {
	/** Observed volatility points required for a fit */
	minObservations: number;
	maxIterations: number;
	tolerance: number;
	decoding: RegimeDecodingMethod;
}

export const DEFAULT_REGIME_OPTIONS: RegimeClassifierOptions = {
	minObservations: 30,
	maxIterations: MARKOV_SWITCHING_DEFAULTS.maxIterations,
	tolerance: MARKOV_SWITCHING_DEFAULTS.tolerance,
	decoding: "smoothed",
};

/**
 * Map the `regime` config section onto classifier options.
 */
export function regimeOptionsFromConfig(config: RegimeConfig): RegimeDetectionOptions {
	return {
		minObservations: config.min_observations,
		maxIterations: config.max_iterations,
		tolerance: config.tolerance,
		decoding: config.decoding,
		annualizationFactor: config.annualization_factor,
	};
}

// ============================================
// Threshold Fallback
// ============================================

/**
 * Label points above the given percentile of the series as high-vol.
 */
export function thresholdRegimes(
	timestamps: readonly number[],
	values: readonly number[],
	percentile = 50
): RegimeLabel[] {
	const threshold = quantile(
		[...values].sort((a, b) => a - b),
		percentile / 100
	);
	return timestamps.map((timestamp, i): RegimeLabel => ({
		timestamp,
		state: (values[i] ?? Number.NaN) > threshold ? 1 : 0,
	}));
}

// ============================================
// Classification
// ============================================

function conditionalMeans(values: readonly number[], states: readonly RegimeState[]): [number | null, number | null] {
	const sums = [0, 0];
	const counts = [0, 0];
	states.forEach((state, i) => {
		sums[state] = (sums[state] ?? 0) + (values[i] ?? 0);
		counts[state] = (counts[state] ?? 0) + 1;
	});
	const meanOf = (state: RegimeState): number | null => {
		const count = counts[state] ?? 0;
		return count > 0 ? (sums[state] ?? 0) / count : null;
	};
	return [meanOf(0), meanOf(1)];
}

function swapped(model: MarkovSwitchingModel): MarkovSwitchingModel {
	return {
		...model,
		means: [model.means[1], model.means[0]],
		variances: [model.variances[1], model.variances[0]],
		transition: [
			[model.transition[1][1], model.transition[1][0]],
			[model.transition[0][1], model.transition[0][0]],
		],
		initial: [model.initial[1], model.initial[0]],
	};
}

/**
 * Classify a volatility series into regimes.
 *
 * Null and non-finite points are skipped; every observed point gets a label.
 *
 * @throws InsufficientDataError when fewer than `minObservations` points are observed
 */
export function classifyRegimes(
	volatility: Series,
	options: Partial<RegimeClassifierOptions> = {}
): RegimeClassification {
	const { minObservations, maxIterations, tolerance, decoding } = { ...DEFAULT_REGIME_OPTIONS, ...options };

	const timestamps: number[] = [];
	const values: number[] = [];
	for (const point of volatility) {
		if (isFiniteNumber(point.value)) {
			timestamps.push(point.timestamp);
			values.push(point.value);
		}
	}

	if (values.length < minObservations) {
		throw new InsufficientDataError("regime", values.length, minObservations);
	}

	let model: MarkovSwitchingModel;
	let states: RegimeState[];
	try {
		const fit = fitMarkovSwitching(values, { maxIterations, tolerance });
		model = fit.model;
		states = decoding === "viterbi" ? decodeViterbi(values, model) : decodeSmoothed(fit.smoothed);
	} catch (error) {
		if (!(error instanceof DegenerateFitError)) {
			throw error;
		}
		log.warn(
			{ observations: values.length, reason: error.message },
			"Markov fit degenerate, using median threshold"
		);
		return {
			labels: thresholdRegimes(timestamps, values),
			metadata: getRegimeMetadata(),
			method: "threshold",
		};
	}

	const [lowMean, highMean] = conditionalMeans(values, states);
	if (lowMean !== null && highMean !== null && lowMean > highMean) {
		states = states.map((state): RegimeState => (state === 0 ? 1 : 0));
		model = swapped(model);
	}

	const labels = timestamps.map((timestamp, i): RegimeLabel => ({ timestamp, state: states[i] ?? 0 }));

	log.debug(
		{
			observations: values.length,
			iterations: model.iterations,
			converged: model.converged,
			logLikelihood: model.logLikelihood,
			highVolShare: labels.filter((label) => label.state === 1).length / labels.length,
		},
		"Regimes classified"
	);

	return { labels, metadata: getRegimeMetadata(), model, method: "markov" };
}

export interface RegimeDetectionOptions extends RegimeClassifierOptions {
	annualizationFactor: number;
}

/**
 * Garman-Klass volatility from bars, then regimes over it.
 */
export function detectRegimes(
	bars: readonly OHLCVBar[],
	options: Partial<RegimeDetectionOptions> = {}
): RegimeClassification & { volatility: Series } {
	const { annualizationFactor = TRADING_DAYS_PER_YEAR, ...classifierOptions } = options;
	const volatility = garmanKlassVolatility(bars, { annualizationFactor });
	return { ...classifyRegimes(volatility, classifierOptions), volatility };
}
