/**
 * Markov-Switching Model
 *
 * Two hidden states, each with its own mean and variance, linked by a
 * first-order Markov chain:
 *
 *   y_t | s_t = j  ~  N(μ_j, σ²_j)
 *   P(s_t = j | s_{t-1} = i) = p_ij
 *
 * Fitted by expectation-maximization. The E-step runs the Hamilton filter
 * forward and the Kim smoother backward; the M-step re-estimates means,
 * variances and transition probabilities from the smoothed probabilities.
 *
 * Initialization is deterministic (median split), so identical input gives
 * an identical fit.
 */

import type { MarkovSwitchingModel, RegimeState, StatePair } from "./types.js";

// ============================================
// Parameters
// ============================================

export interface MarkovSwitchingParams {
	/** EM iteration cap */
	maxIterations: number;
	/** Stop once the log-likelihood improves by less than this */
	tolerance: number;
}

export const MARKOV_SWITCHING_DEFAULTS: MarkovSwitchingParams = {
	maxIterations: 100,
	tolerance: 1e-8,
};

/** Variance floor relative to the sample variance; keeps a state from collapsing onto one point */
const VARIANCE_FLOOR_RATIO = 1e-6;

const INITIAL_PERSISTENCE = 0.9;

const LOG_SQRT_2PI = 0.5 * Math.log(2 * Math.PI);

/**
 * Thrown when the data cannot identify two states (constant input, or a
 * likelihood that stops being finite).
 */
export class DegenerateFitError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "DegenerateFitError";
	}
}

// ============================================
// Helpers
// ============================================

function mean(values: readonly number[]): number {
	let sum = 0;
	for (const v of values) sum += v;
	return sum / values.length;
}

function variance(values: readonly number[], m: number): number {
	let sum = 0;
	for (const v of values) sum += (v - m) ** 2;
	return sum / values.length;
}

/**
 * Linear-interpolated quantile of an ascending array.
 */
export function quantile(sorted: readonly number[], q: number): number {
	if (sorted.length === 0) {
		return Number.NaN;
	}
	const position = (sorted.length - 1) * q;
	const lower = Math.floor(position);
	const upper = Math.ceil(position);
	const lo = sorted[lower] ?? Number.NaN;
	const hi = sorted[upper] ?? Number.NaN;
	return lo + (hi - lo) * (position - lower);
}

function logDensity(y: number, mu: number, sigma2: number): number {
	return -LOG_SQRT_2PI - 0.5 * Math.log(sigma2) - ((y - mu) ** 2) / (2 * sigma2);
}

function stateLogDensities(y: number, model: ModelParameters): StatePair {
	return [logDensity(y, model.means[0], model.variances[0]), logDensity(y, model.means[1], model.variances[1])];
}

export interface ModelParameters {
	means: StatePair;
	variances: StatePair;
	transition: [StatePair, StatePair];
	initial: StatePair;
}

// ============================================
// Initialization
// ============================================

/**
 * Split at the median: the lower half seeds state 0, the upper half state 1.
 */
function initialParameters(values: readonly number[], varianceFloor: number): ModelParameters {
	const sorted = [...values].sort((a, b) => a - b);
	const median = quantile(sorted, 0.5);
	const low = values.filter((v) => v <= median);
	const high = values.filter((v) => v > median);
	if (low.length === 0 || high.length === 0) {
		throw new DegenerateFitError("median split leaves an empty state");
	}

	const lowMean = mean(low);
	const highMean = mean(high);
	return {
		means: [lowMean, highMean],
		variances: [Math.max(variance(low, lowMean), varianceFloor), Math.max(variance(high, highMean), varianceFloor)],
		transition: [
			[INITIAL_PERSISTENCE, 1 - INITIAL_PERSISTENCE],
			[1 - INITIAL_PERSISTENCE, INITIAL_PERSISTENCE],
		],
		initial: [0.5, 0.5],
	};
}

// ============================================
// E-step
// ============================================

export interface FilterResult {
	/** P(s_t | y_1..t) */
	filtered: StatePair[];
	/** P(s_t | y_1..t-1) */
	predicted: StatePair[];
	logLikelihood: number;
}

/**
 * Hamilton filter, in log space for the densities so that far-out
 * observations do not underflow.
 */
export function hamiltonFilter(values: readonly number[], model: ModelParameters): FilterResult {
	const filtered: StatePair[] = [];
	const predicted: StatePair[] = [];
	let logLikelihood = 0;
	let previous: StatePair | undefined;

	for (const y of values) {
		const prior: StatePair = previous
			? [
					previous[0] * model.transition[0][0] + previous[1] * model.transition[1][0],
					previous[0] * model.transition[0][1] + previous[1] * model.transition[1][1],
				]
			: [model.initial[0], model.initial[1]];

		const [l0, l1] = stateLogDensities(y, model);
		const shift = Math.max(l0, l1);
		const joint0 = prior[0] * Math.exp(l0 - shift);
		const joint1 = prior[1] * Math.exp(l1 - shift);
		const total = joint0 + joint1;

		logLikelihood += Math.log(total) + shift;
		const posterior: StatePair = [joint0 / total, joint1 / total];

		predicted.push(prior);
		filtered.push(posterior);
		previous = posterior;
	}

	return { filtered, predicted, logLikelihood };
}

export interface SmootherResult {
	/** P(s_t | y_1..T) */
	smoothed: StatePair[];
	/** Σ_t P(s_t = i, s_{t+1} = j | y_1..T) */
	transitionCounts: [StatePair, StatePair];
}

/**
 * Kim smoother over a filter pass.
 */
export function kimSmoother(filter: FilterResult, model: ModelParameters): SmootherResult {
	const { filtered, predicted } = filter;
	const n = filtered.length;
	const smoothed: StatePair[] = new Array<StatePair>(n);
	const transitionCounts: [StatePair, StatePair] = [
		[0, 0],
		[0, 0],
	];

	const last = filtered[n - 1];
	if (last === undefined) {
		return { smoothed: [], transitionCounts };
	}
	smoothed[n - 1] = [last[0], last[1]];

	for (let t = n - 2; t >= 0; t--) {
		const current = filtered[t];
		const next = smoothed[t + 1];
		const nextPrior = predicted[t + 1];
		if (!current || !next || !nextPrior) {
			continue;
		}

		const ratio: StatePair = [
			nextPrior[0] > 0 ? next[0] / nextPrior[0] : 0,
			nextPrior[1] > 0 ? next[1] / nextPrior[1] : 0,
		];
		const row: StatePair = [0, 0];
		for (const i of [0, 1] as const) {
			for (const j of [0, 1] as const) {
				const joint = current[i] * model.transition[i][j] * ratio[j];
				row[i] += joint;
				transitionCounts[i][j] += joint;
			}
		}
		smoothed[t] = row;
	}

	return { smoothed, transitionCounts };
}

// ============================================
// M-step
// ============================================

function maximize(
	values: readonly number[],
	smoothing: SmootherResult,
	varianceFloor: number
): ModelParameters {
	const { smoothed, transitionCounts } = smoothing;
	const weight: StatePair = [0, 0];
	const weightedSum: StatePair = [0, 0];

	values.forEach((y, t) => {
		const p = smoothed[t];
		if (!p) return;
		for (const j of [0, 1] as const) {
			weight[j] += p[j];
			weightedSum[j] += p[j] * y;
		}
	});

	const means: StatePair = [weightedSum[0] / weight[0], weightedSum[1] / weight[1]];
	const squared: StatePair = [0, 0];
	values.forEach((y, t) => {
		const p = smoothed[t];
		if (!p) return;
		for (const j of [0, 1] as const) {
			squared[j] += p[j] * (y - means[j]) ** 2;
		}
	});
	const variances: StatePair = [
		Math.max(squared[0] / weight[0], varianceFloor),
		Math.max(squared[1] / weight[1], varianceFloor),
	];

	const transitionRow = (i: RegimeState): StatePair => {
		const counts = transitionCounts[i];
		const total = counts[0] + counts[1];
		return total > 0 ? [counts[0] / total, counts[1] / total] : [0.5, 0.5];
	};

	const first = smoothed[0] ?? [0.5, 0.5];
	return {
		means,
		variances,
		transition: [transitionRow(0), transitionRow(1)],
		initial: [first[0], first[1]],
	};
}

function isFiniteModel(model: ModelParameters): boolean {
	return [...model.means, ...model.variances, ...model.transition[0], ...model.transition[1]].every((v) =>
		Number.isFinite(v)
	);
}

// ============================================
// Fit
// ============================================

export interface MarkovSwitchingFit {
	model: MarkovSwitchingModel;
	/** Smoothed P(s_t | all observations), per observation */
	smoothed: StatePair[];
}

/**
 * Swap state indices so that state 0 has the lower mean.
 */
function ordered(fit: MarkovSwitchingFit): MarkovSwitchingFit {
	const { model, smoothed } = fit;
	if (model.means[0] <= model.means[1]) {
		return fit;
	}
	return {
		model: {
			...model,
			means: [model.means[1], model.means[0]],
			variances: [model.variances[1], model.variances[0]],
			transition: [
				[model.transition[1][1], model.transition[1][0]],
				[model.transition[0][1], model.transition[0][0]],
			],
			initial: [model.initial[1], model.initial[0]],
		},
		smoothed: smoothed.map(([p0, p1]): StatePair => [p1, p0]),
	};
}

/**
 * Fit the 2-state model to a sequence of observations.
 *
 * @throws DegenerateFitError when two states cannot be identified
 */
export function fitMarkovSwitching(
	values: readonly number[],
	params: Partial<MarkovSwitchingParams> = {}
): MarkovSwitchingFit {
	const { maxIterations, tolerance } = { ...MARKOV_SWITCHING_DEFAULTS, ...params };
	if (values.length < 2 || !values.every((v) => Number.isFinite(v))) {
		throw new DegenerateFitError("need at least two finite observations");
	}

	const sampleVariance = variance(values, mean(values));
	if (!(sampleVariance > 0)) {
		throw new DegenerateFitError("observations have zero variance");
	}
	const varianceFloor = sampleVariance * VARIANCE_FLOOR_RATIO;

	let parameters = initialParameters(values, varianceFloor);
	let filter = hamiltonFilter(values, parameters);
	let smoothing = kimSmoother(filter, parameters);
	let iterations = 0;
	let converged = false;

	while (iterations < maxIterations) {
		const next = maximize(values, smoothing, varianceFloor);
		if (!isFiniteModel(next)) {
			throw new DegenerateFitError(`non-finite parameters after ${iterations} iterations`);
		}
		const nextFilter = hamiltonFilter(values, next);
		if (!Number.isFinite(nextFilter.logLikelihood)) {
			throw new DegenerateFitError(`non-finite log-likelihood after ${iterations} iterations`);
		}
		iterations++;

		const improvement = nextFilter.logLikelihood - filter.logLikelihood;
		parameters = next;
		filter = nextFilter;
		smoothing = kimSmoother(filter, parameters);

		if (Math.abs(improvement) < tolerance) {
			converged = true;
			break;
		}
	}

	return ordered({
		model: {
			...parameters,
			logLikelihood: filter.logLikelihood,
			iterations,
			converged,
			observations: values.length,
		},
		smoothed: smoothing.smoothed,
	});
}

// ============================================
// Decoding
// ============================================

/**
 * Most likely state per observation from smoothed probabilities.
 * Ties go to state 0.
 */
export function decodeSmoothed(smoothed: readonly StatePair[]): RegimeState[] {
	return smoothed.map(([p0, p1]): RegimeState => (p1 > p0 ? 1 : 0));
}

/**
 * Most likely state path (Viterbi) under a fitted model.
 */
export function decodeViterbi(values: readonly number[], model: ModelParameters): RegimeState[] {
	if (values.length === 0) {
		return [];
	}

	const logTransition = model.transition.map((row) => row.map((p) => Math.log(p)));
	const backPointers: [RegimeState, RegimeState][] = [];
	let scores: StatePair = [0, 0];

	values.forEach((y, t) => {
		const densities = stateLogDensities(y, model);
		if (t === 0) {
			scores = [Math.log(model.initial[0]) + densities[0], Math.log(model.initial[1]) + densities[1]];
			return;
		}

		const next: StatePair = [0, 0];
		const pointers: [RegimeState, RegimeState] = [0, 0];
		for (const j of [0, 1] as const) {
			const from0 = scores[0] + (logTransition[0]?.[j] ?? Number.NEGATIVE_INFINITY);
			const from1 = scores[1] + (logTransition[1]?.[j] ?? Number.NEGATIVE_INFINITY);
			pointers[j] = from1 > from0 ? 1 : 0;
			next[j] = Math.max(from0, from1) + densities[j];
		}
		backPointers.push(pointers);
		scores = next;
	});

	const path: RegimeState[] = new Array<RegimeState>(values.length);
	let state: RegimeState = scores[1] > scores[0] ? 1 : 0;
	path[values.length - 1] = state;
	for (let t = values.length - 1; t > 0; t--) {
		const pointers = backPointers[t - 1];
		if (pointers) {
			state = pointers[state];
		}
		path[t - 1] = state;
	}
	return path;
}
