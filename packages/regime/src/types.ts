/**
 * Regime Types
 */

/** 0 = low volatility, 1 = high volatility */
export type RegimeState = 0 | 1;

export interface RegimeLabel {
	/** Unix timestamp in milliseconds */
	timestamp: number;
	state: RegimeState;
}

export interface RegimeStateInfo {
	/** Stable identifier */
	name: string;
	label: string;
	/** Line color */
	color: string;
	/** Background band color */
	fill: string;
	description: string;
}

export interface RegimeMetadata {
	label: string;
	states: Record<RegimeState, RegimeStateInfo>;
}

/** Pair of per-state values, indexed by state */
export type StatePair = [number, number];

/**
 * Fitted 2-state Markov-switching model with state-dependent mean and variance.
 * States are ordered so that `means[0] <= means[1]`.
 */
export interface MarkovSwitchingModel {
	means: StatePair;
	variances: StatePair;
	/** transition[i][j] = P(s_t = j | s_{t-1} = i) */
	transition: [StatePair, StatePair];
	/** P(s_0 = j) */
	initial: StatePair;
	logLikelihood: number;
	iterations: number;
	converged: boolean;
	observations: number;
}

export type RegimeDecodingMethod = "smoothed" | "viterbi";

export type ClassificationMethod = "markov" | "threshold";

export interface RegimeClassification {
	/** One label per observed volatility point */
	labels: RegimeLabel[];
	metadata: RegimeMetadata;
	/** Absent when the threshold fallback was used */
	model?: MarkovSwitchingModel;
	method: ClassificationMethod;
}
