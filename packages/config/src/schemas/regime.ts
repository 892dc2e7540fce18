/**
 * Regime Classifier Configuration Schema
 *
 * Settings for Garman-Klass volatility and the 2-state Markov-switching fit.
 */

import { z } from "zod";

/**
 * How the most likely state per observation is chosen
 */
export const RegimeDecoding = z.enum(["smoothed", "viterbi"]);
export type RegimeDecoding = z.infer<typeof RegimeDecoding>;

export const RegimeConfigSchema = z.object({
	/**
	 * Volatility observations required before a model is fitted
	 */
	min_observations: z.number().int().min(10).default(30),

	/**
	 * Periods per year used to annualize per-bar variance
	 */
	annualization_factor: z.number().positive().default(252),

	/**
	 * EM iteration cap
	 */
	max_iterations: z.number().int().positive().default(100),

	/**
	 * Log-likelihood change below which EM stops
	 */
	tolerance: z.number().positive().default(1e-8),

	decoding: RegimeDecoding.default("smoothed"),
});
export type RegimeConfig = z.infer<typeof RegimeConfigSchema>;
