/**
 * Pair-Tension Analyzer
 *
 * Two-level divergence between a sentiment leg and a mechanics leg, both
 * already normalized:
 *   Tension₁ = sentiment_z − mechanics_z   (aligned, nulls dropped)
 *   Tension₂ = rolling self z-score of Tension₁
 *
 * A Tension₂ spike above the threshold flags abnormal divergence; the sign
 * of Tension₁ gives its direction.
 */

import { alignSeries } from "./alignment.js";
import { rollingZScore, ZSCORE_DEFAULTS, type ZScoreParams } from "./transforms/zscore.js";
import type { NormalizedSeries, Series, TimePoint } from "./types.js";

export interface TensionPair {
	name: string;
	sentiment: NormalizedSeries;
	mechanics: NormalizedSeries;
}

export interface TensionResult {
	name: string;
	tension1: TimePoint[];
	tension2: NormalizedSeries;
}

export type TensionSignal = "sell_pressure" | "buy_pressure";

export interface TensionSignalPoint {
	timestamp: number;
	signal: TensionSignal;
	tension1: number;
	tension2: number;
}

export const DEFAULT_SIGNAL_THRESHOLD = 2;

/**
 * Sentiment minus mechanics over their shared observed timestamps.
 */
export function calculateTension1(sentiment: Series, mechanics: Series): TimePoint[] {
	const pair = alignSeries(sentiment, mechanics);
	return pair.timestamps.map((timestamp, i) => ({
		timestamp,
		value: (pair.indicator[i] ?? Number.NaN) - (pair.reference[i] ?? Number.NaN),
	}));
}

export function analyzeTension(pair: TensionPair, params: Partial<ZScoreParams> = {}): TensionResult {
	const tension1 = calculateTension1(pair.sentiment.points, pair.mechanics.points);
	const tension2 = rollingZScore(tension1, { ...ZSCORE_DEFAULTS, ...params });
	return { name: pair.name, tension1, tension2 };
}

/**
 * Classify one timestamp from its two tension values.
 */
export function classifyTension(
	tension1: number,
	tension2: number,
	threshold = DEFAULT_SIGNAL_THRESHOLD
): TensionSignal | null {
	if (!(tension2 > threshold)) {
		return null;
	}
	if (tension1 > 0) {
		return "sell_pressure";
	}
	if (tension1 < 0) {
		return "buy_pressure";
	}
	return null;
}

/**
 * Pressure flags over a tension result, in timestamp order.
 */
export function identifyTensionSignals(
	tension1: Series,
	tension2: Series,
	threshold = DEFAULT_SIGNAL_THRESHOLD
): TensionSignalPoint[] {
	const pair = alignSeries(tension2, tension1);
	const signals: TensionSignalPoint[] = [];

	pair.timestamps.forEach((timestamp, i) => {
		const t1 = pair.reference[i];
		const t2 = pair.indicator[i];
		if (t1 === undefined || t2 === undefined) {
			return;
		}
		const signal = classifyTension(t1, t2, threshold);
		if (signal) {
			signals.push({ timestamp, signal, tension1: t1, tension2: t2 });
		}
	});

	return signals;
}
