/**
 * Regime Display Clipping
 *
 * Regimes are fitted over the full history but drawn only under the points
 * the caller actually renders.
 */

import type { DateRange } from "@oscillo/indicators";
import type { RegimeLabel } from "./types.js";

/**
 * Keep labels whose timestamp is in the given set.
 */
export function clipToTimestamps(labels: readonly RegimeLabel[], timestamps: Iterable<number>): RegimeLabel[] {
	const wanted = new Set(timestamps);
	return labels.filter((label) => wanted.has(label.timestamp));
}

/**
 * Keep labels inside the inclusive range.
 */
export function clipToRange(labels: readonly RegimeLabel[], range: DateRange): RegimeLabel[] {
	return labels.filter((label) => label.timestamp >= range.start && label.timestamp <= range.end);
}

export type SerializedRegime = [number, 0 | 1];

export function toRegimeTuples(labels: readonly RegimeLabel[]): SerializedRegime[] {
	return labels.map((label) => [label.timestamp, label.state]);
}
