/**
 * Static Sources
 *
 * In-memory sources over data already loaded (fixtures, snapshots, tests).
 */

import {
	assertStrictlyIncreasing,
	clipToRange,
	type DateRange,
	type OHLCVBar,
	type Series,
} from "@oscillo/indicators";
import { log } from "./logger.js";
import type { DatasetMetadata, OhlcvSource, SeriesSource } from "./types.js";

export type StaticSourceMetadata = Omit<DatasetMetadata, "kind">;

/**
 * @throws ValidationError when the points are not strictly increasing
 */
export function createStaticSeriesSource(metadata: StaticSourceMetadata, points: Series): SeriesSource {
	assertStrictlyIncreasing(points, metadata.id);
	const data = [...points];

	return {
		kind: "series",
		id: metadata.id,
		describe: () => ({ ...metadata, kind: "series" }),
		async fetch(range: DateRange) {
			const clipped = clipToRange(data, range);
			log.debug({ dataset: metadata.id, points: clipped.length }, "Served static series");
			return clipped;
		},
	};
}

/**
 * @throws ValidationError when the bars are not strictly increasing
 */
export function createStaticOhlcvSource(metadata: StaticSourceMetadata, bars: readonly OHLCVBar[]): OhlcvSource {
	assertStrictlyIncreasing(bars, metadata.id);
	const data = [...bars];

	return {
		kind: "ohlcv",
		id: metadata.id,
		describe: () => ({ ...metadata, kind: "ohlcv" }),
		async fetch(range: DateRange) {
			const clipped = clipToRange(data, range);
			log.debug({ dataset: metadata.id, bars: clipped.length }, "Served static bars");
			return clipped;
		},
	};
}
