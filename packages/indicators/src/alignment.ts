/**
 * Time Series Alignment
 *
 * Exact-timestamp joins. Nothing is interpolated or forward-filled, so
 * market-closed gaps stay gaps, and a matched timestamp where either side
 * is missing is dropped rather than carried as null.
 */

import { type AlignedPair, isFiniteNumber, type Series } from "./types.js";
import { assertStrictlyIncreasing } from "./validation.js";

function observedLookup(series: Series): Map<number, number> {
	const lookup = new Map<number, number>();
	for (const point of series) {
		if (isFiniteNumber(point.value)) {
			lookup.set(point.timestamp, point.value);
		}
	}
	return lookup;
}

/**
 * Join an indicator and a reference series on shared timestamps.
 *
 * @param indicator - Indicator series, ascending
 * @param reference - Reference series (typically close price), ascending
 * @returns Ascending pair; empty when nothing matches
 * @throws ValidationError if either input is not strictly increasing
 */
export function alignSeries(indicator: Series, reference: Series): AlignedPair {
	assertStrictlyIncreasing(indicator, "indicator");
	assertStrictlyIncreasing(reference, "reference");

	const referenceLookup = observedLookup(reference);
	const aligned: AlignedPair = { timestamps: [], indicator: [], reference: [] };

	for (const point of indicator) {
		if (!isFiniteNumber(point.value)) {
			continue;
		}
		const referenceValue = referenceLookup.get(point.timestamp);
		if (referenceValue === undefined) {
			continue;
		}
		aligned.timestamps.push(point.timestamp);
		aligned.indicator.push(point.value);
		aligned.reference.push(referenceValue);
	}

	return aligned;
}

/**
 * Several series restricted to the timestamps where all of them are observed.
 */
export interface AlignedGroup {
	timestamps: number[];
	values: Record<string, number[]>;
}

/**
 * Intersect any number of named series.
 */
export function alignMany(seriesByName: Readonly<Record<string, Series>>): AlignedGroup {
	const names = Object.keys(seriesByName);
	const lookups = new Map<string, Map<number, number>>();
	for (const name of names) {
		const series = seriesByName[name] ?? [];
		assertStrictlyIncreasing(series, name);
		lookups.set(name, observedLookup(series));
	}

	const [first, ...rest] = names;
	const group: AlignedGroup = { timestamps: [], values: {} };
	if (first === undefined) {
		return group;
	}
	for (const name of names) {
		group.values[name] = [];
	}

	const firstSeries = seriesByName[first] ?? [];
	for (const point of firstSeries) {
		if (!isFiniteNumber(point.value)) {
			continue;
		}
		const row: number[] = [point.value];
		for (const name of rest) {
			const value = lookups.get(name)?.get(point.timestamp);
			if (value === undefined) {
				break;
			}
			row.push(value);
		}
		if (row.length !== names.length) {
			continue;
		}
		group.timestamps.push(point.timestamp);
		names.forEach((name, i) => {
			group.values[name]?.push(row[i] ?? Number.NaN);
		});
	}

	return group;
}

/**
 * Project a series onto a sorted list of timestamps, keeping the index
 * and filling absent timestamps with null.
 */
export function reindex(series: Series, timestamps: readonly number[]): Series {
	const lookup = new Map<number, number | null>();
	for (const point of series) {
		lookup.set(point.timestamp, point.value);
	}
	return timestamps.map((timestamp) => ({ timestamp, value: lookup.get(timestamp) ?? null }));
}
