/**
 * Data Source Types
 *
 * The engine only sees plain series and bars; where they come from (a
 * database, an exchange API, a file) is behind this interface.
 */

import type { DateRange, OHLCVBar, Series } from "@oscillo/indicators";

export type DataSourceKind = "series" | "ohlcv";

/**
 * Static description of a dataset.
 */
export interface DatasetMetadata {
	id: string;
	label: string;
	kind: DataSourceKind;
	/** Display unit of the raw values, e.g. "USD" or "%" */
	unit?: string;
	color?: string;
	/** Negate the dataset's score when it joins a composite */
	invertInComposite?: boolean;
}

export interface DataSourceBase<K extends DataSourceKind, T> {
	readonly kind: K;
	readonly id: string;
	describe(): DatasetMetadata;
	/**
	 * Observations inside the inclusive range, ascending.
	 */
	fetch(range: DateRange): Promise<T>;
}

/** Plain numeric series (indicators, on-chain, sentiment, macro) */
export type SeriesSource = DataSourceBase<"series", Series>;

/** Price bars for an asset */
export type OhlcvSource = DataSourceBase<"ohlcv", readonly OHLCVBar[]>;

export type DataSource = SeriesSource | OhlcvSource;
