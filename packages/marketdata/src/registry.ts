/**
 * Data Source Registry
 *
 * Read-only lookup table from dataset id to source, built once at startup.
 */

import { DatasetKindError, DuplicateDatasetError, UnknownDatasetError } from "./errors.js";
import type { DatasetMetadata, DataSource, OhlcvSource, SeriesSource } from "./types.js";

export interface DataSourceRegistry {
	has(id: string): boolean;
	/**
	 * @throws UnknownDatasetError
	 */
	get(id: string): DataSource;
	/**
	 * @throws UnknownDatasetError, or DatasetKindError when the dataset holds bars
	 */
	getSeries(id: string): SeriesSource;
	/**
	 * @throws UnknownDatasetError, or DatasetKindError when the dataset holds a plain series
	 */
	getOhlcv(id: string): OhlcvSource;
	/** Metadata of every source, in registration order */
	list(): DatasetMetadata[];
}

/**
 * @throws DuplicateDatasetError when two sources share an id
 */
export function createDataSourceRegistry(sources: readonly DataSource[]): DataSourceRegistry {
	const table = new Map<string, DataSource>();
	for (const source of sources) {
		if (table.has(source.id)) {
			throw new DuplicateDatasetError(source.id);
		}
		table.set(source.id, source);
	}

	const get = (id: string): DataSource => {
		const source = table.get(id);
		if (!source) {
			throw new UnknownDatasetError(id);
		}
		return source;
	};

	return {
		has: (id) => table.has(id),
		get,
		getSeries(id) {
			const source = get(id);
			if (source.kind !== "series") {
				throw new DatasetKindError(id, "series", source.kind);
			}
			return source;
		},
		getOhlcv(id) {
			const source = get(id);
			if (source.kind !== "ohlcv") {
				throw new DatasetKindError(id, "ohlcv", source.kind);
			}
			return source;
		},
		list: () => [...table.values()].map((source) => source.describe()),
	};
}
