/**
 * @oscillo/marketdata
 *
 * Data-source capability shared by every dataset the oscillators read.
 *
 * @example
 * ```ts
 * import { createDataSourceRegistry, createStaticSeriesSource } from "@oscillo/marketdata";
 *
 * const registry = createDataSourceRegistry([
 *   createStaticSeriesSource({ id: "rsi", label: "RSI" }, rsiPoints),
 * ]);
 * const points = await registry.getSeries("rsi").fetch({ start, end });
 * ```
 */

export { DatasetKindError, DuplicateDatasetError, UnknownDatasetError } from "./errors.js";
export { createDataSourceRegistry, type DataSourceRegistry } from "./registry.js";
export { createStaticOhlcvSource, createStaticSeriesSource, type StaticSourceMetadata } from "./static.js";
export type { DataSource, DataSourceKind, DatasetMetadata, OhlcvSource, SeriesSource } from "./types.js";
