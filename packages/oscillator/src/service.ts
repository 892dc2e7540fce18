/**
 * Oscillator Service
 *
 * Request-scoped orchestration over the data sources: fetch, normalize,
 * aggregate, classify, clip to the requested range and serialize. Nothing
 * is kept between requests except what the optional cache memoizes.
 *
 * Modes:
 *   individual  each dataset normalized against the asset close
 *   composite   weighted composite of the normalized datasets, with a
 *               breakdown per dataset and the volatility-regime overlay
 *   tension     sentiment/mechanics pair divergence and pressure signals
 */

import { defaultConfig, type NormalizerMethod, type OscilloConfig } from "@oscillo/config";
import {
	aggregateComposite,
	analyzeTension,
	clipToRange,
	type CompositeWeighting,
	type DateRange,
	describeNormalizer,
	identifyTensionSignals,
	InsufficientDataError,
	type NormalizedSeries,
	normalizePctChange,
	normalizeRegression,
	type OHLCVBar,
	type RegressionParams,
	type Series,
	toTuples,
} from "@oscillo/indicators";
import { type Logger, withRequestContext } from "@oscillo/logger";
import type { DatasetMetadata, DataSourceRegistry } from "@oscillo/marketdata";
import {
	clipToTimestamps,
	detectRegimes,
	getRegimeMetadata,
	regimeOptionsFromConfig,
	toRegimeTuples,
} from "@oscillo/regime";
import type { z } from "zod";
import { buildCacheKey, type CacheMetrics, SingleFlightCache } from "./cache.js";
import { NoOscillatorDataError, RequestValidationError } from "./errors.js";
import { log } from "./logger.js";
import {
	type CompositeRequest,
	CompositeRequestSchema,
	type OscillatorRequest,
	OscillatorRequestSchema,
	type TensionRequest,
	TensionRequestSchema,
} from "./requests.js";
import type {
	CompositeResponse,
	OscillatorResponse,
	OscillatorSeries,
	RegimeOverlay,
	TensionResponse,
	TensionSeries,
} from "./types.js";

// ============================================
// Options
// ============================================

export interface OscillatorServiceOptions {
	registry: DataSourceRegistry;
	config?: OscilloConfig;
	/** Length of one observation period; sizes the history fetched ahead of the range */
	periodMs?: number;
	/** Earliest timestamp fetched for the regime fit */
	historyStart?: number;
	/** Clock for cache expiry */
	now?: () => number;
}

const DAY_MS = 86_400_000;

/** Periods fetched beyond the window ahead of the requested range */
const LOOKBACK_PADDING = 10;

const COMPOSITE_DISPLAY = {
	label: "Composite Regression Divergence",
	unit: "σ",
	color: "#00D9FF",
} as const;

interface NormalizedDataset {
	series: NormalizedSeries;
	metadata: DatasetMetadata;
}

type NormalizationOutcome =
	| { kind: "normalized"; id: string; dataset: NormalizedDataset }
	| { kind: "skipped"; id: string; reason: string };

interface ModeCaches {
	individual?: SingleFlightCache<OscillatorResponse>;
	composite?: SingleFlightCache<CompositeResponse>;
	tension?: SingleFlightCache<TensionResponse>;
}

// ============================================
// Helpers
// ============================================

function parseRequest<Output, Input>(schema: z.ZodType<Output, z.ZodTypeDef, Input>, input: unknown): Output {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new RequestValidationError(result.error);
	}
	return result.data;
}

function closeSeries(bars: readonly OHLCVBar[]): Series {
	return bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.close }));
}

function hasScores(series: NormalizedSeries): boolean {
	return series.points.some((point) => point.value !== null);
}

/**
 * Weighting as a key fragment, independent of the order the datasets were listed in.
 */
function weightsKey(weights: Record<string, CompositeWeighting>): string {
	return Object.entries(weights)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([id, { weight, invert }]) => `${id}=${weight}${invert ? "!" : ""}`)
		.join(",");
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ============================================
// Service
// ============================================

export class OscillatorService {
	private readonly registry: DataSourceRegistry;
	private readonly config: OscilloConfig;
	private readonly periodMs: number;
	private readonly historyStart: number;
	private readonly caches: ModeCaches;

	constructor(options: OscillatorServiceOptions) {
		this.registry = options.registry;
		this.config = options.config ?? defaultConfig();
		this.periodMs = options.periodMs ?? DAY_MS;
		this.historyStart = options.historyStart ?? 0;

		const { enabled, ttl_ms, max_entries } = this.config.cache;
		const cacheOptions = { ttlMs: ttl_ms, maxEntries: max_entries, now: options.now };
		this.caches = enabled
			? {
					individual: new SingleFlightCache<OscillatorResponse>(cacheOptions),
					composite: new SingleFlightCache<CompositeResponse>(cacheOptions),
					tension: new SingleFlightCache<TensionResponse>(cacheOptions),
				}
			: {};
	}

	/**
	 * Each dataset normalized against the asset close, clipped to the range.
	 *
	 * @throws RequestValidationError, or UnknownDatasetError for an unknown asset
	 */
	async getOscillators(input: OscillatorRequest): Promise<OscillatorResponse> {
		const request = parseRequest(OscillatorRequestSchema, input);
		const window = request.window ?? this.config.normalizer.window_size;
		const method = request.method ?? this.config.normalizer.method;
		const key = buildCacheKey({
			datasetId: `${request.asset}:${request.datasets.join(",")}`,
			window,
			range: request.range,
			variant: `individual:${method}`,
		});

		return this.memoize(this.caches.individual, key, async () => {
			const logger = withRequestContext(log, {
				requestId: request.requestId,
				asset: request.asset,
				mode: "individual",
				window,
			});
			const history = this.lookbackRange(request.range, window);
			const bars = await this.registry.getOhlcv(request.asset).fetch(history);
			const outcomes = await this.normalizeDatasets(
				request.datasets,
				closeSeries(bars),
				history,
				window,
				method,
				logger
			);

			const datasets: Record<string, OscillatorSeries> = {};
			for (const [id, dataset] of outcomes.normalized) {
				datasets[id] = this.serializeDataset(dataset, request.range, window, method);
			}

			logger.info({ datasets: outcomes.normalized.size, skipped: outcomes.skipped }, "Oscillators computed");
			return { mode: "individual", asset: request.asset, method, window, datasets, skipped: outcomes.skipped };
		});
	}

	/**
	 * Weighted composite of the normalized datasets plus the regime overlay.
	 *
	 * @throws NoOscillatorDataError when no dataset produced a score
	 */
	async getComposite(input: CompositeRequest): Promise<CompositeResponse> {
		const request = parseRequest(CompositeRequestSchema, input);
		const window = request.window ?? this.config.composite.default_window;
		const key = buildCacheKey({
			datasetId: `${request.asset}:${request.datasets.join(",")}`,
			window,
			range: request.range,
			variant: `composite:${weightsKey(request.weights ?? {})}`,
		});

		return this.memoize(this.caches.composite, key, async () => {
			const logger = withRequestContext(log, {
				requestId: request.requestId,
				asset: request.asset,
				mode: "composite",
				window,
			});
			const bars = await this.registry
				.getOhlcv(request.asset)
				.fetch({ start: this.historyStart, end: request.range.end });
			const history = this.lookbackRange(request.range, window);
			const outcomes = await this.normalizeDatasets(
				request.datasets,
				closeSeries(bars),
				history,
				window,
				"regression",
				logger
			);
			if (outcomes.normalized.size === 0) {
				throw new NoOscillatorDataError(request.asset, request.datasets);
			}

			const weighting: Record<string, CompositeWeighting> = {};
			for (const id of request.datasets) {
				const configured = request.weights?.[id] ?? this.config.composite.components[id];
				weighting[id] = configured ?? {
					weight: 1,
					invert: outcomes.normalized.get(id)?.metadata.invertInComposite ?? false,
				};
			}

			const components: Record<string, Series> = {};
			for (const [id, dataset] of outcomes.normalized) {
				components[id] = dataset.series.points;
			}
			const aggregate = aggregateComposite(components, weighting);
			const composite = clipToRange(aggregate.points, request.range);

			const breakdown: Record<string, OscillatorSeries> = {};
			for (const [id, dataset] of outcomes.normalized) {
				breakdown[id] = this.serializeDataset(dataset, request.range, window, "regression");
			}

			const regime = this.regimeOverlay(
				bars,
				composite.map((point) => point.timestamp),
				logger
			);

			logger.info(
				{
					components: aggregate.components,
					skipped: outcomes.skipped,
					points: composite.length,
					regimePoints: regime.data.length,
				},
				"Composite computed"
			);

			return {
				mode: "composite",
				asset: request.asset,
				window,
				composite: {
					data: toTuples(composite),
					metadata: {
						...COMPOSITE_DISPLAY,
						window,
						normalizer: describeNormalizer("regression").name,
						components: aggregate.components,
						weights: aggregate.weights,
						missing: aggregate.missing,
					},
				},
				breakdown,
				regime,
				skipped: outcomes.skipped,
			};
		});
	}

	/**
	 * Tension series and pressure signals for each sentiment/mechanics pair.
	 */
	async getTension(input: TensionRequest): Promise<TensionResponse> {
		const request = parseRequest(TensionRequestSchema, input);
		const window = request.window ?? this.config.normalizer.window_size;
		const threshold = request.signal_threshold ?? this.config.tension.signal_threshold;
		const pairKey = request.pairs.map((pair) => `${pair.name}=${pair.sentiment}/${pair.mechanics}`).join(",");
		const key = buildCacheKey({
			datasetId: `${request.asset}:${pairKey}`,
			window,
			range: request.range,
			variant: `tension:${threshold}`,
		});

		return this.memoize(this.caches.tension, key, async () => {
			const logger = withRequestContext(log, {
				requestId: request.requestId,
				asset: request.asset,
				mode: "tension",
				window,
			});
			const history = this.lookbackRange(request.range, window + this.config.tension.window_size);
			const bars = await this.registry.getOhlcv(request.asset).fetch(history);
			const legs = [...new Set(request.pairs.flatMap((pair) => [pair.sentiment, pair.mechanics]))];
			const outcomes = await this.normalizeDatasets(
				legs,
				closeSeries(bars),
				history,
				window,
				"regression",
				logger
			);

			const pairs: Record<string, TensionSeries> = {};
			const skipped: string[] = [];
			for (const pair of request.pairs) {
				const sentiment = outcomes.normalized.get(pair.sentiment);
				const mechanics = outcomes.normalized.get(pair.mechanics);
				if (!sentiment || !mechanics) {
					logger.warn({ pair: pair.name }, "Tension leg unavailable, skipping pair");
					skipped.push(pair.name);
					continue;
				}

				const result = analyzeTension(
					{ name: pair.name, sentiment: sentiment.series, mechanics: mechanics.series },
					{ windowSize: this.config.tension.window_size, minPeriods: this.config.tension.min_periods }
				);
				const tension1 = clipToRange(result.tension1, request.range);
				const tension2 = clipToRange(result.tension2.points, request.range);
				pairs[pair.name] = {
					sentiment: pair.sentiment,
					mechanics: pair.mechanics,
					tension1: toTuples(tension1),
					tension2: toTuples(tension2),
					signals: identifyTensionSignals(tension1, tension2, threshold),
				};
			}

			logger.info({ pairs: Object.keys(pairs), skipped }, "Tension computed");
			return { mode: "tension", asset: request.asset, window, threshold, pairs, skipped };
		});
	}

	/**
	 * Drop every memoized response so the next request recomputes from the sources.
	 */
	clearCache(): void {
		this.caches.individual?.clear();
		this.caches.composite?.clear();
		this.caches.tension?.clear();
		log.info("Oscillator caches cleared");
	}

	cacheMetrics(): Partial<Record<keyof ModeCaches, CacheMetrics>> {
		const metrics: Partial<Record<keyof ModeCaches, CacheMetrics>> = {};
		if (this.caches.individual) metrics.individual = this.caches.individual.metrics();
		if (this.caches.composite) metrics.composite = this.caches.composite.metrics();
		if (this.caches.tension) metrics.tension = this.caches.tension.metrics();
		return metrics;
	}

	// ============================================
	// Internals
	// ============================================

	private memoize<T>(cache: SingleFlightCache<T> | undefined, key: string, compute: () => Promise<T>): Promise<T> {
		return cache ? cache.getOrCompute(key, compute) : compute();
	}

	private lookbackRange(range: DateRange, periods: number): DateRange {
		return { start: range.start - (periods + LOOKBACK_PADDING) * this.periodMs, end: range.end };
	}

	private async normalizeDatasets(
		ids: readonly string[],
		close: Series,
		range: DateRange,
		window: number,
		method: NormalizerMethod,
		logger: Logger
	): Promise<{ normalized: Map<string, NormalizedDataset>; skipped: string[] }> {
		const params: RegressionParams = {
			windowSize: window,
			minPeriods: Math.min(this.config.normalizer.min_periods, window),
		};

		const outcomes = await Promise.all(
			ids.map(async (id): Promise<NormalizationOutcome> => {
				try {
					const source = this.registry.getSeries(id);
					const raw = await source.fetch(range);
					const series =
						method === "pct_change"
							? normalizePctChange(raw, close, params)
							: normalizeRegression(raw, close, params);
					if (!hasScores(series)) {
						return { kind: "skipped", id, reason: "no scores in range" };
					}
					return { kind: "normalized", id, dataset: { series, metadata: source.describe() } };
				} catch (error) {
					return { kind: "skipped", id, reason: errorMessage(error) };
				}
			})
		);

		const normalized = new Map<string, NormalizedDataset>();
		const skipped: string[] = [];
		for (const outcome of outcomes) {
			if (outcome.kind === "normalized") {
				normalized.set(outcome.id, outcome.dataset);
				continue;
			}
			logger.warn({ dataset: outcome.id, reason: outcome.reason }, "Dataset skipped");
			skipped.push(outcome.id);
		}
		return { normalized, skipped };
	}

	private serializeDataset(
		dataset: NormalizedDataset,
		range: DateRange,
		window: number,
		method: NormalizerMethod
	): OscillatorSeries {
		return {
			data: toTuples(clipToRange(dataset.series.points, range)),
			metadata: { ...dataset.metadata, normalizer: describeNormalizer(method).name, window },
		};
	}

	/**
	 * Regimes fitted over the full asset history, shown only under the given timestamps.
	 */
	private regimeOverlay(bars: readonly OHLCVBar[], timestamps: readonly number[], logger: Logger): RegimeOverlay {
		try {
			const { labels, metadata, method } = detectRegimes(bars, regimeOptionsFromConfig(this.config.regime));
			return { data: toRegimeTuples(clipToTimestamps(labels, timestamps)), metadata, method };
		} catch (error) {
			if (!(error instanceof InsufficientDataError)) {
				throw error;
			}
			logger.warn({ available: error.available, required: error.required }, "Regime overlay unavailable");
			return { data: [], metadata: getRegimeMetadata(), unavailable: error.message };
		}
	}
}
