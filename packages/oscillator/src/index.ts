/**
 * @oscillo/oscillator
 *
 * Request orchestration for the chart layer: individual oscillators,
 * composite with regime overlay, and pair tension.
 *
 * @example
 * ```ts
 * import { OscillatorService } from "@oscillo/oscillator";
 *
 * const service = new OscillatorService({ registry, config });
 * const response = await service.getComposite({
 *   asset: "btc",
 *   datasets: ["rsi", "macd", "atr"],
 *   range: { start, end },
 *   window: 50,
 * });
 * ```
 */

export {
	buildCacheKey,
	type CacheKeyParts,
	type CacheMetrics,
	SingleFlightCache,
	type SingleFlightCacheOptions,
} from "./cache.js";
export { NoOscillatorDataError, RequestValidationError } from "./errors.js";
export {
	type CompositeRequest,
	CompositeRequestSchema,
	DateRangeSchema,
	type OscillatorRequest,
	OscillatorRequestSchema,
	type TensionRequest,
	TensionRequestSchema,
} from "./requests.js";
export { OscillatorService, type OscillatorServiceOptions } from "./service.js";
export type * from "./types.js";
