/**
 * Error Taxonomy
 *
 * Whole-series failures raise. Per-timestamp degeneracy (zero variance,
 * singular fit, negative-domain volatility) is a `null` value, not an error.
 */

/**
 * Too few observations for a whole-series fit.
 */
export class InsufficientDataError extends Error {
	constructor(
		public readonly component: string,
		public readonly available: number,
		public readonly required: number
	) {
		super(`[${component}] Insufficient data: need ${required} observations, got ${available}`);
		this.name = "InsufficientDataError";
	}
}

export { InsufficientDataError as DataInsufficientError };

/**
 * Malformed input. Raised for series-level preconditions; bar-level issues
 * are returned instead and the bar is treated as missing.
 */
export class ValidationError extends Error {
	constructor(
		public readonly field: string,
		message: string,
		public readonly timestamp?: number
	) {
		super(`[${field}] ${message}`);
		this.name = "ValidationError";
	}
}
