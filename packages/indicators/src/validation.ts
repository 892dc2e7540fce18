import { ValidationError } from "./errors.js";
import type { OHLCVBar } from "./types.js";

/**
 * @throws ValidationError when timestamps are not strictly increasing
 */
export function assertStrictlyIncreasing(points: readonly { timestamp: number }[], label: string): void {
	for (let i = 1; i < points.length; i++) {
		const previous = points[i - 1];
		const current = points[i];
		if (previous && current && current.timestamp <= previous.timestamp) {
			throw new ValidationError(
				label,
				`timestamps must be strictly increasing (index ${i}: ${current.timestamp} after ${previous.timestamp})`,
				current.timestamp
			);
		}
	}
}

/**
 * Check the raw price invariants of one bar.
 *
 * @returns the first violated invariant, or null for a valid bar
 */
export function validateBar(bar: OHLCVBar): ValidationError | null {
	const { open, high, low, close, timestamp } = bar;

	if (![open, high, low, close].every((price) => Number.isFinite(price) && price > 0)) {
		return new ValidationError("ohlc", "prices must be finite and positive", timestamp);
	}
	if (high < low) {
		return new ValidationError("ohlc", `high ${high} is below low ${low}`, timestamp);
	}
	if (high < Math.max(open, close)) {
		return new ValidationError("ohlc", `high ${high} is below max(open, close)`, timestamp);
	}
	if (low > Math.min(open, close)) {
		return new ValidationError("ohlc", `low ${low} is above min(open, close)`, timestamp);
	}
	return null;
}

/**
 * @throws ValidationError for a non-integer or too-small window setting
 */
export function assertWindow(windowSize: number, minPeriods: number, floor = 3): void {
	if (!Number.isInteger(windowSize) || windowSize < floor) {
		throw new ValidationError("windowSize", `must be an integer >= ${floor}, got ${windowSize}`);
	}
	if (!Number.isInteger(minPeriods) || minPeriods < floor) {
		throw new ValidationError("minPeriods", `must be an integer >= ${floor}, got ${minPeriods}`);
	}
}
