/**
 * Garman-Klass Volatility
 *
 * OHLC range estimator, more efficient than close-to-close:
 *
 *   σ² = 0.5·ln(H/L)² − (2·ln2 − 1)·ln(C/O)²
 *   σ_annualized = sqrt(σ² · annualizationFactor)
 *
 * Outputs are decimals (0.25 = 25%). Bars failing price validation are
 * null. A valid bar has ln(H/L) >= |ln(C/O)|, so σ² >= 0 there; the
 * negative check only guards non-finite arithmetic.
 *
 * @see Garman & Klass (1980), "On the Estimation of Security Price Volatilities from Historical Data"
 */

import { log } from "../logger.js";
import type { OHLCVBar, TimePoint } from "../types.js";
import { validateBar } from "../validation.js";

export const TRADING_DAYS_PER_YEAR = 252;

/** 2·ln2 − 1 ≈ 0.386 */
const GK_CLOSE_OPEN_COEFFICIENT = 2 * Math.LN2 - 1;

export interface GarmanKlassParams {
	/** Periods per year (252 for daily bars) */
	annualizationFactor: number;
}

export const GARMAN_KLASS_DEFAULTS: GarmanKlassParams = {
	annualizationFactor: TRADING_DAYS_PER_YEAR,
};

/**
 * Per-bar Garman-Klass variance; null for an invalid bar.
 */
export function garmanKlassVariance(bar: OHLCVBar): number | null {
	if (validateBar(bar) !== null) {
		return null;
	}
	const logHighLow = Math.log(bar.high / bar.low);
	const logCloseOpen = Math.log(bar.close / bar.open);
	const variance = 0.5 * logHighLow ** 2 - GK_CLOSE_OPEN_COEFFICIENT * logCloseOpen ** 2;
	return Number.isFinite(variance) ? variance : null;
}

/**
 * Annualized Garman-Klass volatility, one point per input bar.
 */
export function garmanKlassVolatility(
	bars: readonly OHLCVBar[],
	params: Partial<GarmanKlassParams> = {}
): TimePoint[] {
	const { annualizationFactor } = { ...GARMAN_KLASS_DEFAULTS, ...params };
	let invalid = 0;
	let negative = 0;

	const points = bars.map((bar): TimePoint => {
		const issue = validateBar(bar);
		if (issue) {
			invalid++;
			log.debug({ timestamp: bar.timestamp, reason: issue.message }, "Excluding malformed bar");
			return { timestamp: bar.timestamp, value: null };
		}

		const variance = garmanKlassVariance(bar);
		if (variance === null || variance < 0) {
			negative++;
			return { timestamp: bar.timestamp, value: null };
		}

		return { timestamp: bar.timestamp, value: Math.sqrt(variance * annualizationFactor) };
	});

	if (invalid > 0 || negative > 0) {
		log.debug({ bars: bars.length, invalid, negative }, "Garman-Klass bars without an estimate");
	}

	return points;
}
