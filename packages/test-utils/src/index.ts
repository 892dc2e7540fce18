import type { OHLCVBar, Series, TimePoint } from "@oscillo/indicators";

export const DAY_MS = 86_400_000;

/** 2024-01-01T00:00:00Z */
export const BASE_TIMESTAMP = Date.UTC(2024, 0, 1);

/**
 * Daily timestamps starting at `start`.
 */
export function dailyTimestamps(count: number, start = BASE_TIMESTAMP): number[] {
	return Array.from({ length: count }, (_, i) => start + i * DAY_MS);
}

/**
 * Build a daily series from values; `null` entries stay null.
 */
export function seriesFromValues(values: readonly (number | null)[], start = BASE_TIMESTAMP): Series {
	return values.map((value, i): TimePoint => ({ timestamp: start + i * DAY_MS, value }));
}

export function valuesOf(series: Series): (number | null)[] {
	return series.map((point) => point.value);
}

/**
 * Deterministic pseudo-random generator (mulberry32).
 */
export function createSeededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Daily bars around a close path with a fixed intraday range.
 *
 * `rangePct` sets high/low as close * (1 ± rangePct); open sits halfway between
 * the previous close and the current one.
 */
export function barsFromCloses(closes: readonly number[], rangePct = 0.02, start = BASE_TIMESTAMP): OHLCVBar[] {
	return closes.map((close, i) => {
		const previous = closes[i - 1] ?? close;
		const open = (previous + close) / 2;
		return {
			timestamp: start + i * DAY_MS,
			open,
			high: Math.max(open, close) * (1 + rangePct),
			low: Math.min(open, close) * (1 - rangePct),
			close,
			volume: 1_000_000,
		};
	});
}

/**
 * Bars whose intraday range alternates between calm and turbulent blocks.
 */
export function regimeBars(blocks: readonly { length: number; rangePct: number }[], seed = 7): OHLCVBar[] {
	const random = createSeededRandom(seed);
	const bars: OHLCVBar[] = [];
	let close = 100;
	let timestamp = BASE_TIMESTAMP;

	for (const block of blocks) {
		for (let i = 0; i < block.length; i++) {
			const jitter = 0.75 + random() * 0.5;
			const range = block.rangePct * jitter;
			const open = close;
			close = open * (1 + (random() - 0.5) * range * 0.5);
			bars.push({
				timestamp,
				open,
				high: Math.max(open, close) * (1 + range),
				low: Math.min(open, close) * (1 - range),
				close,
				volume: 1_000_000,
			});
			timestamp += DAY_MS;
		}
	}

	return bars;
}
