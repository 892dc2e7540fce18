/**
 * Composite Aggregator
 *
 * Weighted average of several normalized oscillators:
 *
 *   composite_t = Σ w_i · s_i · z_i,t / (number of components observed at t)
 *
 * where s_i = −1 for inverted components. The divisor is the count of
 * contributing components, so weights are never renormalized to sum to 1.
 * The output index is the union of all component timestamps; a timestamp
 * with no observed component is kept with a null value.
 */

import { log } from "./logger.js";
import {
	type CompositeConfig,
	type CompositeWeighting,
	isFiniteNumber,
	type Series,
	type TimePoint,
} from "./types.js";
import { assertStrictlyIncreasing } from "./validation.js";

export const DEFAULT_COMPONENT_WEIGHTING: CompositeWeighting = { weight: 1, invert: false };

export interface CompositeResult {
	points: TimePoint[];
	/** Components that contributed, in input order */
	components: string[];
	/** Effective weighting per contributing component */
	weights: Record<string, CompositeWeighting>;
	/** Configured components with no series */
	missing: string[];
}

/**
 * Combine normalized series into one composite series.
 *
 * Components without a config entry use weight 1, no inversion. A weight of
 * 0 disables the component; it is not counted in the divisor.
 *
 * @param components - Normalized score series by component name
 * @param config - Optional weighting per component
 */
export function aggregateComposite(
	components: Readonly<Record<string, Series>>,
	config: CompositeConfig = {}
): CompositeResult {
	const active: { name: string; series: Series; weighting: CompositeWeighting }[] = [];

	for (const [name, series] of Object.entries(components)) {
		assertStrictlyIncreasing(series, name);
		const weighting = config[name] ?? DEFAULT_COMPONENT_WEIGHTING;
		if (!(weighting.weight > 0)) {
			continue;
		}
		active.push({ name, series, weighting });
	}

	const missing = Object.keys(config).filter((name) => !(name in components));
	if (missing.length > 0) {
		log.debug({ missing }, "Composite components configured without series");
	}

	const sums = new Map<number, { total: number; count: number }>();
	for (const { series } of active) {
		for (const point of series) {
			if (!sums.has(point.timestamp)) {
				sums.set(point.timestamp, { total: 0, count: 0 });
			}
		}
	}

	for (const { series, weighting } of active) {
		const sign = weighting.invert ? -1 : 1;
		for (const point of series) {
			const bucket = sums.get(point.timestamp);
			if (bucket && isFiniteNumber(point.value)) {
				bucket.total += weighting.weight * sign * point.value;
				bucket.count += 1;
			}
		}
	}

	const points = [...sums.entries()]
		.sort(([a], [b]) => a - b)
		.map(([timestamp, { total, count }]): TimePoint => ({
			timestamp,
			value: count > 0 ? total / count : null,
		}));

	return {
		points,
		components: active.map(({ name }) => name),
		weights: Object.fromEntries(active.map(({ name, weighting }) => [name, { ...weighting }])),
		missing,
	};
}

/**
 * Equal weights for the named components, with the given ones inverted.
 */
export function equalWeightConfig(names: readonly string[], inverted: readonly string[] = []): CompositeConfig {
	return Object.fromEntries(names.map((name) => [name, { weight: 1, invert: inverted.includes(name) }]));
}
