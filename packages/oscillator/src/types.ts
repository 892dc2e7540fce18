/**
 * Response Shapes
 *
 * What the chart layer receives. Points are serialized as
 * `[timestamp_ms, value | null]`.
 */

import type { NormalizerMethod } from "@oscillo/config";
import type { CompositeWeighting, SerializedPoint, TensionSignalPoint } from "@oscillo/indicators";
import type { DatasetMetadata } from "@oscillo/marketdata";
import type { ClassificationMethod, RegimeMetadata, SerializedRegime } from "@oscillo/regime";

export interface OscillatorSeriesMetadata extends DatasetMetadata {
	normalizer: string;
	window: number;
}

export interface OscillatorSeries {
	data: SerializedPoint[];
	metadata: OscillatorSeriesMetadata;
}

export interface OscillatorResponse {
	mode: "individual";
	asset: string;
	method: NormalizerMethod;
	window: number;
	datasets: Record<string, OscillatorSeries>;
	/** Requested datasets that could not be normalized */
	skipped: string[];
}

export interface CompositeMetadata {
	label: string;
	unit: string;
	color: string;
	window: number;
	normalizer: string;
	components: string[];
	weights: Record<string, CompositeWeighting>;
	missing: string[];
}

/**
 * Regime overlay. `unavailable` carries the reason when the classifier
 * could not run; `data` is empty then.
 */
export interface RegimeOverlay {
	data: SerializedRegime[];
	metadata: RegimeMetadata;
	method?: ClassificationMethod;
	unavailable?: string;
}

export interface CompositeResponse {
	mode: "composite";
	asset: string;
	window: number;
	composite: {
		data: SerializedPoint[];
		metadata: CompositeMetadata;
	};
	breakdown: Record<string, OscillatorSeries>;
	regime: RegimeOverlay;
	skipped: string[];
}

export interface TensionSeries {
	tension1: SerializedPoint[];
	tension2: SerializedPoint[];
	signals: TensionSignalPoint[];
	sentiment: string;
	mechanics: string;
}

export interface TensionResponse {
	mode: "tension";
	asset: string;
	window: number;
	threshold: number;
	pairs: Record<string, TensionSeries>;
	skipped: string[];
}
