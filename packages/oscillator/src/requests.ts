/**
 * Request Schemas
 *
 * Shapes the rendering layer sends, validated before any data is fetched.
 */

import { CompositeConfigSchema, NormalizerMethod, WindowSize } from "@oscillo/config";
import { z } from "zod";

export const DateRangeSchema = z
	.object({
		start: z.number().int(),
		end: z.number().int(),
	})
	.refine((range) => range.start <= range.end, { message: "range.start must not be after range.end" });

const BaseRequestSchema = z.object({
	requestId: z.string().optional(),
	/** Id of the OHLCV dataset every indicator is normalized against */
	asset: z.string().min(1),
	range: DateRangeSchema,
	window: WindowSize.optional(),
});

export const OscillatorRequestSchema = BaseRequestSchema.extend({
	datasets: z.array(z.string().min(1)).min(1),
	method: NormalizerMethod.optional(),
});
export type OscillatorRequest = z.input<typeof OscillatorRequestSchema>;

export const CompositeRequestSchema = BaseRequestSchema.extend({
	datasets: z.array(z.string().min(1)).min(1),
	/** Per-dataset weighting; unlisted datasets fall back to config, then to weight 1 */
	weights: CompositeConfigSchema.optional(),
});
export type CompositeRequest = z.input<typeof CompositeRequestSchema>;

export const TensionPairRequestSchema = z.object({
	name: z.string().min(1),
	sentiment: z.string().min(1),
	mechanics: z.string().min(1),
});

export const TensionRequestSchema = BaseRequestSchema.extend({
	pairs: z.array(TensionPairRequestSchema).min(1),
	signal_threshold: z.number().positive().optional(),
});
export type TensionRequest = z.input<typeof TensionRequestSchema>;
