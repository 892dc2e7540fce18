/**
 * Composite Configuration Schema
 */

import { z } from "zod";
import { WindowSize } from "./normalizer.js";

/**
 * Per-component weighting. Weights are used exactly as given.
 */
export const CompositeComponentSchema = z.object({
	weight: z.number().finite().min(0).default(1),
	invert: z.boolean().default(false),
});
export type CompositeComponent = z.infer<typeof CompositeComponentSchema>;

export const CompositeConfigSchema = z.record(z.string().min(1), CompositeComponentSchema);
export type CompositeConfig = z.infer<typeof CompositeConfigSchema>;

export const CompositeSettingsSchema = z.object({
	/**
	 * Window used when a composite request names none
	 */
	default_window: WindowSize.default(50),

	/**
	 * Standing overrides; datasets not listed get weight 1
	 */
	components: CompositeConfigSchema.default({}),
});
export type CompositeSettings = z.infer<typeof CompositeSettingsSchema>;
