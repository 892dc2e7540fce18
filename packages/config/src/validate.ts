/**
 * Configuration Validation
 *
 * Combines the section schemas into OscilloConfigSchema.
 */

import { z } from "zod";
import {
	CacheConfigSchema,
	CompositeSettingsSchema,
	NormalizerConfigSchema,
	RegimeConfigSchema,
	TensionConfigSchema,
} from "./schemas/index.js";

// ============================================
// Complete Configuration Schema
// ============================================

export const OscilloConfigSchema = z.object({
	normalizer: NormalizerConfigSchema.default({}),
	composite: CompositeSettingsSchema.default({}),
	regime: RegimeConfigSchema.default({}),
	tension: TensionConfigSchema.default({}),
	cache: CacheConfigSchema.default({}),
});
export type OscilloConfig = z.infer<typeof OscilloConfigSchema>;

// ============================================
// Validation Functions
// ============================================

export type ValidationResult =
	| { success: true; data: OscilloConfig; errors: [] }
	| { success: false; errors: string[] };

/**
 * Validate a raw configuration object.
 */
export function validateConfig(config: unknown): ValidationResult {
	const result = OscilloConfigSchema.safeParse(config);

	if (result.success) {
		return { success: true, data: result.data, errors: [] };
	}

	return {
		success: false,
		errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
	};
}

/**
 * @throws ZodError if validation fails
 */
export function validateConfigOrThrow(config: unknown): OscilloConfig {
	return OscilloConfigSchema.parse(config);
}

/**
 * Defaults for every section, as if an empty file had been loaded.
 */
export function defaultConfig(): OscilloConfig {
	return OscilloConfigSchema.parse({});
}
