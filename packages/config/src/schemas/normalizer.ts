/**
 * Normalizer Configuration Schema
 *
 * Rolling-window settings for the regression-residual normalizer.
 */

import { z } from "zod";

// ============================================
// Window Options
// ============================================

/**
 * Recognized rolling window lengths ("noise levels").
 */
export const WINDOW_SIZE_OPTIONS = [14, 30, 50, 100, 200] as const;

export const WindowSize = z
	.number()
	.int()
	.refine((value): value is WindowSizeOption => WINDOW_SIZE_OPTIONS.some((option) => option === value), {
		message: `window_size must be one of ${WINDOW_SIZE_OPTIONS.join(", ")}`,
	});
export type WindowSizeOption = (typeof WINDOW_SIZE_OPTIONS)[number];

/**
 * Reference transform applied before the regression.
 *
 * - regression: indicator against the reference level
 * - pct_change: indicator against the reference's log change
 */
export const NormalizerMethod = z.enum(["regression", "pct_change"]);
export type NormalizerMethod = z.infer<typeof NormalizerMethod>;

// ============================================
// Normalizer Configuration
// ============================================

export const NormalizerConfigSchema = z
	.object({
		/**
		 * Trailing window length in aligned observations
		 */
		window_size: WindowSize.default(30),

		/**
		 * Minimum observations in the window before a score is emitted
		 */
		min_periods: z.number().int().min(3).default(10),

		method: NormalizerMethod.default("regression"),
	})
	.superRefine((data, ctx) => {
		if (data.min_periods > data.window_size) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "min_periods cannot exceed window_size",
				path: ["min_periods"],
			});
		}
	});
export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>;
