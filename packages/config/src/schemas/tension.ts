/**
 * Pair-Tension Configuration Schema
 */

import { z } from "zod";

export const TensionConfigSchema = z
	.object({
		/**
		 * Rolling window for the Tension₂ self z-score
		 */
		window_size: z.number().int().min(3).default(30),

		min_periods: z.number().int().min(3).default(10),

		/**
		 * Tension₂ level (in σ) above which a pressure flag is raised
		 */
		signal_threshold: z.number().positive().default(2),
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
export type TensionConfig = z.infer<typeof TensionConfigSchema>;
