/**
 * Computation Cache Configuration Schema
 */

import { z } from "zod";

export const CacheConfigSchema = z.object({
	enabled: z.boolean().default(true),
	ttl_ms: z.number().int().positive().default(5 * 60 * 1000),
	max_entries: z.number().int().positive().default(200),
});
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
