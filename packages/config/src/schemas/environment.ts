/**
 * Deployment environment; selects the `configs/<environment>.yaml` override.
 */

import { z } from "zod";

export const Environment = z.enum(["development", "staging", "production", "test"]);
export type Environment = z.infer<typeof Environment>;
