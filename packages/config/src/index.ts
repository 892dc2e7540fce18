/**
 * @oscillo/config - Configuration schemas and loaders
 *
 * - Zod schemas for the normalizer, composite, regime, tension and cache sections
 * - YAML loading with environment overrides
 * - Validation utilities
 */

export { ConfigLoadError } from "./errors.js";
export {
	DEFAULT_CONFIG_DIR,
	loadConfig,
	loadConfigFromFile,
	loadConfigWithEnv,
	resolveEnvironment,
} from "./loader.js";
export * from "./schemas/index.js";
export {
	defaultConfig,
	type OscilloConfig,
	OscilloConfigSchema,
	type ValidationResult,
	validateConfig,
	validateConfigOrThrow,
} from "./validate.js";
