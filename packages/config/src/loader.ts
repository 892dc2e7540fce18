/**
 * Configuration Loader
 *
 * Loads default.yaml, merges the environment-specific overrides on top and
 * validates the result.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { deepmerge } from "deepmerge-ts";
import { parse } from "yaml";
import { ConfigLoadError } from "./errors.js";
import { log } from "./logger.js";
import { type Environment } from "./schemas/environment.js";
import { type OscilloConfig, OscilloConfigSchema } from "./validate.js";

/**
 * Directory holding the packaged default.yaml and environment overrides.
 */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../configs", import.meta.url));

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load and parse a YAML file.
 *
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
async function loadYaml(path: string): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigLoadError(`Failed to load YAML from ${path}: ${message}`, path, error);
	}

	try {
		return parse(content) ?? {};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigLoadError(`Failed to parse YAML from ${path}: ${message}`, path, error);
	}
}

function asRecord(value: unknown, path: string): Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		throw new ConfigLoadError(`Expected a mapping at the top level of ${path}`, path);
	}
	return Object.fromEntries(Object.entries(value));
}

/**
 * Load configuration with environment-specific overrides.
 *
 * The override file is optional; default.yaml is not.
 */
export async function loadConfig(
	environment: Environment,
	configDir = DEFAULT_CONFIG_DIR
): Promise<OscilloConfig> {
	const basePath = join(configDir, "default.yaml");
	const base = asRecord(await loadYaml(basePath), basePath);

	const overridePath = join(configDir, `${environment}.yaml`);
	let override: Record<string, unknown> = {};
	try {
		override = asRecord(await loadYaml(overridePath), overridePath);
	} catch (error) {
		if (!(error instanceof ConfigLoadError && isMissingFile(error.cause))) {
			throw error;
		}
		log.debug({ environment, configDir }, "No environment override found, using defaults only");
	}

	return OscilloConfigSchema.parse(deepmerge(base, override));
}

/**
 * Load configuration from a single file, without overrides.
 */
export async function loadConfigFromFile(path: string): Promise<OscilloConfig> {
	return OscilloConfigSchema.parse(await loadYaml(path));
}

/**
 * Pick the environment from OSCILLO_ENV, then NODE_ENV.
 */
export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
	const candidate = env.OSCILLO_ENV ?? env.NODE_ENV;
	switch (candidate) {
		case "production":
		case "staging":
		case "test":
			return candidate;
		default:
			return "development";
	}
}

export async function loadConfigWithEnv(configDir = DEFAULT_CONFIG_DIR): Promise<OscilloConfig> {
	return loadConfig(resolveEnvironment(), configDir);
}
