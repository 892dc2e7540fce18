import type { LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export interface NodeLoggerOptions {
	/** Service name attached to every line */
	service: string;
	level?: LogLevel;
	environment?: string;
	version?: string;
	/** Pretty-print through pino-pretty (defaults to NODE_ENV === "development") */
	pretty?: boolean;
	/** Extra redaction paths merged with the defaults */
	redactPaths?: string[];
	base?: Record<string, unknown>;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Identifiers of the request a computation runs for.
 */
export interface RequestContext {
	requestId?: string;
	asset?: string;
	mode?: string;
	window?: number;
}
