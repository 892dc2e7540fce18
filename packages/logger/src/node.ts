import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { LogLevel, NodeLoggerOptions, RequestContext } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
	flush(): Promise<void>;
	destroy(): Promise<void>;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
	let state: LoggerState = "active";
	let flushPromise: Promise<void> | null = null;
	const flushBase = baseLogger.flush.bind(baseLogger);

	const flush = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		if (flushPromise) {
			return flushPromise;
		}
		state = "flushing";
		flushPromise = new Promise<void>((resolve, reject) => {
			flushBase((err) => {
				state = "active";
				flushPromise = null;
				if (err) {
					reject(err);
					return;
				}
				resolve();
			});
		});
		return flushPromise;
	};

	const destroy = async (): Promise<void> => {
		if (state === "destroyed") {
			return;
		}
		await flush();
		state = "destroyed";
		baseLogger.level = "silent";
	};

	return Object.assign(baseLogger, { flush, destroy });
}

/**
 * Resolve a log level from an environment value, falling back when it is not one pino knows.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	const candidate = value?.toLowerCase();
	return LOG_LEVELS.find((level) => level === candidate) ?? fallback;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
			bindings: () => ({}), // Remove pid, hostname
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	let baseLogger: Logger;

	if (isPretty) {
		baseLogger = pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,environment,version",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			})
		);
	} else {
		baseLogger = pino(loggerOptions);
	}

	return wrapLoggerWithLifecycle(baseLogger);
}

/**
 * Bind request identifiers so every line of one computation pass can be correlated.
 */
export function withRequestContext(logger: Logger, context: RequestContext): Logger {
	return logger.child({
		requestId: context.requestId,
		asset: context.asset,
		mode: context.mode,
		window: context.window,
	});
}
