import { createNodeLogger, type LifecycleLogger, resolveLogLevel } from "@oscillo/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "regime",
	level: resolveLogLevel(process.env.LOG_LEVEL),
	environment: process.env.OSCILLO_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
