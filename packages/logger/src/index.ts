export type { Logger } from "pino";

export {
	createNodeLogger,
	type LifecycleLogger,
	resolveLogLevel,
	withRequestContext,
} from "./node.js";
export * from "./redaction.js";
export * from "./types.js";
