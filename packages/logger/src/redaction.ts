/**
 * Paths removed from every log line.
 *
 * Data-provider credentials travel inside source configs and request headers.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"apiSecret",
	"password",
	"token",
	"*.apiKey",
	"*.apiSecret",
	"*.password",
	"*.token",
	"headers.authorization",
	"req.headers.authorization",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
