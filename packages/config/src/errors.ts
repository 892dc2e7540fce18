export class ConfigLoadError extends Error {
	constructor(
		message: string,
		public readonly path: string,
		cause?: unknown
	) {
		super(message, { cause });
		this.name = "ConfigLoadError";
	}
}
