import type { ZodError } from "zod";

export class RequestValidationError extends Error {
	readonly issues: string[];

	constructor(error: ZodError) {
		const issues = error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
		super(`Invalid request: ${issues.join("; ")}`);
		this.name = "RequestValidationError";
		this.issues = issues;
	}
}

/**
 * None of the requested datasets produced a score.
 */
export class NoOscillatorDataError extends Error {
	constructor(
		public readonly asset: string,
		public readonly datasets: readonly string[]
	) {
		super(`No oscillator data for ${asset}: ${datasets.join(", ")}`);
		this.name = "NoOscillatorDataError";
	}
}
