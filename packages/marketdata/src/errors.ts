import type { DataSourceKind } from "./types.js";

export class UnknownDatasetError extends Error {
	constructor(public readonly datasetId: string) {
		super(`Unknown dataset "${datasetId}"`);
		this.name = "UnknownDatasetError";
	}
}

export class DatasetKindError extends Error {
	constructor(
		public readonly datasetId: string,
		public readonly expected: DataSourceKind,
		public readonly actual: DataSourceKind
	) {
		super(`Dataset "${datasetId}" is ${actual}, expected ${expected}`);
		this.name = "DatasetKindError";
	}
}

export class DuplicateDatasetError extends Error {
	constructor(public readonly datasetId: string) {
		super(`Dataset "${datasetId}" is registered more than once`);
		this.name = "DuplicateDatasetError";
	}
}
