export type ErrorDetails = Record<string, unknown>;

/** Invalid or unusable strategy configuration. */
export class ConfigurationError extends Error {
	constructor(
		message: string,
		readonly details: ErrorDetails = {}
	) {
		super(message);
		this.name = "ConfigurationError";
	}
}

/** Inbound market or portfolio data the core cannot act on. */
export class DataError extends Error {
	constructor(
		message: string,
		readonly details: ErrorDetails = {}
	) {
		super(message);
		this.name = "DataError";
	}
}

/** Illegal FLAT/OPEN transition. */
export class PositionStateError extends Error {
	constructor(
		message: string,
		readonly details: ErrorDetails = {}
	) {
		super(message);
		this.name = "PositionStateError";
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
