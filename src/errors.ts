// src/errors.ts

export type VectorIndexErrorCode =
	| "DIMENSION_MISMATCH"
	| "EMPTY_INDEX"
	| "INVALID_PARAMETER"
	| "NOT_FOUND"
	| "PERSISTENCE";

export class VectorIndexError extends Error {
	readonly code: VectorIndexErrorCode;

	constructor(
		code: VectorIndexErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "VectorIndexError";
		this.code = code;
	}
}

export class DimensionMismatchError extends VectorIndexError {
	readonly expected: number;
	readonly actual: number;

	constructor(expected: number, actual: number, what = "Vector") {
		super(
			"DIMENSION_MISMATCH",
			`${what} dimension mismatch. Expected ${expected}, got ${actual}`,
		);
		this.name = "DimensionMismatchError";
		this.expected = expected;
		this.actual = actual;
	}
}

export class EmptyIndexError extends VectorIndexError {
	constructor(operation: string) {
		super("EMPTY_INDEX", `Cannot ${operation}: the index holds no documents`);
		this.name = "EmptyIndexError";
	}
}

export class InvalidParameterError extends VectorIndexError {
	readonly parameter: string;

	constructor(parameter: string, message: string) {
		super("INVALID_PARAMETER", `Invalid parameter "${parameter}": ${message}`);
		this.name = "InvalidParameterError";
		this.parameter = parameter;
	}
}

export class NotFoundError extends VectorIndexError {
	readonly id: string;

	constructor(id: string) {
		super("NOT_FOUND", `Document not found: ${id}`);
		this.name = "NotFoundError";
		this.id = id;
	}
}

export class PersistenceError extends VectorIndexError {
	readonly path: string;

	constructor(path: string, message: string, options?: ErrorOptions) {
		super("PERSISTENCE", `${message} (${path})`, options);
		this.name = "PersistenceError";
		this.path = path;
	}
}

export function isVectorIndexError(error: unknown): error is VectorIndexError {
	return error instanceof VectorIndexError;
}

export function wrapPersistenceError(
	error: unknown,
	path: string,
	action: string,
): PersistenceError {
	if (error instanceof PersistenceError) return error;
	const detail = error instanceof Error ? `: ${error.message}` : "";
	return new PersistenceError(path, `${action} failed${detail}`, {
		cause: error,
	});
}
