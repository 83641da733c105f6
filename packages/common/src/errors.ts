export type DecodeErrorCode =
	| "MALFORMED"
	| "MISSING_DISCRIMINATOR"
	| "MISSING_FIELD"
	| "TYPE_MISMATCH"
	| "ARITY_TOO_SMALL";

export type DecodeErrorDetails =
	| { code: "MALFORMED"; reason: string }
	| { code: "MISSING_DISCRIMINATOR" }
	| { code: "MISSING_FIELD"; field: string }
	| { code: "TYPE_MISMATCH"; field: string; expected: string; actual: string }
	| { code: "ARITY_TOO_SMALL"; field: string; minimum: number; actual: number };

export class DecodeError extends Error {
	public readonly code: DecodeErrorCode;
	public readonly details: Readonly<DecodeErrorDetails>;

	constructor(details: DecodeErrorDetails, message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "DecodeError";
		this.code = details.code;
		this.details = Object.freeze(details);
	}
}

/**
 * Outcome of every decode call. Bad input is reported as a value, never thrown.
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

export function success<T>(value: T): DecodeResult<T> {
	return { ok: true, value };
}

export function failure<T>(error: DecodeError): DecodeResult<T> {
	return { ok: false, error };
}

export function isDecodeError(err: unknown): err is DecodeError {
	return err instanceof DecodeError;
}

export function malformed(reason: string, cause?: unknown): DecodeError {
	return new DecodeError({ code: "MALFORMED", reason }, `Malformed envelope: ${reason}`, cause);
}

export function missingDiscriminator(): DecodeError {
	return new DecodeError({ code: "MISSING_DISCRIMINATOR" }, "Envelope has no 'type' discriminator");
}

export function missingField(field: string): DecodeError {
	return new DecodeError({ code: "MISSING_FIELD", field }, `Missing required field '${field}'`);
}

export function typeMismatch(field: string, expected: string, actual: string): DecodeError {
	return new DecodeError(
		{ code: "TYPE_MISMATCH", field, expected, actual },
		`Field '${field}' expected ${expected} but got ${actual}`
	);
}

export function arityTooSmall(field: string, minimum: number, actual: number): DecodeError {
	return new DecodeError(
		{ code: "ARITY_TOO_SMALL", field, minimum, actual },
		`Array '${field}' needs at least ${minimum} elements but has ${actual}`
	);
}

/**
 * Short description of a JSON value's runtime shape, used in TYPE_MISMATCH details.
 */
export function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (value === undefined) return "undefined";
	if (Array.isArray(value)) return "array";
	if (typeof value === "number") {
		if (!Number.isFinite(value)) return "non-finite number";
		if (!Number.isInteger(value)) return "float";
		return value < 0 ? "negative integer" : "integer";
	}
	return typeof value;
}
