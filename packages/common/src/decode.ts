import {
	describeValue,
	failure,
	malformed,
	missingDiscriminator,
	success,
	typeMismatch,
	type DecodeResult
} from "./errors";
import { decodeUnknown, VARIANT_DECODERS } from "./schema";
import { RECORD_TYPES, type Envelope, type TempestRecord } from "./telemetry";

type VariantDecoder = (envelope: Envelope) => DecodeResult<TempestRecord>;

const DECODERS: ReadonlyMap<string, VariantDecoder> = new Map(
	RECORD_TYPES.map((type): [string, VariantDecoder] => [type, VARIANT_DECODERS[type]])
);

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isEnvelope(value: unknown): value is Envelope {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

/**
 * Decode an already-parsed envelope (e.g. one element of a REST API response).
 */
export function decodeValue(value: unknown): DecodeResult<TempestRecord> {
	if (!isEnvelope(value)) {
		return failure(malformed(`expected a JSON object, got ${describeValue(value)}`));
	}

	const discriminator = value.type;
	if (discriminator === undefined || discriminator === null || discriminator === "") {
		return failure(missingDiscriminator());
	}
	if (typeof discriminator !== "string") {
		return failure(typeMismatch("type", "string", describeValue(discriminator)));
	}

	const decoder = DECODERS.get(discriminator);
	const res = decoder ? decoder(value) : decodeUnknown(discriminator, value);
	if (!res.ok) return res;

	return success(deepFreeze(res.value));
}

/**
 * Decode one envelope from its JSON text. Bad input is returned as a
 * DecodeError, never thrown.
 */
export function decodeEnvelope(text: string): DecodeResult<TempestRecord> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (err) {
		return failure(malformed("body is not valid JSON", err));
	}
	return decodeValue(parsed);
}

/**
 * Decode a UTF-8 encoded envelope, as received in a UDP datagram.
 */
export function decodeBytes(bytes: Uint8Array): DecodeResult<TempestRecord> {
	let text: string;
	try {
		text = utf8.decode(bytes);
	} catch (err) {
		return failure(malformed("body is not valid UTF-8", err));
	}
	return decodeEnvelope(text);
}

/**
 * Throwing variant of decodeEnvelope for callers that prefer exceptions.
 */
export function decodeEnvelopeOrThrow(text: string): TempestRecord {
	const res = decodeEnvelope(text);
	if (!res.ok) {
		throw res.error;
	}
	return res.value;
}
