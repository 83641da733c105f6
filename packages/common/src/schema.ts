import { z } from "zod";

import {
	describeValue,
	failure,
	malformed,
	missingField,
	success,
	typeMismatch,
	type DecodeError,
	type DecodeResult
} from "./errors";
import { extractSlots, type PositionalSlot, type SlotFields, type SlotLayout } from "./extract";
import {
	EVT_PRECIP_LAYOUT,
	EVT_STRIKE_LAYOUT,
	OBS_AIR_LAYOUT,
	OBS_SKY_LAYOUT,
	OBS_ST_LAYOUT,
	RADIO_STATS_LAYOUT,
	RAPID_WIND_LAYOUT
} from "./layouts";
import type {
	DeviceStatus,
	Envelope,
	EvtPrecip,
	EvtStrike,
	HubStatus,
	KnownRecordType,
	Observation,
	RapidWind,
	RecordOf,
	UnknownRecord
} from "./telemetry";

const integer = z.number().int();
const epochSeconds = z.number().int().nonnegative("epoch seconds");

/* ---------- header schemas ---------- */

const SensorHeaderSchema = z.object({
	serial_number: z.string(),
	hub_sn: z.string()
});

const EventSchema = SensorHeaderSchema.extend({
	evt: z.array(z.unknown())
});

const RapidWindSchema = SensorHeaderSchema.extend({
	ob: z.array(z.unknown())
});

const ObservationSchema = SensorHeaderSchema.extend({
	obs: z.array(z.unknown()),
	firmware_revision: integer
});

const DeviceStatusSchema = SensorHeaderSchema.extend({
	timestamp: epochSeconds,
	uptime: integer,
	voltage: z.number(),
	firmware_revision: integer,
	rssi: integer,
	hub_rssi: integer,
	sensor_status: integer,
	debug: integer
});

const HubStatusSchema = z.object({
	serial_number: z.string(),
	firmware_revision: z.string(),
	uptime: integer,
	rssi: integer,
	timestamp: epochSeconds,
	reset_flags: z.string(),
	seq: integer,
	fs: z.array(integer),
	radio_stats: z.array(z.unknown()),
	mqtt_stats: z.array(integer)
});

/* ---------- zod issue mapping ---------- */

function formatPath(path: readonly (string | number)[]): string {
	return path.reduce<string>((acc, seg) => {
		if (typeof seg === "number") return `${acc}[${seg}]`;
		return acc ? `${acc}.${seg}` : seg;
	}, "");
}

function valueAt(input: unknown, path: readonly (string | number)[]): unknown {
	let current: unknown = input;
	for (const seg of path) {
		if (current === null || typeof current !== "object") return undefined;
		current = Reflect.get(current, seg);
	}
	return current;
}

function issueToError(issue: z.ZodIssue, input: unknown): DecodeError {
	const field = formatPath(issue.path) || "<root>";

	if (issue.code === z.ZodIssueCode.invalid_type) {
		if (issue.received === z.ZodParsedType.undefined) {
			return missingField(field);
		}
		return typeMismatch(field, issue.expected, issue.received);
	}

	// Refinements such as nonnegative(): the message names the expectation
	return typeMismatch(field, issue.message, describeValue(valueAt(input, issue.path)));
}

function parseFields<T extends z.ZodTypeAny>(schema: T, envelope: Envelope): DecodeResult<z.infer<T>> {
	const res = schema.safeParse(envelope);
	if (res.success) {
		return success(res.data);
	}
	return failure(issueToError(res.error.issues[0], envelope));
}

/* ---------- variant decoders ---------- */

function decodeEvtPrecip(envelope: Envelope): DecodeResult<EvtPrecip> {
	const header = parseFields(EventSchema, envelope);
	if (!header.ok) return header;

	const evt = extractSlots(header.value.evt, EVT_PRECIP_LAYOUT, "evt");
	if (!evt.ok) return evt;

	return success<EvtPrecip>({
		type: "evt_precip",
		serialNumber: header.value.serial_number,
		hubSn: header.value.hub_sn,
		evt: evt.value
	});
}

function decodeEvtStrike(envelope: Envelope): DecodeResult<EvtStrike> {
	const header = parseFields(EventSchema, envelope);
	if (!header.ok) return header;

	const evt = extractSlots(header.value.evt, EVT_STRIKE_LAYOUT, "evt");
	if (!evt.ok) return evt;

	return success<EvtStrike>({
		type: "evt_strike",
		serialNumber: header.value.serial_number,
		hubSn: header.value.hub_sn,
		evt: evt.value
	});
}

function decodeRapidWind(envelope: Envelope): DecodeResult<RapidWind> {
	const header = parseFields(RapidWindSchema, envelope);
	if (!header.ok) return header;

	const ob = extractSlots(header.value.ob, RAPID_WIND_LAYOUT, "ob");
	if (!ob.ok) return ob;

	return success<RapidWind>({
		type: "rapid_wind",
		serialNumber: header.value.serial_number,
		hubSn: header.value.hub_sn,
		ob: ob.value
	});
}

function extractRows<S extends readonly PositionalSlot[]>(
	rows: readonly unknown[],
	layout: SlotLayout<S>
): DecodeResult<readonly SlotFields<S>[]> {
	const out: SlotFields<S>[] = [];
	for (const [i, row] of rows.entries()) {
		const res = extractSlots(row, layout, `obs[${i}]`);
		if (!res.ok) return res;
		out.push(res.value);
	}
	return success(out);
}

function observationDecoder<T extends "obs_air" | "obs_sky" | "obs_st", S extends readonly PositionalSlot[]>(
	type: T,
	layout: SlotLayout<S>
): (envelope: Envelope) => DecodeResult<Observation<T, SlotFields<S>>> {
	return envelope => {
		const header = parseFields(ObservationSchema, envelope);
		if (!header.ok) return header;

		const obs = extractRows(header.value.obs, layout);
		if (!obs.ok) return obs;

		return success<Observation<T, SlotFields<S>>>({
			type,
			serialNumber: header.value.serial_number,
			hubSn: header.value.hub_sn,
			obs: obs.value,
			firmwareRevision: header.value.firmware_revision
		});
	};
}

function decodeDeviceStatus(envelope: Envelope): DecodeResult<DeviceStatus> {
	const fields = parseFields(DeviceStatusSchema, envelope);
	if (!fields.ok) return fields;

	const f = fields.value;
	return success<DeviceStatus>({
		type: "device_status",
		serialNumber: f.serial_number,
		hubSn: f.hub_sn,
		timestamp: f.timestamp,
		uptime: f.uptime,
		voltage: f.voltage,
		firmwareRevision: f.firmware_revision,
		rssi: f.rssi,
		hubRssi: f.hub_rssi,
		sensorStatus: f.sensor_status,
		debug: f.debug
	});
}

function decodeHubStatus(envelope: Envelope): DecodeResult<HubStatus> {
	const fields = parseFields(HubStatusSchema, envelope);
	if (!fields.ok) return fields;

	const f = fields.value;
	const radioStats = extractSlots(f.radio_stats, RADIO_STATS_LAYOUT, "radio_stats");
	if (!radioStats.ok) return radioStats;

	return success<HubStatus>({
		type: "hub_status",
		serialNumber: f.serial_number,
		firmwareRevision: f.firmware_revision,
		uptime: f.uptime,
		rssi: f.rssi,
		timestamp: f.timestamp,
		resetFlags: f.reset_flags,
		seq: f.seq,
		fs: f.fs,
		radioStats: radioStats.value,
		mqttStats: f.mqtt_stats
	});
}

// Deepest container nesting a passthrough field may carry
export const MAX_PAYLOAD_DEPTH = 64;

function copyJsonValue(value: unknown, field: string, depth: number): DecodeResult<unknown> {
	if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return success(value);
	}
	if (typeof value !== "object") {
		return failure(malformed(`field '${field}' holds a ${typeof value}, not a JSON value`));
	}
	if (depth > MAX_PAYLOAD_DEPTH) {
		return failure(malformed(`field '${field}' is nested deeper than ${MAX_PAYLOAD_DEPTH} levels`));
	}

	if (Array.isArray(value)) {
		const items: unknown[] = [];
		for (const item of value) {
			const res = copyJsonValue(item, field, depth + 1);
			if (!res.ok) return res;
			items.push(res.value);
		}
		return success(items);
	}

	const entries: [string, unknown][] = [];
	for (const [key, item] of Object.entries(value)) {
		const res = copyJsonValue(item, field, depth + 1);
		if (!res.ok) return res;
		entries.push([key, res.value]);
	}
	// fromEntries defines own properties, so a "__proto__" key survives
	return success(Object.fromEntries(entries));
}

/**
 * Passthrough for discriminators outside RECORD_TYPES. String headers are
 * lifted out and everything else is copied into `payload`. Fails only when a
 * field is not plain JSON or nests deeper than MAX_PAYLOAD_DEPTH.
 */
export function decodeUnknown(discriminator: string, envelope: Envelope): DecodeResult<UnknownRecord> {
	let serialNumber: string | undefined;
	let hubSn: string | undefined;
	const entries: [string, unknown][] = [];

	for (const [key, value] of Object.entries(envelope)) {
		if (key === "type") continue;
		if (key === "serial_number" && typeof value === "string") {
			serialNumber = value;
			continue;
		}
		if (key === "hub_sn" && typeof value === "string") {
			hubSn = value;
			continue;
		}
		const copy = copyJsonValue(value, key, 1);
		if (!copy.ok) return copy;
		entries.push([key, copy.value]);
	}

	return success<UnknownRecord>({
		type: "unknown",
		discriminator,
		serialNumber,
		hubSn,
		payload: Object.fromEntries(entries)
	});
}

export const VARIANT_DECODERS: {
	readonly [K in KnownRecordType]: (envelope: Envelope) => DecodeResult<RecordOf<K>>;
} = {
	evt_precip: decodeEvtPrecip,
	evt_strike: decodeEvtStrike,
	rapid_wind: decodeRapidWind,
	obs_air: observationDecoder("obs_air", OBS_AIR_LAYOUT),
	obs_sky: observationDecoder("obs_sky", OBS_SKY_LAYOUT),
	obs_st: observationDecoder("obs_st", OBS_ST_LAYOUT),
	device_status: decodeDeviceStatus,
	hub_status: decodeHubStatus
};
