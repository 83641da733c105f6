import { encodeSlots } from "./extract";
import {
	EVT_PRECIP_LAYOUT,
	EVT_STRIKE_LAYOUT,
	OBS_AIR_LAYOUT,
	OBS_SKY_LAYOUT,
	OBS_ST_LAYOUT,
	RADIO_STATS_LAYOUT,
	RAPID_WIND_LAYOUT
} from "./layouts";
import type { RecordOf, RecordType, TempestRecord } from "./telemetry";

/** Header identifiers under their wire names. */
export interface WireHeader {
	serial_number?: string;
	hub_sn?: string;
}

export type WireEnvelope = WireHeader & { type: string } & Record<string, unknown>;

export function isRecordType<T extends RecordType>(record: TempestRecord, type: T): record is RecordOf<T> {
	return record.type === type;
}

/**
 * Identifiers exactly as they arrived. `hub_sn` is left out when the envelope
 * had none (hub_status, some passthrough messages).
 */
export function recordHeader(record: TempestRecord): WireHeader {
	const header: WireHeader = {};
	if (record.serialNumber !== undefined) header.serial_number = record.serialNumber;
	if ("hubSn" in record && record.hubSn !== undefined) header.hub_sn = record.hubSn;
	return header;
}

/**
 * Epoch seconds the record refers to: the event or sample time, the newest
 * observation row, or the status timestamp.
 */
export function recordTimestamp(record: TempestRecord): number | undefined {
	switch (record.type) {
		case "evt_precip":
		case "evt_strike":
			return record.evt.epoch;
		case "rapid_wind":
			return record.ob.epoch;
		case "obs_air":
		case "obs_sky":
		case "obs_st":
			return record.obs.at(-1)?.epoch;
		case "device_status":
		case "hub_status":
			return record.timestamp;
		case "unknown":
			return undefined;
	}
}

/**
 * Serialize a record back to the hub's JSON shape.
 */
export function encodeRecord(record: TempestRecord): WireEnvelope {
	switch (record.type) {
		case "evt_precip":
			return { ...envelopeHead(record), evt: encodeSlots(record.evt, EVT_PRECIP_LAYOUT) };
		case "evt_strike":
			return { ...envelopeHead(record), evt: encodeSlots(record.evt, EVT_STRIKE_LAYOUT) };
		case "rapid_wind":
			return { ...envelopeHead(record), ob: encodeSlots(record.ob, RAPID_WIND_LAYOUT) };
		case "obs_air":
			return {
				...envelopeHead(record),
				obs: record.obs.map(row => encodeSlots(row, OBS_AIR_LAYOUT)),
				firmware_revision: record.firmwareRevision
			};
		case "obs_sky":
			return {
				...envelopeHead(record),
				obs: record.obs.map(row => encodeSlots(row, OBS_SKY_LAYOUT)),
				firmware_revision: record.firmwareRevision
			};
		case "obs_st":
			return {
				...envelopeHead(record),
				obs: record.obs.map(row => encodeSlots(row, OBS_ST_LAYOUT)),
				firmware_revision: record.firmwareRevision
			};
		case "device_status":
			return {
				...envelopeHead(record),
				timestamp: record.timestamp,
				uptime: record.uptime,
				voltage: record.voltage,
				firmware_revision: record.firmwareRevision,
				rssi: record.rssi,
				hub_rssi: record.hubRssi,
				sensor_status: record.sensorStatus,
				debug: record.debug
			};
		case "hub_status":
			return {
				...envelopeHead(record),
				firmware_revision: record.firmwareRevision,
				uptime: record.uptime,
				rssi: record.rssi,
				timestamp: record.timestamp,
				reset_flags: record.resetFlags,
				seq: record.seq,
				fs: [...record.fs],
				radio_stats: encodeSlots(record.radioStats, RADIO_STATS_LAYOUT),
				mqtt_stats: [...record.mqttStats]
			};
		case "unknown":
			return { ...envelopeHead(record), ...thawPayload(record.payload) };
	}
}

// Mutable copy of a decoded (frozen) payload; own "__proto__" keys are kept
function thawPayload(payload: object): Record<string, unknown> {
	return Object.fromEntries(Object.entries(payload).map(([key, value]): [string, unknown] => [key, thawValue(value)]));
}

function thawValue(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(thawValue);
	if (typeof value === "object" && value !== null) return thawPayload(value);
	return value;
}

function envelopeHead(record: TempestRecord): WireHeader & { type: string } {
	const { serial_number, hub_sn } = recordHeader(record);
	const type = record.type === "unknown" ? record.discriminator : record.type;
	return {
		...(serial_number !== undefined ? { serial_number } : {}),
		type,
		...(hub_sn !== undefined ? { hub_sn } : {})
	};
}
