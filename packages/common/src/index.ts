// Decode entry points (used by the UDP listener and REST consumers)
export { decodeBytes, decodeEnvelope, decodeEnvelopeOrThrow, decodeValue } from "./decode";

// Record union and accessors
export { RECORD_TYPES } from "./telemetry";
export { MAX_PAYLOAD_DEPTH } from "./schema";
export type {
	DeviceStatus,
	Envelope,
	EvtPrecip,
	EvtStrike,
	HubStatus,
	KnownRecordType,
	Observation,
	ObsAir,
	ObsSky,
	ObsSt,
	RapidWind,
	RecordOf,
	RecordType,
	TempestRecord,
	UnknownRecord
} from "./telemetry";
export { encodeRecord, isRecordType, recordHeader, recordTimestamp } from "./records";
export type { WireEnvelope, WireHeader } from "./records";

// Positional layouts
export { defineSlots, extractSlots, encodeSlots, SLOT_KIND_LABELS } from "./extract";
export type { PositionalSlot, SlotFields, SlotKind, SlotLayout } from "./extract";
export {
	EVT_PRECIP_LAYOUT,
	EVT_STRIKE_LAYOUT,
	OBS_AIR_LAYOUT,
	OBS_SKY_LAYOUT,
	OBS_ST_LAYOUT,
	RADIO_STATS_LAYOUT,
	RAPID_WIND_LAYOUT
} from "./layouts";
export type {
	EvtPrecipEvt,
	EvtStrikeEvt,
	ObsAirObs,
	ObsSkyObs,
	ObsStObs,
	RadioStats,
	RapidWindOb
} from "./layouts";

// Errors
export { DecodeError, isDecodeError } from "./errors";
export type { DecodeErrorCode, DecodeErrorDetails, DecodeResult } from "./errors";
