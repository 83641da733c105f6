import type {
	EvtPrecipEvt,
	EvtStrikeEvt,
	ObsAirObs,
	ObsSkyObs,
	ObsStObs,
	RadioStats,
	RapidWindOb
} from "./layouts";

// Discriminators the hub emits (UDP API v171)
export const RECORD_TYPES = [
	"evt_precip",
	"evt_strike",
	"rapid_wind",
	"obs_air",
	"obs_sky",
	"obs_st",
	"device_status",
	"hub_status"
] as const;

export type KnownRecordType = (typeof RECORD_TYPES)[number];

/** Raw envelope after JSON parsing, before variant resolution. */
export type Envelope = Readonly<Record<string, unknown>>;

interface SensorHeader {
	readonly serialNumber: string; // SK-00008453
	readonly hubSn: string;        // HB-00000001
}

/** Rain start event. */
export interface EvtPrecip extends SensorHeader {
	readonly type: "evt_precip";
	readonly evt: EvtPrecipEvt;
}

/** Lightning strike event. */
export interface EvtStrike extends SensorHeader {
	readonly type: "evt_strike";
	readonly evt: EvtStrikeEvt;
}

/** Three-second wind sample. */
export interface RapidWind extends SensorHeader {
	readonly type: "rapid_wind";
	readonly ob: RapidWindOb;
}

export interface Observation<T extends "obs_air" | "obs_sky" | "obs_st", Row> extends SensorHeader {
	readonly type: T;
	readonly obs: readonly Row[];
	readonly firmwareRevision: number;
}

export type ObsAir = Observation<"obs_air", ObsAirObs>;
export type ObsSky = Observation<"obs_sky", ObsSkyObs>;
/** Tempest all-in-one station observation. */
export type ObsSt = Observation<"obs_st", ObsStObs>;

export interface DeviceStatus extends SensorHeader {
	readonly type: "device_status";
	readonly timestamp: number;
	readonly uptime: number;           // seconds
	readonly voltage: number;
	readonly firmwareRevision: number;
	readonly rssi: number;
	readonly hubRssi: number;
	readonly sensorStatus: number;     // bitmask, not interpreted
	readonly debug: number;
}

export interface HubStatus {
	readonly type: "hub_status";
	readonly serialNumber: string;
	readonly firmwareRevision: string;
	readonly uptime: number;
	readonly rssi: number;
	readonly timestamp: number;
	readonly resetFlags: string;       // "BOR,PIN,POR"
	readonly seq: number;
	readonly fs: readonly number[];    // internal use
	readonly radioStats: RadioStats;
	readonly mqttStats: readonly number[];
}

/**
 * Envelope with a discriminator this library does not know. Header strings are
 * lifted out when present; every other field is kept as received in `payload`.
 */
export interface UnknownRecord {
	readonly type: "unknown";
	readonly discriminator: string;
	readonly serialNumber?: string;
	readonly hubSn?: string;
	readonly payload: Readonly<Record<string, unknown>>;
}

export type TempestRecord =
	| EvtPrecip
	| EvtStrike
	| RapidWind
	| ObsAir
	| ObsSky
	| ObsSt
	| DeviceStatus
	| HubStatus
	| UnknownRecord;

export type RecordType = TempestRecord["type"];

export type RecordOf<T extends RecordType> = Extract<TempestRecord, { type: T }>;
