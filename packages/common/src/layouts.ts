import { defineSlots, type SlotFields } from "./extract";

/*
	Positional layouts of the array payloads. Units are the hub's native ones:
	seconds since epoch, m/s, degrees, MB, °C, %, lux, W/m², mm, km, volts, minutes.
 */

// evt_precip.evt: [1493322445]
export const EVT_PRECIP_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" }
] as const);

// evt_strike.evt: [1493322445,27,3848]
export const EVT_STRIKE_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" },
	{ name: "distance", kind: "integer" },
	{ name: "energy", kind: "integer" }
] as const);

// rapid_wind.ob: [1493322445,2.3,128]
export const RAPID_WIND_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" },
	{ name: "windSpeed", kind: "float" },
	{ name: "windDirection", kind: "integer" }
] as const);

// obs_air.obs[n]: [1493164835,835.0,10.0,45,0,0,3.46,1]
export const OBS_AIR_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" },
	{ name: "stationPressure", kind: "float" },
	{ name: "airTemperature", kind: "float" },
	{ name: "relativeHumidity", kind: "integer" },
	{ name: "lightningStrikeCount", kind: "integer" },
	{ name: "lightningStrikeAvgDistance", kind: "integer" },
	{ name: "battery", kind: "float" },
	{ name: "reportInterval", kind: "integer", optional: true }
] as const);

// obs_sky.obs[n]: [1493321340,9000,10,0.0,2.6,4.6,7.4,187,3.12,1,130,null,0,3]
export const OBS_SKY_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" },
	{ name: "illuminance", kind: "integer" },
	{ name: "uv", kind: "integer" },
	{ name: "rainMinute", kind: "float" },
	{ name: "windLull", kind: "float" },
	{ name: "windAvg", kind: "float" },
	{ name: "windGust", kind: "float" },
	{ name: "windDirection", kind: "integer" },
	{ name: "battery", kind: "float" },
	{ name: "reportInterval", kind: "integer" },
	{ name: "solarRadiation", kind: "integer" },
	{ name: "rainDay", kind: "integer", nullable: true },
	{ name: "precipitationType", kind: "integer", optional: true },
	{ name: "windSampleInterval", kind: "integer", optional: true }
] as const);

// obs_st.obs[n]: [1588948614,0.18,0.22,0.27,144,6,1017.57,22.37,50.26,328,0.03,3,0.00000,0,0,0,2.410,1]
export const OBS_ST_LAYOUT = defineSlots([
	{ name: "epoch", kind: "epoch" },
	{ name: "windLull", kind: "float" },
	{ name: "windAvg", kind: "float" },
	{ name: "windGust", kind: "float" },
	{ name: "windDirection", kind: "integer" },
	{ name: "windSampleInterval", kind: "integer" },
	{ name: "stationPressure", kind: "float" },
	{ name: "airTemperature", kind: "float" },
	{ name: "relativeHumidity", kind: "float" },
	{ name: "illuminance", kind: "integer" },
	{ name: "uv", kind: "float" },
	{ name: "solarRadiation", kind: "integer" },
	{ name: "rainMinute", kind: "float" },
	{ name: "precipitationType", kind: "integer" },
	{ name: "lightningStrikeAvgDistance", kind: "integer" },
	{ name: "lightningStrikeCount", kind: "integer" },
	{ name: "battery", kind: "float" },
	{ name: "reportInterval", kind: "integer", optional: true }
] as const);

// hub_status.radio_stats: [25,1,0,3,17773]
export const RADIO_STATS_LAYOUT = defineSlots([
	{ name: "version", kind: "integer" },
	{ name: "reboots", kind: "integer" },
	{ name: "i2cErrors", kind: "integer" },
	{ name: "radioStatus", kind: "integer" },
	{ name: "networkId", kind: "integer" }
] as const);

export type EvtPrecipEvt = SlotFields<typeof EVT_PRECIP_LAYOUT.slots>;
export type EvtStrikeEvt = SlotFields<typeof EVT_STRIKE_LAYOUT.slots>;
export type RapidWindOb = SlotFields<typeof RAPID_WIND_LAYOUT.slots>;
export type ObsAirObs = SlotFields<typeof OBS_AIR_LAYOUT.slots>;
export type ObsSkyObs = SlotFields<typeof OBS_SKY_LAYOUT.slots>;
export type ObsStObs = SlotFields<typeof OBS_ST_LAYOUT.slots>;
export type RadioStats = SlotFields<typeof RADIO_STATS_LAYOUT.slots>;
