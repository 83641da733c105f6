// Sample envelopes in the shapes the hub broadcasts.

export const EVT_PRECIP = `{
	"serial_number": "SK-00008453",
	"type": "evt_precip",
	"hub_sn": "HB-00000001",
	"evt": [1493322445]
}`;

export const EVT_STRIKE = `{
	"serial_number": "SK-00008453",
	"type": "evt_strike",
	"hub_sn": "HB-00000001",
	"evt": [1493322445, 27, 3848]
}`;

export const RAPID_WIND = `{
	"serial_number": "SK-00008453",
	"type": "rapid_wind",
	"hub_sn": "HB-00000001",
	"ob": [1493322445, 2.3, 128]
}`;

export const OBS_AIR = `{
	"serial_number": "AR-00004049",
	"type": "obs_air",
	"hub_sn": "HB-00000001",
	"obs": [[1493164835, 835.0, 10.0, 45, 0, 0, 3.46, 1]],
	"firmware_revision": 17
}`;

export const OBS_SKY = `{
	"serial_number": "SK-00008453",
	"type": "obs_sky",
	"hub_sn": "HB-00000001",
	"obs": [[1493321340, 9000, 10, 0.0, 2.6, 4.6, 7.4, 187, 3.12, 1, 130, null, 0, 3]],
	"firmware_revision": 29
}`;

export const OBS_ST = `{
	"serial_number": "ST-00000512",
	"type": "obs_st",
	"hub_sn": "HB-00013030",
	"obs": [[1588948614, 0.18, 0.22, 0.27, 144, 6, 1017.57, 22.37, 50.26, 328, 0.03, 3, 0.00000, 0, 0, 0, 2.410, 1]],
	"firmware_revision": 129
}`;

export const DEVICE_STATUS = `{
	"serial_number": "AR-00004049",
	"type": "device_status",
	"hub_sn": "HB-00000001",
	"timestamp": 1510855923,
	"uptime": 2189,
	"voltage": 3.50,
	"firmware_revision": 17,
	"rssi": -17,
	"hub_rssi": -87,
	"sensor_status": 0,
	"debug": 0
}`;

export const HUB_STATUS = `{
	"serial_number": "HB-00000001",
	"type": "hub_status",
	"firmware_revision": "35",
	"uptime": 1670133,
	"rssi": -62,
	"timestamp": 1495724691,
	"reset_flags": "BOR,PIN,POR",
	"seq": 48,
	"fs": [1, 0, 15675411, 524288],
	"radio_stats": [2, 1, 0, 3, 2839],
	"mqtt_stats": [1, 0]
}`;

export const FUTURE_EVENT = `{
	"serial_number": "ST-00000512",
	"type": "evt_future",
	"hub_sn": "HB-00013030",
	"evt": [1588948614, 4],
	"note": "added by newer firmware"
}`;

/** Parse a fixture and apply shallow overrides; `undefined` removes a key. */
export function envelopeWith(text: string, overrides: Record<string, unknown>): string {
	const parsed: Record<string, unknown> = JSON.parse(text);
	for (const [key, value] of Object.entries(overrides)) {
		if (value === undefined) {
			delete parsed[key];
		} else {
			parsed[key] = value;
		}
	}
	return JSON.stringify(parsed);
}
