import { describe, expect, it } from "vitest";

import { defineSlots, encodeSlots, extractSlots } from "../src/extract";
import { OBS_AIR_LAYOUT, OBS_SKY_LAYOUT, RAPID_WIND_LAYOUT } from "../src/layouts";

describe("defineSlots", () => {
	it("computes the required prefix and the full width", () => {
		expect(RAPID_WIND_LAYOUT.minimum).toBe(3);
		expect(RAPID_WIND_LAYOUT.maximum).toBe(3);
		expect(OBS_AIR_LAYOUT.minimum).toBe(7);
		expect(OBS_AIR_LAYOUT.maximum).toBe(8);
		expect(OBS_SKY_LAYOUT.minimum).toBe(12);
		expect(OBS_SKY_LAYOUT.maximum).toBe(14);
	});

	it("rejects a required slot after an optional one", () => {
		expect(() =>
			defineSlots([
				{ name: "epoch", kind: "epoch" },
				{ name: "battery", kind: "float", optional: true },
				{ name: "interval", kind: "integer" }
			] as const)
		).toThrow("Slot 'interval' at index 2 is required but follows optional slot 'battery'");
	});

	it("rejects repeated names", () => {
		expect(() =>
			defineSlots([
				{ name: "epoch", kind: "epoch" },
				{ name: "epoch", kind: "integer" }
			] as const)
		).toThrow("Duplicate slot name 'epoch'");
	});
});

describe("extractSlots", () => {
	it("reads each slot by index", () => {
		const res = extractSlots([1493322445, 2.3, 128], RAPID_WIND_LAYOUT, "ob");
		expect(res).toEqual({ ok: true, value: { epoch: 1493322445, windSpeed: 2.3, windDirection: 128 } });
	});

	it("ignores elements past the last slot", () => {
		const res = extractSlots([1493322445, 2.3, 128, 7, 8], RAPID_WIND_LAYOUT, "ob");
		expect(res.ok && res.value).toStrictEqual({ epoch: 1493322445, windSpeed: 2.3, windDirection: 128 });
	});

	it("fails with ARITY_TOO_SMALL below the required prefix", () => {
		const res = extractSlots([1493322445, 2.3], RAPID_WIND_LAYOUT, "ob");
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.code).toBe("ARITY_TOO_SMALL");
		expect(res.error.details).toEqual({ code: "ARITY_TOO_SMALL", field: "ob", minimum: 3, actual: 2 });
		expect(res.error.message).toBe("Array 'ob' needs at least 3 elements but has 2");
	});

	it("sets missing optional trailing slots to undefined", () => {
		const res = extractSlots([1493164835, 835, 10, 45, 0, 0, 3.46], OBS_AIR_LAYOUT, "obs[0]");
		expect(res.ok).toBe(true);
		if (!res.ok) return;
		expect(res.value.battery).toBe(3.46);
		expect("reportInterval" in res.value).toBe(true);
		expect(res.value.reportInterval).toBeUndefined();
	});

	it("treats null in an optional or nullable slot as unset", () => {
		const row = [1493321340, 9000, 10, 0, 2.6, 4.6, 7.4, 187, 3.12, 1, 130, null, null, 3];
		const res = extractSlots(row, OBS_SKY_LAYOUT, "obs[0]");
		expect(res.ok).toBe(true);
		if (!res.ok) return;
		expect(res.value.rainDay).toBeUndefined();
		expect(res.value.precipitationType).toBeUndefined();
		expect(res.value.windSampleInterval).toBe(3);
	});

	it("succeeds on an empty array when every slot is optional", () => {
		const layout = defineSlots([
			{ name: "a", kind: "integer", optional: true },
			{ name: "b", kind: "float", optional: true }
		] as const);
		const res = extractSlots([], layout, "extra");
		expect(res).toStrictEqual({ ok: true, value: { a: undefined, b: undefined } });
	});

	it("rejects null in a required slot", () => {
		const res = extractSlots([1493322445, null, 128], RAPID_WIND_LAYOUT, "ob");
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.details).toEqual({
			code: "TYPE_MISMATCH",
			field: "ob.windSpeed",
			expected: "number",
			actual: "null"
		});
	});

	it.each([
		[["1493322445", 2.3, 128], "ob.epoch", "epoch seconds", "string"],
		[[-1, 2.3, 128], "ob.epoch", "epoch seconds", "negative integer"],
		[[1493322445.5, 2.3, 128], "ob.epoch", "epoch seconds", "float"],
		[[1493322445, true, 128], "ob.windSpeed", "number", "boolean"],
		[[1493322445, 2.3, 12.5], "ob.windDirection", "integer", "float"],
		[[1493322445, 2.3, [128]], "ob.windDirection", "integer", "array"]
	])("reports TYPE_MISMATCH for %j", (raw, field, expected, actual) => {
		const res = extractSlots(raw, RAPID_WIND_LAYOUT, "ob");
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.details).toEqual({ code: "TYPE_MISMATCH", field, expected, actual });
	});

	it("rejects a payload that is not an array", () => {
		const res = extractSlots({ epoch: 1 }, RAPID_WIND_LAYOUT, "ob");
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.details).toEqual({ code: "TYPE_MISMATCH", field: "ob", expected: "array", actual: "object" });
	});

	it("leaves the input untouched and returns a frozen object", () => {
		const raw = Object.freeze([1493322445, 2.3, 128, 9]);
		const res = extractSlots(raw, RAPID_WIND_LAYOUT, "ob");
		expect(raw).toEqual([1493322445, 2.3, 128, 9]);
		expect(res.ok && Object.isFrozen(res.value)).toBe(true);
	});
});

describe("encodeSlots", () => {
	it("drops unset trailing optional slots but keeps nullable gaps", () => {
		const fields = {
			epoch: 1493321340,
			illuminance: 9000,
			uv: 10,
			rainMinute: 0,
			windLull: 2.6,
			windAvg: 4.6,
			windGust: 7.4,
			windDirection: 187,
			battery: 3.12,
			reportInterval: 1,
			solarRadiation: 130,
			rainDay: undefined,
			precipitationType: undefined,
			windSampleInterval: undefined
		};
		expect(encodeSlots(fields, OBS_SKY_LAYOUT)).toEqual([1493321340, 9000, 10, 0, 2.6, 4.6, 7.4, 187, 3.12, 1, 130, null]);
	});

	it("keeps an unset optional slot that precedes a set one", () => {
		const layout = defineSlots([
			{ name: "a", kind: "integer" },
			{ name: "b", kind: "integer", optional: true },
			{ name: "c", kind: "integer", optional: true }
		] as const);
		expect(encodeSlots({ a: 1, b: undefined, c: 3 }, layout)).toEqual([1, null, 3]);
	});
});
