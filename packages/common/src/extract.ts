import { z } from "zod";

import {
	arityTooSmall,
	describeValue,
	failure,
	success,
	typeMismatch,
	type DecodeResult
} from "./errors";

export type SlotKind = "epoch" | "integer" | "float";

/**
 * One element of a positionally encoded array. The slot's index is its
 * position in the layout.
 *
 * - optional: may be missing from the end of the array (or sent as null)
 * - nullable: position is required but the hub may send null
 */
export interface PositionalSlot {
	readonly name: string;
	readonly kind: SlotKind;
	readonly optional?: boolean;
	readonly nullable?: boolean;
}

type SlotValue<P extends PositionalSlot> = P extends { readonly optional: true }
	? number | undefined
	: P extends { readonly nullable: true }
		? number | undefined
		: number;

export type SlotFields<S extends readonly PositionalSlot[]> = {
	readonly [P in S[number] as P["name"]]: SlotValue<P>;
};

export interface SlotLayout<S extends readonly PositionalSlot[] = readonly PositionalSlot[]> {
	readonly slots: S;
	/** Number of leading required slots. */
	readonly minimum: number;
	readonly maximum: number;
}

// Coercion rules per slot kind. JSON has one number type, so integer slots
// reject fractional values rather than truncating them.
const SLOT_RULES: Readonly<Record<SlotKind, z.ZodType<number>>> = {
	epoch: z.number().int().nonnegative(),
	integer: z.number().int(),
	float: z.number()
};

export const SLOT_KIND_LABELS: Readonly<Record<SlotKind, string>> = {
	epoch: "epoch seconds",
	integer: "integer",
	float: "number"
};

/**
 * Build a layout from an ordered slot list. Throws when a required slot
 * follows an optional one or a name is repeated.
 */
export function defineSlots<S extends readonly PositionalSlot[]>(slots: S): SlotLayout<S> {
	const firstOptional = slots.findIndex(s => s.optional === true);
	const minimum = firstOptional === -1 ? slots.length : firstOptional;

	const seen = new Set<string>();
	slots.forEach((slot, index) => {
		if (seen.has(slot.name)) {
			throw new Error(`Duplicate slot name '${slot.name}'`);
		}
		seen.add(slot.name);

		if (index > minimum && slot.optional !== true) {
			throw new Error(
				`Slot '${slot.name}' at index ${index} is required but follows optional slot '${slots[minimum].name}'`
			);
		}
	});

	return Object.freeze({ slots, minimum, maximum: slots.length });
}

/**
 * Read each slot of `layout` from `raw` by index. Elements past the last slot
 * are ignored; `raw` is never modified.
 *
 * @param path  Name of the array in the envelope, used to qualify error fields.
 */
export function extractSlots<S extends readonly PositionalSlot[]>(
	raw: unknown,
	layout: SlotLayout<S>,
	path: string
): DecodeResult<SlotFields<S>> {
	if (!Array.isArray(raw)) {
		return failure(typeMismatch(path, "array", describeValue(raw)));
	}
	if (raw.length < layout.minimum) {
		return failure(arityTooSmall(path, layout.minimum, raw.length));
	}

	const fields: Record<string, number | undefined> = {};

	for (const [index, slot] of layout.slots.entries()) {
		// Only optional slots can lie past the end once the minimum is met
		if (index >= raw.length) {
			fields[slot.name] = undefined;
			continue;
		}

		const value: unknown = raw[index];
		const field = `${path}.${slot.name}`;

		if (value === null) {
			if (slot.optional === true || slot.nullable === true) {
				fields[slot.name] = undefined;
				continue;
			}
			return failure(typeMismatch(field, SLOT_KIND_LABELS[slot.kind], "null"));
		}

		const parsed = SLOT_RULES[slot.kind].safeParse(value);
		if (!parsed.success) {
			return failure(typeMismatch(field, SLOT_KIND_LABELS[slot.kind], describeValue(value)));
		}
		fields[slot.name] = parsed.data;
	}

	// Keys are exactly the slot names filled above.
	return success(Object.freeze(fields) as SlotFields<S>);
}

/**
 * Inverse of extractSlots: lay the fields back out in slot order. Unset
 * trailing optional slots are dropped; other unset slots become null.
 */
export function encodeSlots(
	fields: Readonly<Record<string, number | undefined>>,
	layout: SlotLayout
): (number | null)[] {
	const out = layout.slots.map(slot => fields[slot.name] ?? null);
	while (out.length > layout.minimum && out[out.length - 1] === null) {
		out.pop();
	}
	return out;
}
