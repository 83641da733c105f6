import type { RemoteInfo } from "node:dgram";
import type winston from "winston";

import {
	decodeBytes,
	encodeRecord,
	recordHeader,
	recordTimestamp,
	type DecodeResult,
	type TempestRecord
} from "@tempest-wire/common";

import type { EchoMode } from "./config";

export interface DatagramContext {
	logger: winston.Logger;
	stats: ListenerStats;
	// Receives one line per datagram when echo is enabled
	echo?: (line: string) => void;
	mode?: EchoMode;
}

export interface ListenerStats {
	received: number;
	decoded: number;
	dropped: number;
	byType: Map<string, number>;
}

export function createStats(): ListenerStats {
	return { received: 0, decoded: 0, dropped: 0, byType: new Map() };
}

export function previewBody(body: string, maxLen = 120): string {
	const trimmed = body.trim();
	if (trimmed.length <= maxLen) return trimmed;
	return trimmed.slice(0, maxLen) + "…";
}

/**
 * Decode one datagram, log the outcome and update the counters. Decode
 * failures are logged and returned; they never stop the listener. In `raw`
 * mode the text is echoed before decoding, so dropped datagrams show too.
 */
export function handleDatagram(msg: Buffer, rinfo: RemoteInfo, ctx: DatagramContext): DecodeResult<TempestRecord> {
	const { logger, stats } = ctx;
	stats.received++;

	const mode = ctx.mode ?? "struct";
	if (mode === "raw") {
		ctx.echo?.(msg.toString("utf8"));
	}

	const res = decodeBytes(msg);
	if (!res.ok) {
		stats.dropped++;
		logger.warn(
			"Dropped datagram from %s:%d code=%s details=%s body=%s",
			rinfo.address,
			rinfo.port,
			res.error.code,
			JSON.stringify(res.error.details),
			previewBody(msg.toString("utf8"))
		);
		return res;
	}

	const record = res.value;
	const label = record.type === "unknown" ? `unknown:${record.discriminator}` : record.type;
	stats.decoded++;
	stats.byType.set(label, (stats.byType.get(label) ?? 0) + 1);

	const header = recordHeader(record);
	logger.info(
		"Decoded %s serial=%s hub=%s epoch=%s from %s:%d",
		label,
		header.serial_number ?? "-",
		header.hub_sn ?? "-",
		String(recordTimestamp(record) ?? "-"),
		rinfo.address,
		rinfo.port
	);
	logger.debug("Record %s", JSON.stringify(record));

	if (mode === "struct") {
		ctx.echo?.(JSON.stringify(record));
	} else if (mode === "parsed") {
		ctx.echo?.(JSON.stringify(encodeRecord(record)));
	}

	return res;
}

export function formatStats(stats: ListenerStats): string {
	const types = Array.from(stats.byType.entries())
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([type, n]) => `${type}=${n}`)
		.join(" ");
	return `received=${stats.received} decoded=${stats.decoded} dropped=${stats.dropped}${types ? ` ${types}` : ""}`;
}
