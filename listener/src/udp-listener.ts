import dgram from "node:dgram";
import type winston from "winston";

import { loadConfig } from "./lib/config";
import type { ListenerConfig } from "./lib/config";
import { createLogger } from "./lib/log";
import { createStats, formatStats, handleDatagram } from "./lib/datagram";
import type { ListenerStats } from "./lib/datagram";

function listen(config: ListenerConfig, logger: winston.Logger): Promise<ListenerStats> {
	const stats = createStats();
	const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
	const echo = config.echo ? (line: string) => process.stdout.write(`${line}\n`) : undefined;

	return new Promise<ListenerStats>((resolve, reject) => {
		let stopped = false;

		const stop = (reason: string) => {
			if (stopped) return;
			stopped = true;
			logger.info("Stopping UDP listener (reason=%s)", reason);
			process.off("SIGINT", onSigint);
			process.off("SIGTERM", onSigterm);
			socket.close(() => resolve(stats));
		};

		const onSigint = () => stop("SIGINT"); // Ctrl+C
		const onSigterm = () => stop("SIGTERM"); // systemd stop

		process.on("SIGINT", onSigint);
		process.on("SIGTERM", onSigterm);

		socket.on("error", err => {
			logger.error("UDP socket error: %s", err.message);
			process.off("SIGINT", onSigint);
			process.off("SIGTERM", onSigterm);
			if (!stopped) {
				stopped = true;
				socket.close();
			}
			reject(err);
		});

		socket.on("message", (msg, rinfo) => {
			if (stopped) return;
			handleDatagram(msg, rinfo, { logger, stats, echo, mode: config.mode });
			if (config.maxPackets > 0 && stats.received >= config.maxPackets) {
				stop(`received ${stats.received} datagrams`);
			}
		});

		socket.on("listening", () => {
			const addr = socket.address();
			logger.info("Listening on %s:%d", addr.address, addr.port);
		});

		socket.bind(config.udp.port, config.udp.host);
	});
}

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "tempest-listener",
		level: config.logLevel,
		rotate: config.logRotate
	});

	logger.info(
		"UDP listener starting (host=%s port=%d maxPackets=%d echo=%s mode=%s)",
		config.udp.host,
		config.udp.port,
		config.maxPackets,
		String(config.echo),
		config.mode
	);

	const stats = await listen(config, logger);

	logger.info("UDP listener exiting (%s)", formatStats(stats));
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
