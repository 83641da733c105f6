import "dotenv/config";
import process from "node:process";
import { Command } from "commander";

/**
 * What echo writes per datagram: `struct` the decoded record, `parsed` the
 * record re-encoded in wire form, `raw` the datagram text as received.
 */
export type EchoMode = "struct" | "parsed" | "raw";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface ListenerConfig {
	udp: {
		host: string;
		port: number;
	};

	// Stop after this many datagrams; 0 = run until signalled
	maxPackets: number;

	// Write one line per datagram to stdout, shaped by `mode`
	echo: boolean;
	mode: EchoMode;

	paths: {
		logDir: string;
	};

	logLevel: LogLevel;
	logRotate: boolean;
}

interface CliOptions {
	port?: string;
	host?: string;
	count?: string;
	logDir?: string;
	logLevel?: string;
	rotate: boolean;
	echo?: boolean;
	mode?: string;
}

/* ---------- defaults ---------- */

// WeatherFlow hubs broadcast on this port
const DEFAULT_UDP_PORT = 50222;
const DEFAULT_UDP_HOST = "0.0.0.0";
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_MODE: EchoMode = "struct";

const ECHO_MODES: readonly EchoMode[] = ["struct", "parsed", "raw"];

const LOG_LEVELS: ReadonlySet<string> = new Set(["error", "warn", "info", "http", "verbose", "debug", "silly"]);

function parseCommandLine(argv: readonly string[]): CliOptions {
	const program = new Command();

	program
		.name("tempest-listen")
		.description("Listen for WeatherFlow hub broadcasts and decode them")
		.option("-p, --port <port>", `UDP port (env TEMPEST_UDP_PORT, default ${DEFAULT_UDP_PORT})`)
		.option("-H, --host <addr>", `Bind address (env TEMPEST_UDP_HOST, default ${DEFAULT_UDP_HOST})`)
		.option("-n, --count <n>", "Exit after n datagrams, 0 = unlimited (env TEMPEST_MAX_PACKETS)")
		.option("--log-dir <path>", `Log directory (env LOG_DIR, default ${DEFAULT_LOG_DIR})`)
		.option("-l, --log-level <level>", `Log level (env LOG_LEVEL, default ${DEFAULT_LOG_LEVEL})`)
		.option("--no-rotate", "Write plain log files instead of daily rotated ones (env LOG_ROTATE)")
		.option("--echo", "Print each datagram on stdout (env TEMPEST_ECHO)")
		.option("-m, --mode <mode>", `Echo output: struct, parsed or raw (env TEMPEST_MODE, default ${DEFAULT_MODE})`);

	program.parse([...argv]);

	return program.opts<CliOptions>();
}

function pick(flag: string | undefined, env: NodeJS.ProcessEnv, name: string): string | undefined {
	if (flag !== undefined) return flag;
	const value = env[name];
	if (value === undefined || value.trim() === "") return undefined;
	return value.trim();
}

function parseInteger(raw: string | undefined, label: string, def: number, min: number, max: number): number {
	if (raw === undefined) return def;
	const n = Number(raw);
	if (!Number.isInteger(n) || n < min || n > max) {
		throw new Error(`${label} must be an integer between ${min} and ${max} (got '${raw}')`);
	}
	return n;
}

function parseBoolean(raw: string | undefined, label: string, def: boolean): boolean {
	if (raw === undefined) return def;
	const lower = raw.toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw new Error(`${label} must be "true" or "false"`);
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.has(value);
}

function parseMode(raw: string | undefined): EchoMode {
	if (raw === undefined) return DEFAULT_MODE;
	const lower = raw.toLowerCase();
	const mode = ECHO_MODES.find(m => m === lower);
	if (mode === undefined) {
		throw new Error(`mode must be one of: ${ECHO_MODES.join(", ")} (got '${raw}')`);
	}
	return mode;
}

/* ---------- public API ---------- */

/**
 * Resolve listener settings: command line first, then environment (.env is
 * loaded on import), then defaults.
 */
export function loadConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): ListenerConfig {
	const opts = parseCommandLine(argv);

	const logLevel = (pick(opts.logLevel, env, "LOG_LEVEL") ?? DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw new Error(`log level must be one of: ${Array.from(LOG_LEVELS).join(", ")}`);
	}

	return {
		udp: {
			host: pick(opts.host, env, "TEMPEST_UDP_HOST") ?? DEFAULT_UDP_HOST,
			port: parseInteger(pick(opts.port, env, "TEMPEST_UDP_PORT"), "port", DEFAULT_UDP_PORT, 1, 65535)
		},
		maxPackets: parseInteger(
			pick(opts.count, env, "TEMPEST_MAX_PACKETS"),
			"count",
			0,
			0,
			Number.MAX_SAFE_INTEGER
		),
		echo: opts.echo ?? parseBoolean(pick(undefined, env, "TEMPEST_ECHO"), "TEMPEST_ECHO", false),
		mode: parseMode(pick(opts.mode, env, "TEMPEST_MODE")),
		paths: {
			logDir: pick(opts.logDir, env, "LOG_DIR") ?? DEFAULT_LOG_DIR
		},
		logLevel,
		logRotate: opts.rotate && parseBoolean(pick(undefined, env, "LOG_ROTATE"), "LOG_ROTATE", true)
	};
}
