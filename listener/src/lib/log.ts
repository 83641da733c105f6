import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	logDir?: string;
	level?: string;
	rotate?: boolean;
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function lineFormat(serviceName: string): winston.Logform.Format {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);
}

/**
 * Console logger plus combined and error files under `logDir`. Without a
 * `logDir` only the console transport is attached.
 */
export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);
	const format = lineFormat(opts.serviceName);

	const transports: winston.transport[] = [new winston.transports.Console({ level, format })];

	if (opts.logDir) {
		fs.mkdirSync(opts.logDir, { recursive: true });

		if (opts.rotate ?? true) {
			transports.push(
				new DailyRotateFile({
					level,
					format,
					dirname: opts.logDir,
					filename: `${opts.serviceName}.%DATE%.log`,
					datePattern: "YYYY-MM-DD",
					maxFiles: "14d",
					zippedArchive: false
				}),
				new DailyRotateFile({
					level: "error",
					format,
					dirname: opts.logDir,
					filename: `${opts.serviceName}.error.%DATE%.log`,
					datePattern: "YYYY-MM-DD",
					maxFiles: "30d",
					zippedArchive: false
				})
			);
		} else {
			transports.push(
				new winston.transports.File({
					level,
					format,
					filename: path.join(opts.logDir, `${opts.serviceName}.log`)
				}),
				new winston.transports.File({
					level: "error",
					format,
					filename: path.join(opts.logDir, `${opts.serviceName}.error.log`)
				})
			);
		}
	}

	return winston.createLogger({ level, format, transports });
}
