import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
	serviceName: string;
	level?: LogLevel;
	/** Enables rotating file logs in this directory. */
	logDir?: string;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = opts.level ?? "warn";

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${ts} [${opts.serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	// stdout belongs to sensor output and the heartbeat
	const transports: winston.transport[] = [
		new winston.transports.Console({
			level,
			format: baseFormat,
			stderrLevels: [...LOG_LEVELS]
		})
	];

	if (opts.logDir) {
		ensureDir(opts.logDir);

		transports.push(
			new DailyRotateFile({
				level,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		transports
	});
}
