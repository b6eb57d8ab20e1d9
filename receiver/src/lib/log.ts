import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	/** Directory for log files. Omit for console-only logging. */
	logDir?: string;
	level?: string;
	console?: boolean;
	rotate?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (process.env.LOG_LEVEL ?? level ?? "info").toLowerCase();
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);

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

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format: baseFormat
			})
		);
	}

	if (opts.logDir) {
		ensureDir(opts.logDir);

		if (opts.rotate ?? true) {
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
		} else {
			transports.push(
				new winston.transports.File({
					level,
					filename: path.join(opts.logDir, `${opts.serviceName}.log`),
					format: baseFormat
				})
			);
		}
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		transports,
		// With every transport disabled winston would warn about writing to nothing
		silent: transports.length === 0
	});
}
