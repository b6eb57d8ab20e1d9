import type winston from "winston";

import type { ShutdownCause, ShutdownReport } from "./controller";

function isCleanCause(cause: ShutdownCause): boolean {
	return cause.kind === "peer-closed" || cause.kind === "stop-requested";
}

/** A session ended cleanly only if it stopped for a clean reason and the log never failed. */
export function isCleanShutdown(report: ShutdownReport): boolean {
	return isCleanCause(report.cause) && !report.secondary.some(c => c.kind === "log-write-failed");
}

export function describeShutdown(report: ShutdownReport): string {
	const { cause, ingest } = report;
	const also = report.secondary.map(c => ` Also ${c.kind}: ${c.message}.`).join("");
	return (
		`Receiver stopped: ${cause.message} (${cause.kind}). ` +
		`${ingest.records} records received (${ingest.unrecognized} unrecognized), ` +
		`${report.rowsWritten} rows logged. Final values: ${report.finalValues.join(", ")}.` +
		also
	);
}

/**
 * Logs the shutdown notice at info (clean) or error. When the logger's level
 * hides that, the notice goes to `fallback` instead so it is always shown.
 */
export function announceShutdown(
	report: ShutdownReport,
	logger: winston.Logger,
	fallback: (line: string) => void = line => console.error(line)
): void {
	const level = isCleanShutdown(report) ? "info" : "error";
	const notice = describeShutdown(report);

	if (logger.isLevelEnabled(level)) {
		logger.log(level, notice);
	} else {
		fallback(notice);
	}
}
