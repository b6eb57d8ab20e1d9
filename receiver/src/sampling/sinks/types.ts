import type winston from "winston";

import type { OutputFormat } from "@fbg-logger/common";

import type { SlotTable } from "../../state/slot-table";

export interface SampleRow {
	ts: Date;
	values: readonly number[];
}

export interface SinkOpenOptions {
	path: string;
	slots: SlotTable;
	newline: "\n" | "\r\n";
	logger: winston.Logger;
}

/**
 * An opened sample log. The header (or schema) is in place once `open()` resolves.
 */
export interface SampleSink {
	/** Human-readable location, for log messages. */
	readonly target: string;

	/** Append one row. Rejects with LogWriteError. */
	append(row: SampleRow): Promise<void>;

	/** Release the underlying file. Safe to call more than once. */
	close(): Promise<void>;
}

/**
 * SinkModule defines the contract for every output format.
 * - format: identifier used in config.output.format
 * - open: truncate/recreate the target and write its header
 */
export interface SinkModule {
	readonly format: OutputFormat;

	open(opts: SinkOpenOptions): Promise<SampleSink>;
}
