import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import { LogWriteError, errorMessage } from "@fbg-logger/common";

import { toCsv, toCsvLine } from "../../lib/csv";
import type { CsvValue } from "../../lib/csv";
import { Mutex } from "../../lib/lock";
import type { SlotTable } from "../../state/slot-table";
import type { SampleRow, SampleSink, SinkModule, SinkOpenOptions } from "./types";

/**
 * Two header rows:
 *   Time,Channel 1,,Channel 2,
 *   ,Sensor 1,Sensor 2,Sensor 1,Sensor 2
 */
export function csvHeaderRows(slots: SlotTable): CsvValue[][] {
	const groups: CsvValue[] = ["Time"];
	for (const { channel, width } of slots.channelGroups()) {
		groups.push(`Channel ${channel}`);
		for (let i = 1; i < width; i++) groups.push("");
	}

	const labels: CsvValue[] = ["", ...slots.columns.map(c => `Sensor ${c.sensorNumber}`)];
	return [groups, labels];
}

export function csvSampleRow(row: SampleRow): CsvValue[] {
	return [row.ts, ...row.values];
}

class CsvFileSink implements SampleSink {
	private readonly lock = new Mutex();
	private closed = false;

	constructor(
		readonly target: string,
		private readonly file: FileHandle,
		private readonly newline: "\n" | "\r\n"
	) {}

	async append(row: SampleRow): Promise<void> {
		await this.lock.runExclusive(async () => {
			if (this.closed) {
				throw new LogWriteError(`CSV log ${this.target} is closed`);
			}
			try {
				await this.file.write(toCsvLine(csvSampleRow(row), { newline: this.newline }));
			} catch (err) {
				throw new LogWriteError(`Cannot append to ${this.target}: ${errorMessage(err)}`, err);
			}
		});
	}

	async close(): Promise<void> {
		// Waits for an in-flight append before releasing the handle
		await this.lock.runExclusive(async () => {
			if (this.closed) return;
			this.closed = true;
			await this.file.close();
		});
	}
}

const CsvSink: SinkModule = {
	format: "csv",

	async open(opts: SinkOpenOptions): Promise<SampleSink> {
		const target = path.resolve(opts.path);

		let file: FileHandle;
		try {
			await fs.mkdir(path.dirname(target), { recursive: true });
			file = await fs.open(target, "w");
		} catch (err) {
			throw new LogWriteError(`Cannot create ${target}: ${errorMessage(err)}`, err);
		}

		try {
			await file.write(toCsv(csvHeaderRows(opts.slots), { newline: opts.newline }));
		} catch (err) {
			await file.close();
			throw new LogWriteError(`Cannot write header to ${target}: ${errorMessage(err)}`, err);
		}

		opts.logger.info("CSV log created: %s (%d value columns)", target, opts.slots.size);
		return new CsvFileSink(target, file, opts.newline);
	}
};

export default CsvSink;
