import path from "node:path";

import { LogWriteError, errorMessage } from "@fbg-logger/common";

import { initSampleTables, openDb, prepareSampleInsert } from "../../lib/sqlite";
import type { DbHandle, SampleInserter } from "../../lib/sqlite";
import type { SampleRow, SampleSink, SinkModule, SinkOpenOptions } from "./types";

class SqliteFileSink implements SampleSink {
	private closed = false;

	constructor(
		readonly target: string,
		private readonly handle: DbHandle,
		private readonly insert: SampleInserter
	) {}

	async append(row: SampleRow): Promise<void> {
		if (this.closed) {
			throw new LogWriteError(`SQLite log ${this.target} is closed`);
		}
		// better-sqlite3 is synchronous, so appends cannot interleave
		try {
			this.insert(row.ts.toISOString(), row.values);
		} catch (err) {
			throw new LogWriteError(`Cannot append to ${this.target}: ${errorMessage(err)}`, err);
		}
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.handle.close();
	}
}

const SqliteSink: SinkModule = {
	format: "sqlite",

	async open(opts: SinkOpenOptions): Promise<SampleSink> {
		const target = path.resolve(opts.path);

		let handle: DbHandle | undefined;
		try {
			handle = openDb(target);
			initSampleTables(handle.db, opts.slots.columns);
			const insert = prepareSampleInsert(handle.db, opts.slots.columns);

			opts.logger.info("SQLite log created: %s (%d value columns)", target, opts.slots.size);
			return new SqliteFileSink(target, handle, insert);
		} catch (err) {
			handle?.close();
			throw new LogWriteError(`Cannot create ${target}: ${errorMessage(err)}`, err);
		}
	}
};

export default SqliteSink;
