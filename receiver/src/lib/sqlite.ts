import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import type { SlotColumn } from "../state/slot-table";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function openDb(sqlitePath: string): DbHandle {
	ensureDir(path.dirname(path.resolve(sqlitePath)));

	const db = new Database(sqlitePath);

	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function slotColumnName(col: SlotColumn): string {
	return `ch${col.channel}_s${col.sensorSlot}`;
}

/**
 * Recreate the sample tables for a new run.
 * `columns` records which channel/sensor each value column holds.
 */
export function initSampleTables(db: Database.Database, columns: readonly SlotColumn[]): void {
	const valueCols = columns.map(c => `${slotColumnName(c)} REAL`).join(",\n\t\t\t\t");

	const tx = db.transaction(() => {
		db.exec(`
			DROP TABLE IF EXISTS samples;
			DROP TABLE IF EXISTS columns;

			CREATE TABLE samples (
				id  INTEGER PRIMARY KEY AUTOINCREMENT,
				ts  TEXT    NOT NULL,
				${valueCols}
			);

			CREATE TABLE columns (
				position    INTEGER PRIMARY KEY,
				name        TEXT    NOT NULL,
				channel     INTEGER NOT NULL,
				sensorSlot  INTEGER NOT NULL,
				label       TEXT    NOT NULL
			);
		`);

		const insert = db.prepare(
			"INSERT INTO columns (position, name, channel, sensorSlot, label) VALUES (?, ?, ?, ?, ?)"
		);
		for (const c of columns) {
			insert.run(c.position, slotColumnName(c), c.channel, c.sensorSlot, `Channel ${c.channel} Sensor ${c.sensorNumber}`);
		}
	});

	tx();
}

export type SampleInserter = (ts: string, values: readonly number[]) => void;

export function prepareSampleInsert(db: Database.Database, columns: readonly SlotColumn[]): SampleInserter {
	const names = ["ts", ...columns.map(slotColumnName)];
	const stmt = db.prepare(`INSERT INTO samples (${names.join(", ")}) VALUES (${names.map(() => "?").join(", ")})`);

	return (ts, values) => {
		if (values.length !== columns.length) {
			throw new Error(`Expected ${columns.length} values, got ${values.length}`);
		}
		stmt.run(ts, ...values);
	};
}

export interface SampleRecord {
	id: number;
	ts: string;
	[column: string]: number | string;
}

export function fetchSamples(db: Database.Database, limit = 1000): SampleRecord[] {
	return db.prepare("SELECT * FROM samples ORDER BY id ASC LIMIT ?").all(limit) as SampleRecord[];
}
