import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { LogWriteError } from "@fbg-logger/common";

import { SlotTable } from "../../state/slot-table";
import { REFERENCE_CHANNELS, silentLogger } from "../../test-helpers";
import CsvSink, { csvHeaderRows } from "./csv";

const T0 = new Date("2024-04-17T10:00:00.000Z");

describe("csv sink", () => {
	let dir: string;
	const slots = SlotTable.fromChannels(REFERENCE_CHANNELS);

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "fbg-csv-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("builds the two header rows from the channel mapping", () => {
		expect(csvHeaderRows(slots)).toEqual([
			["Time", "Channel 1", "", "Channel 2", ""],
			["", "Sensor 1", "Sensor 2", "Sensor 1", "Sensor 2"]
		]);
	});

	it("truncates the file, writes the header and appends rows", async () => {
		const file = path.join(dir, "nested", "log.csv");
		fs.mkdirSync(path.dirname(file));
		fs.writeFileSync(file, "stale contents\n");

		const sink = await CsvSink.open({ path: file, slots, newline: "\n", logger: silentLogger() });
		await sink.append({ ts: T0, values: [0, 1534.63, 0.5, -2] });
		await sink.append({ ts: new Date(T0.getTime() + 100), values: [1, 2, 3, 4] });
		await sink.close();

		expect(fs.readFileSync(file, "utf8")).toBe(
			"Time,Channel 1,,Channel 2,\n" +
				",Sensor 1,Sensor 2,Sensor 1,Sensor 2\n" +
				"2024-04-17T10:00:00.000Z,0,1534.63,0.5,-2\n" +
				"2024-04-17T10:00:00.100Z,1,2,3,4\n"
		);
	});

	it("creates missing directories and honours CRLF", async () => {
		const file = path.join(dir, "a", "b", "log.csv");
		const single = SlotTable.fromChannels([{ channel: 3, sensors: [1] }]);

		const sink = await CsvSink.open({ path: file, slots: single, newline: "\r\n", logger: silentLogger() });
		await sink.append({ ts: T0, values: [NaN] });
		await sink.close();

		expect(fs.readFileSync(file, "utf8")).toBe("Time,Channel 3\r\n,Sensor 1\r\n2024-04-17T10:00:00.000Z,\r\n");
	});

	it("keeps concurrent appends whole and in call order", async () => {
		const file = path.join(dir, "log.csv");
		const sink = await CsvSink.open({ path: file, slots, newline: "\n", logger: silentLogger() });

		await Promise.all([1, 2, 3].map(n => sink.append({ ts: T0, values: [n, n, n, n] })));
		await sink.close();

		const rows = fs.readFileSync(file, "utf8").trimEnd().split("\n").slice(2);
		expect(rows).toEqual([
			"2024-04-17T10:00:00.000Z,1,1,1,1",
			"2024-04-17T10:00:00.000Z,2,2,2,2",
			"2024-04-17T10:00:00.000Z,3,3,3,3"
		]);
	});

	it("closes once and refuses appends afterwards", async () => {
		const sink = await CsvSink.open({ path: path.join(dir, "log.csv"), slots, newline: "\n", logger: silentLogger() });

		await sink.close();
		await sink.close();

		await expect(sink.append({ ts: T0, values: [0, 0, 0, 0] })).rejects.toBeInstanceOf(LogWriteError);
	});

	it("reports an unusable path as LogWriteError", async () => {
		const blocker = path.join(dir, "blocker");
		fs.writeFileSync(blocker, "");

		await expect(
			CsvSink.open({ path: path.join(blocker, "log.csv"), slots, newline: "\n", logger: silentLogger() })
		).rejects.toMatchObject({ name: "LogWriteError", code: "LOG_WRITE_FAILED" });
	});
});
