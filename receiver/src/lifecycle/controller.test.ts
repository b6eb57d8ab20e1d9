import fs from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { describe, it, expect, vi } from "vitest";

import { LogWriteError, StopRequestedError, encodePacket } from "@fbg-logger/common";

import { acceptSingleConnection } from "../lib/server";
import type { SensorConnection } from "../lib/server";
import CsvSink from "../sampling/sinks/csv";
import { SlotTable } from "../state/slot-table";
import { MemorySink, REFERENCE_CHANNELS, silentLogger } from "../test-helpers";
import { LifecycleController } from "./controller";
import type { LifecycleOptions } from "./controller";
import { isCleanShutdown } from "./notice";

const slots = SlotTable.fromChannels(REFERENCE_CHANNELS);

function record(channel: number, sensorSlot: number, value: number): Buffer {
	return encodePacket({ channel, fiber: 0, sensorSlot, value });
}

function fakeConnection() {
	const stream = new PassThrough();
	const close = vi.fn(() => {
		stream.destroy();
	});
	const connection: SensorConnection = { stream, remote: "10.0.0.2:50000", close };
	return { stream, close, connection };
}

function controllerWith(overrides: Partial<LifecycleOptions> & Pick<LifecycleOptions, "accept" | "openSink">) {
	return new LifecycleController({ slots, periodMs: 20, logger: silentLogger(), ...overrides });
}

describe("LifecycleController", () => {
	it("drains on peer close and releases each resource once", async () => {
		const { stream, close, connection } = fakeConnection();
		const sink = new MemorySink();
		const logger = silentLogger();
		const info = vi.spyOn(logger, "info");
		const controller = controllerWith({ logger, accept: async () => connection, openSink: async () => sink });

		stream.write(record(1, 1, 1534.61));
		stream.write(record(1, 1, 1534.62));
		stream.end(record(1, 1, 1534.63));

		const report = await controller.run();

		expect(report.cause.kind).toBe("peer-closed");
		expect(report.secondary).toEqual([]);
		expect(report.remote).toBe("10.0.0.2:50000");
		expect(report.ingest.routed).toBe(3);
		expect(report.finalValues).toEqual([0, 1534.63, 0, 0]);
		expect(controller.state.get({ channel: 1, sensorSlot: 1 })).toBe(1534.63);
		expect(sink.rows.some(r => r.values[1] === 1534.63)).toBe(true);
		expect(report.rowsWritten).toBe(sink.rows.length);

		expect(close).toHaveBeenCalledTimes(1);
		expect(sink.closeCalls).toBe(1);
		expect(controller.lifecycleState).toBe("stopped");

		const calls: unknown[][] = info.mock.calls;
		const transitions = calls.filter(c => c[0] === "Lifecycle %s -> %s").map(c => c.slice(1));
		expect(transitions).toEqual([
			["idle", "awaiting-connection"],
			["awaiting-connection", "running"],
			["running", "draining"],
			["draining", "stopped"]
		]);
	});

	it("stops on request while running", async () => {
		const { stream, close, connection } = fakeConnection();
		const sink = new MemorySink();
		const controller = controllerWith({ accept: async () => connection, openSink: async () => sink });

		stream.write(record(2, 0, 1549.65));
		const done = controller.run();
		await vi.waitFor(() => expect(controller.state.get({ channel: 2, sensorSlot: 0 })).toBe(1549.65));
		expect(controller.lifecycleState).toBe("running");

		controller.stop("SIGINT");
		controller.stop("SIGTERM");
		const report = await done;

		expect(report.cause).toEqual({ kind: "stop-requested", message: "SIGINT" });
		expect(sink.rows[sink.rows.length - 1].values).toEqual([0, 0, 1549.65, 0]);
		expect(close).toHaveBeenCalledTimes(1);
		expect(sink.closeCalls).toBe(1);
	});

	it("cancels a pending accept", async () => {
		const openSink = vi.fn(async () => new MemorySink());
		const controller = controllerWith({
			accept: signal =>
				new Promise<SensorConnection>((_, reject) => {
					signal.addEventListener("abort", () => reject(new StopRequestedError("while awaiting connection")));
				}),
			openSink
		});

		const done = controller.run();
		expect(controller.lifecycleState).toBe("awaiting-connection");
		controller.stop("SIGINT");

		const report = await done;
		expect(report.cause.kind).toBe("stop-requested");
		expect(report.rowsWritten).toBe(0);
		expect(openSink).not.toHaveBeenCalled();
		expect(controller.lifecycleState).toBe("stopped");
	});

	it("shuts down when the log cannot be written", async () => {
		const { close, connection } = fakeConnection();
		const sink = new MemorySink({ failOnCall: 1 });
		const controller = controllerWith({ accept: async () => connection, openSink: async () => sink });

		const report = await controller.run();

		expect(report.cause.kind).toBe("log-write-failed");
		expect(report.cause.error).toBeInstanceOf(LogWriteError);
		expect(report.rowsWritten).toBe(0);
		expect(close).toHaveBeenCalledTimes(1);
		expect(sink.closeCalls).toBe(1);
	});

	it("keeps a log failure raised while draining after a peer close", async () => {
		const { stream, close, connection } = fakeConnection();
		const sink = new MemorySink({ failOnCall: 1 });
		const logger = silentLogger();
		const error = vi.spyOn(logger, "error");
		const controller = controllerWith({ logger, accept: async () => connection, openSink: async () => sink });

		stream.end(record(1, 1, 1534.63));
		const report = await controller.run();

		expect(report.cause.kind).toBe("peer-closed");
		expect(report.secondary).toHaveLength(1);
		expect(report.secondary[0]).toMatchObject({ kind: "log-write-failed", message: "disk full" });
		expect(report.secondary[0].error).toBeInstanceOf(LogWriteError);
		expect(report.rowsWritten).toBe(0);
		expect(sink.rows).toEqual([]);
		expect(isCleanShutdown(report)).toBe(false);

		const calls: unknown[][] = error.mock.calls;
		expect(calls).toContainEqual(["Sample log failed while shutting down (%s): %s", "peer-closed", "disk full"]);
		expect(close).toHaveBeenCalledTimes(1);
		expect(sink.closeCalls).toBe(1);
	});

	it("reports a socket failure as a connection error", async () => {
		const { stream, connection } = fakeConnection();
		const controller = controllerWith({ accept: async () => connection, openSink: async () => new MemorySink() });

		const done = controller.run();
		await vi.waitFor(() => expect(controller.lifecycleState).toBe("running"));
		stream.destroy(new Error("read ECONNRESET"));

		const report = await done;
		expect(report.cause).toMatchObject({ kind: "connection-error", message: "Connection failed: read ECONNRESET" });
	});

	it("releases the connection when the log cannot be opened", async () => {
		const { close, connection } = fakeConnection();
		const controller = controllerWith({
			accept: async () => connection,
			openSink: async () => {
				throw new LogWriteError("Cannot create /readonly/log.csv");
			}
		});

		await expect(controller.run()).rejects.toBeInstanceOf(LogWriteError);
		expect(close).toHaveBeenCalledTimes(1);
		expect(controller.lifecycleState).toBe("stopped");
	});

	it("runs only once", async () => {
		const { stream, connection } = fakeConnection();
		const controller = controllerWith({ accept: async () => connection, openSink: async () => new MemorySink() });
		stream.end();

		await controller.run();
		await expect(controller.run()).rejects.toThrow("LifecycleController.run() called in state 'stopped'");
	});

	it("logs a session from a TCP client to CSV", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fbg-session-"));
		const file = path.join(dir, "session.csv");
		const logger = silentLogger();

		try {
			let client: net.Socket | undefined;
			const controller = new LifecycleController({
				slots,
				periodMs: 20,
				logger,
				accept: signal =>
					acceptSingleConnection({
						host: "127.0.0.1",
						port: 0,
						logger,
						signal,
						onListening: address => {
							client = net.connect(address.port, "127.0.0.1", () => {
								const bytes = Buffer.concat([record(1, 1, 1.5), record(1, 1, 2.5), record(1, 1, 3.5)]);
								// split mid-record to exercise reassembly
								client?.write(bytes.subarray(0, 16));
								client?.end(bytes.subarray(16));
							});
						}
					}),
				openSink: s => CsvSink.open({ path: file, slots: s, newline: "\n", logger })
			});

			const report = await controller.run();

			expect(report.cause.kind).toBe("peer-closed");
			expect(report.finalValues).toEqual([0, 3.5, 0, 0]);

			const lines = fs.readFileSync(file, "utf8").trimEnd().split("\n");
			expect(lines.slice(0, 2)).toEqual(["Time,Channel 1,,Channel 2,", ",Sensor 1,Sensor 2,Sensor 1,Sensor 2"]);
			expect(lines[lines.length - 1]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z,0,3\.5,0,0$/);
			client?.destroy();
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
