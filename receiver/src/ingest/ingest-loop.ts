import type { Readable } from "node:stream";
import type winston from "winston";

import { ConnectionClosedError, UnrecognizedSlotWarning, errorMessage, slotKeyString } from "@fbg-logger/common";
import type { Reading } from "@fbg-logger/common";

import type { SensorState } from "../state/sensor-state";
import { PacketFramer } from "./framer";

export interface IngestStats {
	bytes: number;
	records: number;
	routed: number;
	unrecognized: number;
	malformed: number;
}

export interface IngestLoopOptions {
	connection: Readable;
	state: SensorState;
	logger: winston.Logger;
}

function toBytes(chunk: unknown): Uint8Array {
	if (chunk instanceof Uint8Array) return chunk;
	if (typeof chunk === "string") return Buffer.from(chunk, "latin1");
	throw new TypeError(`Unexpected chunk type from connection: ${typeof chunk}`);
}

/**
 * Reads the connection until it ends, fails, or the shutdown signal is raised,
 * routing every decoded reading into the shared state.
 */
export class IngestLoop {
	readonly stats: IngestStats = { bytes: 0, records: 0, routed: 0, unrecognized: 0, malformed: 0 };

	private readonly connection: Readable;
	private readonly state: SensorState;
	private readonly logger: winston.Logger;
	private readonly framer: PacketFramer;
	private readonly warnedSlots = new Set<string>();

	constructor(opts: IngestLoopOptions) {
		this.connection = opts.connection;
		this.state = opts.state;
		this.logger = opts.logger;
		this.framer = new PacketFramer((err, record) => {
			this.stats.malformed++;
			this.logger.warn("Skipping undecodable record (%s): %s", record.toString("hex"), errorMessage(err));
		});
	}

	/**
	 * Resolves when the loop stopped because `signal` was raised.
	 * Rejects with ConnectionClosedError when the peer closed or the socket failed.
	 */
	async run(signal: AbortSignal): Promise<IngestStats> {
		if (signal.aborted) return this.stats;

		try {
			for await (const chunk of this.connection) {
				if (signal.aborted) break;
				this.ingest(toBytes(chunk));
			}
		} catch (err) {
			if (signal.aborted) return this.finish();
			this.finish();
			throw new ConnectionClosedError({
				message: `Connection failed: ${errorMessage(err)}`,
				peerClosed: false,
				cause: err
			});
		}

		if (signal.aborted) return this.finish();

		this.finish();
		throw new ConnectionClosedError({ message: "Connection closed by peer", peerClosed: true });
	}

	ingest(bytes: Uint8Array): void {
		this.stats.bytes += bytes.byteLength;
		for (const reading of this.framer.push(bytes)) {
			this.stats.records++;
			this.route(reading);
		}
	}

	private route(reading: Reading): void {
		if (this.logger.isDebugEnabled()) {
			this.logger.debug(
				"Reading fiber=%d channel=%d sensor=%d value=%s",
				reading.fiber,
				reading.channel,
				reading.sensorSlot,
				String(reading.value)
			);
		}

		if (this.state.record(reading)) {
			this.stats.routed++;
			return;
		}

		this.stats.unrecognized++;
		const warning = new UnrecognizedSlotWarning(reading.channel, reading.sensorSlot);
		const key = slotKeyString(reading);
		if (this.warnedSlots.has(key)) {
			this.logger.debug("%s; reading discarded", warning.message);
		} else {
			this.warnedSlots.add(key);
			this.logger.warn("%s; discarding this and later readings for it", warning.message);
		}
	}

	private finish(): IngestStats {
		if (this.framer.buffered > 0) {
			this.logger.warn("Discarding %d trailing bytes of an incomplete record", this.framer.buffered);
			this.framer.reset();
		}
		return this.stats;
	}
}
