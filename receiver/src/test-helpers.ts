import winston from "winston";

import { LogWriteError } from "@fbg-logger/common";
import type { ChannelMapping } from "@fbg-logger/common";

import type { SampleRow, SampleSink } from "./sampling/sinks";
import { SensorState } from "./state/sensor-state";
import { SlotTable } from "./state/slot-table";

export const REFERENCE_CHANNELS: ChannelMapping[] = [
	{ channel: 1, sensors: [0, 1] },
	{ channel: 2, sensors: [0, 1] }
];

export function silentLogger(): winston.Logger {
	return winston.createLogger({
		silent: true,
		transports: [new winston.transports.Console({ silent: true })]
	});
}

export function referenceState(): SensorState {
	return new SensorState(SlotTable.fromChannels(REFERENCE_CHANNELS));
}

/**
 * In-memory sample sink. `delayMs` holds each append on a timer;
 * `failOnCall` makes that append (1-based) reject with LogWriteError.
 */
export class MemorySink implements SampleSink {
	readonly target = "memory";
	readonly rows: SampleRow[] = [];
	appendCalls = 0;
	closeCalls = 0;

	private readonly delayMs: number;
	private readonly failOnCall?: number;

	constructor(opts: { delayMs?: number; failOnCall?: number } = {}) {
		this.delayMs = opts.delayMs ?? 0;
		this.failOnCall = opts.failOnCall;
	}

	async append(row: SampleRow): Promise<void> {
		this.appendCalls++;
		if (this.appendCalls === this.failOnCall) {
			throw new LogWriteError("disk full");
		}
		if (this.delayMs > 0) {
			await new Promise(resolve => setTimeout(resolve, this.delayMs));
		}
		this.rows.push(row);
	}

	async close(): Promise<void> {
		this.closeCalls++;
	}

	offsets(t0: number): number[] {
		return this.rows.map(r => r.ts.getTime() - t0);
	}
}
