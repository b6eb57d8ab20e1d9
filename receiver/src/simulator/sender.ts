import { once } from "node:events";
import type { Writable } from "node:stream";
import type winston from "winston";

import { encodePacket } from "@fbg-logger/common";

import { sleep } from "../lib/sleep";
import type { SlotTable } from "../state/slot-table";
import { DEFAULT_WAVEFORM, synthesizeReading } from "./waveform";
import type { Quantity, WaveformOptions } from "./waveform";

export interface SendOptions {
	slots: SlotTable;
	/** Sweeps per second; one record per slot each. */
	rate: number;
	/** Stop after this many sweeps; 0 runs until `signal` aborts. */
	count: number;
	/** Split every record over two writes. */
	fragment: boolean;
	quantity: Quantity;
	waveform?: WaveformOptions;
	signal: AbortSignal;
	logger: winston.Logger;
}

/**
 * Writes `chunk` and waits for `drain` when the socket is backed up.
 * Returns early once `signal` aborts, so a receiver that went away cannot stall the sender.
 */
export async function writeAll(out: Writable, chunk: Uint8Array, signal: AbortSignal): Promise<void> {
	if (out.write(chunk) || signal.aborted) return;
	try {
		await once(out, "drain", { signal });
	} catch (err) {
		if (signal.aborted) return;
		throw err;
	}
}

/** Streams sweeps of synthetic records to `out`. Resolves with the number of full sweeps sent. */
export async function sendSweeps(out: Writable, opts: SendOptions): Promise<number> {
	const { slots, signal, logger } = opts;
	const waveform = opts.waveform ?? DEFAULT_WAVEFORM;
	const periodMs = 1000 / opts.rate;
	const start = Date.now();
	let sweeps = 0;

	while (!signal.aborted && (opts.count === 0 || sweeps < opts.count)) {
		const t = Date.now() - start;
		for (const col of slots.columns) {
			if (signal.aborted) return sweeps;
			const record = encodePacket(synthesizeReading(col, t, waveform, opts.quantity));
			if (opts.fragment) {
				const cut = 1 + Math.floor(Math.random() * (record.length - 1));
				await writeAll(out, record.subarray(0, cut), signal);
				await writeAll(out, record.subarray(cut), signal);
			} else {
				await writeAll(out, record, signal);
			}
		}
		sweeps++;
		if (sweeps % Math.max(1, Math.round(opts.rate)) === 0) {
			logger.debug("Sent %d sweeps", sweeps);
		}

		if (opts.count !== 0 && sweeps >= opts.count) break;
		await sleep(start + sweeps * periodMs - Date.now(), signal);
	}

	return sweeps;
}
