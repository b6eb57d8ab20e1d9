import type winston from "winston";

import { LogWriteError, errorMessage } from "@fbg-logger/common";

import { sleep } from "../lib/sleep";
import type { SensorState } from "../state/sensor-state";
import type { SampleSink } from "./sinks";

export interface SamplingLoggerOptions {
	state: SensorState;
	sink: SampleSink;
	periodMs: number;
	logger: winston.Logger;
	/** Wall clock in epoch ms. */
	now?: () => number;
}

export function periodFromFrequency(frequencyHz: number): number {
	return 1000 / frequencyHz;
}

/**
 * Snapshots the shared state once per period and appends it to the sink.
 *
 * Ticks are scheduled against absolute targets (`next += period`) so sleep
 * overshoot does not accumulate. A tick that runs late by whole periods skips
 * the missed targets instead of writing a burst of identical rows.
 */
export class SamplingLogger {
	private readonly state: SensorState;
	private readonly sink: SampleSink;
	private readonly periodMs: number;
	private readonly logger: winston.Logger;
	private readonly now: () => number;

	private rows = 0;
	private skipped = 0;

	constructor(opts: SamplingLoggerOptions) {
		if (!Number.isFinite(opts.periodMs) || opts.periodMs <= 0) {
			throw new RangeError(`periodMs must be a positive number, got ${opts.periodMs}`);
		}
		this.state = opts.state;
		this.sink = opts.sink;
		this.periodMs = opts.periodMs;
		this.logger = opts.logger;
		this.now = opts.now ?? (() => Date.now());
	}

	get rowsWritten(): number {
		return this.rows;
	}

	get ticksSkipped(): number {
		return this.skipped;
	}

	/**
	 * Runs until `signal` is aborted, then writes one closing row with the final
	 * state and resolves with the number of rows written.
	 * Rejects with LogWriteError if an append fails; no closing row is attempted then.
	 */
	async run(signal: AbortSignal): Promise<number> {
		let next = this.now() + this.periodMs;

		while (!signal.aborted) {
			await sleep(next - this.now(), signal);
			if (signal.aborted) break;

			await this.writeSample();

			next += this.periodMs;
			const now = this.now();
			if (next <= now) {
				const missed = Math.floor((now - next) / this.periodMs) + 1;
				next += missed * this.periodMs;
				this.skipped += missed;
				this.logger.debug("Sampling fell behind; skipped %d tick(s)", missed);
			}
		}

		await this.writeSample();
		this.logger.info("Sampling stopped after %d rows (%d ticks skipped)", this.rows, this.skipped);
		return this.rows;
	}

	private async writeSample(): Promise<void> {
		const row = { ts: new Date(this.now()), values: this.state.snapshot() };
		try {
			await this.sink.append(row);
		} catch (err) {
			throw err instanceof LogWriteError
				? err
				: new LogWriteError(`Cannot append to ${this.sink.target}: ${errorMessage(err)}`, err);
		}
		this.rows++;
	}
}
