import type winston from "winston";

import { ConnectionClosedError, LogWriteError, StopRequestedError, asAppError, errorMessage } from "@fbg-logger/common";
import type { AppError } from "@fbg-logger/common";

import { IngestLoop } from "../ingest/ingest-loop";
import type { IngestStats } from "../ingest/ingest-loop";
import type { SensorConnection } from "../lib/server";
import { SamplingLogger } from "../sampling/sampling-logger";
import type { SampleSink } from "../sampling/sinks";
import { SensorState } from "../state/sensor-state";
import type { SlotTable } from "../state/slot-table";

export type LifecycleState = "idle" | "awaiting-connection" | "running" | "draining" | "stopped";

export type ShutdownKind = "peer-closed" | "connection-error" | "log-write-failed" | "stop-requested";

export interface ShutdownCause {
	kind: ShutdownKind;
	message: string;
	error?: AppError;
}

export interface ShutdownReport {
	cause: ShutdownCause;
	/** Failures raised after the first cause, while draining. */
	secondary: ShutdownCause[];
	remote?: string;
	ingest: IngestStats;
	rowsWritten: number;
	finalValues: number[];
}

export interface LifecycleOptions {
	slots: SlotTable;
	periodMs: number;
	logger: winston.Logger;
	/** Resolve with the client connection; reject when `signal` aborts first. */
	accept: (signal: AbortSignal) => Promise<SensorConnection>;
	/** Truncate/create the sample log and write its header. */
	openSink: (slots: SlotTable) => Promise<SampleSink>;
	now?: () => number;
}

const ALLOWED: Record<LifecycleState, readonly LifecycleState[]> = {
	"idle": ["awaiting-connection"],
	"awaiting-connection": ["running", "stopped"],
	"running": ["draining"],
	"draining": ["stopped"],
	"stopped": []
};

function ingestCause(err: unknown): ShutdownCause {
	if (err instanceof ConnectionClosedError) {
		return { kind: err.peerClosed ? "peer-closed" : "connection-error", message: err.message, error: err };
	}
	const e = asAppError(err);
	return { kind: "connection-error", message: e.message, error: e };
}

function samplingCause(err: unknown): ShutdownCause {
	const e = err instanceof LogWriteError ? err : new LogWriteError(errorMessage(err), err);
	return { kind: "log-write-failed", message: e.message, error: e };
}

function emptyStats(): IngestStats {
	return { bytes: 0, records: 0, routed: 0, unrecognized: 0, malformed: 0 };
}

/**
 * Owns one receiving session: accept a client, open the sample log, run the
 * ingest loop and the sampling logger side by side, and tear everything down
 * once on the first shutdown trigger. A controller runs once; it cannot restart.
 */
export class LifecycleController {
	readonly state: SensorState;

	private readonly opts: LifecycleOptions;
	private readonly logger: winston.Logger;
	private readonly shutdown = new AbortController();

	private current: LifecycleState = "idle";
	private cause?: ShutdownCause;
	private readonly secondary: ShutdownCause[] = [];
	private connection?: SensorConnection;
	private connectionClosed = false;
	private sink?: SampleSink;
	private sinkClosed = false;

	constructor(opts: LifecycleOptions) {
		this.opts = opts;
		this.logger = opts.logger;
		this.state = new SensorState(opts.slots);
	}

	get lifecycleState(): LifecycleState {
		return this.current;
	}

	/** External stop request. During a shutdown it is only recorded as a secondary cause. */
	stop(reason = "stop requested"): void {
		if (this.current === "stopped") return;
		this.requestShutdown({ kind: "stop-requested", message: reason });
	}

	async run(): Promise<ShutdownReport> {
		if (this.current !== "idle") {
			throw new Error(`LifecycleController.run() called in state '${this.current}'`);
		}
		const signal = this.shutdown.signal;

		this.transition("awaiting-connection");
		try {
			this.connection = await this.opts.accept(signal);
		} catch (err) {
			this.transition("stopped");
			if (err instanceof StopRequestedError && this.cause) {
				return this.report(emptyStats(), 0);
			}
			throw err;
		}

		if (signal.aborted) {
			this.closeConnection();
			this.transition("stopped");
			return this.report(emptyStats(), 0);
		}

		try {
			this.sink = await this.opts.openSink(this.opts.slots);
		} catch (err) {
			this.closeConnection();
			this.transition("stopped");
			throw err;
		}

		this.transition("running");
		if (signal.aborted) this.transition("draining");

		const ingest = new IngestLoop({ connection: this.connection.stream, state: this.state, logger: this.logger });
		const sampler = new SamplingLogger({
			state: this.state,
			sink: this.sink,
			periodMs: this.opts.periodMs,
			logger: this.logger,
			now: this.opts.now
		});

		await Promise.all([
			ingest.run(signal).then(
				stats => {
					this.logger.debug("Ingest loop exited (%d records)", stats.records);
				},
				(err: unknown) => this.requestShutdown(ingestCause(err))
			),
			sampler.run(signal).then(
				rows => {
					this.logger.debug("Sampling logger exited (%d rows)", rows);
				},
				(err: unknown) => this.requestShutdown(samplingCause(err))
			)
		]);

		this.closeConnection();
		await this.closeSink();
		this.transition("stopped");

		return this.report(ingest.stats, sampler.rowsWritten);
	}

	private requestShutdown(cause: ShutdownCause): void {
		if (this.cause) {
			this.secondary.push(cause);
			if (cause.kind === "log-write-failed") {
				this.logger.error("Sample log failed while shutting down (%s): %s", this.cause.kind, cause.message);
			} else {
				this.logger.debug("Already shutting down (%s); also %s: %s", this.cause.kind, cause.kind, cause.message);
			}
			return;
		}
		this.cause = cause;

		const log = cause.kind === "peer-closed" || cause.kind === "stop-requested" ? "info" : "error";
		this.logger[log]("Shutdown requested (%s): %s", cause.kind, cause.message);

		if (this.current === "running") this.transition("draining");
		this.shutdown.abort(cause.error ?? new StopRequestedError(cause.message));

		// A reader blocked on the socket only wakes up when the socket goes away
		this.closeConnection();
	}

	private closeConnection(): void {
		if (!this.connection || this.connectionClosed) return;
		this.connectionClosed = true;
		this.connection.close();
		this.logger.info("Connection from %s closed", this.connection.remote);
	}

	private async closeSink(): Promise<void> {
		if (!this.sink || this.sinkClosed) return;
		this.sinkClosed = true;
		try {
			await this.sink.close();
			this.logger.info("Sample log closed: %s", this.sink.target);
		} catch (err) {
			this.logger.error("Closing sample log %s failed: %s", this.sink.target, errorMessage(err));
		}
	}

	private transition(to: LifecycleState): void {
		if (!ALLOWED[this.current].includes(to)) {
			throw new Error(`Invalid lifecycle transition ${this.current} -> ${to}`);
		}
		this.logger.info("Lifecycle %s -> %s", this.current, to);
		this.current = to;
	}

	private report(ingest: IngestStats, rowsWritten: number): ShutdownReport {
		return {
			cause: this.cause ?? { kind: "stop-requested", message: "stopped" },
			secondary: [...this.secondary],
			remote: this.connection?.remote,
			ingest,
			rowsWritten,
			finalValues: this.state.snapshot()
		};
	}
}
