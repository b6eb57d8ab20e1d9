export type ErrorCode =
	| "CONFIG_ERROR"
	| "MALFORMED_PACKET"
	| "CONNECTION_CLOSED"
	| "UNRECOGNIZED_SLOT"
	| "LOG_WRITE_FAILED"
	| "STOP_REQUESTED"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

/**
 * Fewer than one full record was handed to the decoder.
 * Only a framing bug can produce this; the caller skips the record.
 */
export class MalformedPacketError extends AppError {
	constructor(message: string, details?: unknown) {
		super({ code: "MALFORMED_PACKET", message, details });
		this.name = "MalformedPacketError";
	}
}

/** Peer closed the connection, or the socket failed. Ends the session. */
export class ConnectionClosedError extends AppError {
	public readonly peerClosed: boolean;

	constructor(params: { message: string; peerClosed: boolean; cause?: unknown }) {
		super({ code: "CONNECTION_CLOSED", message: params.message, cause: params.cause });
		this.name = "ConnectionClosedError";
		this.peerClosed = params.peerClosed;
	}
}

/**
 * A decoded reading addressed a (channel, sensorSlot) pair that is not configured.
 * Reported through the logger, never thrown.
 */
export class UnrecognizedSlotWarning extends AppError {
	public readonly channel: number;
	public readonly sensorSlot: number;

	constructor(channel: number, sensorSlot: number) {
		super({
			code: "UNRECOGNIZED_SLOT",
			message: `No configured slot for channel=${channel} sensor=${sensorSlot}`,
			details: { channel, sensorSlot }
		});
		this.name = "UnrecognizedSlotWarning";
		this.channel = channel;
		this.sensorSlot = sensorSlot;
	}
}

export class LogWriteError extends AppError {
	constructor(message: string, cause?: unknown) {
		super({ code: "LOG_WRITE_FAILED", message, cause });
		this.name = "LogWriteError";
	}
}

export class StopRequestedError extends AppError {
	constructor(reason: string) {
		super({ code: "STOP_REQUESTED", message: `Stop requested (${reason})`, details: { reason } });
		this.name = "StopRequestedError";
	}
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
