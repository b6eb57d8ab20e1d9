import net from "node:net";
import type { AddressInfo } from "node:net";
import type { Readable } from "node:stream";
import type winston from "winston";

import { StopRequestedError, errorMessage } from "@fbg-logger/common";

/**
 * The one client connection of a session.
 * `close()` tears the socket down, which also ends a pending read.
 */
export interface SensorConnection {
	readonly stream: Readable;
	readonly remote: string;
	close(): void;
}

export interface AcceptOptions {
	host: string;
	port: number;
	logger: winston.Logger;
	signal?: AbortSignal;
	/** Called once the listener is bound; port 0 resolves to the real port here. */
	onListening?: (address: AddressInfo) => void;
}

export function wrapSocket(socket: net.Socket, logger: winston.Logger): SensorConnection {
	const remote = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;

	// Errors after the reader has let go of the stream must not become uncaught
	socket.on("error", err => {
		logger.debug("Socket error from %s: %s", remote, err.message);
	});

	return {
		stream: socket,
		remote,
		close: () => {
			socket.destroy();
		}
	};
}

/**
 * Listen until the first client connects, then stop listening.
 * A second client is never accepted.
 */
export function acceptSingleConnection(opts: AcceptOptions): Promise<SensorConnection> {
	const { host, port, logger, signal } = opts;

	return new Promise<SensorConnection>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new StopRequestedError("before listening"));
			return;
		}

		const server = net.createServer();
		let settled = false;

		const onAbort = () => {
			if (settled) return;
			settled = true;
			server.close();
			reject(new StopRequestedError("while awaiting connection"));
		};

		server.on("connection", socket => {
			signal?.removeEventListener("abort", onAbort);
			server.close();
			if (settled) {
				socket.destroy();
				return;
			}
			settled = true;
			const connection = wrapSocket(socket, logger);
			logger.info("Connection from %s", connection.remote);
			resolve(connection);
		});

		server.once("error", err => {
			signal?.removeEventListener("abort", onAbort);
			if (settled) return;
			settled = true;
			server.close();
			logger.error("Listener on %s:%d failed: %s", host, port, errorMessage(err));
			reject(err);
		});

		signal?.addEventListener("abort", onAbort, { once: true });

		server.listen(port, host, () => {
			const address = server.address();
			if (address && typeof address === "object") {
				logger.info("Waiting for client connection on %s:%d", address.address, address.port);
				opts.onListening?.(address);
			}
		});
	});
}
