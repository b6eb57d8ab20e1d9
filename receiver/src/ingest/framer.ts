import { PACKET_SIZE, decodePacket } from "@fbg-logger/common";
import type { Reading } from "@fbg-logger/common";

const EMPTY = Buffer.alloc(0);

/**
 * Reassembles fixed-size records from an arbitrarily chunked byte stream.
 *
 * TCP gives no message boundaries: one read may carry a fragment of a record,
 * several records, or both. Bytes are held until a full record is present and
 * the tail is carried into the next push.
 */
export class PacketFramer {
	private pending: Buffer = EMPTY;

	constructor(private readonly onDecodeError?: (err: unknown, record: Buffer) => void) {}

	/** Bytes held back waiting for the rest of a record. */
	get buffered(): number {
		return this.pending.length;
	}

	push(chunk: Uint8Array): Reading[] {
		if (chunk.byteLength === 0) return [];

		const incoming = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
		const data = this.pending.length === 0 ? incoming : Buffer.concat([this.pending, incoming]);

		const readings: Reading[] = [];
		let offset = 0;
		while (data.length - offset >= PACKET_SIZE) {
			const record = data.subarray(offset, offset + PACKET_SIZE);
			offset += PACKET_SIZE;
			try {
				readings.push(decodePacket(record));
			} catch (err) {
				this.onDecodeError?.(err, record);
			}
		}

		// Copy the tail so a large chunk's backing memory is not retained
		this.pending = offset === data.length ? EMPTY : Buffer.from(data.subarray(offset));
		return readings;
	}

	reset(): void {
		this.pending = EMPTY;
	}
}
