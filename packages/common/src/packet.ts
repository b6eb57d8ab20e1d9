import { MalformedPacketError } from "./errors";
import type { Reading } from "./reading";

// Record layout (fixed size, back-to-back on the stream, no delimiter):
// [0]     channel     uint8
// [1]     fiber       uint8
// [2]     sensorSlot  uint8
// [3..10] value       float64, little-endian
export const PACKET_SIZE = 11;

const VALUE_OFFSET = 3;

export function decodePacket(data: Uint8Array): Reading {
	if (data.byteLength < PACKET_SIZE) {
		throw new MalformedPacketError(
			`Packet needs ${PACKET_SIZE} bytes, got ${data.byteLength}`,
			{ length: data.byteLength }
		);
	}

	const v = new DataView(data.buffer, data.byteOffset, PACKET_SIZE);
	return {
		channel: v.getUint8(0),
		fiber: v.getUint8(1),
		sensorSlot: v.getUint8(2),
		value: v.getFloat64(VALUE_OFFSET, true)
	};
}

function assertUint8(name: string, n: number): void {
	if (!Number.isInteger(n) || n < 0 || n > 0xff) {
		throw new MalformedPacketError(`${name} must be an integer in 0..255, got ${n}`, { [name]: n });
	}
}

export function encodePacket(reading: Reading): Buffer {
	assertUint8("channel", reading.channel);
	assertUint8("fiber", reading.fiber);
	assertUint8("sensorSlot", reading.sensorSlot);

	const buf = Buffer.alloc(PACKET_SIZE);
	buf.writeUInt8(reading.channel, 0);
	buf.writeUInt8(reading.fiber, 1);
	buf.writeUInt8(reading.sensorSlot, 2);
	buf.writeDoubleLE(reading.value, VALUE_OFFSET);
	return buf;
}
