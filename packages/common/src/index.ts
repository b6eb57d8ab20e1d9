// Wire protocol (used by the receiver and the simulator)
export { PACKET_SIZE, decodePacket, encodePacket } from "./packet";
export type { Reading, SensorSlotKey } from "./reading";
export { slotKeyString } from "./reading";

// Configuration schema
export { ReceiverConfigSchema } from "./schema";
export type { ChannelMapping, OutputFormat, ReceiverConfig } from "./schema";

// Error taxonomy
export {
	AppError,
	ConnectionClosedError,
	LogWriteError,
	MalformedPacketError,
	StopRequestedError,
	UnrecognizedSlotWarning,
	asAppError,
	configError,
	errorMessage
} from "./errors";
export type { ErrorCode } from "./errors";
