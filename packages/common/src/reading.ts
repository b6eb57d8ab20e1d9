/**
 * One measurement as it arrives from the interrogator client.
 */
export interface Reading {
	channel: number;    // uint8, physical line on the interrogator
	fiber: number;      // uint8, informational only
	sensorSlot: number; // uint8, grating index on the channel
	value: number;      // float64, wavelength or calibrated force
}

export interface SensorSlotKey {
	channel: number;
	sensorSlot: number;
}

export function slotKeyString(key: SensorSlotKey): string {
	return `${key.channel}:${key.sensorSlot}`;
}
