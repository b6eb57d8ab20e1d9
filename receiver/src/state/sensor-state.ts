import type { Reading, SensorSlotKey } from "@fbg-logger/common";

import type { SlotTable } from "./slot-table";

/**
 * Latest value per configured slot, shared by the ingest loop (writer) and the
 * sampling logger (reader).
 *
 * Every method runs to completion on the event loop without awaiting, so a
 * reader never observes a partially written value. The backing array is never
 * handed out; `snapshot()` returns a copy.
 */
export class SensorState {
	private readonly values: Float64Array;
	private writes = 0;

	constructor(readonly slots: SlotTable) {
		this.values = new Float64Array(slots.size);
	}

	get size(): number {
		return this.values.length;
	}

	/** Number of values written since start. */
	get writeCount(): number {
		return this.writes;
	}

	get(key: SensorSlotKey): number | undefined {
		const i = this.slots.indexOf(key);
		return i === undefined ? undefined : this.values[i];
	}

	set(key: SensorSlotKey, value: number): boolean {
		const i = this.slots.indexOf(key);
		if (i === undefined) return false;
		this.values[i] = value;
		this.writes++;
		return true;
	}

	/**
	 * Route a decoded reading to its slot.
	 * Returns false, leaving every slot untouched, when the slot is not configured.
	 */
	record(reading: Reading): boolean {
		return this.set({ channel: reading.channel, sensorSlot: reading.sensorSlot }, reading.value);
	}

	snapshot(): number[] {
		return Array.from(this.values);
	}
}
