import { slotKeyString } from "@fbg-logger/common";
import type { ChannelMapping, SensorSlotKey } from "@fbg-logger/common";

export interface SlotColumn extends SensorSlotKey {
	/** Zero-based output column, after the timestamp. */
	position: number;
	/** 1-based index of the sensor within its channel, used for the "Sensor n" label. */
	sensorNumber: number;
}

/**
 * Routing table and column schema derived from the channel configuration.
 * Column order follows the configured channel order, then sensor order.
 */
export class SlotTable {
	readonly columns: readonly SlotColumn[];
	private readonly byKey: ReadonlyMap<string, number>;

	private constructor(columns: SlotColumn[]) {
		this.columns = columns;
		this.byKey = new Map(columns.map(c => [slotKeyString(c), c.position]));
	}

	static fromChannels(channels: readonly ChannelMapping[]): SlotTable {
		const columns: SlotColumn[] = [];
		for (const { channel, sensors } of channels) {
			sensors.forEach((sensorSlot, i) => {
				columns.push({ channel, sensorSlot, position: columns.length, sensorNumber: i + 1 });
			});
		}
		return new SlotTable(columns);
	}

	get size(): number {
		return this.columns.length;
	}

	indexOf(key: SensorSlotKey): number | undefined {
		return this.byKey.get(slotKeyString(key));
	}

	/** Channels in configured order, each with its column count. */
	channelGroups(): Array<{ channel: number; width: number }> {
		const groups: Array<{ channel: number; width: number }> = [];
		for (const col of this.columns) {
			const last = groups[groups.length - 1];
			if (last && last.channel === col.channel) {
				last.width++;
			} else {
				groups.push({ channel: col.channel, width: 1 });
			}
		}
		return groups;
	}
}
