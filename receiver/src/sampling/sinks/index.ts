import { configError } from "@fbg-logger/common";

import type { SinkModule } from "./types";
import CsvSink from "./csv";
import SqliteSink from "./sqlite";

const registry = new Map<string, SinkModule>([
	[CsvSink.format, CsvSink],
	[SqliteSink.format, SqliteSink]
]);

/**
 * Resolve a sink module by output format.
 * Throws if the format is unsupported.
 */
export function getSinkModule(format: string): SinkModule {
	const mod = registry.get(format);
	if (!mod) {
		throw configError(`Unsupported output format '${format}'`);
	}
	return mod;
}

export type { SampleRow, SampleSink, SinkModule, SinkOpenOptions } from "./types";
