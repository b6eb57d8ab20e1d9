import { z } from "zod";

const uint8 = z.number().int().min(0).max(255);

const ChannelMappingSchema = z.object({
	channel: uint8,
	sensors: z
		.array(uint8)
		.min(1)
		.refine(ids => new Set(ids).size === ids.length, { message: "sensor ids must be unique within a channel" })
});

export const ReceiverConfigSchema = z.object({
	server: z
		.object({
			host: z.string().min(1).default("0.0.0.0"),
			port: z.number().int().min(1).max(65535).default(4578)
		})
		.default({}),
	sampling: z
		.object({
			frequencyHz: z.number().positive().max(1000).default(10)
		})
		.default({}),
	channels: z
		.array(ChannelMappingSchema)
		.min(1)
		.refine(chs => new Set(chs.map(c => c.channel)).size === chs.length, { message: "channels must be unique" }),
	output: z
		.object({
			format: z.enum(["csv", "sqlite"]).default("csv"),
			path: z.string().min(1).default("./data/fbg-log.csv"),
			newline: z.enum(["\n", "\r\n"]).default("\n")
		})
		.default({}),
	paths: z
		.object({
			logDir: z.string().min(1).default("./logs")
		})
		.default({}),
	logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info")
});

export type ChannelMapping = z.infer<typeof ChannelMappingSchema>;
export type ReceiverConfig = z.infer<typeof ReceiverConfigSchema>;
export type OutputFormat = ReceiverConfig["output"]["format"];
