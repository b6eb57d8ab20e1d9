import net from "node:net";
import { once } from "node:events";
import { Command, Option } from "commander";

import { errorMessage } from "@fbg-logger/common";
import type { ChannelMapping } from "@fbg-logger/common";

import { readConfigFile } from "./lib/config";
import { createLogger } from "./lib/log";
import { sendSweeps } from "./simulator/sender";
import type { Quantity } from "./simulator/waveform";
import { SlotTable } from "./state/slot-table";

const DEFAULT_CHANNELS: ChannelMapping[] = [
	{ channel: 1, sensors: [0, 1] },
	{ channel: 2, sensors: [0, 1] }
];

interface CliOptions {
	config?: string;
	host: string;
	port: number;
	rate: number;
	count: number;
	fragment: boolean;
	quantity: Quantity;
}

function positiveNumber(raw: string): number {
	const n = Number(raw);
	if (!Number.isFinite(n) || n <= 0) {
		throw new Error(`expected a positive number, got '${raw}'`);
	}
	return n;
}

function parseCommandLine(): CliOptions {
	const program = new Command();

	program
		.option("-c, --config <path>", "Receiver configuration file (channel layout and port)")
		.option("-H, --host <host>", "Receiver host", "127.0.0.1")
		.option("-p, --port <port>", "Receiver port", positiveNumber, 4578)
		.option("-r, --rate <hz>", "Sweeps per second (one record per slot each)", positiveNumber, 100)
		.option("-n, --count <sweeps>", "Stop after this many sweeps (0 = until interrupted)", Number, 0)
		.option("--fragment", "Split every record over two writes", false)
		.addOption(
			new Option("-q, --quantity <kind>", "Record value: calibrated force [mN] or wavelength [nm]")
				.choices(["force", "wavelength"])
				.default("force")
		);

	program.parse(process.argv);
	return program.opts<CliOptions>();
}

async function main(): Promise<void> {
	const opts = parseCommandLine();
	const logger = createLogger({ serviceName: "fbg-simulator" });

	let channels = DEFAULT_CHANNELS;
	let port = opts.port;
	if (opts.config) {
		const cfg = readConfigFile(opts.config);
		channels = cfg.channels;
		port = cfg.server.port;
	}
	const slots = SlotTable.fromChannels(channels);

	const socket = net.connect(port, opts.host);
	await once(socket, "connect");
	logger.info(
		"Connected to %s:%d; streaming %d slots of %s at %d Hz%s",
		opts.host,
		port,
		slots.size,
		opts.quantity,
		opts.rate,
		opts.fragment ? " (fragmented)" : ""
	);

	const stop = new AbortController();
	process.on("SIGINT", () => stop.abort());
	process.on("SIGTERM", () => stop.abort());
	socket.on("close", () => stop.abort());
	socket.on("error", err => {
		logger.error("Socket error: %s", errorMessage(err));
		stop.abort();
	});

	try {
		const sweeps = await sendSweeps(socket, {
			slots,
			rate: opts.rate,
			count: opts.count,
			fragment: opts.fragment,
			quantity: opts.quantity,
			signal: stop.signal,
			logger
		});
		logger.info("Sent %d sweeps (%d records)", sweeps, sweeps * slots.size);
	} finally {
		socket.end();
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
