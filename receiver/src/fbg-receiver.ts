import { Command } from "commander";
import type winston from "winston";

import { loadConfig } from "./lib/config";
import type { ReceiverConfig } from "./lib/config";
import { createLogger } from "./lib/log";
import { acceptSingleConnection } from "./lib/server";
import { LifecycleController } from "./lifecycle/controller";
import { announceShutdown, isCleanShutdown } from "./lifecycle/notice";
import { periodFromFrequency } from "./sampling/sampling-logger";
import { getSinkModule } from "./sampling/sinks";
import { SlotTable } from "./state/slot-table";

function parseCommandLine(): void {
	const program = new Command();

	program
		.name("fbg-receiver")
		.description("Receive FBG sensor records over TCP and log them at a fixed sampling rate")
		.requiredOption("-c, --config <path>", "Path to configuration file (parsed by config.ts)")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(process.argv);
}

function createController(config: ReceiverConfig, logger: winston.Logger): LifecycleController {
	const slots = SlotTable.fromChannels(config.channels);
	const sinkModule = getSinkModule(config.output.format);

	return new LifecycleController({
		slots,
		periodMs: periodFromFrequency(config.sampling.frequencyHz),
		logger,
		accept: signal =>
			acceptSingleConnection({
				host: config.server.host,
				port: config.server.port,
				logger,
				signal
			}),
		openSink: s =>
			sinkModule.open({
				path: config.output.path,
				slots: s,
				newline: config.output.newline,
				logger
			})
	});
}

async function main(): Promise<number> {
	parseCommandLine();
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "fbg-receiver",
		level: config.logLevel
	});

	logger.info("FBG receiver starting");
	logger.info(
		"port=%d sampling=%dHz output=%s (%s)",
		config.server.port,
		config.sampling.frequencyHz,
		config.output.path,
		config.output.format
	);
	for (const { channel, sensors } of config.channels) {
		logger.info("Channel %d -> sensors %s", channel, sensors.join(", "));
	}

	const controller = createController(config, logger);

	process.on("SIGINT", () => controller.stop("SIGINT")); // Ctrl+C
	process.on("SIGTERM", () => controller.stop("SIGTERM")); // systemd stop

	const report = await controller.run();
	announceShutdown(report, logger);

	return isCleanShutdown(report) ? 0 : 1;
}

main()
	.then(code => process.exit(code))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
