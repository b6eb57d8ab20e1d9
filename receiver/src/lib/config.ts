import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";

import { ReceiverConfigSchema, configError, errorMessage } from "@fbg-logger/common";
import type { ReceiverConfig } from "@fbg-logger/common";

export type { ReceiverConfig } from "@fbg-logger/common";

type Env = Record<string, string | undefined>;

/* ---------- helpers ---------- */

function parseCommandLine(argv: readonly string[]): { configPath: string } {
	const program = new Command();

	program
		.requiredOption("-c, --config <path>", "Path to configuration file")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse([...argv]);

	const opts = program.opts<{ config: string }>();
	return { configPath: opts.config };
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function portFromEnv(env: Env): number | undefined {
	const raw = env.FBG_PORT?.trim();
	if (!raw) return undefined;
	const port = Number(raw);
	if (!Number.isInteger(port)) {
		throw configError(`FBG_PORT must be an integer, got '${raw}'`);
	}
	return port;
}

/**
 * Environment overrides are merged into the raw object before validation,
 * so they go through the same range checks as the file.
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
	const out: Record<string, unknown> = { ...raw };

	const port = portFromEnv(env);
	if (port !== undefined) {
		out.server = { ...(isRecord(raw.server) ? raw.server : {}), port };
	}

	const outputPath = env.FBG_OUTPUT_PATH?.trim();
	if (outputPath) {
		out.output = { ...(isRecord(raw.output) ? raw.output : {}), path: outputPath };
	}

	return out;
}

/* ---------- public API ---------- */

export function parseConfig(raw: unknown, env: Env = {}): ReceiverConfig {
	if (!isRecord(raw)) {
		throw configError("config must be a JSON object");
	}

	const res = ReceiverConfigSchema.safeParse(applyEnvOverrides(raw, env));
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid configuration: ${issues}`, res.error.issues);
	}

	return res.data;
}

export function readConfigFile(configPath: string, env: Env = process.env): ReceiverConfig {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (err) {
		throw configError(`Cannot read config file '${configPath}': ${errorMessage(err)}`);
	}
	return parseConfig(parsed, env);
}

export function loadConfig(argv: readonly string[] = process.argv): ReceiverConfig {
	const { configPath } = parseCommandLine(argv);
	const cfg = readConfigFile(configPath);

	// Verify that dirs exist
	ensureDir(path.dirname(path.resolve(cfg.output.path)));
	ensureDir(cfg.paths.logDir);

	return cfg;
}
