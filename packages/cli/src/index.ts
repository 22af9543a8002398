#!/usr/bin/env node
/**
 * iocsweep command-line entry point.
 *
 * Usage:
 *   iocsweep check --iocs bundle.stix2 [--input candidates.json] [--format text]
 *   iocsweep info --iocs bundle.stix2 other.stix2
 *
 * Logs go to stderr so JSON on stdout stays parseable.
 */

import { readFileSync } from "node:fs";
import { DEFAULT_CONFIG_PATH, loadConfig } from "@iocsweep/core";
import { Command, InvalidArgumentError, Option } from "commander";
import pino from "pino";
import { type CommandResult, type OutputFormat, runCheck, runInfo } from "./commands.js";

const logger = pino({ level: "warn" }, pino.destination(2));

interface GlobalOptions {
	config: string;
	verbose?: boolean;
}

interface CheckFlags {
	iocs: string[];
	input?: string;
	format: OutputFormat;
	maxDepth?: number;
	unshorten: boolean;
}

interface InfoFlags {
	iocs: string[];
	format: OutputFormat;
}

function getVersion(): string {
	try {
		const manifest = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
		const parsed: unknown = JSON.parse(manifest);
		if (parsed && typeof parsed === "object" && "version" in parsed) {
			return String(parsed.version);
		}
	} catch {
		// Fall through to the placeholder version.
	}
	return "0.0.0";
}

function parseDepth(value: string): number {
	const depth = Number(value);
	if (!Number.isInteger(depth) || depth < 0) {
		throw new InvalidArgumentError("Must be a non-negative integer.");
	}
	return depth;
}

function formatOption(): Option {
	return new Option("-f, --format <format>", "output format")
		.choices(["json", "text"])
		.default("json");
}

async function configure(globals: GlobalOptions) {
	const config = await loadConfig(globals.config, logger);
	logger.level = globals.verbose ? "debug" : config.logging.level;
	return config;
}

function emit(result: CommandResult): void {
	if (result.stdout) process.stdout.write(`${result.stdout}\n`);
	if (result.stderr) process.stderr.write(`Error: ${result.stderr}\n`);
	process.exitCode = result.exitCode;
}

const program = new Command();

program
	.name("iocsweep")
	.description("Check device artifacts against STIX2 indicator-of-compromise bundles")
	.version(getVersion())
	.option("-c, --config <path>", "configuration file", DEFAULT_CONFIG_PATH)
	.option("-v, --verbose", "log debug output to stderr");

program
	.command("check")
	.description("Check URLs, processes, emails and files against the indicators")
	.requiredOption("-i, --iocs <paths...>", "indicator bundle files")
	.option("--input <path>", "candidates JSON file (default: stdin)")
	.addOption(formatOption())
	.option("--max-depth <n>", "maximum shortener hops per URL", parseDepth)
	.option("--no-unshorten", "do not follow URL shorteners")
	.action(async (flags: CheckFlags) => {
		const config = await configure(program.opts<GlobalOptions>());
		emit(await runCheck(flags, config, logger));
	});

program
	.command("info")
	.description("Print indicator counts per category")
	.requiredOption("-i, --iocs <paths...>", "indicator bundle files")
	.addOption(formatOption())
	.action(async (flags: InfoFlags) => {
		const config = await configure(program.opts<GlobalOptions>());
		emit(await runInfo(flags, config, logger));
	});

program.parseAsync().catch((e: unknown) => {
	logger.debug({ err: e }, "iocsweep failed");
	process.stderr.write(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
	process.exitCode = 1;
});
