/**
 * Configuration loading. Reads ~/.iocsweep/config.json (or an explicit path)
 * and fills every unset field from ConfigSchema defaults.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { getFileContent } from "./file-utils.js";
import type { Config, Logger } from "./types.js";
import { ConfigSchema, nullLogger } from "./types.js";

export const DEFAULT_CONFIG_PATH = "~/.iocsweep/config.json";

/** Expand a leading ~ to the user's home directory. */
export function resolvePath(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return join(homedir(), path.slice(2));
	return path;
}

export async function loadConfig(
	configPath: string = DEFAULT_CONFIG_PATH,
	logger: Logger = nullLogger,
): Promise<Config> {
	const path = resolvePath(configPath);

	let raw: string;
	try {
		raw = await getFileContent(path);
	} catch {
		return ConfigSchema.parse({});
	}

	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (e) {
		logger.warn(`Failed to parse config ${path}, using defaults`, { error: String(e) });
		return ConfigSchema.parse({});
	}

	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		logger.warn(`Config file ${path} does not contain a JSON object, using defaults`);
		return ConfigSchema.parse({});
	}

	const parsed = ConfigSchema.safeParse(data);
	if (!parsed.success) {
		logger.warn(`Invalid config ${path}, using defaults`, { issues: parsed.error.issues });
		return ConfigSchema.parse({});
	}
	return parsed.data;
}
