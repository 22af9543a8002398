/**
 * Registry of known URL-shortener domains.
 * The bundled list lives in data/shorteners.json; configuration can point at
 * another JSON list and add domains inline.
 */

import { fileURLToPath } from "node:url";
import { z } from "zod";
import { resolvePath } from "./config.js";
import { getFileContent } from "./file-utils.js";
import type { Logger, ShortenerConfig } from "./types.js";
import { nullLogger } from "./types.js";

export const DEFAULT_SHORTENERS_PATH = fileURLToPath(
	new URL("../data/shorteners.json", import.meta.url),
);

const DomainListSchema = z.array(z.string());

function normalizeEntry(domain: string): string {
	return domain.trim().toLowerCase().replace(/^www\./, "").replace(/\.$/, "");
}

export class ShortenerRegistry {
	private readonly domains: ReadonlySet<string>;

	constructor(domains: Iterable<string>) {
		const set = new Set<string>();
		for (const domain of domains) {
			const entry = normalizeEntry(domain);
			if (entry) set.add(entry);
		}
		this.domains = set;
	}

	has(domain: string): boolean {
		return this.domains.has(normalizeEntry(domain));
	}

	get size(): number {
		return this.domains.size;
	}

	list(): string[] {
		return [...this.domains].sort();
	}
}

async function readDomainList(path: string, logger: Logger): Promise<string[]> {
	try {
		const raw = await getFileContent(path);
		const parsed = DomainListSchema.safeParse(JSON.parse(raw));
		if (!parsed.success) {
			logger.warn(`Shortener list ${path} is not a JSON array of strings`);
			return [];
		}
		return parsed.data;
	} catch (e) {
		logger.warn(`Failed to load shortener list from ${path}`, { error: String(e) });
		return [];
	}
}

export async function loadShortenerRegistry(
	config: Partial<ShortenerConfig> = {},
	logger: Logger = nullLogger,
): Promise<ShortenerRegistry> {
	const domains = await readDomainList(DEFAULT_SHORTENERS_PATH, logger);
	if (config.path) {
		domains.push(...(await readDomainList(resolvePath(config.path), logger)));
	}
	domains.push(...(config.extra_domains ?? []));

	const registry = new ShortenerRegistry(domains);
	logger.debug(`Loaded ${registry.size} shortener domains`);
	return registry;
}
