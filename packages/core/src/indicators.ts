/**
 * Indicator bundle loader.
 * Reads STIX2 bundles and compiles the domain, process, email and file
 * indicators they carry into an immutable IndicatorSet.
 */

import { domainToASCII } from "node:url";
import { resolvePath } from "./config.js";
import {
	BundleParseError,
	BundleReadError,
	BundleSchemaError,
} from "./errors.js";
import { getFileContent } from "./file-utils.js";
import type { IndicatorKind, Logger } from "./types.js";
import { BundleSchema, IndicatorObjectSchema, nullLogger, PATTERN_KEYS } from "./types.js";

const IN_MEMORY_SOURCE = "<memory>";

function lower(value: string): string {
	return value.toLowerCase();
}

/**
 * Host form used on both sides of a domain comparison: lower-cased, without
 * a trailing dot or leading `www.`, internationalised labels in punycode.
 */
export function normalizeDomain(value: string): string {
	const host = value.toLowerCase().replace(/\.$/, "").replace(/^www\./, "");
	return domainToASCII(host) || host;
}

function keep(value: string): string {
	return value;
}

function collect(values: Iterable<string> | undefined, normalize: (v: string) => string): Set<string> {
	const set = new Set<string>();
	for (const value of values ?? []) {
		const normalized = normalize(value.trim());
		if (normalized) set.add(normalized);
	}
	return set;
}

export type IndicatorValues = Partial<Record<IndicatorKind, Iterable<string>>>;

/**
 * De-duplicated indicator categories. Domains go through normalizeDomain,
 * emails are lower-cased, processes and files keep their case. Frozen once
 * constructed.
 */
export class IndicatorSet {
	readonly domains: ReadonlySet<string>;
	readonly processes: ReadonlySet<string>;
	readonly emails: ReadonlySet<string>;
	readonly files: ReadonlySet<string>;

	constructor(values: IndicatorValues = {}) {
		this.domains = collect(values.domain, normalizeDomain);
		this.processes = collect(values.process, keep);
		this.emails = collect(values.email, lower);
		this.files = collect(values.file, keep);
		Object.freeze(this);
	}

	static merge(...sets: IndicatorSet[]): IndicatorSet {
		return new IndicatorSet({
			domain: sets.flatMap((s) => [...s.domains]),
			process: sets.flatMap((s) => [...s.processes]),
			email: sets.flatMap((s) => [...s.emails]),
			file: sets.flatMap((s) => [...s.files]),
		});
	}

	get size(): number {
		return this.domains.size + this.processes.size + this.emails.size + this.files.size;
	}

	isEmpty(): boolean {
		return this.size === 0;
	}

	counts(): Record<IndicatorKind, number> {
		return {
			domain: this.domains.size,
			process: this.processes.size,
			email: this.emails.size,
			file: this.files.size,
		};
	}
}

export interface IndicatorPattern {
	key: string;
	value: string;
}

/**
 * Split `[key = 'value']` into its key and value.
 * Returns null unless the body holds exactly one "=".
 */
export function parsePattern(pattern: string): IndicatorPattern | null {
	const body = pattern.trim().replace(/^\[+/, "").replace(/\]+$/, "");
	const parts = body.split("=");
	if (parts.length !== 2) return null;

	const [key = "", value = ""] = parts;
	return {
		key: key.trim(),
		value: value.trim().replace(/^'+/, "").replace(/'+$/, ""),
	};
}

export interface ParseBundleOptions {
	/** Name used in errors and log records. */
	source?: string;
	/** When false, malformed patterns are logged and skipped instead of failing the load. */
	strict?: boolean;
	logger?: Logger;
}

export function parseBundle(data: unknown, options: ParseBundleOptions = {}): IndicatorSet {
	const source = options.source ?? IN_MEMORY_SOURCE;
	const strict = options.strict ?? true;
	const logger = options.logger ?? nullLogger;

	const bundle = BundleSchema.safeParse(data);
	if (!bundle.success) {
		throw new BundleSchemaError(source, 'missing top-level "objects" array');
	}

	const values: Record<IndicatorKind, string[]> = { domain: [], process: [], email: [], file: [] };
	for (const entry of bundle.data.objects) {
		const indicator = IndicatorObjectSchema.safeParse(entry);
		if (!indicator.success) continue;

		const { pattern } = indicator.data;
		const parsed = parsePattern(pattern);
		if (parsed === null) {
			if (strict) {
				throw new BundleSchemaError(source, `malformed indicator pattern "${pattern}"`, pattern);
			}
			logger.warn("Skipping malformed indicator pattern", { source, pattern });
			continue;
		}

		const kind = PATTERN_KEYS.get(parsed.key);
		if (kind === undefined) continue;
		values[kind].push(parsed.value);
	}

	return new IndicatorSet(values);
}

export interface LoadIndicatorsOptions {
	strict?: boolean;
	logger?: Logger;
}

/**
 * Load one or more bundle files and merge them into a single set.
 * @throws BundleReadError, BundleParseError, BundleSchemaError
 */
export async function loadIndicators(
	paths: string | string[],
	options: LoadIndicatorsOptions = {},
): Promise<IndicatorSet> {
	const logger = options.logger ?? nullLogger;
	const sets: IndicatorSet[] = [];

	for (const bundlePath of typeof paths === "string" ? [paths] : paths) {
		const path = resolvePath(bundlePath);

		let raw: string;
		try {
			raw = await getFileContent(path);
		} catch (e) {
			throw new BundleReadError(path, e);
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (e) {
			throw new BundleParseError(path, e);
		}

		const set = parseBundle(data, { source: path, strict: options.strict, logger });
		logger.info(`Loaded ${set.size} indicators from ${path}`, set.counts());
		sets.push(set);
	}

	return IndicatorSet.merge(...sets);
}
