/**
 * Indicator matcher. Decides whether candidate artifacts correspond to a
 * loaded indicator. Holds only read-only state, so one instance can serve
 * any number of concurrent callers.
 */

import { domainToUnicode } from "node:url";
import { UrlResolver, type Unshortener } from "./clients/url-resolver.js";
import { InvalidUrlError } from "./errors.js";
import { baseName } from "./file-utils.js";
import type { IndicatorSet } from "./indicators.js";
import { loadShortenerRegistry, type ShortenerRegistry } from "./shorteners.js";
import type {
	Config,
	IndicatorKind,
	Logger,
	MatchFinding,
	MatchType,
	NormalizedUrl,
} from "./types.js";
import { nullLogger } from "./types.js";
import { normalizeUrl, parentDomains } from "./url-utils.js";

export const DEFAULT_MAX_DEPTH = 5;

/** Width of the process-name field that truncates long names. */
export const TRUNCATED_PROCESS_NAME_LENGTH = 16;

export interface IndicatorMatcherOptions {
	shorteners: ShortenerRegistry;
	/** Follows shortened URLs. Omit or pass null to match shortened URLs as-is. */
	unshortener?: Unshortener | null;
	/** Maximum number of shortener hops followed per URL. */
	maxDepth?: number;
	logger?: Logger;
}

export interface CheckDomainOptions {
	maxDepth?: number;
	signal?: AbortSignal;
}

interface Hit {
	kind: IndicatorKind;
	matchType: Exclude<MatchType, "none">;
	indicator: string;
	originalValue: string;
	matchedValue: string;
	redirectChain?: string[];
	detail: string;
}

function noMatch(
	kind: IndicatorKind,
	value: string,
	redirectChain: string[] = [],
	detail = "No match",
): MatchFinding {
	return {
		matched: false,
		indicatorKind: kind,
		matchType: "none",
		confidence: "high",
		indicator: null,
		originalValue: value,
		matchedValue: value,
		redirectChain,
		detail,
	};
}

export class IndicatorMatcher {
	private readonly indicators: IndicatorSet;
	private readonly shorteners: ShortenerRegistry;
	private readonly unshortener: Unshortener | null;
	private readonly maxDepth: number;
	private readonly logger: Logger;

	constructor(indicators: IndicatorSet, options: IndicatorMatcherOptions) {
		this.indicators = indicators;
		this.shorteners = options.shorteners;
		this.unshortener = options.unshortener ?? null;
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
		this.logger = options.logger ?? nullLogger;
	}

	// ── Domains ─────────────────────────────────────────────────────

	/** Never rejects: any failure degrades to a non-match. */
	async checkDomain(url: string, options: CheckDomainOptions = {}): Promise<MatchFinding> {
		if (!url) return noMatch("domain", "");

		try {
			return await this.matchDomain(url, options);
		} catch (e) {
			this.logger.error("Domain check failed", { url, error: String(e) });
			return noMatch("domain", url);
		}
	}

	/** First positive finding across `urls`, evaluated in order. */
	async checkDomains(
		urls: Iterable<string>,
		options: CheckDomainOptions = {},
	): Promise<MatchFinding> {
		for (const url of urls) {
			const finding = await this.checkDomain(url, options);
			if (finding.matched) return finding;
		}
		return noMatch("domain", "", [], "No domain indicators matched");
	}

	private async matchDomain(url: string, options: CheckDomainOptions): Promise<MatchFinding> {
		let original: NormalizedUrl;
		try {
			original = normalizeUrl(url, this.shorteners);
		} catch (e) {
			if (e instanceof InvalidUrlError) {
				this.logger.debug("Falling back to substring matching", { url, reason: e.message });
				return this.matchDomainSubstring(url);
			}
			throw e;
		}

		const chain = await this.followShorteners(
			original,
			options.maxDepth ?? this.maxDepth,
			options.signal,
		);
		const final = chain[chain.length - 1] ?? original;
		return this.compareDomain(url, final, chain.map((u) => u.raw));
	}

	/**
	 * Resolve shortener hops until a non-shortened URL, a failure, a cycle or
	 * the hop limit. Returns every URL reached, starting with `start`.
	 */
	private async followShorteners(
		start: NormalizedUrl,
		maxDepth: number,
		signal?: AbortSignal,
	): Promise<NormalizedUrl[]> {
		const chain = [start];
		if (this.unshortener === null) return chain;

		const visited = new Set([start.raw]);
		let current = start;
		let hops = 0;

		while (current.isShortened) {
			if (hops >= maxDepth) {
				this.logger.debug(`Stopped following shorteners after ${hops} hops`, { url: start.raw });
				break;
			}
			if (signal?.aborted) {
				this.logger.debug("Shortener resolution cancelled", { url: current.raw });
				break;
			}

			let target: string;
			try {
				target = await this.unshortener.unshorten(current.raw, signal);
			} catch (e) {
				this.logger.debug(`Could not unshorten ${current.raw}`, { error: String(e) });
				break;
			}
			hops++;

			if (target === current.raw) break;
			if (visited.has(target)) {
				this.logger.warn("Shortener redirect cycle detected", { url: start.raw, target });
				break;
			}

			let next: NormalizedUrl;
			try {
				next = normalizeUrl(target, this.shorteners);
			} catch (e) {
				this.logger.debug(`Shortener ${current.raw} points to an unparseable URL`, {
					target,
					error: String(e),
				});
				break;
			}

			this.logger.info(`Found a shortened URL ${current.raw} -> ${next.raw}`);
			visited.add(target);
			chain.push(next);
			current = next;
		}

		return chain;
	}

	private compareDomain(originalValue: string, final: NormalizedUrl, chain: string[]): MatchFinding {
		const domains = this.indicators.domains;
		const via = chain.length > 1 ? ` shortened as ${originalValue}` : "";

		if (domains.has(final.domain)) {
			return this.hit({
				kind: "domain",
				matchType: "exact",
				indicator: final.domain,
				originalValue,
				matchedValue: final.raw,
				redirectChain: chain,
				detail: `Found a known suspicious domain ${final.raw}${via}`,
			});
		}

		for (const parent of parentDomains(final)) {
			if (domains.has(parent)) {
				return this.hit({
					kind: "domain",
					matchType: "parent_domain",
					indicator: parent,
					originalValue,
					matchedValue: final.raw,
					redirectChain: chain,
					detail: `Found a sub-domain of suspicious domain ${parent}: ${final.raw}${via}`,
				});
			}
		}

		if (domains.has(final.topLevelDomain)) {
			return this.hit({
				kind: "domain",
				matchType: "top_level_domain",
				indicator: final.topLevelDomain,
				originalValue,
				matchedValue: final.raw,
				redirectChain: chain,
				detail: `Found a sub-domain matching suspicious top level domain ${final.topLevelDomain}: ${final.raw}${via}`,
			});
		}

		return {
			...noMatch("domain", originalValue, chain),
			matchedValue: final.raw,
		};
	}

	/** Low-confidence containment test for strings that do not parse as URLs. */
	private matchDomainSubstring(url: string): MatchFinding {
		const haystack = url.toLowerCase();
		for (const ioc of this.indicators.domains) {
			// Unparsed input keeps internationalised labels as written
			if (haystack.includes(ioc) || haystack.includes(domainToUnicode(ioc))) {
				return this.hit({
					kind: "domain",
					matchType: "substring",
					indicator: ioc,
					originalValue: url,
					matchedValue: url,
					detail: `Maybe found a known suspicious domain ${ioc}: ${url}`,
				});
			}
		}
		return noMatch("domain", url);
	}

	// ── Processes ───────────────────────────────────────────────────

	checkProcess(processPath: string | null | undefined): MatchFinding {
		if (!processPath) return noMatch("process", "");

		const name = baseName(processPath);
		if (this.indicators.processes.has(name)) {
			return this.hit({
				kind: "process",
				matchType: "exact",
				indicator: name,
				originalValue: processPath,
				matchedValue: name,
				detail: `Found a known suspicious process name "${processPath}"`,
			});
		}

		// Names at exactly the field width may be the prefix of a longer indicator
		if ([...name].length === TRUNCATED_PROCESS_NAME_LENGTH) {
			for (const ioc of this.indicators.processes) {
				if (ioc.startsWith(name)) {
					return this.hit({
						kind: "process",
						matchType: "truncated_name",
						indicator: ioc,
						originalValue: processPath,
						matchedValue: name,
						detail: `Found a truncated known suspicious process name "${processPath}"`,
					});
				}
			}
		}

		return noMatch("process", processPath);
	}

	checkProcesses(processPaths: Iterable<string>): MatchFinding {
		for (const processPath of processPaths) {
			const finding = this.checkProcess(processPath);
			if (finding.matched) return finding;
		}
		return noMatch("process", "", [], "No process indicators matched");
	}

	// ── Emails and files ────────────────────────────────────────────

	checkEmail(email: string | null | undefined): MatchFinding {
		if (!email) return noMatch("email", "");

		const normalized = email.trim().toLowerCase();
		if (this.indicators.emails.has(normalized)) {
			return this.hit({
				kind: "email",
				matchType: "exact",
				indicator: normalized,
				originalValue: email,
				matchedValue: email,
				detail: `Found a known suspicious email address "${email}"`,
			});
		}
		return noMatch("email", email);
	}

	checkFile(filePath: string | null | undefined): MatchFinding {
		if (!filePath) return noMatch("file", "");

		const name = baseName(filePath);
		if (this.indicators.files.has(name)) {
			return this.hit({
				kind: "file",
				matchType: "exact",
				indicator: name,
				originalValue: filePath,
				matchedValue: name,
				detail: `Found a known suspicious file "${filePath}"`,
			});
		}
		return noMatch("file", filePath);
	}

	private hit(match: Hit): MatchFinding {
		this.logger.warn(match.detail, { indicator: match.indicator });
		return {
			matched: true,
			indicatorKind: match.kind,
			matchType: match.matchType,
			confidence: match.matchType === "substring" ? "low" : "high",
			indicator: match.indicator,
			originalValue: match.originalValue,
			matchedValue: match.matchedValue,
			redirectChain: match.redirectChain ?? [],
			detail: match.detail,
		};
	}
}

/** Build a matcher wired to the configured shortener registry and resolver. */
export async function createMatcher(
	indicators: IndicatorSet,
	config: Config,
	logger: Logger = nullLogger,
): Promise<IndicatorMatcher> {
	const shorteners = await loadShortenerRegistry(config.shorteners, logger);
	return new IndicatorMatcher(indicators, {
		shorteners,
		unshortener: config.unshorten.enabled ? new UrlResolver(config.unshorten, logger) : null,
		maxDepth: config.unshorten.max_depth,
		logger,
	});
}
