/**
 * URL normalization: split a candidate URL into host, registrable domain and
 * public suffix, and flag known shorteners.
 */

import { parse } from "tldts";
import { InvalidUrlError } from "./errors.js";
import type { ShortenerRegistry } from "./shorteners.js";
import type { NormalizedUrl } from "./types.js";

/**
 * Parse `raw` into a NormalizedUrl.
 * @throws InvalidUrlError when there is no scheme, the percent-encoding is
 * malformed, or the host has no registrable domain (IP literals included).
 */
export function normalizeUrl(raw: string, shorteners: ShortenerRegistry): NormalizedUrl {
	const trimmed = raw.trim();

	let url: URL;
	try {
		url = new URL(trimmed);
	} catch {
		throw new InvalidUrlError(raw, "not an absolute URL");
	}

	// WHATWG parsing tolerates stray "%" sequences; decodeURI does not
	try {
		decodeURI(trimmed);
	} catch {
		throw new InvalidUrlError(raw, "malformed percent-encoding");
	}

	// URL already lowercases the host name
	const hostname = url.hostname.replace(/\.$/, "");
	if (!hostname) {
		throw new InvalidUrlError(raw, "missing host");
	}

	const info = parse(hostname);
	if (info.isIp || !info.domain || !info.publicSuffix) {
		throw new InvalidUrlError(raw, "host has no registrable domain");
	}

	const domain = hostname.replace(/^www\./, "");
	return {
		raw,
		domain,
		topLevelDomain: info.domain,
		suffix: info.publicSuffix,
		isShortened: shorteners.has(domain),
	};
}

/**
 * Domains between the full host and its registrable domain, nearest first.
 * `a.b.evil.com` with registrable `evil.com` yields `["b.evil.com"]`.
 */
export function parentDomains(url: NormalizedUrl): string[] {
	const parents: string[] = [];
	let current = url.domain;
	while (current.length > url.topLevelDomain.length) {
		const dot = current.indexOf(".");
		if (dot === -1) break;
		current = current.slice(dot + 1);
		if (current.length <= url.topLevelDomain.length) break;
		parents.push(current);
	}
	return parents;
}
