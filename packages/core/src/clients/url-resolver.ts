/**
 * HTTP client that follows one hop of a URL shortener.
 * Uses native fetch.
 */

import { UnshortenError } from "../errors.js";
import type { Logger, UnshortenConfig } from "../types.js";
import { nullLogger } from "../types.js";

const DEFAULT_TIMEOUT = 5.0;
const SERVICE_NAME = "iocsweep";
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/** One-hop resolution of a shortened URL. Injected into the matcher. */
export interface Unshortener {
	unshorten(url: string, signal?: AbortSignal): Promise<string>;
}

export class UrlResolver implements Unshortener {
	private readonly timeoutMs: number;
	private readonly logger: Logger;

	constructor(config?: Partial<UnshortenConfig>, logger: Logger = nullLogger) {
		this.timeoutMs = (config?.timeout_seconds ?? DEFAULT_TIMEOUT) * 1000;
		this.logger = logger;
	}

	/**
	 * Issue a HEAD request with redirects disabled and return the Location
	 * target. Non-redirect responses return `url` unchanged.
	 */
	async unshorten(url: string, signal?: AbortSignal): Promise<string> {
		if (signal?.aborted) {
			throw new UnshortenError(url, "aborted");
		}

		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		let response: Response;
		try {
			response = await fetch(url, {
				method: "HEAD",
				redirect: "manual",
				headers: { "User-Agent": SERVICE_NAME },
				signal: controller.signal,
			});
		} catch (e) {
			const reason = timedOut ? "timeout" : signal?.aborted ? "aborted" : "network";
			this.logger.debug(`Unshorten request for ${url} failed`, { reason, error: String(e) });
			throw new UnshortenError(url, reason, e);
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}

		if (!REDIRECT_STATUSES.has(response.status)) {
			this.logger.debug(`Unshorten request for ${url} returned HTTP ${response.status}`);
			return url;
		}

		const location = response.headers.get("location");
		if (!location) {
			this.logger.debug(`Redirect from ${url} carries no Location header`);
			return url;
		}

		try {
			return new URL(location, url).toString();
		} catch {
			return location;
		}
	}
}
