/**
 * Error types raised by the indicator loader and the URL helpers.
 * Matching operations never let these escape; see matcher.ts.
 */

export class IndicatorLoadError extends Error {
	readonly path: string;

	constructor(message: string, path: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "IndicatorLoadError";
		this.path = path;
	}
}

/** Bundle file could not be read. */
export class BundleReadError extends IndicatorLoadError {
	constructor(path: string, cause: unknown) {
		super(`Unable to read indicator bundle ${path}: ${String(cause)}`, path, { cause });
		this.name = "BundleReadError";
	}
}

/** Bundle file is not valid JSON. */
export class BundleParseError extends IndicatorLoadError {
	constructor(path: string, cause: unknown) {
		super(`Indicator bundle ${path} is not valid JSON: ${String(cause)}`, path, { cause });
		this.name = "BundleParseError";
	}
}

/** Bundle is JSON but its structure or an indicator pattern is unusable. */
export class BundleSchemaError extends IndicatorLoadError {
	readonly pattern: string | null;

	constructor(path: string, reason: string, pattern: string | null = null) {
		super(`Indicator bundle ${path}: ${reason}`, path);
		this.name = "BundleSchemaError";
		this.pattern = pattern;
	}
}

export class InvalidUrlError extends Error {
	readonly url: string;

	constructor(url: string, reason: string) {
		super(`Invalid URL "${url}": ${reason}`);
		this.name = "InvalidUrlError";
		this.url = url;
	}
}

export type UnshortenFailure = "network" | "timeout" | "aborted";

export class UnshortenError extends Error {
	readonly url: string;
	readonly reason: UnshortenFailure;

	constructor(url: string, reason: UnshortenFailure, cause?: unknown) {
		super(`Failed to unshorten ${url} (${reason})`, { cause });
		this.name = "UnshortenError";
		this.url = url;
		this.reason = reason;
	}
}
