/**
 * Zod schemas and inferred TypeScript types for iocsweep.
 * Single source of truth for configuration and match result shapes.
 */

import { z } from "zod";

// ── Logger interface (dependency injection) ─────────────────────────

export interface Logger {
	debug(msg: string, data?: Record<string, unknown>): void;
	info(msg: string, data?: Record<string, unknown>): void;
	warn(msg: string, data?: Record<string, unknown>): void;
	error(msg: string, data?: Record<string, unknown>): void;
}

/** No-op logger for when no logger is provided. */
export const nullLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

// ── Indicator bundle ────────────────────────────────────────────────

export const IndicatorKindSchema = z.enum(["domain", "process", "email", "file"]);
export type IndicatorKind = z.infer<typeof IndicatorKindSchema>;

/** Pattern keys understood by the loader, mapped to the category they fill. */
export const PATTERN_KEYS: ReadonlyMap<string, IndicatorKind> = new Map<string, IndicatorKind>([
	["domain-name:value", "domain"],
	["process:name", "process"],
	["email-addr:value", "email"],
	["file:name", "file"],
]);

export const BundleSchema = z.object({
	objects: z.array(z.unknown()),
});

/** Bundle entries we act on. Anything else in `objects` is skipped. */
export const IndicatorObjectSchema = z.object({
	type: z.literal("indicator"),
	pattern: z.string(),
});

export type IndicatorObject = z.infer<typeof IndicatorObjectSchema>;

// ── URL ─────────────────────────────────────────────────────────────

export interface NormalizedUrl {
	raw: string;
	/** Full host name, lower-cased, without a leading `www.`. */
	domain: string;
	/** Registrable domain under the public-suffix table, e.g. `evil.co.uk`. */
	topLevelDomain: string;
	/** Public suffix, e.g. `co.uk`. */
	suffix: string;
	isShortened: boolean;
}

// ── Findings ────────────────────────────────────────────────────────

export const MatchTypeSchema = z.enum([
	"exact",
	"parent_domain",
	"top_level_domain",
	"substring",
	"truncated_name",
	"none",
]);

export type MatchType = z.infer<typeof MatchTypeSchema>;
export type MatchConfidence = "high" | "low";

export interface MatchFinding {
	matched: boolean;
	indicatorKind: IndicatorKind;
	matchType: MatchType;
	confidence: MatchConfidence;
	/** Indicator value that matched, null when nothing did. */
	indicator: string | null;
	/** Candidate exactly as supplied by the caller. */
	originalValue: string;
	/** Artifact that triggered the match; may be a resolved URL. */
	matchedValue: string;
	/** URLs visited while following shorteners, original first. Empty for non-URL kinds. */
	redirectChain: string[];
	detail: string;
}

// ── Timeline ────────────────────────────────────────────────────────

export interface TimelineEvent {
	timestamp: string;
	module: string;
	event: string;
	data: string;
}

// ── Config ──────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const UnshortenConfigSchema = z.object({
	enabled: z.boolean().default(true),
	timeout_seconds: z.number().positive().default(5.0),
	max_depth: z.number().int().min(0).default(5),
});

export const ShortenerConfigSchema = z.object({
	path: z.string().optional(),
	extra_domains: z.array(z.string()).default([]),
});

export const BundleConfigSchema = z.object({
	strict: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
	level: LogLevelSchema.default("warn"),
});

export const ConfigSchema = z.object({
	unshorten: UnshortenConfigSchema.default({}),
	shorteners: ShortenerConfigSchema.default({}),
	bundle: BundleConfigSchema.default({}),
	logging: LoggingConfigSchema.default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type UnshortenConfig = z.infer<typeof UnshortenConfigSchema>;
export type ShortenerConfig = z.infer<typeof ShortenerConfigSchema>;
export type BundleConfig = z.infer<typeof BundleConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
