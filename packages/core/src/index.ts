// @iocsweep/core public API

export type { Unshortener } from "./clients/url-resolver.js";
// URL resolver
export { UrlResolver } from "./clients/url-resolver.js";
// Config
export { DEFAULT_CONFIG_PATH, loadConfig, resolvePath } from "./config.js";
// Errors
export {
	BundleParseError,
	BundleReadError,
	BundleSchemaError,
	IndicatorLoadError,
	InvalidUrlError,
	UnshortenError,
	type UnshortenFailure,
} from "./errors.js";
export { baseName, findFiles, getFileContent, getFirstLine } from "./file-utils.js";
// Format
export {
	confidenceEmoji,
	formatCounts,
	formatFindingsBanner,
	formatScanClean,
	kv,
	separatorLine,
} from "./format.js";
// Indicators
export {
	IndicatorSet,
	type IndicatorPattern,
	type IndicatorValues,
	type LoadIndicatorsOptions,
	loadIndicators,
	normalizeDomain,
	type ParseBundleOptions,
	parseBundle,
	parsePattern,
} from "./indicators.js";
// Matcher
export {
	type CheckDomainOptions,
	createMatcher,
	DEFAULT_MAX_DEPTH,
	IndicatorMatcher,
	type IndicatorMatcherOptions,
	TRUNCATED_PROCESS_NAME_LENGTH,
} from "./matcher.js";
// Extraction modules
export type { ExtractionModule } from "./modules/base.js";
export {
	ANALYTICS_JOURNAL_DIR,
	toUtcTimestamp,
	VersionHistoryModule,
	type VersionHistoryRecord,
} from "./modules/version-history.js";
// Shortener registry
export {
	DEFAULT_SHORTENERS_PATH,
	loadShortenerRegistry,
	ShortenerRegistry,
} from "./shorteners.js";
export type {
	BundleConfig,
	Config,
	IndicatorKind,
	IndicatorObject,
	Logger,
	LoggingConfig,
	LogLevel,
	MatchConfidence,
	MatchFinding,
	MatchType,
	NormalizedUrl,
	ShortenerConfig,
	TimelineEvent,
	UnshortenConfig,
} from "./types.js";
// Types
export {
	BundleConfigSchema,
	BundleSchema,
	ConfigSchema,
	IndicatorKindSchema,
	IndicatorObjectSchema,
	LoggingConfigSchema,
	LogLevelSchema,
	MatchTypeSchema,
	nullLogger,
	PATTERN_KEYS,
	ShortenerConfigSchema,
	UnshortenConfigSchema,
} from "./types.js";
// URL utilities
export { normalizeUrl, parentDomains } from "./url-utils.js";
