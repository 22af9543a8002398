/**
 * `check` and `info` command logic, kept apart from argument parsing so the
 * commands can be driven directly.
 */

import {
	type CheckDomainOptions,
	type Config,
	createMatcher,
	formatCounts,
	formatFindingsBanner,
	type IndicatorKind,
	type IndicatorMatcher,
	IndicatorLoadError,
	IndicatorSet,
	loadIndicators,
	type Logger,
	type MatchFinding,
} from "@iocsweep/core";
import { type Candidates, CandidatesError, readCandidates } from "./candidates.js";

export type OutputFormat = "json" | "text";

export interface CheckOptions {
	iocs: string[];
	input?: string;
	format: OutputFormat;
	maxDepth?: number;
	unshorten: boolean;
}

export interface InfoOptions {
	iocs: string[];
	format: OutputFormat;
}

export interface CheckReport {
	indicators: Record<IndicatorKind, number>;
	findings: MatchFinding[];
}

export interface CommandResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

function failure(message: string): CommandResult {
	return { exitCode: 1, stdout: "", stderr: message };
}

/** Command-line flags take precedence over the configuration file. */
export function applyOverrides(
	config: Config,
	options: Pick<CheckOptions, "maxDepth" | "unshorten">,
): Config {
	return {
		...config,
		unshorten: {
			...config.unshorten,
			enabled: config.unshorten.enabled && options.unshorten,
			max_depth: options.maxDepth ?? config.unshorten.max_depth,
		},
	};
}

/**
 * Check every candidate individually and keep the positive findings, in input
 * order. URLs are checked one at a time so at most one shortener request is in
 * flight.
 */
export async function scanCandidates(
	matcher: IndicatorMatcher,
	candidates: Candidates,
	options: CheckDomainOptions = {},
): Promise<MatchFinding[]> {
	const domainFindings: MatchFinding[] = [];
	for (const url of candidates.urls) {
		domainFindings.push(await matcher.checkDomain(url, options));
	}
	const findings = [
		...domainFindings,
		...candidates.processes.map((p) => matcher.checkProcess(p)),
		...candidates.emails.map((e) => matcher.checkEmail(e)),
		...candidates.files.map((f) => matcher.checkFile(f)),
	];
	return findings.filter((f) => f.matched);
}

export function renderReport(report: CheckReport, format: OutputFormat): string {
	if (format === "text") return formatFindingsBanner(report.findings, report.indicators);
	return JSON.stringify(report, null, 2);
}

async function loadBundles(
	iocs: string[],
	config: Config,
	logger: Logger,
): Promise<IndicatorSet | CommandResult> {
	try {
		return await loadIndicators(iocs, { strict: config.bundle.strict, logger });
	} catch (e) {
		if (e instanceof IndicatorLoadError) return failure(e.message);
		throw e;
	}
}

export async function runCheck(
	options: CheckOptions,
	config: Config,
	logger: Logger,
): Promise<CommandResult> {
	const effective = applyOverrides(config, options);

	const indicators = await loadBundles(options.iocs, effective, logger);
	if (!(indicators instanceof IndicatorSet)) return indicators;

	let candidates: Candidates;
	try {
		candidates = await readCandidates(options.input);
	} catch (e) {
		if (e instanceof CandidatesError) return failure(e.message);
		throw e;
	}

	const matcher = await createMatcher(indicators, effective, logger);
	const findings = await scanCandidates(matcher, candidates);
	logger.info(`Checked candidates, ${findings.length} matched`);

	const report: CheckReport = { indicators: indicators.counts(), findings };
	return { exitCode: 0, stdout: renderReport(report, options.format), stderr: "" };
}

export async function runInfo(
	options: InfoOptions,
	config: Config,
	logger: Logger,
): Promise<CommandResult> {
	const indicators = await loadBundles(options.iocs, config, logger);
	if (!(indicators instanceof IndicatorSet)) return indicators;

	const counts = indicators.counts();
	const stdout =
		options.format === "text"
			? formatCounts(counts)
			: JSON.stringify({ indicators: counts, total: indicators.size }, null, 2);
	return { exitCode: 0, stdout, stderr: "" };
}
