/**
 * Shared text formatting for scan results.
 * Plain text and Unicode only, no ANSI escape codes.
 */

import type { IndicatorKind, MatchFinding } from "./types.js";
import { IndicatorKindSchema } from "./types.js";

const PAD = 12;
const SEPARATOR_WIDTH = 48;
const MAX_FINDINGS = 20;

const KIND_LABELS: Record<IndicatorKind, string> = {
	domain: "Domain",
	process: "Process",
	email: "Email",
	file: "File",
};

export function confidenceEmoji(finding: MatchFinding): string {
	return finding.confidence === "high" ? "🚨" : "⚠️";
}

export function kv(key: string, value: string): string {
	return `   ${key.padEnd(PAD)}${value}`;
}

export function separatorLine(width: number = SEPARATOR_WIDTH): string {
	return "━".repeat(width);
}

export function formatCounts(counts: Record<IndicatorKind, number>): string {
	return IndicatorKindSchema.options
		.map((kind) => `${KIND_LABELS[kind]}s: ${counts[kind]}`)
		.join(", ");
}

export function formatScanClean(counts: Record<IndicatorKind, number>): string {
	return `🛡️ iocsweep ✅ No indicators matched (${formatCounts(counts)})`;
}

export function formatFindingsBanner(
	findings: MatchFinding[],
	counts: Record<IndicatorKind, number>,
): string {
	const matched = findings.filter((f) => f.matched);
	if (matched.length === 0) return formatScanClean(counts);

	const lines: string[] = [
		`🛡️ iocsweep — ${matched.length} indicator match${matched.length === 1 ? "" : "es"}`,
		separatorLine(),
	];

	matched.slice(0, MAX_FINDINGS).forEach((f, i) => {
		if (i > 0) lines.push("");
		lines.push(`${confidenceEmoji(f)} ${KIND_LABELS[f.indicatorKind].padEnd(PAD)}${f.originalValue}`);
		lines.push(kv("Indicator", f.indicator ?? "-"));
		lines.push(kv("Match", f.matchType));
		if (f.redirectChain.length > 1) {
			lines.push(kv("Redirects", f.redirectChain.join(" → ")));
		}
		lines.push(kv("Detail", f.detail));
	});

	const overflow = matched.length - MAX_FINDINGS;
	if (overflow > 0) {
		lines.push("");
		lines.push(`   ... and ${overflow} more findings`);
	}

	lines.push(separatorLine());
	lines.push(formatCounts(counts));
	return lines.join("\n");
}
