import { describe, expect, it } from "vitest";
import {
	formatCounts,
	formatFindingsBanner,
	formatScanClean,
	kv,
	separatorLine,
} from "../format.js";
import type { MatchFinding } from "../types.js";

const counts = { domain: 2, process: 1, email: 0, file: 1 };

function finding(overrides: Partial<MatchFinding> = {}): MatchFinding {
	return {
		matched: true,
		indicatorKind: "domain",
		matchType: "exact",
		confidence: "high",
		indicator: "evil.com",
		originalValue: "https://evil.com/",
		matchedValue: "https://evil.com/",
		redirectChain: ["https://evil.com/"],
		detail: "Found a known suspicious domain https://evil.com/",
		...overrides,
	};
}

describe("kv", () => {
	it("pads the key to a fixed column", () => {
		expect(kv("Match", "exact")).toBe("   Match       exact");
	});
});

describe("separatorLine", () => {
	it("defaults to 48 characters", () => {
		expect(separatorLine()).toBe("━".repeat(48));
		expect(separatorLine(3)).toBe("━━━");
	});
});

describe("formatCounts", () => {
	it("lists every indicator kind", () => {
		expect(formatCounts(counts)).toBe("Domains: 2, Processes: 1, Emails: 0, Files: 1");
	});
});

describe("formatScanClean", () => {
	it("summarizes a clean scan", () => {
		expect(formatScanClean(counts)).toBe(
			"🛡️ iocsweep ✅ No indicators matched (Domains: 2, Processes: 1, Emails: 0, Files: 1)",
		);
	});
});

describe("formatFindingsBanner", () => {
	it("falls back to the clean summary without matches", () => {
		const banner = formatFindingsBanner([finding({ matched: false, matchType: "none" })], counts);
		expect(banner).toBe(formatScanClean(counts));
	});

	it("renders a shortened domain match with its redirect chain", () => {
		const banner = formatFindingsBanner(
			[
				finding({
					originalValue: "https://bit.ly/a",
					matchedValue: "https://evil.com/landing",
					redirectChain: ["https://bit.ly/a", "https://evil.com/landing"],
					detail: "Found a known suspicious domain https://evil.com/landing shortened as https://bit.ly/a",
				}),
			],
			counts,
		);
		expect(banner.split("\n")).toEqual([
			"🛡️ iocsweep — 1 indicator match",
			"━".repeat(48),
			"🚨 Domain      https://bit.ly/a",
			"   Indicator   evil.com",
			"   Match       exact",
			"   Redirects   https://bit.ly/a → https://evil.com/landing",
			"   Detail      Found a known suspicious domain https://evil.com/landing shortened as https://bit.ly/a",
			"━".repeat(48),
			"Domains: 2, Processes: 1, Emails: 0, Files: 1",
		]);
	});

	it("marks low-confidence findings and omits single-entry chains", () => {
		const banner = formatFindingsBanner(
			[
				finding({
					matchType: "substring",
					confidence: "low",
					originalValue: "evil.com/path",
					redirectChain: [],
					detail: "Maybe found a known suspicious domain evil.com: evil.com/path",
				}),
				finding({
					indicatorKind: "process",
					indicator: "badproc",
					originalValue: "/usr/bin/badproc",
					matchedValue: "badproc",
					redirectChain: [],
					detail: 'Found a known suspicious process name "/usr/bin/badproc"',
				}),
			],
			counts,
		);
		const lines = banner.split("\n");
		expect(lines[0]).toBe("🛡️ iocsweep — 2 indicator matches");
		expect(lines[2]).toBe("⚠️ Domain      evil.com/path");
		expect(lines[6]).toBe("");
		expect(lines[7]).toBe("🚨 Process     /usr/bin/badproc");
		expect(lines.some((line) => line.includes("Redirects"))).toBe(false);
	});

	it("caps the number of listed findings", () => {
		const many = Array.from({ length: 23 }, (_, i) =>
			finding({ originalValue: `https://evil.com/${i}` }),
		);
		const lines = formatFindingsBanner(many, counts).split("\n");
		expect(lines).toContain("   ... and 3 more findings");
		expect(lines.filter((line) => line.startsWith("🚨"))).toHaveLength(20);
	});
});
