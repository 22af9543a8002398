/**
 * Extracts the iOS update history recorded in analyticsd journal files.
 * Each journal's first line is a JSON header carrying the OS version and the
 * time the journal was opened.
 */

import { join } from "node:path";
import { z } from "zod";
import { findFiles, getFirstLine } from "../file-utils.js";
import type { Logger, TimelineEvent } from "../types.js";
import { nullLogger } from "../types.js";
import type { ExtractionModule } from "./base.js";

export const ANALYTICS_JOURNAL_DIR = join("private", "var", "db", "analyticsd");
const JOURNAL_FILE = /^Analytics-Journal-.*\.ips$/;

const JournalHeaderSchema = z.object({
	timestamp: z.string(),
	os_version: z.string(),
});

const JOURNAL_TIMESTAMP =
	/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))? ([+-])(\d{2}):?(\d{2})$/;

export interface VersionHistoryRecord {
	isodate: string;
	osVersion: string;
}

function pad(n: number, width = 2): string {
	return String(n).padStart(width, "0");
}

/**
 * Convert `YYYY-MM-DD HH:MM:SS.ffffff ±HHMM` to UTC `YYYY-MM-DD HH:MM:SS.ffffff`.
 * Returns null for any other shape.
 */
export function toUtcTimestamp(value: string): string | null {
	const m = JOURNAL_TIMESTAMP.exec(value.trim());
	if (!m) return null;

	const [, year, month, day, hour, minute, second, fraction = "", sign, offH, offM] = m;
	const offsetMinutes = (sign === "-" ? -1 : 1) * (Number(offH) * 60 + Number(offM));
	const utc = new Date(
		Date.UTC(
			Number(year),
			Number(month) - 1,
			Number(day),
			Number(hour),
			Number(minute),
			Number(second),
		) -
			offsetMinutes * 60_000,
	);
	if (Number.isNaN(utc.getTime())) return null;

	const date = `${utc.getUTCFullYear()}-${pad(utc.getUTCMonth() + 1)}-${pad(utc.getUTCDate())}`;
	const time = `${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}`;
	return `${date} ${time}.${fraction.padEnd(6, "0")}`;
}

export class VersionHistoryModule implements ExtractionModule<VersionHistoryRecord> {
	readonly name = "IOSVersionHistory";
	private readonly root: string;
	private readonly logger: Logger;

	/** @param root Root of an extracted device filesystem. */
	constructor(root: string, logger: Logger = nullLogger) {
		this.root = root;
		this.logger = logger;
	}

	async run(): Promise<VersionHistoryRecord[]> {
		const results: VersionHistoryRecord[] = [];
		const journals = await findFiles(join(this.root, ANALYTICS_JOURNAL_DIR), JOURNAL_FILE);

		for (const path of journals) {
			let header: z.infer<typeof JournalHeaderSchema>;
			try {
				header = JournalHeaderSchema.parse(JSON.parse(await getFirstLine(path)));
			} catch (e) {
				this.logger.warn(`Skipping unreadable analytics journal ${path}`, { error: String(e) });
				continue;
			}

			const isodate = toUtcTimestamp(header.timestamp);
			if (isodate === null) {
				this.logger.warn(`Skipping analytics journal ${path} with unknown timestamp format`, {
					timestamp: header.timestamp,
				});
				continue;
			}
			results.push({ isodate, osVersion: header.os_version });
		}

		// Fixed-width timestamps sort lexically
		results.sort((a, b) => (a.isodate < b.isodate ? -1 : a.isodate > b.isodate ? 1 : 0));
		this.logger.info(`Extracted ${results.length} iOS version records`);
		return results;
	}

	serialize(record: VersionHistoryRecord): TimelineEvent {
		return {
			timestamp: record.isodate,
			module: this.name,
			event: "ios_version",
			data: `Recorded iOS version ${record.osVersion}`,
		};
	}
}
