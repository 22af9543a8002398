/**
 * Candidate artifacts handed to `iocsweep check`, read as JSON from a file
 * or standard input.
 */

import { getFileContent } from "@iocsweep/core";
import { z } from "zod";

export const CandidatesSchema = z.object({
	urls: z.array(z.string()).default([]),
	processes: z.array(z.string()).default([]),
	emails: z.array(z.string()).default([]),
	files: z.array(z.string()).default([]),
});

export type Candidates = z.infer<typeof CandidatesSchema>;

export class CandidatesError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CandidatesError";
	}
}

function stripBom(value: string): string {
	return value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
}

export function parseCandidates(raw: string): Candidates {
	const trimmed = stripBom(raw).trim();
	if (!trimmed) return CandidatesSchema.parse({});

	let data: unknown;
	try {
		data = JSON.parse(trimmed);
	} catch (e) {
		throw new CandidatesError(`Candidates are not valid JSON: ${String(e)}`, { cause: e });
	}

	const parsed = CandidatesSchema.safeParse(data);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		throw new CandidatesError(`Invalid candidates: ${issues}`);
	}
	return parsed.data;
}

export function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
	return new Promise<string>((resolve, reject) => {
		const chunks: Buffer[] = [];
		stream.on("data", (chunk: Buffer | string) => {
			chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
		});
		stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
		stream.on("error", reject);
	});
}

/** Read candidates from `input`, or from standard input when it is unset or "-". */
export async function readCandidates(input?: string): Promise<Candidates> {
	let raw: string;
	if (input === undefined || input === "-") {
		raw = await readStdin();
	} else {
		try {
			raw = await getFileContent(input);
		} catch (e) {
			throw new CandidatesError(`Unable to read candidates from ${input}: ${String(e)}`, {
				cause: e,
			});
		}
	}
	return parseCandidates(raw);
}
