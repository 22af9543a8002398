import type * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import { join, posix } from "node:path";

export function getFileContent(
	path: fs.PathLike,
	encoding: BufferEncoding = "utf-8",
): Promise<string> {
	return fsPromises.readFile(path, encoding);
}

/** First line of a text file, without its line terminator. */
export async function getFirstLine(path: fs.PathLike): Promise<string> {
	const content = await getFileContent(path);
	const end = content.indexOf("\n");
	return (end === -1 ? content : content.slice(0, end)).replace(/\r$/, "");
}

/**
 * Absolute paths of the regular files in `dir` whose name matches `pattern`,
 * sorted by name. A missing or unreadable directory yields an empty list.
 */
export async function findFiles(dir: string, pattern: RegExp): Promise<string[]> {
	let entries: fs.Dirent[];
	try {
		entries = await fsPromises.readdir(dir, { withFileTypes: true });
	} catch {
		return [];
	}
	return entries
		.filter((entry) => entry.isFile() && pattern.test(entry.name))
		.map((entry) => join(dir, entry.name))
		.sort();
}

/**
 * Final component of a device path. Artifacts come from mobile filesystems,
 * so paths are always split on "/" whatever the host platform.
 */
export function baseName(path: string): string {
	return posix.basename(path);
}
