import fg from "fast-glob";
import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { describeError, errorCode, FilesystemError } from "./errors";

/** Plain code-unit ordering, independent of locale. */
export function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

function buildGlobPattern(exts: string[]): string {
	// a one-element brace set would be matched literally
	return exts.length === 1 ? `*.${exts[0]}` : `*.{${exts.join(",")}}`;
}

/**
 * Files directly inside `cwd` (not recursive) whose extension is one of
 * `exts` (without dots, any case). Sorted.
 */
export async function getFilesInFolder(
	cwd: string,
	exts: string[],
): Promise<ImageList> {
	const pattern = buildGlobPattern(exts);
	const filesRel = await fg([pattern], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
		caseSensitiveMatch: false,
		deep: 1,
	});
	return filesRel.sort(compareNames).map((f) => path.join(cwd, f));
}

export async function pathExists(p: string): Promise<boolean> {
	try {
		await fs.access(p);
		return true;
	} catch {
		return false;
	}
}

export async function ensureDirectory(dir: string): Promise<void> {
	try {
		await fs.mkdir(dir, { recursive: true });
	} catch (err) {
		throw new FilesystemError(dir, describeError(err), errorCode(err));
	}
}

export async function assertDirectory(dir: string): Promise<void> {
	let stat: Stats;
	try {
		stat = await fs.stat(dir);
	} catch (err) {
		throw new FilesystemError(dir, describeError(err), errorCode(err));
	}
	if (!stat.isDirectory()) {
		throw new FilesystemError(dir, "not a directory", "ENOTDIR");
	}
}
