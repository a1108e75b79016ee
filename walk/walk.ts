import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type WalkOptions = {
	/** Subtree that is never descended into, wherever it sits under the root */
	exclude: string;
	/** Lowercase, dot-prefixed extensions to accept */
	extensions: ReadonlyArray<ImageExtension>;
	/** Called for every directory that cannot be listed; the walk goes on */
	onError?: (dir: string, err: unknown) => void;
};

function byName(a: { name: string }, b: { name: string }): number {
	if (a.name < b.name) return -1;
	if (a.name > b.name) return 1;
	return 0;
}

export function hasImageExtension(
	file: string,
	extensions: ReadonlySet<string>,
): boolean {
	return extensions.has(path.extname(file).toLowerCase());
}

/**
 * Yields image paths under `root`, top-down: the files of a directory
 * (sorted by name) before its subdirectories (also sorted), so repeated walks
 * of an unchanged tree give the same order.
 *
 * Symlinked directories are listed but not followed.
 */
export async function* walkImages(
	root: string,
	options: WalkOptions,
): AsyncGenerator<ImagePath> {
	const exclude = path.resolve(options.exclude);
	const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
	const pending = [path.resolve(root)];

	while (pending.length > 0) {
		const dir = pending.pop();
		if (dir === undefined) break;

		let entries: Dirent[];
		try {
			entries = await fs.readdir(dir, { withFileTypes: true });
		} catch (err) {
			options.onError?.(dir, err);
			continue;
		}
		entries.sort(byName);

		const subdirs: string[] = [];
		for (const entry of entries) {
			const full = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				// prune here, so the output folder is never listed at all
				if (full !== exclude) subdirs.push(full);
				continue;
			}
			if (
				(entry.isFile() || entry.isSymbolicLink()) &&
				hasImageExtension(entry.name, extensions)
			) {
				yield full;
			}
		}

		// stack: push in reverse so the first subdirectory is visited next
		pending.push(...subdirs.reverse());
	}
}
