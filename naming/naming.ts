import path from "node:path";
import type { ImageInfo } from "../types";

export const MAX_NAME_PART = 120;

/**
 * Makes `text` safe for file names and URLs. Total: every input, the empty
 * string included, maps to a string over `[A-Za-z0-9._-]`, and applying it
 * twice changes nothing.
 */
export function sanitizeForFilename(text: string, maxLen = MAX_NAME_PART): string {
	return text
		.trim()
		.replace(/\s+/g, "_")
		.replace(/[^A-Za-z0-9._-]+/g, "-")
		.replace(/-{2,}/g, "-")
		.slice(0, maxLen)
		.replace(/^[-_.]+|[-_.]+$/g, "");
}

/** At least three digits; wider serials are kept whole. */
export function formatSerial(serial: number): string {
	return String(serial).padStart(3, "0");
}

/**
 * `{serial}-{folder}-{stem}-{W}x{H}@{DPI}.jpg`, always JPEG whatever the
 * source format.
 *
 * @param sourceFolder name of the directory directly holding the source file
 * @param originalName source file name; only its stem is kept
 */
export function buildOutputFilename(
	serial: number,
	sourceFolder: string,
	originalName: string,
	info: ImageInfo,
): string {
	const folder = sanitizeForFilename(sourceFolder);
	const stem = sanitizeForFilename(path.parse(originalName).name);
	return `${formatSerial(serial)}-${folder}-${stem}-${info.width}x${info.height}@${info.dpi}.jpg`;
}

/** Output file name for a source path, from its parent folder and stem. */
export function outputNameFor(
	serial: number,
	sourcePath: ImagePath,
	info: ImageInfo,
): string {
	return buildOutputFilename(
		serial,
		path.basename(path.dirname(sourcePath)),
		path.basename(sourcePath),
		info,
	);
}
