import path from "node:path";
import yargs from "yargs/yargs";
import { ConfigError } from "../errors";
import { LOG_LEVELS } from "../logger";
import type { GalleryConfig } from "../types";

export const DEFAULT_OUTPUT_FOLDER_NAME = "gallery";
export const DEFAULT_THUMB_WIDTH = 600;
export const DEFAULT_EXTENSIONS: ReadonlyArray<ImageExtension> = [".jpg", ".jpeg"];

/** ".jpg, JPEG,png" -> [".jpg", ".jpeg", ".png"]; empty input gives the defaults */
export function parseExtensions(raw: string): ImageExtension[] {
	const exts = raw
		.split(",")
		.map((s) => s.trim().toLowerCase().replace(/^\.+/, ""))
		.filter(Boolean)
		.map((s): ImageExtension => `.${s}`);
	return exts.length > 0 ? [...new Set(exts)] : [...DEFAULT_EXTENSIONS];
}

function requireInteger(option: string, value: number, min: number): number {
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(option, `expected an integer >= ${min}, got ${value}`);
	}
	return value;
}

/**
 * Parses command-line arguments (without the node/script prefix) into a
 * resolved configuration. Relative paths resolve against `cwd`.
 */
export async function parseArgs(
	args: string[],
	cwd: string = process.cwd(),
): Promise<GalleryConfig> {
	const argv = await yargs(args)
		.scriptName("vote-sheet")
		.usage("$0 [options]\n\nGenerate thumbnails and an optional HTML vote sheet.")
		.option("input", {
			type: "string",
			default: ".",
			describe: "Base folder to scan recursively",
		})
		.option("output", {
			type: "string",
			describe: `Output folder (default: <input>/${DEFAULT_OUTPUT_FOLDER_NAME})`,
		})
		.option("thumb-width", {
			type: "number",
			default: DEFAULT_THUMB_WIDTH,
			describe: "Thumbnail width in pixels",
		})
		.option("extensions", {
			type: "string",
			default: DEFAULT_EXTENSIONS.join(","),
			describe: 'Comma-separated extensions, e.g. ".jpg,.jpeg,.png"',
		})
		.option("skip-existing", {
			type: "boolean",
			default: false,
			describe: "Skip creating a thumbnail if the output file already exists",
		})
		.option("max-images", {
			type: "number",
			describe: "Create at most N thumbnails (useful for quick tests)",
		})
		.option("html", {
			type: "boolean",
			default: false,
			describe: `Generate ImageGallery.html in the output folder`,
		})
		.option("vote-box", {
			type: "boolean",
			default: false,
			describe: "Include a 'VOTE HERE' box under each image (only with --html)",
		})
		.option("log-level", {
			type: "string",
			default: "info",
			choices: LOG_LEVELS,
			describe: "Logging level",
		})
		.option("progress", {
			type: "boolean",
			default: Boolean(process.stderr.isTTY),
			describe: "Show progress bars",
		})
		.strict()
		.help()
		.parseAsync();

	const inputFolder = path.resolve(cwd, String(argv.input));
	const outputFolder =
		argv.output !== undefined
			? path.resolve(cwd, String(argv.output))
			: path.join(inputFolder, DEFAULT_OUTPUT_FOLDER_NAME);

	return {
		inputFolder,
		outputFolder,
		thumbWidth: requireInteger("thumb-width", Number(argv["thumb-width"]), 1),
		extensions: parseExtensions(String(argv.extensions)),
		skipExisting: Boolean(argv["skip-existing"]),
		maxImages:
			argv["max-images"] !== undefined
				? requireInteger("max-images", Number(argv["max-images"]), 0)
				: undefined,
		html: Boolean(argv.html),
		voteBox: Boolean(argv["vote-box"]),
		logLevel:
			LOG_LEVELS.find((level) => level === argv["log-level"]) ?? "info",
		progress: Boolean(argv.progress),
	};
}
