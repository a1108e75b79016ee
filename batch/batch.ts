import path from "node:path";
import bar from "../bar";
import { describeError, type ImageError, isSystemic } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { openImage } from "../metadata/metadata";
import { outputNameFor } from "../naming/naming";
import { renderThumbnail, writeThumbnail } from "../thumbnail/thumbnail";
import { left, type Result, right } from "../types";
import { ensureDirectory, pathExists } from "../utils";
import { walkImages } from "../walk/walk";

export type BatchOptions = {
	thumbWidth: number;
	extensions: ReadonlyArray<ImageExtension>;
	skipExisting?: boolean;
	/** Stop after this many created thumbnails */
	maxImages?: number;
	logger?: Logger;
	progress?: boolean;
};

export type FileOutcome =
	| { status: "created"; outputName: string }
	| { status: "skipped"; outputName: string };

export type BatchResult = {
	created: number;
	skipped: number;
	failed: number;
	/** Last serial handed out; one per file encountered */
	serial: number;
	/** Output names created in this pass, in creation order */
	outputs: string[];
};

/**
 * Turns one source file into one thumbnail. Nothing here throws for a bad
 * image; the reason comes back as a tagged error instead.
 */
export async function processImage(
	file: ImagePath,
	serial: number,
	outputFolder: string,
	options: Pick<BatchOptions, "thumbWidth" | "skipExisting">,
): Promise<Result<FileOutcome, ImageError>> {
	const opened = await openImage(file);
	if (opened._tag === "Left") return opened;

	const outputName = outputNameFor(serial, file, opened.right.info);
	const outPath = path.join(outputFolder, outputName);

	if (options.skipExisting && (await pathExists(outPath))) {
		return right({ status: "skipped", outputName });
	}

	const rendered = await renderThumbnail(opened.right, options.thumbWidth);
	if (rendered._tag === "Left") return rendered;

	const written = await writeThumbnail(outPath, rendered.right);
	if (written._tag === "Left") return left(written.left);

	return right({ status: "created", outputName });
}

/**
 * Thumbnail pass. Files are numbered in walk order starting at 1; a file
 * that is skipped or fails still uses up its serial, so names stay stable
 * between runs over the same tree.
 */
export async function generateThumbnails(
	inputFolder: string,
	outputFolder: string,
	options: BatchOptions,
): Promise<BatchResult> {
	const logger = options.logger ?? silentLogger;
	await ensureDirectory(outputFolder);

	const result: BatchResult = {
		created: 0,
		skipped: 0,
		failed: 0,
		serial: 0,
		outputs: [],
	};

	const b = bar.start(0, 0, {
		task: "Creating thumbnails",
		enabled: options.progress ?? false,
	});

	const files = walkImages(inputFolder, {
		exclude: outputFolder,
		extensions: options.extensions,
		onError: (dir, err) =>
			logger.warn(`Cannot list folder: ${dir} (${describeError(err)})`),
	});

	try {
		for await (const file of files) {
			if (options.maxImages !== undefined && result.created >= options.maxImages) {
				break;
			}
			b.grow();
			result.serial++;

			const outcome = await processImage(file, result.serial, outputFolder, options);
			b.increment(1, { detail: path.basename(file) });

			if (outcome._tag === "Left") {
				if (isSystemic(outcome.left)) throw outcome.left;
				result.failed++;
				logger.warn(
					`Failed processing image: ${file} (${outcome.left.message})`,
				);
				continue;
			}

			const { status, outputName } = outcome.right;
			if (status === "skipped") {
				result.skipped++;
				logger.info(`Skipping existing: ${outputName}`);
				continue;
			}
			result.created++;
			result.outputs.push(outputName);
			logger.info(
				`Thumbnail created: ${path.basename(file)} -> ${outputName}`,
			);
		}
	} finally {
		b.complete();
	}

	return result;
}
