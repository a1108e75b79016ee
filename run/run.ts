import { type BatchResult, generateThumbnails } from "../batch/batch";
import { formatStatsReport, type Stats } from "../classify/classify";
import { generateHtmlGallery } from "../gallery/gallery";
import { type Logger, silentLogger } from "../logger";
import { collectStats } from "../stats/stats";
import type { GalleryConfig } from "../types";
import { assertDirectory, ensureDirectory } from "../utils";

export type RunDeps = {
	logger?: Logger;
	/** Where the statistics report and final count are printed */
	print?: (line: string) => void;
};

export type RunSummary = {
	stats: Stats;
	unreadable: number;
	batch: BatchResult;
	htmlPath?: string;
};

function logConfig(config: GalleryConfig, logger: Logger) {
	logger.info(`Input folder:   ${config.inputFolder}`);
	logger.info(`Output folder:  ${config.outputFolder}`);
	logger.info(`Thumb width:    ${config.thumbWidth} px`);
	logger.info(`Extensions:     ${config.extensions.join(", ")}`);
	logger.info(`Skip existing:  ${config.skipExisting}`);
	if (config.maxImages !== undefined) {
		logger.info(`Max images:     ${config.maxImages}`);
	}
}

/**
 * Statistics pass, thumbnail pass, then the optional vote sheet.
 * A missing input folder or an output folder that cannot be created fails
 * before any image is touched.
 */
export async function runGallery(
	config: GalleryConfig,
	deps: RunDeps = {},
): Promise<RunSummary> {
	const logger = deps.logger ?? silentLogger;
	const print = deps.print ?? ((line: string) => console.log(line));

	logConfig(config, logger);
	await assertDirectory(config.inputFolder);
	await ensureDirectory(config.outputFolder);

	const { stats, unreadable } = await collectStats(
		config.inputFolder,
		config.outputFolder,
		{ extensions: config.extensions, logger, progress: config.progress },
	);
	logger.info("Image statistics:");
	for (const line of formatStatsReport(stats)) print(line);

	const batch = await generateThumbnails(config.inputFolder, config.outputFolder, {
		thumbWidth: config.thumbWidth,
		extensions: config.extensions,
		skipExisting: config.skipExisting,
		maxImages: config.maxImages,
		logger,
		progress: config.progress,
	});
	print(`Thumbnails created: ${batch.created}`);

	let htmlPath: string | undefined;
	if (config.html) {
		htmlPath = await generateHtmlGallery(config.outputFolder, config.voteBox, logger);
	} else if (config.voteBox) {
		logger.warn("--vote-box has no effect without --html");
	}

	logger.info("Done.");
	return { stats, unreadable, batch, htmlPath };
}
