import bar from "../bar";
import { describeError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { readImageInfo } from "../metadata/metadata";
import { walkImages } from "../walk/walk";
import { classifyImage, createStats, type Stats } from "../classify/classify";

export type StatsOptions = {
	extensions: ReadonlyArray<ImageExtension>;
	logger?: Logger;
	progress?: boolean;
};

export type StatsResult = {
	stats: Stats;
	/** Files that matched an extension but could not be read */
	unreadable: number;
};

/**
 * Read-only pass: classifies every readable image under `inputFolder`
 * (skipping `outputFolder`). Unreadable files are logged and not counted.
 */
export async function collectStats(
	inputFolder: string,
	outputFolder: string,
	options: StatsOptions,
): Promise<StatsResult> {
	const logger = options.logger ?? silentLogger;
	const stats = createStats();
	let unreadable = 0;

	const b = bar.start(0, 0, {
		task: "Reading statistics",
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
			b.grow();
			const result = await readImageInfo(file);
			b.increment();

			if (result._tag === "Left") {
				unreadable++;
				logger.warn(
					`Skipping unreadable image for stats: ${file} (${result.left.message})`,
				);
				continue;
			}
			stats[classifyImage(result.right)]++;
		}
	} finally {
		b.complete();
	}

	return { stats, unreadable };
}
