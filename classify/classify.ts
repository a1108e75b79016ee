import type { ImageInfo } from "../types";

export const DPI_THRESHOLD = 250;

export type Orientation = "landscape" | "portrait";
export type DpiTier = "high" | "low" | "other";
export type BucketName = `${Orientation}_${DpiTier}_dpi`;

/** Reporting order of the buckets. */
export const BUCKETS: ReadonlyArray<BucketName> = [
	"landscape_high_dpi",
	"landscape_low_dpi",
	"landscape_other_dpi",
	"portrait_high_dpi",
	"portrait_low_dpi",
	"portrait_other_dpi",
];

export const BUCKET_LABELS: Readonly<Record<BucketName, string>> = {
	landscape_high_dpi: `Landscape High DPI (>${DPI_THRESHOLD})`,
	landscape_low_dpi: `Landscape Low DPI (<${DPI_THRESHOLD})`,
	landscape_other_dpi: `Landscape Other DPI (=${DPI_THRESHOLD})`,
	portrait_high_dpi: `Portrait High DPI (>${DPI_THRESHOLD})`,
	portrait_low_dpi: `Portrait Low DPI (<${DPI_THRESHOLD})`,
	portrait_other_dpi: `Portrait Other DPI (=${DPI_THRESHOLD})`,
};

export type Stats = Record<BucketName, number>;

export function createStats(): Stats {
	return {
		landscape_high_dpi: 0,
		landscape_low_dpi: 0,
		landscape_other_dpi: 0,
		portrait_high_dpi: 0,
		portrait_low_dpi: 0,
		portrait_other_dpi: 0,
	};
}

export function orientationOf(info: ImageInfo): Orientation {
	// squares count as portrait
	return info.width > info.height ? "landscape" : "portrait";
}

export function dpiTierOf(dpi: number): DpiTier {
	if (dpi > DPI_THRESHOLD) return "high";
	if (dpi < DPI_THRESHOLD) return "low";
	return "other";
}

export function classifyImage(info: ImageInfo): BucketName {
	return `${orientationOf(info)}_${dpiTierOf(info.dpi)}_dpi`;
}

export function totalOf(stats: Stats): number {
	return BUCKETS.reduce((sum, bucket) => sum + stats[bucket], 0);
}

/** One `<label>: <count>` line per bucket, in {@link BUCKETS} order. */
export function formatStatsReport(stats: Stats): string[] {
	return BUCKETS.map((bucket) => `${BUCKET_LABELS[bucket]}: ${stats[bucket]}`);
}
