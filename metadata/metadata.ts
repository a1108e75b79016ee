import fs from "node:fs/promises";
import sharp, { type Sharp } from "sharp";
import { DecodeError, describeError, InvalidDimensionsError } from "../errors";
import { type ImageInfo, left, type Result, right } from "../types";

export const DEFAULT_DPI = 72;

/** An image decoded to upright pixels. */
export type OpenedImage = {
	path: ImagePath;
	info: ImageInfo;
	/** Pipeline over the decoded, already oriented pixels */
	image: Sharp;
};

/** Whole DPI from sharp's density, or 72 when missing or unusable. */
export function resolveDpi(density: number | undefined): number {
	if (typeof density !== "number" || !Number.isFinite(density) || density <= 0) {
		return DEFAULT_DPI;
	}
	return Math.round(density);
}

/**
 * Reads a file and decodes all of its pixels, turned upright by the EXIF
 * orientation tag. Width and height in the result are what a viewer shows.
 * Empty, corrupt and truncated files give a DecodeError.
 */
export async function openImage(
	filePath: ImagePath,
): Promise<Result<OpenedImage, DecodeError | InvalidDimensionsError>> {
	let buffer: Buffer;
	try {
		buffer = await fs.readFile(filePath);
	} catch (err) {
		return left(new DecodeError(filePath, describeError(err)));
	}
	if (buffer.length === 0) {
		return left(new DecodeError(filePath, "empty file"));
	}

	let meta: sharp.Metadata;
	let pixels: { data: Buffer; info: sharp.OutputInfo };
	try {
		const source = sharp(buffer);
		meta = await source.metadata();
		const { width = 0, height = 0 } = meta;
		if (width <= 0 || height <= 0) {
			return left(new InvalidDimensionsError(filePath, width, height));
		}
		pixels = await source
			.rotate() // auto-orient from EXIF
			.raw()
			.toBuffer({ resolveWithObject: true });
	} catch (err) {
		return left(new DecodeError(filePath, describeError(err)));
	}

	const { width, height, channels } = pixels.info;
	return right({
		path: filePath,
		info: { width, height, dpi: resolveDpi(meta.density) },
		image: sharp(pixels.data, { raw: { width, height, channels } }),
	});
}

/** Same as {@link openImage}, keeping only the dimensions. */
export async function readImageInfo(
	filePath: ImagePath,
): Promise<Result<ImageInfo, DecodeError | InvalidDimensionsError>> {
	const opened = await openImage(filePath);
	return opened._tag === "Right" ? right(opened.right.info) : opened;
}
