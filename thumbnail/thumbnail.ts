import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import {
	describeError,
	EncodeError,
	errorCode,
	FilesystemError,
	InvalidDimensionsError,
} from "../errors";
import type { OpenedImage } from "../metadata/metadata";
import { left, type Result, right } from "../types";

export const JPEG_QUALITY = 85;

// Transparent areas become white; JPEG has no alpha
const FLATTEN_BACKGROUND = "#ffffff";

export type ThumbSize = { width: number; height: number };

/**
 * `thumbWidth` wide, with the height that keeps the aspect ratio
 * (never below 1px).
 */
export function thumbSizeForWidth(
	source: ImagePath,
	width: number,
	height: number,
	thumbWidth: number,
): Result<ThumbSize, InvalidDimensionsError> {
	if (width <= 0 || height <= 0) {
		return left(new InvalidDimensionsError(source, width, height));
	}
	return right({
		width: thumbWidth,
		height: Math.max(1, Math.round(thumbWidth * (height / width))),
	});
}

/**
 * Downsizes (Lanczos) and encodes a progressive JPEG in memory.
 * Images narrower than `thumbWidth` keep their size.
 */
export async function renderThumbnail(
	opened: OpenedImage,
	thumbWidth: number,
): Promise<Result<Buffer, InvalidDimensionsError | EncodeError>> {
	const { width, height } = opened.info;
	const sized = thumbSizeForWidth(opened.path, width, height, thumbWidth);
	if (sized._tag === "Left") return sized;
	const size = sized.right;

	try {
		const data = await opened.image
			.resize(size.width, size.height, {
				fit: "fill",
				kernel: sharp.kernel.lanczos3,
				withoutEnlargement: true,
			})
			.flatten({ background: FLATTEN_BACKGROUND })
			.jpeg({
				quality: JPEG_QUALITY,
				progressive: true,
				optimiseCoding: true,
			})
			.toBuffer();
		return right(data);
	} catch (err) {
		return left(new EncodeError(opened.path, describeError(err)));
	}
}

/**
 * Writes `data` to a temporary sibling and renames it into place, so
 * `outPath` is either absent or a complete file.
 */
export async function writeThumbnail(
	outPath: string,
	data: Buffer,
): Promise<Result<string, FilesystemError>> {
	const tmpPath = path.join(
		path.dirname(outPath),
		`.${path.basename(outPath)}.${process.pid}.partial`,
	);
	try {
		await fs.writeFile(tmpPath, data);
		await fs.rename(tmpPath, outPath);
		return right(outPath);
	} catch (err) {
		const error = new FilesystemError(outPath, describeError(err), errorCode(err));
		// report the write error, not the cleanup one
		await fs.rm(tmpPath, { force: true }).catch(() => undefined);
		return left(error);
	}
}
