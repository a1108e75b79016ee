/**
 * Display dimensions of an image after EXIF orientation has been applied,
 * plus its horizontal resolution rounded to whole dots per inch.
 */
export type ImageInfo = Readonly<{
	width: number;
	height: number;
	dpi: number;
}>;

export type Right<T> = { readonly _tag: "Right"; readonly right: T };
export type Left<E> = { readonly _tag: "Left"; readonly left: E };

/** Outcome of a single-file step: the value, or the tagged reason it failed. */
export type Result<T, E> = Right<T> | Left<E>;

export function right<T>(value: T): Right<T> {
	return { _tag: "Right", right: value };
}

export function left<E>(error: E): Left<E> {
	return { _tag: "Left", left: error };
}

export type GalleryConfig = Readonly<{
	inputFolder: string;
	outputFolder: string;
	thumbWidth: number;
	extensions: ReadonlyArray<ImageExtension>;
	skipExisting: boolean;
	/** Stop once this many thumbnails were created; undefined means no cap */
	maxImages?: number;
	html: boolean;
	voteBox: boolean;
	logLevel: LogLevelName;
	progress: boolean;
}>;
