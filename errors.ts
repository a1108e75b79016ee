export class DecodeError extends Error {
	readonly _tag = "DecodeError";
	constructor(
		readonly filePath: string,
		readonly reason: string,
	) {
		super(`Cannot decode ${filePath}: ${reason}`);
		this.name = "DecodeError";
	}
}

export class InvalidDimensionsError extends Error {
	readonly _tag = "InvalidDimensionsError";
	constructor(
		readonly filePath: string,
		readonly width: number,
		readonly height: number,
	) {
		super(`Invalid image dimensions ${width}x${height}: ${filePath}`);
		this.name = "InvalidDimensionsError";
	}
}

export class EncodeError extends Error {
	readonly _tag = "EncodeError";
	constructor(
		readonly filePath: string,
		readonly reason: string,
	) {
		super(`Cannot encode thumbnail for ${filePath}: ${reason}`);
		this.name = "EncodeError";
	}
}

export class FilesystemError extends Error {
	readonly _tag = "FilesystemError";
	constructor(
		readonly path: string,
		readonly reason: string,
		readonly code?: string,
	) {
		super(`Filesystem error at ${path}: ${reason}`);
		this.name = "FilesystemError";
	}
}

export class ConfigError extends Error {
	readonly _tag = "ConfigError";
	constructor(
		readonly option: string,
		readonly reason: string,
	) {
		super(`Invalid --${option}: ${reason}`);
		this.name = "ConfigError";
	}
}

/** Errors that only cost the current file; the batch moves on. */
export type ImageError =
	| DecodeError
	| InvalidDimensionsError
	| EncodeError
	| FilesystemError;

// Out of space or read-only: every following write would fail the same way
const SYSTEMIC_CODES = new Set(["ENOSPC", "EDQUOT", "EROFS"]);

export function isSystemic(error: ImageError): boolean {
	return (
		error._tag === "FilesystemError" &&
		error.code !== undefined &&
		SYSTEMIC_CODES.has(error.code)
	);
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
	if (err !== null && typeof err === "object" && "code" in err) {
		const { code } = err;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}
