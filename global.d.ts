// Global type declarations for the vote-sheet project

// Common file/path types
type ImagePath = string;
type ImageList = ReadonlyArray<ImagePath>;

// Lowercase, dot-prefixed extension, e.g. ".jpg"
type ImageExtension = `.${string}`;

type LogLevelName = "debug" | "info" | "warn" | "error";

// Progress bar options
type BarOptions = {
	task?: string;
	detail?: string;
	color?: (text: string) => string;
};
