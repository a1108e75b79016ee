import chalk from "chalk";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export const LOG_LEVELS: ReadonlyArray<LogLevelName> = [
	"debug",
	"info",
	"warn",
	"error",
];

const PRIORITY: Record<LogLevelName, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LABELS: Record<LogLevelName, () => string> = {
	debug: () => chalk.gray("DEBUG"),
	info: () => chalk.cyan("INFO"),
	warn: () => chalk.yellow("WARNING"),
	error: () => chalk.red.bold("ERROR"),
};

type Sink = (line: string) => void;

/**
 * Console logger that prints `LEVEL: message`.
 * Info and debug go to stdout, warnings and errors to stderr.
 */
export class ConsoleLogger implements Logger {
	constructor(
		private readonly level: LogLevelName = "info",
		private readonly out: Sink = (line) => console.log(line),
		private readonly err: Sink = (line) => console.error(line),
	) {}

	private enabled(level: LogLevelName): boolean {
		return PRIORITY[level] >= PRIORITY[this.level];
	}

	private write(level: LogLevelName, message: string) {
		if (!this.enabled(level)) return;
		const sink = PRIORITY[level] >= PRIORITY.warn ? this.err : this.out;
		sink(`${LABELS[level]()}: ${message}`);
	}

	debug(message: string) {
		this.write("debug", message);
	}

	info(message: string) {
		this.write("info", message);
	}

	warn(message: string) {
		this.write("warn", message);
	}

	error(message: string) {
		this.write("error", message);
	}
}

export function createLogger(level: LogLevelName = "info"): Logger {
	return new ConsoleLogger(level);
}

/** Drops everything; the default for library callers that pass no logger. */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
