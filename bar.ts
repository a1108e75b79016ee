// bar.ts

import chalk from "chalk";
import cliProgress from "cli-progress";

class ProgressBar {
	private bar: cliProgress.SingleBar;
	private total: number;

	constructor(start: number, total: number, options?: BarOptions) {
		const color = options?.color ?? chalk.green;
		this.total = total;

		this.bar = new cliProgress.SingleBar(
			{
				format:
					`${chalk.cyan.bold("🖼  {task}")}` +
					`|${color("{bar}")}| {percentage}% ` +
					`${chalk.dim("({value}/{total})")} | ${chalk.gray("{detail}")}`,
				barCompleteChar: "█",
				barIncompleteChar: "░",
				hideCursor: true,
			},
			cliProgress.Presets.shades_classic,
		);

		this.bar.start(total, start, {
			task: options?.task ?? "Starting...",
			detail: options?.detail ?? "",
		});
	}

	/** The walk is lazy, so the total grows as files are discovered */
	grow(n = 1) {
		this.total += n;
		this.bar.setTotal(this.total);
	}

	/** Increment by n (default 1) */
	increment(n = 1, payload?: BarOptions) {
		this.bar.increment(n, payload);
	}

	/** Complete and stop the bar */
	complete(options?: BarOptions) {
		if (options?.task) this.bar.update(this.total, { task: options.task });
		this.bar.stop();
	}
}

/** Stand-in used when progress display is off */
class NoopBar {
	grow() {}
	increment() {}
	complete() {}
}

export type Bar = Pick<ProgressBar, "grow" | "increment" | "complete">;

export default {
	/** Start a new progress bar, or a silent one when `enabled` is false */
	start(start: number, total: number, options?: BarOptions & { enabled?: boolean }): Bar {
		if (options?.enabled === false) return new NoopBar();
		return new ProgressBar(start, total, options);
	},
};
