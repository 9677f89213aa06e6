// bar.ts

import chalk from "chalk";
import cliProgress from "cli-progress";
import { log } from "./log";

class ProgressBar {
	private bar: cliProgress.SingleBar;
	private total: number;

	constructor(start: number, total: number, options?: BarOptions) {
		const color = options?.color ?? chalk.green;
		this.total = total;

		this.bar = new cliProgress.SingleBar(
			{
				format:
					`${chalk.cyan.bold("🖼️  {task}")} ` +
					`|${color("{bar}")}| {percentage}% ` +
					`${chalk.dim("({value}/{total})")} ${chalk.gray("{detail}")}`,
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

	/** Increment by n (default 1) */
	increment(n = 1, payload?: BarOptions) {
		this.bar.increment(n, payload);
	}

	/** Complete and stop the bar */
	complete(options?: BarOptions) {
		this.bar.update(
			this.total,
			options?.task ? { task: options.task, detail: "" } : { detail: "" },
		);
		this.bar.stop();
		if (options?.task) log.success(options.task);
	}
}

export default {
	/** Start a new progress bar */
	start(start: number, total: number, options?: BarOptions) {
		return new ProgressBar(start, total, options);
	},
};
