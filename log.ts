import chalk from "chalk";

const warned = new Set<string>();

/** Warnings stream to stdout next to progress output; errors go to stderr. */
export const log = {
	info: (message: string) => console.log(chalk.cyan(message)),
	success: (message: string) => console.log(chalk.green.bold(`✅ ${message}`)),
	warn: (message: string) => console.log(chalk.yellow(`⚠️  ${message}`)),
	error: (message: string) => console.error(chalk.red(message)),
	debug: (message: string) => {
		if (process.env.DEBUG) console.error(chalk.gray(`[debug] ${message}`));
	},
	/** Emit a warning at most once per key for the lifetime of the process. */
	warnOnce: (key: string, message: string) => {
		if (warned.has(key)) return;
		warned.add(key);
		log.warn(message);
	},
};
