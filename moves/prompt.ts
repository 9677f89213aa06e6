import chalk from "chalk";
import type { Interface } from "node:readline/promises";
import type { Selection } from "../select/select";

/**
 * Per-group y/N confirmation. While `rl` owns the terminal, Ctrl-C reaches
 * it instead of the process, so it is routed to `onCancel` here. A pending
 * question resolves as "no" once the controller is aborted.
 */
export function createGroupPrompt(
	rl: Interface,
	controller: AbortController,
	onCancel: () => void,
): (selection: Selection) => Promise<boolean> {
	rl.on("SIGINT", onCancel);

	return async (s) => {
		if (controller.signal.aborted) return false;
		try {
			const answer = await rl.question(
				chalk.yellow(`\nDelete ${s.delete.length} files from group ${s.group.id}? [y/N]: `),
				{ signal: controller.signal },
			);
			return answer.trim().toLowerCase() === "y";
		} catch (err) {
			if (controller.signal.aborted) return false;
			throw err;
		}
	};
}
