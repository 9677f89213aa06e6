import path from "node:path";
import { createInterface } from "node:readline/promises";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import { runCleaner } from "./cleaner";
import { loadDecisions } from "./decisions/decisions";
import { errorMessage } from "./errors";
import { DEFAULT_THRESHOLD } from "./group";
import { setHashConfig } from "./hash/hash";
import { log } from "./log";
import { BackupSink, DeleteSink } from "./moves/move";
import { createGroupPrompt } from "./moves/prompt";
import { parseDay } from "./providers/dates";
import { LocalPhotoProvider } from "./providers/local";
import { DEFAULT_WEIGHTS, setScoreConfig } from "./score/score";
import { DEFAULT_EXTS, parseExtensions } from "./utils";

const REPORT_NAME = "photo_cleaner_report.json";
const DECISIONS_NAME = "photo_decisions.json";

async function main() {
	const argv = await yargs(hideBin(process.argv))
		.scriptName("photo-dedup")
		.usage("$0 [options]\n\nGroup similar photos and delete duplicates to save disk space")
		.env("PHOTO_DEDUP")
		.config()
		.option("path", {
			alias: "p",
			type: "string",
			default: ".",
			describe: "Directory containing photos to clean",
		})
		.option("threshold", {
			type: "number",
			default: DEFAULT_THRESHOLD,
			describe: "Similarity threshold (0-64, lower = more strict)",
		})
		.option("hash-size", {
			type: "number",
			default: 16,
			describe: "Fingerprint grid size N (N*N bits)",
		})
		.option("ext", {
			type: "string",
			default: DEFAULT_EXTS.join(","),
			describe: "Comma-separated extensions to include (lowercase)",
		})
		.option("execute", {
			type: "boolean",
			default: false,
			describe: "Execute deletion (default is dry-run/preview mode)",
		})
		.option("interactive", {
			type: "boolean",
			default: false,
			describe: "Confirm each group before deletion (implies --execute)",
		})
		.option("backup-dir", {
			type: "string",
			describe: "Move files to this directory instead of deleting",
		})
		.option("date-from", {
			type: "string",
			describe: "Process images from this date onwards (YYYY-MM-DD)",
		})
		.option("date-to", {
			type: "string",
			describe: "Process images up to this date (YYYY-MM-DD)",
		})
		.option("apply-decisions", {
			type: "string",
			describe: "Apply keep/delete decisions from a JSON file produced by a dry run",
		})
		.option("allow-incomplete-decisions", {
			type: "boolean",
			default: false,
			describe: "Delete images the decisions file does not mention",
		})
		.option("report", {
			type: "string",
			describe: `Dry-run report path (default: <path>/${REPORT_NAME})`,
		})
		.option("decisions-out", {
			type: "string",
			describe: `Editable decisions path (default: <path>/${DECISIONS_NAME})`,
		})
		.option("previews", {
			type: "string",
			describe: "Render JPEG previews for the report into this directory",
		})
		// Scoring options
		.option("score-weight-resolution", {
			type: "number",
			default: DEFAULT_WEIGHTS.resolution,
		})
		.option("score-weight-sharpness", {
			type: "number",
			default: DEFAULT_WEIGHTS.sharpness,
		})
		.option("score-weight-size", {
			type: "number",
			default: DEFAULT_WEIGHTS.fileSize,
		})
		.check((args) => {
			if (!Number.isInteger(args.threshold) || args.threshold < 0 || args.threshold > 64) {
				throw new Error("--threshold must be an integer between 0 and 64");
			}
			if (!Number.isInteger(args["hash-size"]) || args["hash-size"] < 2) {
				throw new Error("--hash-size must be an integer of at least 2");
			}
			const from = args["date-from"] ? parseDay(args["date-from"]) : undefined;
			const to = args["date-to"] ? parseDay(args["date-to"]) : undefined;
			if (from && to && from > to) {
				throw new Error("--date-from must be before --date-to");
			}
			return true;
		})
		.strict()
		.help()
		.parseAsync();

	const folder = path.resolve(argv.path);
	setHashConfig({ hashSize: argv["hash-size"] });
	setScoreConfig({
		weights: {
			resolution: argv["score-weight-resolution"],
			sharpness: argv["score-weight-sharpness"],
			fileSize: argv["score-weight-size"],
		},
	});

	// a broken decisions file stops the run before anything is read or removed
	const decisionsFile = argv["apply-decisions"]
		? path.resolve(argv["apply-decisions"])
		: undefined;
	const decisions = decisionsFile ? await loadDecisions(decisionsFile) : undefined;

	const decisionsOut = path.resolve(argv["decisions-out"] ?? path.join(folder, DECISIONS_NAME));
	const dryRun = !(argv.execute || argv.interactive);
	const controller = new AbortController();
	const cancel = () => {
		log.warn("Operation cancelled by user");
		process.exitCode = 1;
		controller.abort();
	};
	process.once("SIGINT", cancel);

	const rl = argv.interactive
		? createInterface({ input: process.stdin, output: process.stdout })
		: undefined;
	const confirm = rl ? createGroupPrompt(rl, controller, cancel) : undefined;

	try {
		await runCleaner({
			provider: new LocalPhotoProvider(folder, {
				extensions: parseExtensions(argv.ext),
			}),
			threshold: argv.threshold,
			dryRun,
			range: {
				from: argv["date-from"] ? parseDay(argv["date-from"]) : undefined,
				to: argv["date-to"] ? parseDay(argv["date-to"]) : undefined,
			},
			decisions,
			allowIncompleteDecisions: argv["allow-incomplete-decisions"],
			sink: argv["backup-dir"]
				? new BackupSink(path.resolve(argv["backup-dir"]))
				: new DeleteSink(),
			reportPath: path.resolve(argv.report ?? path.join(folder, REPORT_NAME)),
			// never overwrite the file the reviewer handed us
			decisionsPath: decisionsOut === decisionsFile ? undefined : decisionsOut,
			previewsDir: argv.previews ? path.resolve(argv.previews) : undefined,
			confirm,
			signal: controller.signal,
		});
	} finally {
		rl?.close();
	}
}

await main().catch((err) => {
	log.error(`Error: ${errorMessage(err)}`);
	process.exitCode = 1;
});
