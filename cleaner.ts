import chalk from "chalk";
import path from "node:path";
import {
	type DecisionSet,
	saveDecisions,
	toDecisionDocument,
} from "./decisions/decisions";
import { ProviderError, UnsafeDecisionsError } from "./errors";
import {
	DEFAULT_THRESHOLD,
	fingerprintAll,
	groupFingerprints,
	type ImageAnalyzer,
	type SkippedImage,
} from "./group";
import { getHashConfig } from "./hash/hash";
import { log } from "./log";
import {
	type ExecutionSummary,
	executeSelections,
	type PhotoSink,
	ProviderSink,
} from "./moves/move";
import { collectImages } from "./providers/collect";
import type { PhotoProvider } from "./providers/types";
import { buildReport, type CleanupReport, saveReport } from "./review/report";
import { type Selection, selectBest } from "./select/select";
import { formatSize } from "./utils";

export type CleanerOptions = {
	provider: PhotoProvider;
	threshold?: number;
	/** Default true: nothing is removed unless explicitly asked */
	dryRun?: boolean;
	range?: DateRange;
	decisions?: DecisionSet;
	/** Execute even when the decisions leave images unnamed (they get deleted) */
	allowIncompleteDecisions?: boolean;
	/** Defaults to deleting through the provider */
	sink?: PhotoSink;
	reportPath?: string;
	decisionsPath?: string;
	previewsDir?: string;
	confirm?: (selection: Selection) => Promise<boolean>;
	signal?: AbortSignal;
	analyzer?: ImageAnalyzer;
};

export type CleanerResult = {
	totalPhotos: number;
	skipped: SkippedImage[];
	selections: Selection[];
	report?: CleanupReport;
	execution?: ExecutionSummary;
};

const RULE = "=".repeat(80);

async function printSelection(s: Selection, total: number): Promise<void> {
	console.log(chalk.cyan(`\n${RULE}`));
	console.log(
		chalk.cyan(`Group ${s.group.id}/${total} - ${s.group.members.length} similar images`),
	);
	console.log(chalk.cyan(RULE));

	const q = await s.keep.quality();
	console.log(chalk.green(`✓ KEEP: ${s.keep.name}`));
	console.log(
		`  Resolution: ${q.megapixels.toFixed(2)} MP, Sharpness: ${q.sharpness.toFixed(1)}, ` +
			`Size: ${formatSize(await s.keep.size())}, Score: ${q.score.toFixed(2)}`,
	);
	for (const image of s.retained) {
		console.log(chalk.green(`✓ ALSO KEEP: ${image.name}`));
	}

	console.log(chalk.red(`\n✗ DELETE (${s.delete.length} files):`));
	let space = 0;
	for (const image of s.delete) {
		const size = await image.size();
		space += size;
		const { score } = await image.quality();
		console.log(`  - ${image.name} (${formatSize(size)}, Score: ${score.toFixed(2)})`);
	}
	console.log(chalk.yellow(`\nSpace to be saved: ${formatSize(space)}`));
}

/** Refuses to delete on the strength of a decision file that skipped images. */
function guardDecisions(
	selections: ReadonlyArray<Selection>,
	allowIncomplete: boolean,
): void {
	const unnamed = selections.reduce((a, s) => a + s.unnamed.length, 0);
	if (unnamed === 0) return;
	if (!allowIncomplete) {
		throw new UnsafeDecisionsError(
			`${unnamed} image(s) are not named in the decisions file and would be deleted. ` +
				"Add them to the file or pass --allow-incomplete-decisions.",
		);
	}
	log.warn(`Proceeding with ${unnamed} unnamed image(s) marked for deletion`);
}

export async function runCleaner(options: CleanerOptions): Promise<CleanerResult> {
	const { provider, decisions, signal } = options;
	const threshold = options.threshold ?? DEFAULT_THRESHOLD;
	const dryRun = options.dryRun ?? true;

	log.info("Photo cleaner starting...");
	log.info(`Source: ${provider.displayName()}`);
	const { hashSize } = getHashConfig();
	log.info(`Threshold: ${threshold} (of ${hashSize * hashSize} bits)`);
	log.info(`Mode: ${dryRun ? "DRY RUN" : "LIVE"}`);

	if (!(await provider.authenticate())) {
		throw new ProviderError(provider.name, "Authentication failed");
	}
	// resolved up front so an unsupported backend fails before any analysis
	const sink = dryRun ? undefined : (options.sink ?? new ProviderSink(provider));

	const { images, cleanup } = await collectImages(
		provider,
		{ range: options.range },
		{ analyzer: options.analyzer, signal },
	);
	try {
		const result: CleanerResult = {
			totalPhotos: images.length,
			skipped: [],
			selections: [],
		};
		if (images.length === 0) {
			log.warn("No images found");
			return result;
		}

		const { hashed, skipped } = await fingerprintAll(images, { signal });
		result.skipped = skipped;
		// a partial scan must not overwrite an earlier report or decisions file
		if (signal?.aborted) return result;
		const groups = groupFingerprints(hashed, threshold);
		if (groups.length === 0) {
			log.success("No duplicate or similar images found!");
			return result;
		}
		log.info(`Found ${groups.length} groups of similar images`);

		for (const group of groups) {
			if (signal?.aborted) break;
			result.selections.push(await selectBest(group, decisions));
		}
		if (signal?.aborted) return result;
		for (const s of result.selections) await printSelection(s, groups.length);

		if (dryRun) {
			result.report = await buildReport(result.selections, {
				provider: provider.displayName(),
				threshold,
				dryRun,
				totalPhotos: images.length,
				skipped,
				previewsDir: options.previewsDir,
				reportDir: options.reportPath ? path.dirname(options.reportPath) : undefined,
			});
			if (options.reportPath) {
				await saveReport(result.report, options.reportPath);
				log.success(`Report written to ${options.reportPath}`);
			}
			if (options.decisionsPath) {
				await saveDecisions(options.decisionsPath, toDecisionDocument(result.selections));
				log.success(`Decisions written to ${options.decisionsPath}`);
			}

			const { statistics } = result.report;
			console.log(chalk.cyan(`\n${RULE}\nSUMMARY\n${RULE}`));
			console.log(chalk.green(`Groups found: ${statistics.totalGroups}`));
			console.log(chalk.yellow(`Files to delete: ${statistics.totalDuplicates}`));
			console.log(chalk.yellow(`Space to be saved: ${formatSize(statistics.spaceCanBeSaved)}`));
			log.warn("DRY RUN - No files were deleted. Run with --execute to delete them.");
			return result;
		}

		guardDecisions(result.selections, options.allowIncompleteDecisions ?? false);
		if (!sink) throw new Error("No sink configured for a live run");
		result.execution = await executeSelections(result.selections, sink, {
			confirm: options.confirm,
			signal,
		});

		const { deleted, failed, bytesFreed } = result.execution;
		console.log(chalk.cyan(`\n${RULE}\nDELETION SUMMARY\n${RULE}`));
		console.log(chalk.green(`✓ Successfully removed: ${deleted} files`));
		console.log(chalk.green(`✓ Space freed: ${formatSize(bytesFreed)}`));
		if (failed > 0) console.log(chalk.red(`✗ Failed: ${failed} files`));
		return result;
	} finally {
		if (signal?.aborted) log.warn("Stopped before all images were processed");
		await cleanup();
	}
}
