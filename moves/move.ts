import { promises as fs } from "node:fs";
import path from "node:path";
import bar from "../bar";
import { errorMessage, hasCode, isNotFound, ProviderError } from "../errors";
import type { ImageRecord } from "../group";
import { log } from "../log";
import type { PhotoProvider } from "../providers/types";
import type { Selection } from "../select/select";

/** Where rejected images go. */
export interface PhotoSink {
	readonly name: string;
	remove(image: ImageRecord): Promise<void>;
}

export class DeleteSink implements PhotoSink {
	readonly name = "delete";

	async remove(image: ImageRecord): Promise<void> {
		await fs.unlink(image.path);
	}
}

/** Moves images into `dir` instead of deleting them. */
export class BackupSink implements PhotoSink {
	readonly name = "backup";

	constructor(readonly dir: string) {}

	async remove(image: ImageRecord): Promise<void> {
		await fs.mkdir(this.dir, { recursive: true });
		const dest = await uniquePath(this.dir, path.basename(image.path));
		await moveFile(image.path, dest);
		log.debug(`Moved ${image.path} -> ${dest}`);
	}
}

/** Deletes through the storage backend, addressed by reference. */
export class ProviderSink implements PhotoSink {
	readonly name: string;

	constructor(private readonly provider: PhotoProvider) {
		if (!provider.supportsAutomatedDeletion()) {
			throw new ProviderError(
				provider.name,
				"This provider does not support automated deletion; remove the photos manually using the report",
			);
		}
		this.name = provider.name;
	}

	async remove(image: ImageRecord): Promise<void> {
		await this.provider.deletePhoto(image.ref);
	}
}

/** `name.ext`, then `name_1.ext`, `name_2.ext`, ... until one is free. */
export async function uniquePath(dir: string, fileName: string): Promise<string> {
	const ext = path.extname(fileName);
	const stem = path.basename(fileName, ext);
	let candidate = path.join(dir, fileName);
	for (let counter = 1; ; counter++) {
		try {
			await fs.access(candidate);
		} catch (err) {
			if (isNotFound(err)) return candidate;
			throw err;
		}
		candidate = path.join(dir, `${stem}_${counter}${ext}`);
	}
}

export async function moveFile(src: string, dest: string): Promise<void> {
	try {
		await fs.rename(src, dest);
	} catch (err) {
		if (!hasCode(err, "EXDEV")) throw err;
		// Handle cross-device move (copy then delete)
		await fs.copyFile(src, dest);
		await fs.unlink(src);
	}
}

export type ExecutionSummary = {
	deleted: number;
	failed: number;
	bytesFreed: number;
	skippedGroups: number;
};

type ExecuteOptions = {
	/** Asked once per group; false skips the group */
	confirm?: (selection: Selection) => Promise<boolean>;
	signal?: AbortSignal;
};

/**
 * Sends every image in each selection's delete list to the sink. Kept and
 * retained images are never touched. Individual failures are counted and
 * the run continues.
 */
export async function executeSelections(
	selections: ReadonlyArray<Selection>,
	sink: PhotoSink,
	options: ExecuteOptions = {},
): Promise<ExecutionSummary> {
	const summary: ExecutionSummary = {
		deleted: 0,
		failed: 0,
		bytesFreed: 0,
		skippedGroups: 0,
	};

	const total = selections.reduce((a, s) => a + s.delete.length, 0);
	const b = bar.start(0, total, { task: "Removing duplicates" });
	for (const selection of selections) {
		if (options.signal?.aborted) break;
		if (options.confirm && !(await options.confirm(selection))) {
			log.warn(`Skipped group ${selection.group.id}`);
			summary.skippedGroups++;
			b.increment(selection.delete.length);
			continue;
		}

		for (const image of selection.delete) {
			b.increment(0, { detail: image.name });
			const size = await image.size();
			try {
				await sink.remove(image);
				summary.deleted++;
				summary.bytesFreed += size;
			} catch (err) {
				summary.failed++;
				log.error(`Failed to remove ${image.ref}: ${errorMessage(err)}`);
			}
			b.increment();
		}
	}
	b.complete({ task: `Removed ${summary.deleted} files via ${sink.name}` });
	return summary;
}
