import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import bar from "../bar";
import { errorMessage } from "../errors";
import { type ImageAnalyzer, ImageRecord } from "../group/record";
import { log } from "../log";
import type { ListFilter, PhotoProvider } from "./types";

export type CollectedImages = {
	images: ImageRecord[];
	/** Removes any temporary downloads */
	cleanup: () => Promise<void>;
};

type CollectOptions = {
	analyzer?: ImageAnalyzer;
	signal?: AbortSignal;
};

/**
 * Turns a provider listing into records in listing order. Remote photos are
 * downloaded to a temp directory first; a failed download is skipped.
 */
export async function collectImages(
	provider: PhotoProvider,
	filter: ListFilter = {},
	options: CollectOptions = {},
): Promise<CollectedImages> {
	const photos = await provider.listPhotos(filter);
	const remote = photos.filter((p) => !p.localPath).length;

	let tempDir: string | undefined;
	const cleanup = async () => {
		if (tempDir) await fs.rm(tempDir, { recursive: true, force: true });
	};

	if (remote > 0) {
		tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "photo-dedup-"));
		log.info(`Downloading ${remote} photos to a temporary directory for analysis...`);
	}

	const images: ImageRecord[] = [];
	let downloaded = 0;
	const b = remote > 0 ? bar.start(0, remote, { task: "Downloading" }) : null;
	for (const [i, photo] of photos.entries()) {
		if (options.signal?.aborted) break;
		if (photo.localPath) {
			images.push(
				new ImageRecord({
					ref: photo.ref,
					path: photo.localPath,
					sizeBytes: photo.sizeBytes,
					analyzer: options.analyzer,
				}),
			);
			continue;
		}

		b?.increment(0, { detail: photo.name });
		// index prefix keeps same-named photos from different folders apart
		const dest = path.join(tempDir ?? os.tmpdir(), `${i}-${path.basename(photo.name)}`);
		try {
			await provider.downloadPhoto(photo, dest);
			images.push(
				new ImageRecord({
					ref: photo.ref,
					path: dest,
					sizeBytes: photo.sizeBytes,
					analyzer: options.analyzer,
				}),
			);
			downloaded++;
		} catch (err) {
			log.warn(`Could not download ${photo.name}: ${errorMessage(err)}`);
		}
		b?.increment();
	}
	b?.complete({ task: `Downloaded ${downloaded} photos` });

	return { images, cleanup };
}
