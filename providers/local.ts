import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, ProviderError } from "../errors";
import { supportsHeic } from "../image/decode";
import { log } from "../log";
import { DEFAULT_EXTS, getFilesInFolder } from "../utils";
import { getCaptureDate, isWithinRange } from "./dates";
import type { ListFilter, PhotoEntry, PhotoProvider } from "./types";

const HEIF_EXTS = new Set(["heic", "heif"]);

type LocalOptions = {
	extensions?: ReadonlyArray<string>;
	recursive?: boolean;
	/** Defaults to probing the installed libvips */
	heicSupported?: boolean;
};

/** Photos already on disk: nothing to download, deletion is an unlink. */
export class LocalPhotoProvider implements PhotoProvider {
	readonly name = "local";
	readonly directory: string;
	private readonly options: LocalOptions;

	constructor(directory: string, options: LocalOptions = {}) {
		this.directory = path.resolve(directory);
		this.options = options;
	}

	displayName(): string {
		return `Local Filesystem (${this.directory})`;
	}

	async authenticate(): Promise<boolean> {
		const stat = await fs.stat(this.directory).catch(() => null);
		if (!stat?.isDirectory()) {
			log.error(`Directory does not exist: ${this.directory}`);
			return false;
		}
		return true;
	}

	/** Extensions to glob, minus HEIF ones when no decoder is available. */
	extensions(): string[] {
		const exts = [...(this.options.extensions ?? DEFAULT_EXTS)];
		const heic = this.options.heicSupported ?? supportsHeic();
		if (heic || !exts.some((e) => HEIF_EXTS.has(e))) return exts;

		log.warnOnce(
			"heic-decoder",
			"No HEIC/HEIF decoder in this sharp build; .heic and .heif files will be skipped",
		);
		return exts.filter((e) => !HEIF_EXTS.has(e));
	}

	async listPhotos(filter: ListFilter = {}): Promise<PhotoEntry[]> {
		log.info(`Scanning for images in ${this.directory}...`);
		const files = await getFilesInFolder(
			this.directory,
			this.extensions(),
			this.options.recursive ?? true,
		);

		const photos: PhotoEntry[] = [];
		let outOfRange = 0;
		for (const file of files) {
			if (filter.range && (filter.range.from || filter.range.to)) {
				const date = await getCaptureDate(file);
				if (!isWithinRange(date, filter.range)) {
					outOfRange++;
					continue;
				}
			}
			const stat = await fs.stat(file);
			photos.push({
				ref: file,
				name: path.basename(file),
				sizeBytes: stat.size,
				localPath: file,
			});
		}

		log.info(`Found ${photos.length} images`);
		if (outOfRange > 0) log.warn(`Skipped ${outOfRange} images outside date range`);
		return photos;
	}

	async downloadPhoto(photo: PhotoEntry, dest: ImagePath): Promise<void> {
		const source = photo.localPath ?? photo.ref;
		if (path.resolve(source) === path.resolve(dest)) return;
		try {
			await fs.copyFile(source, dest);
		} catch (err) {
			throw new ProviderError(this.name, `Could not copy ${source}: ${errorMessage(err)}`);
		}
	}

	async deletePhoto(ref: string): Promise<void> {
		try {
			await fs.unlink(ref);
		} catch (err) {
			throw new ProviderError(this.name, `Could not delete ${ref}: ${errorMessage(err)}`);
		}
	}

	supportsAutomatedDeletion(): boolean {
		return true;
	}
}
