import fs from "node:fs/promises";
import path from "node:path";
import { computeFingerprint, type Fingerprint } from "../hash/hash";
import { computeQuality } from "../score/score";
import type { QualityMetrics } from "../score/types";

/** How a record derives its fingerprint and metrics. Swapped out in tests. */
export type ImageAnalyzer = {
	fingerprint: (file: ImagePath) => Promise<Fingerprint>;
	quality: (file: ImagePath) => Promise<QualityMetrics>;
};

export const defaultAnalyzer: ImageAnalyzer = {
	fingerprint: (file) => computeFingerprint(file),
	quality: computeQuality,
};

type RecordInit = {
	/** Identity used in reports and decision files; defaults to `path` */
	ref?: string;
	path: ImagePath;
	sizeBytes?: number;
	analyzer?: ImageAnalyzer;
};

/**
 * One candidate image. Fingerprint, quality and size are computed on first
 * use and cached for the rest of the run.
 */
export class ImageRecord {
	readonly ref: string;
	readonly path: ImagePath;
	private readonly analyzer: ImageAnalyzer;
	private sizeTask?: Promise<number>;
	private fingerprintTask?: Promise<Fingerprint>;
	private qualityTask?: Promise<QualityMetrics>;

	constructor(init: RecordInit) {
		this.ref = init.ref ?? init.path;
		this.path = init.path;
		this.analyzer = init.analyzer ?? defaultAnalyzer;
		if (init.sizeBytes !== undefined) {
			this.sizeTask = Promise.resolve(init.sizeBytes);
		}
	}

	get name(): string {
		return path.basename(this.ref);
	}

	size(): Promise<number> {
		if (!this.sizeTask) {
			this.sizeTask = fs.stat(this.path).then(
				(s) => s.size,
				() => 0,
			);
		}
		return this.sizeTask;
	}

	fingerprint(): Promise<Fingerprint> {
		if (!this.fingerprintTask) {
			this.fingerprintTask = this.analyzer.fingerprint(this.path);
		}
		return this.fingerprintTask;
	}

	quality(): Promise<QualityMetrics> {
		if (!this.qualityTask) {
			this.qualityTask = this.analyzer.quality(this.path);
		}
		return this.qualityTask;
	}
}

export function toRecord(
	image: ImagePath | ImageRecord,
	analyzer?: ImageAnalyzer,
): ImageRecord {
	return typeof image === "string"
		? new ImageRecord({ path: image, analyzer })
		: image;
}
