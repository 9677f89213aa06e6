import bar from "../bar";
import { errorMessage } from "../errors";
import { type Fingerprint, hammingDistance } from "../hash/hash";
import { log } from "../log";
import { type ImageAnalyzer, ImageRecord, toRecord } from "./record";

export { ImageRecord, toRecord, type ImageAnalyzer } from "./record";

export type FingerprintedImage = {
	image: ImageRecord;
	fingerprint: Fingerprint;
};

export type SimilarityGroup = {
	/** 1-based, in discovery order */
	id: number;
	/** Anchor first, then joiners in enumeration order */
	members: ImageRecord[];
};

export type SkippedImage = {
	image: ImageRecord;
	reason: string;
};

type FingerprintOptions = {
	signal?: AbortSignal;
};

export const DEFAULT_THRESHOLD = 15;

/**
 * Hashes every image in order. Images that cannot be read are reported and
 * left out; the batch always continues.
 */
export async function fingerprintAll(
	images: ReadonlyArray<ImageRecord>,
	options: FingerprintOptions = {},
): Promise<{ hashed: FingerprintedImage[]; skipped: SkippedImage[] }> {
	const hashed: FingerprintedImage[] = [];
	const skipped: SkippedImage[] = [];

	const b = bar.start(0, images.length, { task: "Hashing images" });
	for (const image of images) {
		if (options.signal?.aborted) break;
		b.increment(0, { detail: image.name });
		try {
			hashed.push({ image, fingerprint: await image.fingerprint() });
		} catch (err) {
			const reason = errorMessage(err);
			skipped.push({ image, reason });
			log.warn(`Skipping ${image.name}: ${reason}`);
		}
		b.increment();
	}
	b.complete({ task: `Hashed ${hashed.length} images` });

	return { hashed, skipped };
}

/**
 * Greedy anchor clustering. The first unprocessed image opens a group and
 * pulls in every later unprocessed image within `threshold` of IT. Joiners
 * never recruit further images, so this is not a transitive closure: with
 * A~B and B~C but A!~C, C stays out of A's group.
 */
export function groupFingerprints(
	entries: ReadonlyArray<FingerprintedImage>,
	threshold: number,
): SimilarityGroup[] {
	if (!Number.isInteger(threshold) || threshold < 0) {
		throw new RangeError(
			`Threshold must be a non-negative integer, got ${threshold}`,
		);
	}

	const processed = new Array<boolean>(entries.length).fill(false);
	const groups: SimilarityGroup[] = [];

	for (let i = 0; i < entries.length; i++) {
		if (processed[i]) continue;
		processed[i] = true;

		const anchor = entries[i];
		const members = [anchor.image];
		for (let j = i + 1; j < entries.length; j++) {
			if (processed[j]) continue;
			if (hammingDistance(anchor.fingerprint, entries[j].fingerprint) <= threshold) {
				members.push(entries[j].image);
				processed[j] = true;
			}
		}

		if (members.length > 1) {
			groups.push({ id: groups.length + 1, members });
		}
	}
	return groups;
}

/**
 * Paths (or records) in, groups of near-duplicates out. Unreadable images are
 * warned about and excluded; singletons are not emitted.
 */
export async function groupBySimilarity(
	images: ReadonlyArray<ImagePath | ImageRecord>,
	threshold = DEFAULT_THRESHOLD,
	options: FingerprintOptions & { analyzer?: ImageAnalyzer } = {},
): Promise<SimilarityGroup[]> {
	const records = images.map((image) => toRecord(image, options.analyzer));
	const { hashed } = await fingerprintAll(records, options);
	const groups = groupFingerprints(hashed, threshold);
	log.info(`Found ${groups.length} groups of similar images`);
	return groups;
}
