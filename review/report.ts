import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors";
import type { ImageRecord, SkippedImage } from "../group";
import { renderPreview } from "../image/decode";
import { log } from "../log";
import type { QualityMetrics } from "../score/types";
import type { Selection } from "../select/select";

export type ReportImage = {
	ref: string;
	name: string;
	sizeBytes: number;
	metrics: QualityMetrics;
	/** Relative to the report file when previews were rendered */
	preview?: string;
};

export type ReportGroup = {
	id: number;
	source: Selection["source"];
	fallback: boolean;
	keep: ReportImage;
	retained: ReportImage[];
	delete: ReportImage[];
	spaceToSave: number;
};

export type CleanupReport = {
	scanDate: string;
	provider: string;
	threshold: number;
	dryRun: boolean;
	totalPhotos: number;
	skipped: { ref: string; reason: string }[];
	groups: ReportGroup[];
	statistics: {
		totalGroups: number;
		totalDuplicates: number;
		/** Extra reviewer keeps; never counted as space saved */
		totalRetained: number;
		spaceCanBeSaved: number;
	};
};

type ReportContext = {
	provider: string;
	threshold: number;
	dryRun: boolean;
	totalPhotos: number;
	skipped?: ReadonlyArray<SkippedImage>;
	scanDate?: Date;
	/** Render a JPEG preview per image into this directory */
	previewsDir?: string;
	/** Preview paths are written relative to this directory */
	reportDir?: string;
};

async function describeImage(
	image: ImageRecord,
	ctx: ReportContext,
	previewName: string,
): Promise<ReportImage> {
	const entry: ReportImage = {
		ref: image.ref,
		name: image.name,
		sizeBytes: await image.size(),
		metrics: await image.quality(),
	};
	if (!ctx.previewsDir) return entry;

	const file = path.join(ctx.previewsDir, previewName);
	try {
		await fs.writeFile(file, await renderPreview(image.path));
		entry.preview = ctx.reportDir ? path.relative(ctx.reportDir, file) : file;
	} catch (err) {
		log.warn(`No preview for ${image.name}: ${errorMessage(err)}`);
	}
	return entry;
}

/** Group-indexed result set for a renderer: keeper, extras and deletes with metrics. */
export async function buildReport(
	selections: ReadonlyArray<Selection>,
	ctx: ReportContext,
): Promise<CleanupReport> {
	if (ctx.previewsDir) await fs.mkdir(ctx.previewsDir, { recursive: true });

	const groups: ReportGroup[] = [];
	for (const s of selections) {
		const id = s.group.id;
		const keep = await describeImage(s.keep, ctx, `${id}-keep.jpg`);
		const retained: ReportImage[] = [];
		for (const [i, image] of s.retained.entries()) {
			retained.push(await describeImage(image, ctx, `${id}-retained-${i + 1}.jpg`));
		}
		const deletes: ReportImage[] = [];
		for (const [i, image] of s.delete.entries()) {
			deletes.push(await describeImage(image, ctx, `${id}-delete-${i + 1}.jpg`));
		}

		groups.push({
			id,
			source: s.source,
			fallback: s.fallback,
			keep,
			retained,
			delete: deletes,
			spaceToSave: deletes.reduce((a, d) => a + d.sizeBytes, 0),
		});
	}

	return {
		scanDate: (ctx.scanDate ?? new Date()).toISOString(),
		provider: ctx.provider,
		threshold: ctx.threshold,
		dryRun: ctx.dryRun,
		totalPhotos: ctx.totalPhotos,
		skipped: (ctx.skipped ?? []).map((s) => ({ ref: s.image.ref, reason: s.reason })),
		groups,
		statistics: {
			totalGroups: groups.length,
			totalDuplicates: groups.reduce((a, g) => a + g.delete.length, 0),
			totalRetained: groups.reduce((a, g) => a + g.retained.length, 0),
			spaceCanBeSaved: groups.reduce((a, g) => a + g.spaceToSave, 0),
		},
	};
}

export async function saveReport(
	report: CleanupReport,
	file: string,
): Promise<void> {
	await fs.writeFile(file, `${JSON.stringify(report, null, 2)}\n`);
}
