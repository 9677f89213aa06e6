import fg from "fast-glob";
import path from "node:path";

export const DEFAULT_EXTS: ImageExtension[] = [
	"jpg",
	"jpeg",
	"png",
	"gif",
	"bmp",
	"tiff",
	"tif",
	"webp",
	"heic",
	"heif",
];

function buildGlobPattern(exts: ReadonlyArray<string>, recursive: boolean) {
	const prefix = recursive ? "**/" : "";
	if (exts.length === 1) return `${prefix}*.${exts[0]}`;
	return `${prefix}*.{${exts.join(",")}}`;
}

/** Image files under `cwd`, sorted so enumeration order is reproducible. */
export async function getFilesInFolder(
	cwd: string,
	exts: ReadonlyArray<string>,
	recursive = true,
): Promise<ImageList> {
	if (exts.length === 0) return [];
	const filesRel = await fg([buildGlobPattern(exts, recursive)], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
		caseSensitiveMatch: false,
	});
	return filesRel
		.map((f) => path.join(cwd, f))
		.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function parseExtensions(value: string): string[] {
	return value
		.split(",")
		.map((s) => s.trim().toLowerCase().replace(/^\./, ""))
		.filter(Boolean);
}

export function formatSize(bytes: number): string {
	let size = bytes;
	for (const unit of ["B", "KB", "MB", "GB"]) {
		if (size < 1024) return `${size.toFixed(2)} ${unit}`;
		size /= 1024;
	}
	return `${size.toFixed(2)} TB`;
}
