import exifr from "exifr";
import fs from "node:fs/promises";
import path from "node:path";

const FILENAME_PATTERNS = [
	/(\d{4})(\d{2})(\d{2})/, // 20251107_023639127_iOS.heic
	/(\d{4})[_-](\d{2})[_-](\d{2})/, // 2025-11-07_image.jpg
	/(\d{2})[_-](\d{2})[_-](\d{4})/, // photo_11-07-2025.png
];

function validDay(year: number, month: number, day: number): Date | null {
	if (year < 1900 || year > 2100) return null;
	if (month < 1 || month > 12 || day < 1 || day > 31) return null;
	return new Date(year, month - 1, day);
}

export async function readExifDate(file: ImagePath): Promise<Date | null> {
	try {
		const exif = await exifr.parse(file, [
			"DateTimeOriginal",
			"CreateDate",
			"ModifyDate",
		]);
		const value: unknown =
			exif?.DateTimeOriginal ?? exif?.CreateDate ?? exif?.ModifyDate;
		return value instanceof Date && !Number.isNaN(value.getTime())
			? value
			: null;
	} catch {
		return null;
	}
}

export function dateFromFilename(name: string): Date | null {
	const base = path.basename(name);
	for (const pattern of FILENAME_PATTERNS) {
		const match = pattern.exec(base);
		if (!match) continue;
		const [, a, b, c] = match;
		const date =
			a.length === 4
				? validDay(Number(a), Number(b), Number(c))
				: validDay(Number(c), Number(a), Number(b));
		if (date) return date;
	}
	return null;
}

/** EXIF first, then the file name, then the modification time. */
export async function getCaptureDate(file: ImagePath): Promise<Date | null> {
	const exif = await readExifDate(file);
	if (exif) return exif;

	const named = dateFromFilename(file);
	if (named) return named;

	try {
		return (await fs.stat(file)).mtime;
	} catch {
		return null;
	}
}

export function startOfDay(date: Date): Date {
	return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Day-granular, inclusive. Undated images are always in range. */
export function isWithinRange(date: Date | null, range: DateRange): boolean {
	if (!range.from && !range.to) return true;
	if (!date) return true;

	const day = startOfDay(date).getTime();
	if (range.from && day < startOfDay(range.from).getTime()) return false;
	if (range.to && day > startOfDay(range.to).getTime()) return false;
	return true;
}

/** Parses YYYY-MM-DD as a local calendar day. */
export function parseDay(value: string): Date {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
	const date = match
		? new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]))
		: null;
	if (
		!match ||
		!date ||
		date.getMonth() !== Number(match[2]) - 1 ||
		date.getDate() !== Number(match[3])
	) {
		throw new RangeError(`Invalid date "${value}". Use YYYY-MM-DD`);
	}
	return date;
}
