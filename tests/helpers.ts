import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import sharp from "sharp";
import { ImageRecord } from "../group/record";
import type { Fingerprint } from "../hash/hash";
import { ZERO_QUALITY } from "../score/score";

/** Create a temp directory for fixtures. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "photo-dedup-test-"));
	return {
		dir,
		cleanup: async () => {
			await fs.rm(dir, { recursive: true, force: true });
		},
	};
}

type Pixel = (x: number, y: number) => number;

/** Write a gray image (equal RGB channels) from a per-pixel function. */
export async function writeGray(
	file: string,
	width: number,
	height: number,
	pixel: Pixel,
	format: "png" | "jpeg" = "png",
): Promise<string> {
	const buf = Buffer.alloc(width * height * 3);
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const v = pixel(x, y);
			const i = (y * width + x) * 3;
			buf[i] = v;
			buf[i + 1] = v;
			buf[i + 2] = v;
		}
	}
	const img = sharp(buf, { raw: { width, height, channels: 3 } });
	await (format === "png" ? img.png() : img.jpeg({ quality: 95 })).toFile(file);
	return file;
}

export const leftBright: Pixel = (x) => (x < 32 ? 255 : 0);
export const topBright: Pixel = (_x, y) => (y < 32 ? 255 : 0);
export const diagonalBright: Pixel = (x, y) => ((x < 32) === (y < 32) ? 255 : 0);

/** Record whose fingerprint and score are fixed instead of computed. */
export function fakeImage(
	ref: string,
	hex: string,
	score = 0,
	options: { bits?: number; sizeBytes?: number } = {},
): ImageRecord {
	const fingerprint: Fingerprint = { bits: options.bits ?? hex.length * 4, hex };
	return new ImageRecord({
		path: ref,
		sizeBytes: options.sizeBytes ?? 100,
		analyzer: {
			fingerprint: async () => fingerprint,
			quality: async () => ({ ...ZERO_QUALITY, score }),
		},
	});
}
