import fs from "node:fs/promises";
import sharp from "sharp";
import {
	errorMessage,
	ImageDecodeError,
	ImageNotFoundError,
	isNotFound,
} from "../errors";

/** Single-channel 8-bit luma raster, row-major. */
export type LumaImage = {
	data: Uint8Array;
	width: number;
	height: number;
};

type DecodeOptions = {
	/** Resize the luma raster to a size×size square, ignoring aspect ratio */
	size?: number;
	/** Apply EXIF orientation before anything else */
	orient?: boolean;
};

/**
 * ITU-R 601-2 luma, the same fixed-point transform most decoders use for
 * an "L" conversion. Weights sum to 65536 so gray stays gray.
 */
export function toLuma(data: Uint8Array, channels: number): Uint8Array {
	const pixels = Math.floor(data.length / channels);
	const out = new Uint8Array(pixels);
	for (let p = 0, i = 0; p < pixels; p++, i += channels) {
		out[p] =
			channels >= 3
				? (data[i] * 19595 + data[i + 1] * 38470 + data[i + 2] * 7471 + 0x8000) >> 16
				: data[i];
	}
	return out;
}

async function assertReadable(file: ImagePath): Promise<void> {
	try {
		await fs.access(file);
	} catch (err) {
		if (isNotFound(err)) throw new ImageNotFoundError(file);
		throw new ImageDecodeError(file, errorMessage(err));
	}
}

/**
 * Decodes an image to luma. Rejects with ImageNotFoundError when the file
 * is missing and ImageDecodeError for anything libvips cannot read.
 * When `size` is set the luma raster is resized, not the colour image.
 */
export async function decodeLuma(
	file: ImagePath,
	options: DecodeOptions = {},
): Promise<LumaImage> {
	await assertReadable(file);
	try {
		let img = sharp(file);
		if (options.orient) img = img.rotate(); // auto-orient
		const { data, info } = await img
			.removeAlpha()
			.toColourspace("srgb")
			.raw()
			.toBuffer({ resolveWithObject: true });

		const luma = {
			data: toLuma(data, info.channels),
			width: info.width,
			height: info.height,
		};
		return options.size ? await resizeLuma(luma, options.size) : luma;
	} catch (err) {
		throw new ImageDecodeError(file, errorMessage(err));
	}
}

async function resizeLuma(image: LumaImage, size: number): Promise<LumaImage> {
	const { data, info } = await sharp(image.data, {
		raw: { width: image.width, height: image.height, channels: 1 },
	})
		.resize(size, size, { fit: "fill", kernel: "lanczos3" })
		.raw()
		.toBuffer({ resolveWithObject: true });

	return {
		data: toLuma(data, info.channels),
		width: info.width,
		height: info.height,
	};
}

/** Oriented JPEG thumbnail for review pages. */
export async function renderPreview(
	file: ImagePath,
	size = 400,
): Promise<Buffer> {
	await assertReadable(file);
	try {
		return await sharp(file)
			.rotate() // honor EXIF orientation
			.resize({
				width: size,
				height: size,
				fit: "inside",
				withoutEnlargement: true,
			})
			.jpeg({ quality: 85, mozjpeg: true })
			.toBuffer();
	} catch (err) {
		throw new ImageDecodeError(file, errorMessage(err));
	}
}

/** Whether this libvips build can read HEIC (prebuilt sharp only reads AVIF). */
export function supportsHeic(): boolean {
	const input = sharp.format.heif?.input;
	if (!input || !("fileSuffix" in input)) return false;
	const suffixes = input.fileSuffix;
	return Array.isArray(suffixes) && suffixes.includes(".heic");
}
