import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors";
import { decodeLuma } from "../image/decode";
import { log } from "../log";
import type { QualityMetrics, ScoreConfig, ScoreWeights } from "./types";

const BYTES_PER_MB = 1024 * 1024;

/** Weights for composite score */
export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = {
	resolution: 0.7, // megapixels dominate
	sharpness: 0.25,
	fileSize: 0.05, // tie-breaker between re-encodes
};

let SCORE_CONFIG: Required<Omit<ScoreConfig, "weights">> & {
	weights: ScoreWeights;
} = {
	weights: { ...DEFAULT_WEIGHTS },
	sharpnessDivisor: 1000,
	sharpnessCap: 10,
};

export function setScoreConfig(cfg: ScoreConfig) {
	SCORE_CONFIG = {
		weights: { ...SCORE_CONFIG.weights, ...cfg.weights },
		sharpnessDivisor: cfg.sharpnessDivisor ?? SCORE_CONFIG.sharpnessDivisor,
		sharpnessCap: cfg.sharpnessCap ?? SCORE_CONFIG.sharpnessCap,
	};
}

export function resetScoreConfig() {
	SCORE_CONFIG = {
		weights: { ...DEFAULT_WEIGHTS },
		sharpnessDivisor: 1000,
		sharpnessCap: 10,
	};
}

export const ZERO_QUALITY: Readonly<QualityMetrics> = {
	megapixels: 0,
	sharpness: 0,
	fileSizeBytes: 0,
	width: 0,
	height: 0,
	score: 0,
};

export function compositeScore(m: {
	megapixels: number;
	sharpness: number;
	fileSizeBytes: number;
}): number {
	const { weights, sharpnessDivisor, sharpnessCap } = SCORE_CONFIG;
	const normalizedSharpness = Math.min(
		m.sharpness / sharpnessDivisor,
		sharpnessCap,
	);
	return (
		m.megapixels * weights.resolution +
		normalizedSharpness * weights.sharpness +
		(m.fileSizeBytes / BYTES_PER_MB) * weights.fileSize
	);
}

/**
 * Variance of the 4-neighbour Laplacian:
 * [ 0,  1,  0
 *   1, -4,  1
 *   0,  1,  0 ]
 * Out-of-range neighbours reflect onto the edge pixel, so every pixel
 * contributes (no border is cropped).
 */
export function laplacianVariance(
	data: ArrayLike<number>,
	width: number,
	height: number,
): number {
	const count = width * height;
	if (!count) return 0;

	let sum = 0;
	let sumSq = 0;
	for (let y = 0; y < height; y++) {
		const row = y * width;
		const up = (y > 0 ? y - 1 : 0) * width;
		const down = (y < height - 1 ? y + 1 : y) * width;
		for (let x = 0; x < width; x++) {
			const left = x > 0 ? x - 1 : 0;
			const right = x < width - 1 ? x + 1 : x;
			const L =
				data[up + x] +
				data[down + x] +
				data[row + left] +
				data[row + right] -
				4 * data[row + x];
			sum += L;
			sumSq += L * L;
		}
	}

	const mean = sum / count;
	return Math.max(0, sumSq / count - mean * mean);
}

/**
 * Resolution, sharpness and size metrics for one file. Never rejects: any
 * failure yields ZERO_QUALITY so the image sorts last.
 */
export async function computeQuality(file: ImagePath): Promise<QualityMetrics> {
	try {
		const { size } = await fs.stat(file);
		const { data, width, height } = await decodeLuma(file, { orient: true });

		const metrics = {
			megapixels: (width * height) / 1_000_000,
			sharpness: laplacianVariance(data, width, height),
			fileSizeBytes: size,
		};
		return { ...metrics, width, height, score: compositeScore(metrics) };
	} catch (err) {
		log.warn(`Could not analyze ${path.basename(file)}: ${errorMessage(err)}`);
		return { ...ZERO_QUALITY };
	}
}
