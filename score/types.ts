export type QualityMetrics = {
	/** width * height / 1e6 */
	megapixels: number;
	/** Variance of the Laplacian response over the luma raster */
	sharpness: number;
	fileSizeBytes: number;
	/** Dimensions after EXIF orientation */
	width: number;
	height: number;
	/** Composite desirability, higher is kept */
	score: number;
};

export type ScoreWeights = {
	resolution: number;
	sharpness: number;
	fileSize: number;
};

export type ScoreConfig = {
	weights?: Partial<ScoreWeights>;
	/** Sharpness is divided by this before capping */
	sharpnessDivisor?: number;
	/** Upper bound of the normalized sharpness term */
	sharpnessCap?: number;
};
