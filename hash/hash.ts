import { FingerprintMismatchError } from "../errors";
import { decodeLuma } from "../image/decode";

/**
 * Fixed-length perceptual fingerprint. `hex` packs the bits most
 * significant first, padded to ceil(bits / 4) digits.
 */
export type Fingerprint = {
	bits: number;
	hex: string;
};

export type HashConfig = {
	/** Grid edge N; the fingerprint has N*N bits */
	hashSize?: number;
};

let HASH_CONFIG: Required<HashConfig> = {
	hashSize: 16,
};

export function setHashConfig(cfg: HashConfig) {
	HASH_CONFIG = { ...HASH_CONFIG, ...cfg };
}

export function getHashConfig(): Readonly<Required<HashConfig>> {
	return HASH_CONFIG;
}

/**
 * Average hash: one bit per cell, set when the cell is brighter than the
 * mean of all cells.
 */
export function averageHash(values: ArrayLike<number>): Fingerprint {
	const n = values.length;
	if (n === 0) throw new RangeError("Cannot hash an empty grid");

	let sum = 0;
	for (let i = 0; i < n; i++) sum += values[i];
	const mean = sum / n;

	let acc = 0n;
	for (let i = 0; i < n; i++) {
		acc = (acc << 1n) | (values[i] > mean ? 1n : 0n);
	}
	return { bits: n, hex: acc.toString(16).padStart(Math.ceil(n / 4), "0") };
}

export async function computeFingerprint(
	file: ImagePath,
	hashSize = HASH_CONFIG.hashSize,
): Promise<Fingerprint> {
	const { data } = await decodeLuma(file, { size: hashSize });
	return averageHash(data);
}

export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
	if (a.bits !== b.bits) throw new FingerprintMismatchError(a.bits, b.bits);
	let x = BigInt(`0x${a.hex}`) ^ BigInt(`0x${b.hex}`);
	let bits = 0;
	while (x) {
		x &= x - 1n;
		bits++;
	}
	return bits;
}
