export class ImageNotFoundError extends Error {
	constructor(readonly path: string) {
		super(`Image not found: ${path}`);
		this.name = "ImageNotFoundError";
	}
}

export class ImageDecodeError extends Error {
	constructor(
		readonly path: string,
		reason: string,
	) {
		super(`Could not decode ${path}: ${reason}`);
		this.name = "ImageDecodeError";
	}
}

export class FingerprintMismatchError extends Error {
	constructor(a: number, b: number) {
		super(`Cannot compare a ${a}-bit fingerprint with a ${b}-bit fingerprint`);
		this.name = "FingerprintMismatchError";
	}
}

/** The decision file is missing or unreadable. Fatal for the whole run. */
export class DecisionFileError extends Error {
	constructor(
		readonly path: string,
		message: string,
	) {
		super(message);
		this.name = "DecisionFileError";
	}
}

export class UnsafeDecisionsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UnsafeDecisionsError";
	}
}

export class ProviderError extends Error {
	constructor(provider: string, message: string) {
		super(`[${provider}] ${message}`);
		this.name = "ProviderError";
	}
}

export function hasCode(err: unknown, code: string): boolean {
	return err instanceof Error && "code" in err && err.code === code;
}

export function isNotFound(err: unknown): boolean {
	return hasCode(err, "ENOENT");
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
