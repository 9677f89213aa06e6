export type PhotoEntry = {
	/** Identity used for reports, decision files and deletePhoto */
	ref: string;
	name: string;
	sizeBytes?: number;
	/** Set when the photo is already on local disk */
	localPath?: ImagePath;
};

export type ListFilter = {
	range?: DateRange;
};

/**
 * One storage backend. Listing order matters: it is the enumeration order
 * grouping depends on, so it must be stable between runs.
 */
export interface PhotoProvider {
	readonly name: string;

	displayName(): string;
	authenticate(): Promise<boolean>;
	listPhotos(filter?: ListFilter): Promise<PhotoEntry[]>;
	downloadPhoto(photo: PhotoEntry, dest: ImagePath): Promise<void>;
	deletePhoto(ref: string): Promise<void>;
	supportsAutomatedDeletion(): boolean;
}
