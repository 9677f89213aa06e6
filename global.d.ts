// Global type declarations for photo-dedup

// Common file/path types
type ImagePath = string;
type ImageList = ReadonlyArray<ImagePath>;

// Narrow union of the raster extensions we enumerate (lowercase)
type ImageExtension =
	| "jpg"
	| "jpeg"
	| "png"
	| "gif"
	| "bmp"
	| "tiff"
	| "tif"
	| "webp"
	| "heic"
	| "heif";

// Keep/delete verdict for one image
type Decision = "keep" | "delete";

// Progress bar options
type BarOptions = {
	task?: string;
	detail?: string;
	color?: (text: string) => string;
};

// Inclusive calendar-day window for enumeration
interface DateRange {
	from?: Date;
	to?: Date;
}
