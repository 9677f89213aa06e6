import * as path from "node:path";
import sharp from "sharp";
import { describe, expect, it } from "vitest";
import {
	dateFromFilename,
	getCaptureDate,
	isWithinRange,
	parseDay,
} from "../../providers/dates";
import { createTempDir } from "../helpers";

describe("dateFromFilename", () => {
	it.each([
		["20251107_023639127_iOS.heic", [2025, 10, 7]],
		["2024-02-29_party.jpg", [2024, 1, 29]],
		["scan_2019_12_31.png", [2019, 11, 31]],
		["photo_11-07-2025.png", [2025, 10, 7]],
		["/some/dir/IMG_20200101_120000.jpg", [2020, 0, 1]],
	])("should read %s", (name, [y, m, d]) => {
		expect(dateFromFilename(name)).toEqual(new Date(y, m, d));
	});

	it.each(["IMG_1234.jpg", "99999999.jpg", "2020-13-01.jpg", "holiday.png"])(
		"should find no date in %s",
		(name) => {
			expect(dateFromFilename(name)).toBeNull();
		},
	);
});

describe("isWithinRange", () => {
	const range = { from: new Date(2024, 0, 1), to: new Date(2024, 11, 31) };

	it("should include both bounds whatever the time of day", () => {
		expect(isWithinRange(new Date(2024, 0, 1, 0, 0), range)).toBe(true);
		expect(isWithinRange(new Date(2024, 11, 31, 23, 59), range)).toBe(true);
	});

	it("should exclude days outside the window", () => {
		expect(isWithinRange(new Date(2023, 11, 31, 23, 59), range)).toBe(false);
		expect(isWithinRange(new Date(2025, 0, 1), range)).toBe(false);
	});

	it("should accept open-ended ranges", () => {
		expect(isWithinRange(new Date(1990, 5, 1), { to: range.to })).toBe(true);
		expect(isWithinRange(new Date(1990, 5, 1), { from: range.from })).toBe(false);
	});

	it("should keep undated images and ignore an empty range", () => {
		expect(isWithinRange(null, range)).toBe(true);
		expect(isWithinRange(new Date(1990, 5, 1), {})).toBe(true);
	});
});

describe("parseDay", () => {
	it("should parse a calendar day", () => {
		expect(parseDay("2025-03-09")).toEqual(new Date(2025, 2, 9));
	});

	it.each(["2025-02-30", "2025-3-9", "09/03/2025", ""])("should reject %j", (value) => {
		expect(() => parseDay(value)).toThrow(RangeError);
	});
});

describe("getCaptureDate", () => {
	it("should use the EXIF modification date when nothing better is recorded", async () => {
		const { dir, cleanup } = await createTempDir();
		try {
			const file = path.join(dir, "holiday.jpg");
			await sharp(Buffer.alloc(8 * 8 * 3, 100), { raw: { width: 8, height: 8, channels: 3 } })
				.jpeg()
				.withExif({ IFD0: { DateTime: "2021:05:06 07:08:09" } })
				.toFile(file);

			expect(await getCaptureDate(file)).toEqual(new Date(2021, 4, 6, 7, 8, 9));
		} finally {
			await cleanup();
		}
	});
});
