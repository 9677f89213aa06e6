import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../../errors";
import { log } from "../../log";
import { collectImages } from "../../providers/collect";
import { LocalPhotoProvider } from "../../providers/local";
import type { PhotoEntry, PhotoProvider } from "../../providers/types";
import { createTempDir } from "../helpers";

describe("LocalPhotoProvider", () => {
	let dir: string;
	let cleanup: () => Promise<void>;

	beforeAll(async () => {
		({ dir, cleanup } = await createTempDir());
		await fs.mkdir(path.join(dir, "sub"));
		for (const name of ["b.jpg", "sub/a.PNG", "notes.txt", "c.heic", "20200101_old.jpg", "20240101_new.jpg"]) {
			await fs.writeFile(path.join(dir, name), `bytes of ${name}`);
		}
	});

	afterAll(async () => {
		await cleanup();
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should list images recursively in sorted order", async () => {
		vi.spyOn(log, "info").mockImplementation(() => {});
		const provider = new LocalPhotoProvider(dir, { heicSupported: true });
		const photos = await provider.listPhotos();

		expect(photos.map((p) => path.relative(dir, p.ref))).toEqual([
			"20200101_old.jpg",
			"20240101_new.jpg",
			"b.jpg",
			"c.heic",
			path.join("sub", "a.PNG"),
		]);
		const b = photos[2];
		expect(b.localPath).toBe(b.ref);
		expect(b.name).toBe("b.jpg");
		expect(b.sizeBytes).toBe("bytes of b.jpg".length);
	});

	it("should skip HEIC files once when there is no decoder", async () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
		const provider = new LocalPhotoProvider(dir, { heicSupported: false });

		const first = await provider.listPhotos();
		await provider.listPhotos();
		expect(first.map((p) => p.name)).not.toContain("c.heic");
		expect(first).toHaveLength(4);
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it("should honour the recursive flag and extension list", async () => {
		const provider = new LocalPhotoProvider(dir, { extensions: ["png"], recursive: false });
		expect(await provider.listPhotos()).toEqual([]);
	});

	it("should filter by capture date", async () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
		const provider = new LocalPhotoProvider(dir, { extensions: ["jpg"] });
		const photos = await provider.listPhotos({
			range: { from: new Date(2023, 0, 1), to: new Date(2024, 5, 30) },
		});
		// b.jpg has no date in its name, so its modification time (today) is used
		expect(photos.map((p) => p.name)).toEqual(["20240101_new.jpg"]);
		expect(warn).toHaveBeenCalledWith("Skipped 2 images outside date range");
	});

	it("should fail authentication for a missing directory", async () => {
		vi.spyOn(log, "error").mockImplementation(() => {});
		expect(await new LocalPhotoProvider(path.join(dir, "nope")).authenticate()).toBe(false);
		expect(await new LocalPhotoProvider(dir).authenticate()).toBe(true);
	});

	it("should wrap delete failures", async () => {
		const provider = new LocalPhotoProvider(dir);
		await expect(provider.deletePhoto(path.join(dir, "gone.jpg"))).rejects.toBeInstanceOf(
			ProviderError,
		);
	});
});

class RemoteProvider implements PhotoProvider {
	readonly name = "remote";
	readonly deleted: string[] = [];

	constructor(private readonly photos: PhotoEntry[]) {}

	displayName() {
		return "Remote test store";
	}

	async authenticate() {
		return true;
	}

	async listPhotos() {
		return this.photos;
	}

	async downloadPhoto(photo: PhotoEntry, dest: string) {
		if (photo.ref === "remote:fail") throw new Error("timeout");
		await fs.writeFile(dest, `content of ${photo.ref}`);
	}

	async deletePhoto(ref: string) {
		this.deleted.push(ref);
	}

	supportsAutomatedDeletion() {
		return false;
	}
}

describe("collectImages", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should download remote photos and keep their references", async () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
		vi.spyOn(log, "info").mockImplementation(() => {});
		const provider = new RemoteProvider([
			{ ref: "remote:1", name: "beach.jpg", sizeBytes: 10 },
			{ ref: "remote:fail", name: "lost.jpg" },
			{ ref: "remote:2", name: "beach.jpg", sizeBytes: 20 },
		]);

		const { images, cleanup } = await collectImages(provider);
		expect(images.map((i) => i.ref)).toEqual(["remote:1", "remote:2"]);
		expect(path.basename(images[0].path)).toBe("0-beach.jpg");
		expect(path.basename(images[1].path)).toBe("2-beach.jpg");
		expect(await fs.readFile(images[1].path, "utf-8")).toBe("content of remote:2");
		expect(await images[1].size()).toBe(20);
		expect(warn).toHaveBeenCalledWith("Could not download lost.jpg: timeout");

		await cleanup();
		await expect(fs.access(path.dirname(images[0].path))).rejects.toThrow();
	});

	it("should use local photos in place", async () => {
		const provider = new RemoteProvider([
			{ ref: "/albums/a.jpg", name: "a.jpg", localPath: "/albums/a.jpg", sizeBytes: 5 },
		]);
		const { images, cleanup } = await collectImages(provider);
		expect(images[0].path).toBe("/albums/a.jpg");
		expect(images[0].ref).toBe("/albums/a.jpg");
		await cleanup();
	});
});
