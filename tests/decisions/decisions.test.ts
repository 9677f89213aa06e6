import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import {
	loadDecisions,
	parseDecisionDocument,
	saveDecisions,
	toDecisionDocument,
} from "../../decisions/decisions";
import { DecisionFileError } from "../../errors";
import type { SimilarityGroup } from "../../group";
import { log } from "../../log";
import { selectBest } from "../../select/select";
import { createTempDir, fakeImage } from "../helpers";

describe("parseDecisionDocument", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should accept plain and object references", () => {
		const set = parseDecisionDocument({
			"1": { keep: ["/p/a.jpg"], delete: [{ path: "/p/b.jpg", size: 1234 }] },
			"2": { delete: ["/p/c.jpg"] },
		});
		expect(set.actionFor("/p/a.jpg")).toBe("keep");
		expect(set.actionFor("/p/b.jpg")).toBe("delete");
		expect(set.actionFor("/p/c.jpg")).toBe("delete");
		expect(set.actionFor("/p/d.jpg")).toBeUndefined();
		expect(set.groups.get(2)).toEqual({ keep: [], delete: ["/p/c.jpg"] });
		expect(set.size).toBe(3);
	});

	it("should skip malformed entries and unknown group ids", () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
		const set = parseDecisionDocument({
			"1": { keep: ["/p/a.jpg", 42], delete: [] },
			abc: { keep: ["/p/x.jpg"] },
		});
		expect(set.actionFor("/p/a.jpg")).toBe("keep");
		expect(set.actionFor("/p/x.jpg")).toBeUndefined();
		expect([...set.groups.keys()]).toEqual([1]);
		expect(warn).toHaveBeenCalledWith("Ignoring malformed keep entry in group 1: 42");
		expect(warn).toHaveBeenCalledWith('Ignoring decisions for unknown group id "abc"');
	});

	it("should keep an image marked both keep and delete", () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
		const set = parseDecisionDocument({
			"1": { keep: ["/p/a.jpg"], delete: ["/p/b.jpg"] },
			"2": { keep: ["/p/b.jpg"], delete: ["/p/a.jpg"] },
		});
		expect(set.actionFor("/p/a.jpg")).toBe("keep");
		expect(set.actionFor("/p/b.jpg")).toBe("keep");
		expect(warn).toHaveBeenCalledTimes(2);
	});

	it("should reject a document of the wrong shape", () => {
		expect(() => parseDecisionDocument([], "d.json")).toThrow(DecisionFileError);
		expect(() => parseDecisionDocument({ "1": { keep: "/p/a.jpg" } }, "d.json")).toThrow(
			/^Invalid decisions document at 1\.keep: /,
		);
	});
});

describe("decision files", () => {
	let dir: string;
	let cleanup: () => Promise<void>;

	beforeAll(async () => {
		({ dir, cleanup } = await createTempDir());
	});

	afterAll(async () => {
		await cleanup();
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should fail on a missing file", async () => {
		const file = path.join(dir, "missing.json");
		await expect(loadDecisions(file)).rejects.toThrow(`Decisions file not found: ${file}`);
	});

	it("should fail on invalid JSON", async () => {
		const file = path.join(dir, "broken.json");
		await fs.writeFile(file, "{ not json");
		const err = await loadDecisions(file).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(DecisionFileError);
		expect(String(err)).toMatch(/Invalid JSON in decisions file/);
	});

	it("should reproduce the same split when fed back unchanged", async () => {
		vi.spyOn(log, "warn").mockImplementation(() => {});
		vi.spyOn(log, "info").mockImplementation(() => {});
		const groups: SimilarityGroup[] = [
			{
				id: 1,
				members: [fakeImage("/p/a.jpg", "00", 1), fakeImage("/p/b.jpg", "00", 3)],
			},
			{
				id: 2,
				members: [
					fakeImage("/p/c.jpg", "00", 2),
					fakeImage("/p/d.jpg", "00", 2),
					fakeImage("/p/e.jpg", "00", 5),
				],
			},
		];
		const automatic = await Promise.all(groups.map((g) => selectBest(g)));
		const doc = toDecisionDocument(automatic);
		expect(doc).toEqual({
			"1": { keep: ["/p/b.jpg"], delete: ["/p/a.jpg"] },
			"2": { keep: ["/p/e.jpg"], delete: ["/p/c.jpg", "/p/d.jpg"] },
		});

		const file = path.join(dir, "decisions.json");
		await saveDecisions(file, doc);
		const decisions = await loadDecisions(file);
		const replayed = await Promise.all(groups.map((g) => selectBest(g, decisions)));

		expect(replayed.map((s) => s.keep.ref)).toEqual(["/p/b.jpg", "/p/e.jpg"]);
		expect(replayed.map((s) => s.delete.map((d) => d.ref))).toEqual([
			["/p/a.jpg"],
			["/p/c.jpg", "/p/d.jpg"],
		]);
		expect(replayed.every((s) => s.unnamed.length === 0)).toBe(true);
	});
});
