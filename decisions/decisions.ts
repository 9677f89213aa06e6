import fs from "node:fs/promises";
import { z } from "zod";
import { DecisionFileError, errorMessage, isNotFound } from "../errors";
import { log } from "../log";
import type { Selection } from "../select/select";

/**
 * An image reference as written by us (a plain string) or as exported by the
 * review page (`{ path, size }`).
 */
const ReferenceSchema = z.union([
	z.string().min(1),
	z.object({ path: z.string().min(1), size: z.number().optional() }),
]);

const GroupSchema = z.object({
	keep: z.array(z.unknown()).default([]),
	delete: z.array(z.unknown()).default([]),
});

const DocumentSchema = z.record(z.string(), GroupSchema);

export type GroupDecision = {
	keep: string[];
	delete: string[];
};

/** On-disk shape, keyed by group id ("1", "2", ...). */
export type DecisionDocument = Record<string, GroupDecision>;

/**
 * Human-edited keep/delete choices. Lookups go by image reference, so a
 * reference must match exactly what the grouping pass emitted.
 */
export class DecisionSet {
	private readonly byRef = new Map<string, Decision>();

	constructor(readonly groups: ReadonlyMap<number, GroupDecision>) {
		for (const group of groups.values()) {
			for (const ref of group.delete) this.byRef.set(ref, "delete");
		}
		// keep wins over a conflicting delete anywhere in the document
		for (const [id, group] of groups) {
			for (const ref of group.keep) {
				if (this.byRef.get(ref) === "delete") {
					log.warn(
						`${ref} is marked both keep and delete (group ${id}); it will be kept`,
					);
				}
				this.byRef.set(ref, "keep");
			}
		}
	}

	actionFor(ref: string): Decision | undefined {
		return this.byRef.get(ref);
	}

	get size(): number {
		return this.byRef.size;
	}
}

function toReference(entry: unknown): string | null {
	const parsed = ReferenceSchema.safeParse(entry);
	if (!parsed.success) return null;
	return typeof parsed.data === "string" ? parsed.data : parsed.data.path;
}

function collectReferences(
	entries: unknown[],
	groupId: string,
	action: Decision,
): string[] {
	const refs: string[] = [];
	for (const entry of entries) {
		const ref = toReference(entry);
		if (ref === null) {
			log.warn(
				`Ignoring malformed ${action} entry in group ${groupId}: ${JSON.stringify(entry)}`,
			);
			continue;
		}
		refs.push(ref);
	}
	return refs;
}

export function parseDecisionDocument(
	input: unknown,
	source = "<decisions>",
): DecisionSet {
	const parsed = DocumentSchema.safeParse(input);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
		throw new DecisionFileError(
			source,
			`Invalid decisions document${where}: ${issue?.message ?? "unknown error"}`,
		);
	}

	const groups = new Map<number, GroupDecision>();
	for (const [key, value] of Object.entries(parsed.data)) {
		const id = Number(key);
		if (!Number.isInteger(id) || id < 1) {
			log.warn(`Ignoring decisions for unknown group id "${key}"`);
			continue;
		}
		groups.set(id, {
			keep: collectReferences(value.keep, key, "keep"),
			delete: collectReferences(value.delete, key, "delete"),
		});
	}
	return new DecisionSet(groups);
}

/** Reads a decision file. Any failure here is fatal for the run. */
export async function loadDecisions(file: string): Promise<DecisionSet> {
	let raw: string;
	try {
		raw = await fs.readFile(file, "utf-8");
	} catch (err) {
		if (isNotFound(err)) {
			throw new DecisionFileError(file, `Decisions file not found: ${file}`);
		}
		throw new DecisionFileError(
			file,
			`Could not read decisions file ${file}: ${errorMessage(err)}`,
		);
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		throw new DecisionFileError(
			file,
			`Invalid JSON in decisions file: ${errorMessage(err)}`,
		);
	}

	const decisions = parseDecisionDocument(json, file);
	log.info(`Loaded decisions for ${decisions.groups.size} groups`);
	log.warn("Using custom decisions instead of automatic quality ranking");
	return decisions;
}

/** The document a reviewer edits; fed back unchanged it reproduces the split. */
export function toDecisionDocument(
	selections: ReadonlyArray<Selection>,
): DecisionDocument {
	const doc: DecisionDocument = {};
	for (const s of selections) {
		doc[String(s.group.id)] = {
			keep: [s.keep, ...s.retained].map((r) => r.ref),
			delete: s.delete.map((r) => r.ref),
		};
	}
	return doc;
}

export async function saveDecisions(
	file: string,
	doc: DecisionDocument,
): Promise<void> {
	await fs.writeFile(file, `${JSON.stringify(doc, null, 2)}\n`);
}
