import type { DecisionSet } from "../decisions/decisions";
import type { ImageRecord, SimilarityGroup } from "../group";
import { log } from "../log";

export type Selection = {
	group: SimilarityGroup;
	/** The canonical keeper */
	keep: ImageRecord;
	delete: ImageRecord[];
	/** Extra images a reviewer marked keep; neither primary nor deleted */
	retained: ImageRecord[];
	/** Members the decision set did not name; they are in `delete` too */
	unnamed: ImageRecord[];
	source: "quality" | "decisions";
	/** Decisions existed but named no keeper, so quality ranking was used */
	fallback: boolean;
};

/** Highest composite score first; ties keep group order (stable sort). */
export async function rankByQuality(
	members: ReadonlyArray<ImageRecord>,
): Promise<ImageRecord[]> {
	const scored = await Promise.all(
		members.map(async (image) => ({
			image,
			score: (await image.quality()).score,
		})),
	);
	return scored.sort((a, b) => b.score - a.score).map((s) => s.image);
}

async function selectByQuality(
	group: SimilarityGroup,
	fallback: boolean,
): Promise<Selection> {
	const [keep, ...rest] = await rankByQuality(group.members);
	return {
		group,
		keep,
		delete: rest,
		retained: [],
		unnamed: [],
		source: "quality",
		fallback,
	};
}

/**
 * Picks the image to keep. Without decisions the best composite score wins.
 * With decisions the reviewer's choice wins unless they left the group
 * without any keeper, in which case quality ranking decides this group.
 */
export async function selectBest(
	group: SimilarityGroup,
	decisions?: DecisionSet,
): Promise<Selection> {
	if (group.members.length === 0) {
		throw new RangeError(`Group ${group.id} has no members`);
	}
	if (!decisions) return selectByQuality(group, false);

	const keeps: ImageRecord[] = [];
	const deletes: ImageRecord[] = [];
	const unnamed: ImageRecord[] = [];
	for (const image of group.members) {
		const action = decisions.actionFor(image.ref);
		if (action === "keep") {
			keeps.push(image);
		} else {
			deletes.push(image);
			if (action === undefined) unnamed.push(image);
		}
	}

	const [keep, ...retained] = keeps;
	if (!keep) {
		log.warn(
			`No 'keep' entry for group ${group.id} in the decisions; falling back to quality ranking`,
		);
		return selectByQuality(group, true);
	}

	if (unnamed.length) {
		log.warn(
			`Group ${group.id}: ${unnamed.length} image(s) missing from the decisions will be DELETED: ${unnamed
				.map((i) => i.name)
				.join(", ")}`,
		);
	}

	return {
		group,
		keep,
		delete: deletes,
		retained,
		unnamed,
		source: "decisions",
		fallback: false,
	};
}
