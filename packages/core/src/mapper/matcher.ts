import type { SchemaCatalog } from "../catalog";
import { nameScore } from "./similarity";
import type { NameMatch } from "./types";

export const DEFAULT_MIN_SCORE = 50;

/**
 * Find the catalog field whose aliases best match a column name. Looks at
 * names only, so it works for datasets whose values can't be read.
 *
 * @param userColumn - Column name as uploaded
 * @param catalog - Target schema catalog
 * @param minScore - Scores below this report no match. Default: 50
 * @returns The best field (first in catalog order on ties) or a null match
 */
export function bestMatch(userColumn: string, catalog: SchemaCatalog, minScore = DEFAULT_MIN_SCORE): NameMatch {
	let best: NameMatch = { field: null, score: 0, alias: null };

	for (const [field, spec] of Object.entries(catalog.fields)) {
		const { score, alias } = nameScore(userColumn, spec.aliases);
		if (score > best.score) {
			best = { field, score, alias };
		}
	}

	if (best.score < minScore) {
		return { field: null, score: 0, alias: null };
	}
	return best;
}
