// ============================================================================
// String Similarity Functions for Column Names
// ============================================================================

/**
 * Normalize a column name or alias for comparison.
 * - Convert to lowercase
 * - Remove whitespace, underscores and hyphens
 *
 * "Customer_ID", "customer id" and "customer-id" all become "customerid".
 * Hangul and other scripts pass through unchanged.
 */
export function normalizeName(name: string): string {
	return name.toLowerCase().replace(/[\s_-]/g, "");
}

/**
 * Indel distance: the number of single-character insertions and deletions
 * turning one string into the other (Levenshtein with substitution cost 2).
 * Compares code points, so astral characters count once.
 * Time: O(n*m), Space: O(min(n,m))
 */
export function indelDistance(a: string, b: string): number {
	if (a === b) return 0;

	const charsA = Array.from(a);
	const charsB = Array.from(b);
	if (charsA.length === 0) return charsB.length;
	if (charsB.length === 0) return charsA.length;

	// Ensure shorter is the first string (optimize space)
	const shorter = charsA.length <= charsB.length ? charsA : charsB;
	const longer = charsA.length <= charsB.length ? charsB : charsA;

	const sLen = shorter.length;
	const lLen = longer.length;

	// Two rows instead of the full matrix
	let prevRow = new Array<number>(sLen + 1);
	let currRow = new Array<number>(sLen + 1);

	for (let i = 0; i <= sLen; i++) {
		prevRow[i] = i;
	}

	for (let j = 1; j <= lLen; j++) {
		currRow[0] = j;

		for (let i = 1; i <= sLen; i++) {
			const cost = shorter[i - 1] === longer[j - 1] ? 0 : 2;
			currRow[i] = Math.min(
				prevRow[i] + 1, // deletion
				currRow[i - 1] + 1, // insertion
				prevRow[i - 1] + cost // match, or delete + insert
			);
		}

		const temp = prevRow;
		prevRow = currRow;
		currRow = temp;
	}

	return prevRow[sLen];
}

/**
 * Similarity ratio on a 0-100 integer scale:
 * round(100 * (1 - indel / (len(a) + len(b)))).
 * 100 = identical, 0 = no character in common.
 */
export function ratio(a: string, b: string): number {
	if (a === b) return 100;

	const total = Array.from(a).length + Array.from(b).length;
	if (total === 0) return 100;

	return Math.round(100 * (1 - indelDistance(a, b) / total));
}

/**
 * Best ratio between a user column name and a list of aliases, both
 * normalized first. Returns the winning alias; the first alias wins ties.
 */
export function nameScore(
	userColumn: string,
	aliases: readonly string[]
): { score: number; alias: string | null } {
	const normalized = normalizeName(userColumn);
	let bestScore = 0;
	let bestAlias: string | null = null;

	for (const alias of aliases) {
		const score = ratio(normalized, normalizeName(alias));
		if (score > bestScore) {
			bestScore = score;
			bestAlias = alias;
			if (score === 100) break;
		}
	}

	return { score: bestScore, alias: bestAlias };
}
