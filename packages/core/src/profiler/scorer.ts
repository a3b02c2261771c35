// ============================================================================
// Type Scorer
// ============================================================================

import type { ColumnProfile, SemanticType, TypeScores } from "../types";

// Score scale
const SCORE_HIGH = 90;
const SCORE_MEDIUM_HIGH = 80;
const SCORE_MEDIUM = 70;
const SCORE_MEDIUM_LOW = 60;
const SCORE_LOW = 30;

// Rating scale bounds
const RATING_MIN = 0;
const RATING_MAX = 10;

// Average text length tiers
const TEXT_LENGTH_LONG = 50;
const TEXT_LENGTH_MEDIUM = 20;

// Weight of unique ratio for columns below the ID threshold
const NUMERIC_ID_WEIGHT = 50;
const TEXT_ID_WEIGHT = 30;

function textScore(avgTextLength: number | null): number {
	if (avgTextLength === null) return 0;
	if (avgTextLength >= TEXT_LENGTH_LONG) return SCORE_MEDIUM_HIGH;
	if (avgTextLength >= TEXT_LENGTH_MEDIUM) return SCORE_MEDIUM_LOW;
	return SCORE_LOW;
}

/**
 * Convert a column profile into a confidence per semantic type.
 *
 * Priority:
 * 1. Date wins outright. A unique date column keeps a small ID score for
 *    date-shaped order numbers; everything else is 0.
 * 2. Numeric columns score numeric, plus rating when the values sit on a
 *    0-10 scale, plus ID by uniqueness.
 * 3. Everything else scores ID by uniqueness (lower than numeric IDs) and
 *    text by average length.
 */
export function scoreColumn(profile: ColumnProfile): TypeScores {
	if (profile.isDate) {
		return {
			id: profile.isId ? SCORE_LOW : 0,
			date: SCORE_HIGH,
			numeric: 0,
			rating: 0,
			text: 0,
		};
	}

	if (profile.isNumeric) {
		const range = profile.numericRange;
		const onRatingScale = range !== null && range.min >= RATING_MIN && range.max <= RATING_MAX;

		return {
			id: profile.isId ? SCORE_MEDIUM_HIGH : Math.floor(profile.uniqueRatio * NUMERIC_ID_WEIGHT),
			date: 0,
			numeric: SCORE_MEDIUM_HIGH,
			rating: onRatingScale ? SCORE_MEDIUM : 0,
			text: 0,
		};
	}

	return {
		id: profile.isId ? SCORE_MEDIUM : Math.floor(profile.uniqueRatio * TEXT_ID_WEIGHT),
		date: 0,
		numeric: 0,
		rating: 0,
		text: textScore(profile.avgTextLength),
	};
}

// Tie order when two types score the same
const TYPE_PRIORITY: readonly SemanticType[] = ["date", "id", "numeric", "rating", "text"];

/**
 * Highest-scoring type, or null when every score is 0.
 */
export function topType(scores: TypeScores): SemanticType | null {
	let best: SemanticType | null = null;
	let bestScore = 0;

	for (const type of TYPE_PRIORITY) {
		if (scores[type] > bestScore) {
			best = type;
			bestScore = scores[type];
		}
	}

	return best;
}
