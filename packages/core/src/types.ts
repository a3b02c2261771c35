// ============================================================================
// Semantic Types
// ============================================================================

/**
 * Coarse semantic category inferred from a column's values, and declared by
 * each catalog field as the kind of data it expects.
 */
export type SemanticType = "id" | "date" | "numeric" | "rating" | "text";

export const SEMANTIC_TYPES = ["id", "date", "numeric", "rating", "text"] as const satisfies readonly SemanticType[];

/** Confidence per semantic type, 0-100. */
export type TypeScores = Record<SemanticType, number>;

// ============================================================================
// Table
// ============================================================================

/**
 * A raw cell. Uploads are heterogeneous: strings from CSV, numbers and Dates
 * from spreadsheets or JSON, nulls for blanks.
 */
export type CellValue = unknown;

export interface Column {
	readonly name: string;
	readonly values: readonly CellValue[];
}

/** Column-oriented table. All columns have the same length. */
export interface Table {
	readonly columns: readonly Column[];
}

// ============================================================================
// Column Profile
// ============================================================================

/**
 * Raw stored value kind.
 * - 'numeric': every non-null value is a number or bigint
 * - 'text': every non-null value is a string
 * - 'mixed': anything else
 * - 'empty': no non-null value
 */
export type StoredKind = "numeric" | "text" | "mixed" | "empty";

export interface NumericRange {
	min: number;
	max: number;
	mean: number;
}

export interface ColumnProfile {
	dtype: StoredKind;
	rowCount: number;
	/** Distinct non-null values / row count */
	uniqueRatio: number;
	/** Null cells / row count */
	missingRatio: number;
	isNumeric: boolean;
	isDate: boolean;
	isId: boolean;
	numericRange: NumericRange | null;
	/** Mean string length of the date sample; null for numeric or empty columns */
	avgTextLength: number | null;
	/** Number of values in the date/text sample */
	sampleSize: number;
}
