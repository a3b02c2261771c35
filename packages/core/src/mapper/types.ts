// ============================================================================
// Column Mapping Types
// ============================================================================

import type { Table } from "../types";

/**
 * Bucketed confidence for UI and consumers.
 * - 'high': score >= 80
 * - 'medium': score >= 65
 * - 'low': anything below
 */
export type ConfidenceLevel = "high" | "medium" | "low";

/**
 * How a mapping was produced.
 * - 'hybrid': name similarity combined with data-type scores
 * - 'name': name similarity only, no data read
 * - 'manual': at least one entry was set by the user
 */
export type MappingMethod = "hybrid" | "name" | "manual";

/**
 * A user column that cleared the threshold for a field but was not selected.
 */
export interface MappingAlternative {
	userColumn: string;
	/** Combined score, rounded to one decimal */
	score: number;
	nameScore: number;
	/** Type score for the field's semantic type; null for name-only mapping */
	dataScore: number | null;
	/** Field this column was assigned to instead, if any */
	assignedTo: string | null;
}

/**
 * The winning user column for one standard field.
 */
export interface MappingEntry {
	field: string;
	userColumn: string;
	/** Combined score (0-100), rounded to one decimal */
	score: number;
	nameScore: number;
	dataScore: number | null;
	level: ConfidenceLevel;
	/** Losing candidates scoring at or below the winner, best first */
	alternatives: MappingAlternative[];
	/** Higher-scoring candidates claimed by another field, best first */
	displaced: MappingAlternative[];
}

/**
 * Result of mapping user columns onto a schema catalog.
 */
export interface MappingResult {
	domain: string;
	method: MappingMethod;
	/** Every user column name, in table order */
	columns: string[];
	/** One entry per mapped field, in catalog field order */
	entries: MappingEntry[];
	/** Catalog fields without a winning column, in catalog order */
	unmappedFields: string[];
	/** User columns not selected for any field, in table order */
	unmappedColumns: string[];
	/** Non-fatal notices, e.g. very wide tables */
	warnings: string[];
}

/**
 * Required-field check. Not an exception: callers decide whether to ask the
 * user, block the analysis, or carry on.
 */
export interface MappingValidation {
	isValid: boolean;
	messages: string[];
	missingFields: string[];
}

/**
 * Options for the mapping process.
 */
export interface MappingOptions {
	/** Weight of the name similarity score. Default: 0.6 */
	nameWeight?: number;
	/** Weight of the data-type score. Default: 0.4 */
	dataWeight?: number;
	/** Minimum combined score for a candidate. Default: 50 */
	minScore?: number;
	/** Column count above which a performance warning is issued. Default: 200 */
	maxColumns?: number;
	/** Non-null values sampled per column for date detection. Default: 10 */
	sampleSize?: number;
	/** Fraction of the sample that must parse as dates. Default: 0.7 */
	dateThreshold?: number;
}

/**
 * Best catalog field for a single column name.
 */
export interface NameMatch {
	/** Matched standard field, or null below the threshold */
	field: string | null;
	/** Similarity (0-100); 0 when no match */
	score: number;
	/** Alias that produced the score */
	alias: string | null;
}

/**
 * Internal scoring result for a (field, user column) pair.
 */
export interface Candidate {
	field: string;
	fieldIndex: number;
	userColumn: string;
	columnIndex: number;
	score: number;
	nameScore: number;
	dataScore: number | null;
}

export interface MapAndApplyResult {
	mapping: MappingResult;
	validation: MappingValidation;
	mappedTable: Table;
}
