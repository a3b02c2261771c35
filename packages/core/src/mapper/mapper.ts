// ============================================================================
// Mapping Validation, Application & Correction
// ============================================================================

import { getCatalog, getRequiredFields } from "../catalog";
import type { SchemaCatalog } from "../catalog";
import { MAPPING_ERROR_CODES, MappingConfigError } from "../errors";
import { Logger } from "../logger";
import { getColumn } from "../table";
import type { Column, Table } from "../types";
import { HIGH_CONFIDENCE, mapColumns } from "./resolver";
import type {
	MapAndApplyResult,
	MappingAlternative,
	MappingEntry,
	MappingOptions,
	MappingResult,
	MappingValidation,
} from "./types";

/**
 * Required catalog fields that have no entry in the mapping, in catalog order.
 */
export function getMissingFields(result: MappingResult, catalog: SchemaCatalog): string[] {
	const mapped = new Set(result.entries.map((e) => e.field));
	return getRequiredFields(catalog).filter((field) => !mapped.has(field));
}

/**
 * Check that every required field was mapped. One message per missing field.
 */
export function validateMapping(result: MappingResult, catalog: SchemaCatalog): MappingValidation {
	const missingFields = getMissingFields(result, catalog);

	return {
		isValid: missingFields.length === 0,
		messages: missingFields.map((field) => `Required field '${field}' is not mapped.`),
		missingFields,
	};
}

/**
 * Build a new table holding only the mapped columns, renamed to their
 * standard field names, in catalog order. Values and row count are
 * unchanged; the source table is left untouched.
 *
 * @throws MappingConfigError when a mapped column is not in the table
 */
export function applyMapping(table: Table, result: MappingResult): Table {
	const columns: Column[] = result.entries.map((entry) => {
		const source = getColumn(table, entry.userColumn);
		if (!source) {
			throw new MappingConfigError(
				MAPPING_ERROR_CODES.INVALID_TABLE,
				`Mapped column '${entry.userColumn}' not found in table`
			);
		}
		return { name: entry.field, values: source.values.slice() };
	});

	Logger.info(`Applied mapping: ${columns.length} columns renamed`);
	return { columns };
}

/**
 * Map, validate and apply in one step.
 */
export function mapAndApply(table: Table, catalog: SchemaCatalog, options?: MappingOptions): MapAndApplyResult {
	const mapping = mapColumns(table, catalog, options);
	const validation = validateMapping(mapping, catalog);
	const mappedTable = applyMapping(table, mapping);

	return { mapping, validation, mappedTable };
}

/**
 * Map against a built-in or registered domain by name.
 *
 * @throws MappingConfigError for an unknown domain
 */
export function mapWithDomain(table: Table, domain: string, options?: MappingOptions): MappingResult {
	return mapColumns(table, getCatalog(domain), options);
}

/**
 * Whether a mapping can be applied without asking the user: it validates
 * and every entry scores at least `threshold`.
 */
export function shouldAutoApply(
	result: MappingResult,
	validation: MappingValidation,
	threshold = HIGH_CONFIDENCE
): boolean {
	if (!validation.isValid) {
		return false;
	}
	return result.entries.every((entry) => entry.score >= threshold);
}

/**
 * Set a field's column by hand (user correction). Assigning a column that
 * another field uses unassigns that field; `null` unmaps the field.
 * User choices are treated as certain.
 *
 * @returns Updated mapping; the input is not modified
 * @throws MappingConfigError for a field or column the mapping doesn't know
 */
export function updateMapping(
	result: MappingResult,
	field: string,
	userColumn: string | null,
	catalog: SchemaCatalog
): MappingResult {
	if (!Object.hasOwn(catalog.fields, field)) {
		throw new MappingConfigError(
			MAPPING_ERROR_CODES.INVALID_OPTIONS,
			`Unknown field '${field}' for domain '${catalog.domain}'`
		);
	}
	if (userColumn !== null && !result.columns.includes(userColumn)) {
		throw new MappingConfigError(MAPPING_ERROR_CODES.INVALID_OPTIONS, `Unknown column '${userColumn}'`);
	}

	const kept = result.entries.filter((e) => e.field !== field && e.userColumn !== userColumn);

	if (userColumn !== null) {
		const previous = result.entries.find((e) => e.field === field);
		kept.push({
			field,
			userColumn,
			score: 100,
			nameScore: 100,
			dataScore: null,
			level: "high",
			alternatives: previous ? previous.alternatives.filter((a) => a.userColumn !== userColumn) : [],
			displaced: [],
		});
	}

	const order = Object.keys(catalog.fields);
	kept.sort((a, b) => order.indexOf(a.field) - order.indexOf(b.field));

	// assignedTo follows the updated owners
	const owners = new Map(kept.map((e): [string, string] => [e.userColumn, e.field]));
	const reassign = (alternatives: readonly MappingAlternative[]): MappingAlternative[] =>
		alternatives.map((a) => ({ ...a, assignedTo: owners.get(a.userColumn) ?? null }));

	const entries: MappingEntry[] = kept.map((e) => ({
		...e,
		alternatives: reassign(e.alternatives),
		displaced: reassign(e.displaced),
	}));
	const used = new Set(entries.map((e) => e.userColumn));
	const mapped = new Set(entries.map((e) => e.field));

	return {
		...result,
		method: "manual",
		entries,
		unmappedFields: order.filter((f) => !mapped.has(f)),
		unmappedColumns: result.columns.filter((c) => !used.has(c)),
		warnings: [...result.warnings],
	};
}

/**
 * Human-readable summary of a mapping, one line per mapped field.
 */
export function summarizeMapping(result: MappingResult, catalog: SchemaCatalog): string {
	const lines: string[] = [
		`Data domain: ${result.domain}`,
		`Mapped fields: ${result.entries.length}/${Object.keys(catalog.fields).length}`,
		"",
	];

	for (const entry of result.entries) {
		lines.push(`  ${entry.field} <- ${entry.userColumn} (confidence: ${entry.score}%, ${entry.level})`);
	}

	const missing = getMissingFields(result, catalog);
	if (missing.length > 0) {
		lines.push("");
		lines.push(`[WARNING] Unmapped required fields: ${missing.join(", ")}`);
	}

	return lines.join("\n");
}
