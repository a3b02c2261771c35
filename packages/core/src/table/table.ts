// ============================================================================
// Table Construction & Access
// ============================================================================

import { MAPPING_ERROR_CODES, MappingConfigError } from "../errors";
import type { CellValue, Column, Table } from "../types";

function assertUniqueNames(names: readonly string[]): void {
	const seen = new Set<string>();
	for (const name of names) {
		if (seen.has(name)) {
			throw new MappingConfigError(
				MAPPING_ERROR_CODES.INVALID_TABLE,
				`Duplicate column name '${name}'`
			);
		}
		seen.add(name);
	}
}

function assertRectangular(columns: readonly Column[]): void {
	if (columns.length === 0) return;

	const expected = columns[0].values.length;
	for (const column of columns) {
		if (column.values.length !== expected) {
			throw new MappingConfigError(
				MAPPING_ERROR_CODES.INVALID_TABLE,
				`Column '${column.name}' has ${column.values.length} values, expected ${expected}`
			);
		}
	}
}

/**
 * Build a table from a column dictionary. Key order is column order.
 * Values are copied, so later changes to the input arrays don't leak in.
 */
export function createTable(columns: Record<string, readonly CellValue[]>): Table {
	const built: Column[] = Object.entries(columns).map(([name, values]) => ({
		name,
		values: values.slice(),
	}));

	assertRectangular(built);
	return { columns: built };
}

/**
 * Build a table from a header row and data rows, the shape CSV parsers
 * return. Short rows are padded with null, extra cells are ignored.
 */
export function fromRows(headers: readonly string[], rows: readonly (readonly CellValue[])[]): Table {
	assertUniqueNames(headers);

	const columns: Column[] = headers.map((name, colIndex) => {
		const values = new Array<CellValue>(rows.length);
		for (let r = 0; r < rows.length; r++) {
			const row = rows[r];
			values[r] = colIndex < row.length ? row[colIndex] : null;
		}
		return { name, values };
	});

	return { columns };
}

/**
 * Build a table from row objects. Columns are the union of keys in
 * first-seen order; absent keys become null.
 */
export function fromRecords(records: readonly Record<string, CellValue>[]): Table {
	const names: string[] = [];
	const known = new Set<string>();

	for (const record of records) {
		for (const key of Object.keys(record)) {
			if (!known.has(key)) {
				known.add(key);
				names.push(key);
			}
		}
	}

	const columns: Column[] = names.map((name) => ({
		name,
		values: records.map((record) => (Object.hasOwn(record, name) ? record[name] : null)),
	}));

	return { columns };
}

export function rowCount(table: Table): number {
	return table.columns.length === 0 ? 0 : table.columns[0].values.length;
}

export function columnNames(table: Table): string[] {
	return table.columns.map((c) => c.name);
}

export function getColumn(table: Table, name: string): Column | undefined {
	return table.columns.find((c) => c.name === name);
}

/**
 * Convert back to row objects, e.g. to hand a mapped table to a consumer
 * that works row by row.
 */
export function toRecords(table: Table): Record<string, CellValue>[] {
	const count = rowCount(table);
	const records: Record<string, CellValue>[] = [];

	for (let r = 0; r < count; r++) {
		const record: Record<string, CellValue> = {};
		for (const column of table.columns) {
			record[column.name] = column.values[r];
		}
		records.push(record);
	}

	return records;
}
