import { parse } from "csv-parse/sync";
import { MAPPING_ERROR_CODES, MappingConfigError } from "../errors";
import type { Table } from "../types";
import { fromRows } from "./table";

export interface CsvOptions {
	/** Field delimiter. Default: ',' */
	delimiter?: string;
	/** Trim whitespace around unquoted fields. Default: true */
	trim?: boolean;
}

function isStringMatrix(value: unknown): value is string[][] {
	return (
		Array.isArray(value) &&
		value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
	);
}

/**
 * Parse CSV text into a table. The first record is the header row; empty
 * cells become null, every other cell stays a string so the profiler sees
 * what the user uploaded.
 */
export function fromCsv(text: string, options?: CsvOptions): Table {
	const records: unknown = parse(text, {
		bom: true,
		delimiter: options?.delimiter ?? ",",
		trim: options?.trim ?? true,
		skip_empty_lines: true,
		relax_column_count: true,
	});

	if (!isStringMatrix(records) || records.length === 0) {
		throw new MappingConfigError(MAPPING_ERROR_CODES.INVALID_TABLE, "CSV input has no header row");
	}

	const [headers, ...rows] = records;
	const cells = rows.map((row) => row.map((cell) => (cell === "" ? null : cell)));

	return fromRows(headers, cells);
}
