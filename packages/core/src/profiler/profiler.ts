// ============================================================================
// Column Profiler
// ============================================================================

import { Logger } from "../logger";
import type { CellValue, ColumnProfile, NumericRange, StoredKind } from "../types";
import { isDateLike } from "./dates";

// Default thresholds
export const ID_UNIQUE_RATIO_THRESHOLD = 0.9;
export const DEFAULT_DATE_SAMPLE_SIZE = 10;
export const DEFAULT_DATE_PARSE_THRESHOLD = 0.7;

const NUMERIC_STRING = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface ProfileOptions {
	/** Non-null values sampled for date detection and text length. Default: 10 */
	sampleSize?: number;
	/** Fraction of the sample that must parse as dates. Default: 0.7 */
	dateThreshold?: number;
	/** Column name, used only in debug logs */
	name?: string;
}

/**
 * Whether a cell counts as missing: null, undefined, NaN, an invalid Date,
 * or a string that is empty after trimming.
 */
export function isMissing(value: CellValue): boolean {
	if (value === null || value === undefined) return true;
	if (typeof value === "number") return Number.isNaN(value);
	if (typeof value === "string") return value.trim() === "";
	if (value instanceof Date) return Number.isNaN(value.getTime());
	return false;
}

/**
 * Numeric view of a cell, or null when it isn't numeric. Numeric strings
 * count, the way a CSV column of digits is numeric after upload.
 */
export function toNumber(value: CellValue): number | null {
	if (typeof value === "number") {
		return Number.isNaN(value) ? null : value;
	}
	if (typeof value === "bigint") {
		return Number(value);
	}
	if (typeof value === "string") {
		const text = value.trim();
		return NUMERIC_STRING.test(text) ? Number(text) : null;
	}
	return null;
}

/** String form of a cell; objects whose conversion throws become "". */
export function safeString(value: CellValue): string {
	if (typeof value === "string") return value;
	try {
		return String(value);
	} catch {
		return "";
	}
}

function distinctKey(value: CellValue): unknown {
	return value instanceof Date ? `date:${value.getTime()}` : value;
}

function storedKind(values: readonly CellValue[]): StoredKind {
	if (values.length === 0) return "empty";

	let numbers = 0;
	let strings = 0;
	for (const value of values) {
		if (typeof value === "number" || typeof value === "bigint") numbers++;
		else if (typeof value === "string") strings++;
	}

	if (numbers === values.length) return "numeric";
	if (strings === values.length) return "text";
	return "mixed";
}

function numericRangeOf(values: readonly CellValue[]): NumericRange | null {
	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	let sum = 0;
	let count = 0;

	for (const value of values) {
		const n = toNumber(value);
		if (n === null) return null;
		if (n < min) min = n;
		if (n > max) max = n;
		sum += n;
		count++;
	}

	return count === 0 ? null : { min, max, mean: sum / count };
}

/**
 * Profile a single column's raw values.
 *
 * Unique and missing ratios cover the whole column. Date detection only
 * parses the first `sampleSize` non-null values, and the same sample feeds
 * the average text length.
 *
 * Degenerate columns (no rows, all null, exotic values) get null/false
 * defaults.
 */
export function profileColumn(values: readonly CellValue[], options?: ProfileOptions): ColumnProfile {
	const sampleSize = options?.sampleSize ?? DEFAULT_DATE_SAMPLE_SIZE;
	const dateThreshold = options?.dateThreshold ?? DEFAULT_DATE_PARSE_THRESHOLD;

	const rowCount = values.length;
	const present: CellValue[] = [];
	const distinct = new Set<unknown>();

	for (const value of values) {
		if (isMissing(value)) continue;
		present.push(value);
		distinct.add(distinctKey(value));
	}

	const uniqueRatio = rowCount > 0 ? distinct.size / rowCount : 0;
	const missingRatio = rowCount > 0 ? (rowCount - present.length) / rowCount : 0;

	const numericRange = numericRangeOf(present);
	const isNumeric = numericRange !== null;

	let isDate = false;
	let avgTextLength: number | null = null;
	let sample: CellValue[] = [];

	if (!isNumeric) {
		sample = present.slice(0, sampleSize);

		if (sample.length > 0) {
			const dates = sample.filter(isDateLike).length;
			isDate = dates / sample.length >= dateThreshold;
			if (isDate) {
				Logger.debug(`Column '${options?.name ?? "?"}' detected as date (${dates}/${sample.length} valid)`);
			}

			let totalLength = 0;
			for (const value of sample) {
				totalLength += Array.from(safeString(value)).length;
			}
			avgTextLength = totalLength / sample.length;
		}
	}

	return {
		dtype: storedKind(present),
		rowCount,
		uniqueRatio,
		missingRatio,
		isNumeric,
		isDate,
		isId: uniqueRatio >= ID_UNIQUE_RATIO_THRESHOLD,
		numericRange,
		avgTextLength,
		sampleSize: sample.length,
	};
}
