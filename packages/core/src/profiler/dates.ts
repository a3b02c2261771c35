// ============================================================================
// Calendar Date Detection
// ============================================================================

import { isValid, parse, parseISO } from "date-fns";

/**
 * Formats tried in order. Covers ISO-like, slash and dot separated dates,
 * compact yyyyMMdd, US month-first (with the "12/1/2010 8:26" timestamps
 * retail exports use), European day-first, Korean and month-name forms.
 */
export const DATE_FORMATS: readonly string[] = [
	"yyyy-MM-dd",
	"yyyy-MM-dd HH:mm",
	"yyyy-MM-dd HH:mm:ss",
	"yyyy/MM/dd",
	"yyyy/MM/dd HH:mm:ss",
	"yyyy.MM.dd",
	"yyyy. M. d.",
	"yyyyMMdd",
	"M/d/yyyy",
	"M/d/yyyy H:mm",
	"M/d/yyyy H:mm:ss",
	"dd.MM.yyyy",
	"yyyy년 M월 d일",
	"d MMM yyyy",
	"MMM d, yyyy",
	"MMMM d, yyyy",
];

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;
const MIN_LENGTH = 6;
const MAX_LENGTH = 40;

const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T/;

// Only fills fields a format leaves out; fixed so parsing is deterministic
const REFERENCE_DATE = new Date(2000, 0, 1);

function inYearRange(date: Date): boolean {
	const year = date.getFullYear();
	return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Parse a string as a calendar date. Returns null when no known format
 * matches the whole string or the year is outside 1900-2100.
 */
export function parseDateString(value: string): Date | null {
	const text = value.trim();
	if (text.length < MIN_LENGTH || text.length > MAX_LENGTH) {
		return null;
	}

	if (ISO_DATETIME.test(text)) {
		const iso = parseISO(text);
		return isValid(iso) && inYearRange(iso) ? iso : null;
	}

	for (const format of DATE_FORMATS) {
		const parsed = parse(text, format, REFERENCE_DATE);
		if (isValid(parsed)) {
			return inYearRange(parsed) ? parsed : null;
		}
	}

	return null;
}

/**
 * Whether a raw cell holds a calendar date: a valid Date instance, or a
 * string in one of the known formats. Numbers are never dates.
 */
export function isDateLike(value: unknown): boolean {
	if (value instanceof Date) {
		return isValid(value) && inYearRange(value);
	}
	if (typeof value === "string") {
		return parseDateString(value) !== null;
	}
	return false;
}
