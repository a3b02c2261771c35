// Column Profiler & Type Scorer - value-based type inference

export {
	profileColumn,
	isMissing,
	toNumber,
	safeString,
	ID_UNIQUE_RATIO_THRESHOLD,
	DEFAULT_DATE_SAMPLE_SIZE,
	DEFAULT_DATE_PARSE_THRESHOLD,
} from "./profiler";
export type { ProfileOptions } from "./profiler";
export { scoreColumn, topType } from "./scorer";
export { isDateLike, parseDateString, DATE_FORMATS } from "./dates";
