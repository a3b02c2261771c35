// @schemap/core - column profiling, type scoring and schema auto-mapping

// Table exports
export {
	createTable,
	fromRows,
	fromRecords,
	fromCsv,
	rowCount,
	columnNames,
	getColumn,
	toRecords,
} from "./table";
export type { CsvOptions } from "./table";

// Profiler exports
export {
	profileColumn,
	scoreColumn,
	topType,
	isMissing,
	toNumber,
	isDateLike,
	parseDateString,
	DATE_FORMATS,
	ID_UNIQUE_RATIO_THRESHOLD,
	DEFAULT_DATE_SAMPLE_SIZE,
	DEFAULT_DATE_PARSE_THRESHOLD,
} from "./profiler";
export type { ProfileOptions } from "./profiler";

// Catalog exports
export {
	BUILTIN_DOMAINS,
	ecommerceCatalog,
	reviewCatalog,
	salesCatalog,
	isBuiltinDomain,
	getCatalog,
	hasCatalog,
	registerCatalog,
	getCatalogDomains,
	getRequiredFields,
	SchemaCatalogSchema,
} from "./catalog";
export type { BuiltinDomain, FieldSpec, SchemaCatalog, SchemaCatalogInput } from "./catalog";

// Mapper exports
export {
	mapColumns,
	mapColumnsByName,
	validateMapping,
	getMissingFields,
	applyMapping,
	mapAndApply,
	mapWithDomain,
	shouldAutoApply,
	updateMapping,
	summarizeMapping,
	confidenceLevel,
	bestMatch,
	normalizeName,
	indelDistance,
	ratio,
	nameScore,
	DEFAULT_NAME_WEIGHT,
	DEFAULT_DATA_WEIGHT,
	DEFAULT_MAX_COLUMNS,
	DEFAULT_MIN_SCORE,
} from "./mapper";
export type {
	ConfidenceLevel,
	MapAndApplyResult,
	MappingAlternative,
	MappingEntry,
	MappingMethod,
	MappingOptions,
	MappingResult,
	MappingValidation,
	NameMatch,
} from "./mapper";

// Errors & logging
export { MappingConfigError, MAPPING_ERROR_CODES, isMappingConfigError } from "./errors";
export type { MappingErrorCode } from "./errors";
export { Logger } from "./logger";
export type { LogLevel, LoggerInterface } from "./logger";

// Type exports
export * from "./types";
