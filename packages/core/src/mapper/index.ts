// Column Mapper - hybrid name + data matching onto schema catalogs

// Main functions
export {
	mapColumns,
	mapColumnsByName,
	resolveCandidates,
	confidenceLevel,
	combineScores,
	roundScore,
	DEFAULT_NAME_WEIGHT,
	DEFAULT_DATA_WEIGHT,
	DEFAULT_MAX_COLUMNS,
	HIGH_CONFIDENCE,
} from "./resolver";
export {
	validateMapping,
	getMissingFields,
	applyMapping,
	mapAndApply,
	mapWithDomain,
	shouldAutoApply,
	updateMapping,
	summarizeMapping,
} from "./mapper";

// Name matching (usable without any data)
export { bestMatch, DEFAULT_MIN_SCORE } from "./matcher";
export { normalizeName, indelDistance, ratio, nameScore } from "./similarity";

// Types
export type {
	Candidate,
	ConfidenceLevel,
	MapAndApplyResult,
	MappingAlternative,
	MappingEntry,
	MappingMethod,
	MappingOptions,
	MappingResult,
	MappingValidation,
	NameMatch,
} from "./types";
