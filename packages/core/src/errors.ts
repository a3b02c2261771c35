// ============================================================================
// Error Codes
// ============================================================================

export const MAPPING_ERROR_CODES = {
	UNKNOWN_DOMAIN: "UNKNOWN_DOMAIN",
	INVALID_CATALOG: "INVALID_CATALOG",
	INVALID_OPTIONS: "INVALID_OPTIONS",
	INVALID_TABLE: "INVALID_TABLE",
} as const;

export type MappingErrorCode = (typeof MAPPING_ERROR_CODES)[keyof typeof MAPPING_ERROR_CODES];

/**
 * Programmer-facing configuration error: unknown domain, malformed catalog,
 * bad options or a malformed table. Data-quality problems never throw; they
 * come back as validation results.
 */
export class MappingConfigError extends Error {
	readonly code: MappingErrorCode;

	constructor(code: MappingErrorCode, message: string) {
		super(message);
		this.name = "MappingConfigError";
		this.code = code;
	}
}

export function isMappingConfigError(error: unknown): error is MappingConfigError {
	return error instanceof MappingConfigError;
}
