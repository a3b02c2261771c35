import { z } from "zod";
import { MAPPING_ERROR_CODES, MappingConfigError } from "../errors";
import catalogData from "./catalogs.json";
import { SchemaCatalogSchema } from "./types";
import type { FieldSpec, SchemaCatalog } from "./types";

// ============================================================================
// Built-in Catalogs
// ============================================================================

export const BUILTIN_DOMAINS = ["ecommerce", "review", "sales"] as const;

export type BuiltinDomain = (typeof BUILTIN_DOMAINS)[number];

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

function freezeCatalog(catalog: z.output<typeof SchemaCatalogSchema>): SchemaCatalog {
	const fields: Record<string, FieldSpec> = {};
	for (const [name, spec] of Object.entries(catalog.fields)) {
		fields[name] = Object.freeze({ ...spec, aliases: Object.freeze([...spec.aliases]) });
	}
	return Object.freeze({ ...catalog, fields: Object.freeze(fields) });
}

const builtinResult = z.array(SchemaCatalogSchema).safeParse(catalogData);
if (!builtinResult.success) {
	throw new MappingConfigError(
		MAPPING_ERROR_CODES.INVALID_CATALOG,
		`Built-in catalogs are malformed: ${formatIssues(builtinResult.error)}`
	);
}

const catalogRegistry = new Map<string, SchemaCatalog>();

for (const catalog of builtinResult.data) {
	catalogRegistry.set(catalog.domain, freezeCatalog(catalog));
}

function requireBuiltin(domain: BuiltinDomain): SchemaCatalog {
	const catalog = catalogRegistry.get(domain);
	if (!catalog) {
		throw new MappingConfigError(
			MAPPING_ERROR_CODES.INVALID_CATALOG,
			`Built-in catalog '${domain}' is missing from catalogs.json`
		);
	}
	return catalog;
}

export const ecommerceCatalog = requireBuiltin("ecommerce");
export const reviewCatalog = requireBuiltin("review");
export const salesCatalog = requireBuiltin("sales");

// ============================================================================
// Catalog Registry
// ============================================================================

export function isBuiltinDomain(domain: string): domain is BuiltinDomain {
	return BUILTIN_DOMAINS.some((builtin) => builtin === domain);
}

/**
 * Get a catalog by domain name. Unknown domains fail fast with the list of
 * registered ones; there is no fallback domain.
 */
export function getCatalog(domain: string): SchemaCatalog {
	const catalog = catalogRegistry.get(domain);
	if (!catalog) {
		throw new MappingConfigError(
			MAPPING_ERROR_CODES.UNKNOWN_DOMAIN,
			`Unknown data domain: '${domain}'. Available domains: ${getCatalogDomains().join(", ")}`
		);
	}
	return catalog;
}

export function hasCatalog(domain: string): boolean {
	return catalogRegistry.has(domain);
}

/**
 * Validate and register a catalog from configuration (e.g. a parsed JSON
 * file). Built-in domains cannot be replaced.
 */
export function registerCatalog(input: unknown): SchemaCatalog {
	const result = SchemaCatalogSchema.safeParse(input);
	if (!result.success) {
		throw new MappingConfigError(
			MAPPING_ERROR_CODES.INVALID_CATALOG,
			`Invalid catalog: ${formatIssues(result.error)}`
		);
	}

	if (isBuiltinDomain(result.data.domain)) {
		throw new MappingConfigError(
			MAPPING_ERROR_CODES.INVALID_CATALOG,
			`Cannot replace built-in catalog '${result.data.domain}'`
		);
	}

	const catalog = freezeCatalog(result.data);
	catalogRegistry.set(catalog.domain, catalog);
	return catalog;
}

/**
 * Get all registered domain names, built-ins first.
 */
export function getCatalogDomains(): string[] {
	return Array.from(catalogRegistry.keys());
}

/** Names of the catalog's required fields, in catalog order. */
export function getRequiredFields(catalog: SchemaCatalog): string[] {
	return Object.entries(catalog.fields)
		.filter(([, spec]) => spec.required)
		.map(([name]) => name);
}
