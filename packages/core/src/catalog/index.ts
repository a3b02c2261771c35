// Schema Catalogs - standard fields per data domain

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
} from "./registry";
export type { BuiltinDomain } from "./registry";

export { SchemaCatalogSchema, FieldSpecSchema, SemanticTypeSchema } from "./types";
export type { FieldSpec, SchemaCatalog, SchemaCatalogInput } from "./types";
