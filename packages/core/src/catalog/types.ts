// ============================================================================
// Schema Catalog Types
// ============================================================================

import { z } from "zod";
import { SEMANTIC_TYPES } from "../types";
import type { SemanticType } from "../types";

export const SemanticTypeSchema = z.enum(SEMANTIC_TYPES);

export const FieldSpecSchema = z.object({
	aliases: z.array(z.string().trim().min(1)).min(1),
	type: SemanticTypeSchema,
	required: z.boolean(),
	description: z.string().optional(),
});

export const SchemaCatalogSchema = z.object({
	domain: z.string().trim().min(1),
	description: z.string().optional(),
	fields: z.record(FieldSpecSchema).refine((fields) => Object.keys(fields).length > 0, {
		message: "Catalog must declare at least one field",
	}),
});

/** Catalog as accepted from configuration, before validation. */
export type SchemaCatalogInput = z.input<typeof SchemaCatalogSchema>;

/**
 * A standard field: accepted name aliases (case- and punctuation-insensitive),
 * the semantic type its data should have, and whether analysis needs it.
 */
export interface FieldSpec {
	readonly aliases: readonly string[];
	readonly type: SemanticType;
	readonly required: boolean;
	readonly description?: string;
}

/**
 * Per-domain table of standard fields. Field order is the order of `fields`
 * and is the order mapping results and mapped tables use.
 */
export interface SchemaCatalog {
	readonly domain: string;
	readonly description?: string;
	readonly fields: Readonly<Record<string, FieldSpec>>;
}
