// ============================================================================
// Hybrid Resolver
// ============================================================================

import type { SchemaCatalog } from "../catalog";
import { MAPPING_ERROR_CODES, MappingConfigError } from "../errors";
import { Logger } from "../logger";
import { DEFAULT_DATE_PARSE_THRESHOLD, DEFAULT_DATE_SAMPLE_SIZE, profileColumn, scoreColumn } from "../profiler";
import type { Table, TypeScores } from "../types";
import { DEFAULT_MIN_SCORE } from "./matcher";
import { nameScore } from "./similarity";
import type {
	Candidate,
	ConfidenceLevel,
	MappingAlternative,
	MappingEntry,
	MappingMethod,
	MappingOptions,
	MappingResult,
} from "./types";

// Default weights and limits
export const DEFAULT_NAME_WEIGHT = 0.6;
export const DEFAULT_DATA_WEIGHT = 0.4;
export const DEFAULT_MAX_COLUMNS = 200;

export const HIGH_CONFIDENCE = 80;
const MEDIUM_CONFIDENCE = 65;

type ResolvedOptions = Required<MappingOptions>;

function assertOption(ok: boolean, message: string): void {
	if (!ok) {
		throw new MappingConfigError(MAPPING_ERROR_CODES.INVALID_OPTIONS, message);
	}
}

function resolveOptions(options?: MappingOptions): ResolvedOptions {
	const resolved: ResolvedOptions = {
		nameWeight: options?.nameWeight ?? DEFAULT_NAME_WEIGHT,
		dataWeight: options?.dataWeight ?? DEFAULT_DATA_WEIGHT,
		minScore: options?.minScore ?? DEFAULT_MIN_SCORE,
		maxColumns: options?.maxColumns ?? DEFAULT_MAX_COLUMNS,
		sampleSize: options?.sampleSize ?? DEFAULT_DATE_SAMPLE_SIZE,
		dateThreshold: options?.dateThreshold ?? DEFAULT_DATE_PARSE_THRESHOLD,
	};

	const { nameWeight, dataWeight, minScore, maxColumns, sampleSize, dateThreshold } = resolved;

	assertOption(Number.isFinite(nameWeight) && nameWeight >= 0, `nameWeight must be a non-negative number, got ${nameWeight}`);
	assertOption(Number.isFinite(dataWeight) && dataWeight >= 0, `dataWeight must be a non-negative number, got ${dataWeight}`);
	assertOption(nameWeight + dataWeight > 0, "nameWeight and dataWeight cannot both be 0");
	assertOption(Number.isFinite(minScore) && minScore >= 0 && minScore <= 100, `minScore must be within 0-100, got ${minScore}`);
	assertOption(Number.isInteger(maxColumns) && maxColumns > 0, `maxColumns must be a positive integer, got ${maxColumns}`);
	assertOption(Number.isInteger(sampleSize) && sampleSize > 0, `sampleSize must be a positive integer, got ${sampleSize}`);
	assertOption(
		Number.isFinite(dateThreshold) && dateThreshold >= 0 && dateThreshold <= 1,
		`dateThreshold must be within 0-1, got ${dateThreshold}`
	);

	return resolved;
}

/** Round a score to one decimal. */
export function roundScore(score: number): number {
	return Math.round(score * 10) / 10;
}

/**
 * Bucket a final score for display: >= 80 high, >= 65 medium, else low.
 */
export function confidenceLevel(score: number): ConfidenceLevel {
	if (score >= HIGH_CONFIDENCE) return "high";
	if (score >= MEDIUM_CONFIDENCE) return "medium";
	return "low";
}

/**
 * Combined score for one (field, column) pair, rounded to one decimal.
 */
export function combineScores(nameSimilarity: number, dataScore: number, nameWeight: number, dataWeight: number): number {
	return roundScore(nameSimilarity * nameWeight + dataScore * dataWeight);
}

// Score desc, then name score desc, then catalog order, then table order
function compareCandidates(a: Candidate, b: Candidate): number {
	if (b.score !== a.score) return b.score - a.score;
	if (b.nameScore !== a.nameScore) return b.nameScore - a.nameScore;
	if (a.fieldIndex !== b.fieldIndex) return a.fieldIndex - b.fieldIndex;
	return a.columnIndex - b.columnIndex;
}

function toAlternative(candidate: Candidate, owners: ReadonlyMap<number, string>): MappingAlternative {
	return {
		userColumn: candidate.userColumn,
		score: candidate.score,
		nameScore: candidate.nameScore,
		dataScore: candidate.dataScore,
		assignedTo: owners.get(candidate.columnIndex) ?? null,
	};
}

// Scores are kept in tenths so totals compare exactly
const toTenths = (score: number): number => Math.round(score * 10);

/**
 * Best one-to-one assignment of columns to fields: most fields filled, then
 * highest total score. Branch and bound over fields in catalog order, each
 * trying its candidates best first and then no column, so among equal
 * assignments the one reached first (earlier fields on better-ranked
 * columns) is kept.
 */
function assignColumns(byField: readonly (readonly Candidate[])[]): Map<number, Candidate> {
	const fieldCount = byField.length;

	// Upper bounds for what the fields from index i onward can still add
	const countLeft = new Array<number>(fieldCount + 1).fill(0);
	const tenthsLeft = new Array<number>(fieldCount + 1).fill(0);
	for (let i = fieldCount - 1; i >= 0; i--) {
		const top = byField[i][0];
		countLeft[i] = countLeft[i + 1] + (top ? 1 : 0);
		tenthsLeft[i] = tenthsLeft[i + 1] + (top ? toTenths(top.score) : 0);
	}

	const chosen: (Candidate | null)[] = new Array<Candidate | null>(fieldCount).fill(null);
	const taken = new Set<number>();
	let best: (Candidate | null)[] = [];
	let bestCount = -1;
	let bestTenths = -1;

	const search = (fieldIndex: number, count: number, tenths: number): void => {
		const maxCount = count + countLeft[fieldIndex];
		const maxTenths = tenths + tenthsLeft[fieldIndex];
		if (maxCount < bestCount || (maxCount === bestCount && maxTenths <= bestTenths)) {
			return;
		}

		if (fieldIndex === fieldCount) {
			best = chosen.slice();
			bestCount = count;
			bestTenths = tenths;
			return;
		}

		for (const candidate of byField[fieldIndex]) {
			if (taken.has(candidate.columnIndex)) continue;
			taken.add(candidate.columnIndex);
			chosen[fieldIndex] = candidate;
			search(fieldIndex + 1, count + 1, tenths + toTenths(candidate.score));
			taken.delete(candidate.columnIndex);
		}

		chosen[fieldIndex] = null;
		search(fieldIndex + 1, count, tenths);
	};

	search(0, 0, 0);

	const winners = new Map<number, Candidate>();
	best.forEach((candidate, fieldIndex) => {
		if (candidate) winners.set(fieldIndex, candidate);
	});
	return winners;
}

/**
 * Resolve candidates into a one-to-one mapping.
 *
 * Fields and columns are assigned jointly: the result fills as many fields
 * as possible, then maximizes the total score, and no column is selected
 * for two fields. Losing candidates are kept on the entry: those ranked
 * below the winner as `alternatives`, those claimed by another field as
 * `displaced`.
 */
export function resolveCandidates(
	candidates: readonly Candidate[],
	catalog: SchemaCatalog,
	columnNames: readonly string[],
	method: MappingMethod,
	warnings: string[] = []
): MappingResult {
	const fields = Object.keys(catalog.fields);
	const ranked = [...candidates].sort(compareCandidates);
	const byField = fields.map((_, fieldIndex) => ranked.filter((c) => c.fieldIndex === fieldIndex));

	const winners = assignColumns(byField);
	const owners = new Map<number, string>();
	for (const winner of winners.values()) {
		owners.set(winner.columnIndex, winner.field);
	}

	const entries: MappingEntry[] = [];
	const unmappedFields: string[] = [];

	for (let fieldIndex = 0; fieldIndex < fields.length; fieldIndex++) {
		const field = fields[fieldIndex];
		const fieldRanked = byField[fieldIndex];
		const winner = winners.get(fieldIndex);

		if (!winner) {
			unmappedFields.push(field);
			if (fieldRanked.length > 0) {
				const message =
					`Field '${field}' has no free column: candidates ` +
					`${fieldRanked.map((c) => `'${c.userColumn}' (${owners.get(c.columnIndex)})`).join(", ")} ` +
					"were assigned to other fields";
				Logger.warn(message);
				warnings.push(message);
			}
			continue;
		}

		const winnerRank = fieldRanked.indexOf(winner);
		const displaced = fieldRanked.slice(0, winnerRank).map((c) => toAlternative(c, owners));
		const alternatives = fieldRanked.slice(winnerRank + 1).map((c) => toAlternative(c, owners));

		if (alternatives.length > 0 || displaced.length > 0) {
			Logger.warn(
				`Duplicate mapping for '${field}': selected '${winner.userColumn}' (score: ${winner.score}), ` +
					`rejected [${[...displaced, ...alternatives].map((a) => `'${a.userColumn}'`).join(", ")}]`
			);
		}

		entries.push({
			field,
			userColumn: winner.userColumn,
			score: winner.score,
			nameScore: winner.nameScore,
			dataScore: winner.dataScore,
			level: confidenceLevel(winner.score),
			alternatives,
			displaced,
		});
	}

	const unmappedColumns = columnNames.filter((_, index) => !owners.has(index));

	return {
		domain: catalog.domain,
		method,
		columns: [...columnNames],
		entries,
		unmappedFields,
		unmappedColumns,
		warnings,
	};
}

/**
 * Map table columns onto a catalog by combining name similarity with
 * data-type scores:
 *
 *   score = nameWeight * nameScore + dataWeight * typeScores[field.type]
 *
 * Each column is profiled and scored once per call; pairs below `minScore`
 * are dropped, the rest are resolved one-to-one. Never mutates the table.
 *
 * @param table - User table with unknown column names
 * @param catalog - Target schema catalog
 * @param options - Optional weights and thresholds
 */
export function mapColumns(table: Table, catalog: SchemaCatalog, options?: MappingOptions): MappingResult {
	const settings = resolveOptions(options);
	const warnings: string[] = [];
	const columnCount = table.columns.length;

	if (columnCount > settings.maxColumns) {
		const message =
			`Column count (${columnCount}) exceeds maxColumns (${settings.maxColumns}). ` +
			"Profiling cost grows with every column and mapping may be slow.";
		Logger.warn(message);
		warnings.push(message);
	}

	Logger.info(`Analyzing ${columnCount} columns for hybrid mapping...`);

	// Scoped to this call: catalogs and data may change between calls
	const typeScores: TypeScores[] = table.columns.map((column) =>
		scoreColumn(
			profileColumn(column.values, {
				sampleSize: settings.sampleSize,
				dateThreshold: settings.dateThreshold,
				name: column.name,
			})
		)
	);

	const candidates: Candidate[] = [];
	const fields = Object.entries(catalog.fields);

	for (let fieldIndex = 0; fieldIndex < fields.length; fieldIndex++) {
		const [field, spec] = fields[fieldIndex];

		for (let columnIndex = 0; columnIndex < columnCount; columnIndex++) {
			const userColumn = table.columns[columnIndex].name;
			const similarity = nameScore(userColumn, spec.aliases).score;
			const dataScore = typeScores[columnIndex][spec.type];
			const raw = similarity * settings.nameWeight + dataScore * settings.dataWeight;

			// Threshold on the exact value; the rounded one is reported
			if (raw >= settings.minScore) {
				candidates.push({
					field,
					fieldIndex,
					userColumn,
					columnIndex,
					score: roundScore(raw),
					nameScore: similarity,
					dataScore,
				});
			}
		}
	}

	const result = resolveCandidates(
		candidates,
		catalog,
		table.columns.map((c) => c.name),
		"hybrid",
		warnings
	);

	Logger.info(`Hybrid mapping completed: ${result.entries.length}/${fields.length} fields mapped`);
	return result;
}

/**
 * Name-only mapping. Every (field, column) pair whose name similarity
 * reaches `minScore` is a candidate, resolved one-to-one like
 * `mapColumns`. Reads no data, for uploads too large to sample or when only
 * headers are available.
 *
 * Only `minScore` applies from the options.
 */
export function mapColumnsByName(
	columnNames: readonly string[],
	catalog: SchemaCatalog,
	options?: Pick<MappingOptions, "minScore">
): MappingResult {
	const { minScore } = resolveOptions({ minScore: options?.minScore });
	const fields = Object.entries(catalog.fields);
	const candidates: Candidate[] = [];

	for (let fieldIndex = 0; fieldIndex < fields.length; fieldIndex++) {
		const [field, spec] = fields[fieldIndex];

		for (let columnIndex = 0; columnIndex < columnNames.length; columnIndex++) {
			const userColumn = columnNames[columnIndex];
			const similarity = nameScore(userColumn, spec.aliases).score;
			if (similarity < minScore) continue;

			candidates.push({
				field,
				fieldIndex,
				userColumn,
				columnIndex,
				score: similarity,
				nameScore: similarity,
				dataScore: null,
			});
		}
	}

	return resolveCandidates(candidates, catalog, columnNames, "name");
}
