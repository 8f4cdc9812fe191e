import type { Catalog, Cardinality, Column, Relationship, Table } from "./model";
import { findColumn, findTable, sameIdentifier, tableKey } from "./model";
import { singularize } from "./inflection";
import { silentLogger, type Logger } from "./logger";

export interface ResolveOptions {
	/** Synthesize relationships from column names when no foreign key links two tables. Default true. */
	readonly infer?: boolean;
	/** Column suffixes that mark a reference, appended to the target table name. Default `["_id"]`. */
	readonly suffixes?: readonly string[];
	readonly logger?: Logger;
}

/**
 * A column pair found by name-based inference.
 */
export interface InferredMatch {
	readonly sourceColumn: string;
	readonly targetColumn: string;
}

/**
 * Derive the relationships of a catalog.
 *
 * Algorithm:
 * 1. Every foreign key yields one EXPLICIT relationship per column pair
 *    (composite keys are split, not merged)
 * 2. Table pairs with no explicit relationship in either direction are
 *    searched for `<singular target><suffix>` columns (INFERRED)
 * 3. Duplicates by endpoints are dropped; EXPLICIT wins over INFERRED
 */
export function resolveRelationships(catalog: Catalog, options: ResolveOptions = {}): Relationship[] {
	const logger = options.logger ?? silentLogger;
	const suffixes = options.suffixes ?? ["_id"];

	const explicit: Relationship[] = [];
	for (const fk of catalog.foreignKeys) {
		const source = findTable(catalog, fk.sourceTable);
		if (!source) continue;

		if (fk.sourceColumns.length > 1) {
			logger.info(
				{ constraint: fk.name, table: fk.sourceTable, columns: fk.sourceColumns },
				"composite foreign key split into one relationship per column pair"
			);
		}
		fk.sourceColumns.forEach((sourceColumn, i) => {
			explicit.push({
				sourceTable: fk.sourceTable,
				sourceColumn,
				targetTable: fk.targetTable,
				targetColumn: fk.targetColumns[i],
				origin: "EXPLICIT",
				cardinality: estimateCardinality(source, sourceColumn),
			});
		});
	}

	const inferred = options.infer === false ? [] : inferRelationships(catalog, explicit, suffixes, logger);

	return deduplicate([...explicit, ...inferred]);
}

function inferRelationships(
	catalog: Catalog,
	explicit: readonly Relationship[],
	suffixes: readonly string[],
	logger: Logger
): Relationship[] {
	const linkedPairs = new Set(explicit.map(r => pairKey(r.sourceTable, r.targetTable)));
	const tables = [...catalog.tables.values()];
	const result: Relationship[] = [];

	for (const source of tables) {
		for (const target of tables) {
			// Self-references only come from explicit keys; the target's own key would match itself
			if (source === target) continue;
			if (!sameIdentifier(source.schema, target.schema)) continue;
			if (linkedPairs.has(pairKey(source.qualifiedName, target.qualifiedName))) continue;

			for (const column of source.columns) {
				const match = matchReference(column, target, suffixes);
				if (match === undefined) continue;
				result.push({
					sourceTable: source.qualifiedName,
					sourceColumn: match.sourceColumn,
					targetTable: target.qualifiedName,
					targetColumn: match.targetColumn,
					origin: "INFERRED",
					cardinality: estimateCardinality(source, match.sourceColumn),
				});
			}
		}
	}

	for (const table of tables) {
		for (const column of table.columns) {
			if (!looksLikeReference(column.name, suffixes)) continue;
			const resolved = result.some(r => r.sourceTable === table.qualifiedName && r.sourceColumn === column.name)
				|| explicit.some(r => sameIdentifier(r.sourceTable, table.qualifiedName) && sameIdentifier(r.sourceColumn, column.name));
			if (!resolved) {
				logger.info({ table: table.qualifiedName, column: column.name }, "no relationship inferred for reference-like column");
			}
		}
	}

	return result;
}

/**
 * Check whether `column` names a reference into `target`, e.g. `customer_id`
 * for table `customers`. The referenced column is a same-named column of the
 * target, or else its single-column primary key.
 */
export function matchReference(column: Column, target: Table, suffixes: readonly string[]): InferredMatch | undefined {
	const stems = new Set([tableKey(singularize(target.name)), tableKey(target.name)]);
	const columnName = tableKey(column.name);

	const isCandidate = suffixes.some(suffix =>
		[...stems].some(stem => columnName === stem + tableKey(suffix))
	);
	if (!isCandidate) return undefined;

	const sameNamed = findColumn(target, column.name);
	if (sameNamed) {
		return { sourceColumn: column.name, targetColumn: sameNamed.name };
	}
	if (target.primaryKey.length === 1) {
		return { sourceColumn: column.name, targetColumn: target.primaryKey[0] };
	}
	return undefined;
}

function looksLikeReference(columnName: string, suffixes: readonly string[]): boolean {
	const name = tableKey(columnName);
	return suffixes.some(suffix => name.length > suffix.length && name.endsWith(tableKey(suffix)));
}

/**
 * A column that alone forms the primary key can hold each target at most once.
 */
function estimateCardinality(source: Table, sourceColumn: string): Cardinality {
	return source.primaryKey.length === 1 && sameIdentifier(source.primaryKey[0], sourceColumn)
		? "ONE_TO_ONE"
		: "ONE_TO_MANY";
}

function deduplicate(relationships: readonly Relationship[]): Relationship[] {
	const byEndpoints = new Map<string, Relationship>();
	for (const rel of relationships) {
		const key = endpointKey(rel);
		const existing = byEndpoints.get(key);
		if (!existing || (existing.origin === "INFERRED" && rel.origin === "EXPLICIT")) {
			byEndpoints.set(key, rel);
		}
	}
	return [...byEndpoints.values()];
}

export function endpointKey(rel: Relationship): string {
	return [rel.sourceTable, rel.sourceColumn, rel.targetTable, rel.targetColumn].map(tableKey).join("|");
}

function pairKey(a: string, b: string): string {
	return [tableKey(a), tableKey(b)].sort().join("|");
}
