import { z } from "zod";
import type { Catalog, Column, ForeignKeyConstraint, Table, TableKind } from "./model";
import { findColumn, qualifyName, tableKey } from "./model";
import { mapNativeType } from "./typeMapping";
import { MalformedCatalogError } from "./errors";
import { silentLogger, type Logger } from "./logger";

// === Raw row schemas ===

const flag = z.union([z.boolean(), z.string(), z.number()]).transform(value => {
	if (typeof value === "boolean") return value;
	if (typeof value === "number") return value !== 0;
	return ["YES", "Y", "TRUE", "T", "1"].includes(value.trim().toUpperCase());
});

const position = z.union([z.number(), z.string()]).pipe(z.coerce.number().int().nonnegative());

const optionalSchema = z.string().nullish().transform(value => value ?? "");

export const rawTableRowSchema = z.object({
	table_schema: optionalSchema,
	table_name: z.string().min(1),
	table_kind: z.string().nullish(),
});

export const rawColumnRowSchema = z.object({
	table_schema: optionalSchema,
	table_name: z.string().min(1),
	column_name: z.string().min(1),
	data_type: z.string(),
	is_nullable: flag,
	ordinal_position: position,
	table_kind: z.string().nullish(),
	is_primary_key: flag.default(false),
});

export const rawConstraintRowSchema = z.object({
	constraint_name: z.string().nullish(),
	source_schema: optionalSchema,
	source_table: z.string().min(1),
	source_column: z.string().min(1),
	target_schema: optionalSchema,
	target_table: z.string().min(1),
	target_column: z.string().min(1),
});

export type RawTableRow = z.input<typeof rawTableRowSchema>;
export type RawColumnRow = z.input<typeof rawColumnRowSchema>;
export type RawConstraintRow = z.input<typeof rawConstraintRowSchema>;

export interface RawCatalog {
	/** When omitted, tables are derived from the column rows. */
	readonly tables?: readonly RawTableRow[];
	readonly columns: readonly RawColumnRow[];
	readonly constraints?: readonly RawConstraintRow[];
}

export interface ReadCatalogOptions {
	readonly includeViews?: boolean;
	readonly logger?: Logger;
}

/**
 * Normalize raw information-schema rows into a Catalog.
 *
 * Identifiers compare case-insensitively and keep their first spelling.
 * Throws MalformedCatalogError for rows that do not validate, columns of
 * unknown tables, tables without columns and constraints on unknown
 * tables or columns.
 */
export function readCatalog(raw: RawCatalog, options: ReadCatalogOptions = {}): Catalog {
	const includeViews = options.includeViews ?? true;
	const logger = options.logger ?? silentLogger;

	const tableRows = raw.tables?.map((row, i) => parseRow(rawTableRowSchema, row, "table", i));
	const columnRows = raw.columns.map((row, i) => parseRow(rawColumnRowSchema, row, "column", i));
	const constraintRows = (raw.constraints ?? []).map((row, i) => parseRow(rawConstraintRowSchema, row, "constraint", i));

	// Collect tables
	const drafts = new Map<string, TableDraft>();
	const addTable = (schema: string, name: string, kind: string | null | undefined): void => {
		const qualifiedName = qualifyName(schema, name);
		const key = tableKey(qualifiedName);
		const existing = drafts.get(key);
		if (existing) {
			if (existing.kind === undefined && kind) existing.kind = normalizeKind(kind);
			return;
		}
		drafts.set(key, { schema, name, qualifiedName, kind: kind ? normalizeKind(kind) : undefined, columns: [] });
	};

	if (tableRows) {
		for (const row of tableRows) {
			addTable(row.table_schema, row.table_name, row.table_kind);
		}
	}

	// Attach columns
	for (const row of columnRows) {
		const qualifiedName = qualifyName(row.table_schema, row.table_name);
		if (!tableRows) {
			addTable(row.table_schema, row.table_name, row.table_kind);
		}
		const draft = drafts.get(tableKey(qualifiedName));
		if (!draft) {
			throw new MalformedCatalogError(
				`Column ${row.column_name} references unknown table ${qualifiedName}`,
				{ table: qualifiedName, column: row.column_name }
			);
		}
		if (draft.kind === undefined && row.table_kind) {
			draft.kind = normalizeKind(row.table_kind);
		}
		if (draft.columns.some(c => tableKey(c.name) === tableKey(row.column_name))) {
			continue;
		}
		draft.columns.push({
			name: row.column_name,
			type: mapNativeType(row.data_type),
			nativeType: row.data_type,
			isNullable: row.is_nullable,
			ordinalPosition: row.ordinal_position,
			isPrimaryKey: row.is_primary_key,
		});
	}

	// Finalize tables
	const tables = new Map<string, Table>();
	const excluded = new Set<string>();

	for (const [key, draft] of drafts) {
		const kind = draft.kind ?? "TABLE";
		if (kind === "VIEW" && !includeViews) {
			excluded.add(key);
			continue;
		}
		if (draft.columns.length === 0) {
			throw new MalformedCatalogError(
				`Table ${draft.qualifiedName} has no columns`,
				{ table: draft.qualifiedName }
			);
		}
		// Stable sort keeps input order for equal positions
		const columns = [...draft.columns].sort((a, b) => a.ordinalPosition - b.ordinalPosition);
		tables.set(key, {
			schema: draft.schema,
			name: draft.name,
			qualifiedName: draft.qualifiedName,
			kind,
			columns,
			primaryKey: columns.filter(c => c.isPrimaryKey).map(c => c.name),
		});
	}

	if (excluded.size > 0) {
		logger.info({ views: excluded.size }, "views excluded from catalog");
	}

	const foreignKeys = groupConstraints(constraintRows, tables, excluded, logger);

	return { tables, foreignKeys };
}

interface TableDraft {
	readonly schema: string;
	readonly name: string;
	readonly qualifiedName: string;
	kind: TableKind | undefined;
	readonly columns: Column[];
}

interface ConstraintGroup {
	readonly name?: string;
	readonly source: Table;
	readonly target: Table;
	readonly pairs: [string, string][];
}

type ParsedConstraintRow = z.output<typeof rawConstraintRowSchema>;

function groupConstraints(
	rows: readonly ParsedConstraintRow[],
	tables: ReadonlyMap<string, Table>,
	excluded: ReadonlySet<string>,
	logger: Logger
): ForeignKeyConstraint[] {
	const groups = new Map<string, ConstraintGroup>();
	let unnamed = 0;

	for (const row of rows) {
		const sourceName = qualifyName(row.source_schema, row.source_table);
		const targetName = qualifyName(row.target_schema, row.target_table);
		const sourceKey = tableKey(sourceName);
		const targetKey = tableKey(targetName);

		if (excluded.has(sourceKey) || excluded.has(targetKey)) {
			logger.info({ source: sourceName, target: targetName }, "constraint on excluded view dropped");
			continue;
		}

		const source = resolveConstraintTable(tables, sourceName, row.constraint_name);
		const target = resolveConstraintTable(tables, targetName, row.constraint_name);
		const sourceColumn = resolveConstraintColumn(source, row.source_column, row.constraint_name);
		const targetColumn = resolveConstraintColumn(target, row.target_column, row.constraint_name);

		const groupKey = row.constraint_name
			? `${tableKey(row.constraint_name)}|${sourceKey}|${targetKey}`
			: `#${unnamed++}`;
		const group: ConstraintGroup = groups.get(groupKey) ?? {
			name: row.constraint_name ?? undefined,
			source,
			target,
			pairs: [],
		};
		if (!group.pairs.some(([s, t]) => s === sourceColumn && t === targetColumn)) {
			group.pairs.push([sourceColumn, targetColumn]);
		}
		groups.set(groupKey, group);
	}

	return [...groups.values()].map(group => ({
		...(group.name !== undefined ? { name: group.name } : {}),
		sourceTable: group.source.qualifiedName,
		sourceColumns: group.pairs.map(([s]) => s),
		targetTable: group.target.qualifiedName,
		targetColumns: group.pairs.map(([, t]) => t),
	}));
}

function resolveConstraintTable(tables: ReadonlyMap<string, Table>, name: string, constraint: string | null | undefined): Table {
	const table = tables.get(tableKey(name));
	if (!table) {
		throw new MalformedCatalogError(
			`${constraintLabel(constraint)} references unknown table ${name}`,
			{ table: name, constraint: constraint ?? undefined }
		);
	}
	return table;
}

function resolveConstraintColumn(table: Table, columnName: string, constraint: string | null | undefined): string {
	const column = findColumn(table, columnName);
	if (!column) {
		throw new MalformedCatalogError(
			`${constraintLabel(constraint)} references unknown column ${table.qualifiedName}.${columnName}`,
			{ table: table.qualifiedName, column: columnName, constraint: constraint ?? undefined }
		);
	}
	return column.name;
}

function constraintLabel(constraint: string | null | undefined): string {
	return constraint ? `Foreign key ${constraint}` : "Foreign key";
}

function normalizeKind(kind: string): TableKind {
	return kind.toUpperCase().includes("VIEW") ? "VIEW" : "TABLE";
}

function parseRow<S extends z.ZodTypeAny>(schema: S, row: unknown, kind: string, index: number): z.output<S> {
	const result = schema.safeParse(row);
	if (!result.success) {
		const issue = result.error.issues[0];
		const path = issue?.path.join(".") ?? "";
		throw new MalformedCatalogError(
			`Invalid ${kind} row ${index}: ${path ? `${path}: ` : ""}${issue?.message ?? "invalid"}`,
			{ row: index, field: path }
		);
	}
	return result.data;
}
