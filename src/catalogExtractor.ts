import { z } from "zod";
import type { RawCatalog, RawColumnRow, RawConstraintRow, RawTableRow } from "./catalogReader";
import { qualifyName, tableKey } from "./model";
import { silentLogger, type Logger } from "./logger";

/**
 * Database client interface - compatible with pg.Client, PGlite and the
 * Snowflake adapter in sourceConnection.
 */
export interface DbClient {
	query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface ExtractOptions {
	readonly includeViews?: boolean;
	readonly logger?: Logger;
}

const tableRow = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	table_type: z.string(),
});

const columnRow = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	column_name: z.string(),
	data_type: z.string(),
	is_nullable: z.union([z.string(), z.boolean()]),
	ordinal_position: z.union([z.number(), z.string()]),
	numeric_precision: z.union([z.number(), z.string()]).nullish(),
	numeric_scale: z.union([z.number(), z.string()]).nullish(),
});

const keyColumnRow = z.object({
	table_name: z.string(),
	column_name: z.string(),
});

const foreignKeyRow = z.object({
	constraint_name: z.string().nullish(),
	source_table: z.string(),
	source_column: z.string(),
	target_schema: z.string().nullish(),
	target_table: z.string(),
	target_column: z.string(),
});

// Output of SHOW IMPORTED KEYS (Snowflake)
const importedKeyRow = z.object({
	fk_name: z.string().nullish(),
	fk_table_name: z.string(),
	fk_column_name: z.string(),
	pk_schema_name: z.string().nullish(),
	pk_table_name: z.string(),
	pk_column_name: z.string(),
});

/**
 * Read tables, columns, primary keys and foreign keys of the given schemas
 * from the information schema, in the row shape readCatalog expects.
 */
export async function extractCatalogRows(
	client: DbClient,
	schemas: readonly string[],
	options: ExtractOptions = {}
): Promise<RawCatalog> {
	const logger = options.logger ?? silentLogger;
	const includeViews = options.includeViews ?? true;

	const tables: RawTableRow[] = [];
	const columns: RawColumnRow[] = [];
	const constraints: RawConstraintRow[] = [];

	for (const schemaName of schemas) {
		const schemaTables = await extractTables(client, schemaName, includeViews);
		logger.info({ schema: schemaName, tables: schemaTables.length }, "tables found");
		if (schemaTables.length === 0) continue;

		const tableNames = new Set(schemaTables.map(t => t.table_name));
		const primaryKeys = await extractPrimaryKeys(client, schemaName, logger);
		const schemaColumns = await extractColumns(client, schemaName, tableNames, primaryKeys);
		const foreignKeys = await extractForeignKeys(client, schemaName, logger);
		logger.info(
			{ schema: schemaName, columns: schemaColumns.length, primaryKeyColumns: primaryKeys.size, foreignKeys: foreignKeys.length },
			"schema extracted"
		);

		tables.push(...schemaTables);
		columns.push(...schemaColumns);
		constraints.push(...foreignKeys.filter(fk => tableNames.has(fk.source_table)));
	}

	// Keys into schemas or tables outside the extraction have nothing to point at
	const extracted = new Set(tables.map(t => tableKey(qualifyName(t.table_schema ?? "", t.table_name))));
	const inScope = constraints.filter(fk => {
		const target = qualifyName(fk.target_schema ?? "", fk.target_table);
		if (extracted.has(tableKey(target))) return true;
		logger.info(
			{ constraint: fk.constraint_name, source: qualifyName(fk.source_schema ?? "", fk.source_table), target },
			"foreign key to a table outside the extracted schemas dropped"
		);
		return false;
	});

	return { tables, columns, constraints: inScope };
}

/**
 * List the user schemas of the connected database.
 */
export async function listSchemas(client: DbClient): Promise<string[]> {
	const result = await client.query(`
		SELECT schema_name AS "schema_name"
		FROM information_schema.schemata
		WHERE UPPER(schema_name) <> 'INFORMATION_SCHEMA'
		  AND schema_name NOT LIKE 'pg\\_%'
		ORDER BY schema_name
	`);
	return parseRows(z.object({ schema_name: z.string() }), result.rows).map(r => r.schema_name);
}

async function extractTables(client: DbClient, schemaName: string, includeViews: boolean): Promise<RawTableRow[]> {
	const types = includeViews ? "('BASE TABLE', 'VIEW')" : "('BASE TABLE')";
	const result = await client.query(`
		SELECT
			table_schema AS "table_schema",
			table_name AS "table_name",
			table_type AS "table_type"
		FROM information_schema.tables
		WHERE table_schema = $1
		  AND table_type IN ${types}
		ORDER BY table_name
	`, [schemaName]);

	return parseRows(tableRow, result.rows).map(row => ({
		table_schema: row.table_schema,
		table_name: row.table_name,
		table_kind: row.table_type,
	}));
}

async function extractColumns(
	client: DbClient,
	schemaName: string,
	tableNames: ReadonlySet<string>,
	primaryKeys: ReadonlySet<string>
): Promise<RawColumnRow[]> {
	const result = await client.query(`
		SELECT
			table_schema AS "table_schema",
			table_name AS "table_name",
			column_name AS "column_name",
			data_type AS "data_type",
			is_nullable AS "is_nullable",
			ordinal_position AS "ordinal_position",
			numeric_precision AS "numeric_precision",
			numeric_scale AS "numeric_scale"
		FROM information_schema.columns
		WHERE table_schema = $1
		ORDER BY table_name, ordinal_position
	`, [schemaName]);

	return parseRows(columnRow, result.rows)
		.filter(row => tableNames.has(row.table_name))
		.map(row => ({
			table_schema: row.table_schema,
			table_name: row.table_name,
			column_name: row.column_name,
			data_type: formatDataType(row.data_type, row.numeric_precision, row.numeric_scale),
			is_nullable: row.is_nullable,
			ordinal_position: row.ordinal_position,
			is_primary_key: primaryKeys.has(keyOf(row.table_name, row.column_name)),
		}));
}

/**
 * Snowflake reports `NUMBER` with precision and scale in separate columns;
 * `NUMBER(38,0)` is how integers look there.
 */
function formatDataType(
	dataType: string,
	precision: number | string | null | undefined,
	scale: number | string | null | undefined
): string {
	const isNumber = ["NUMBER", "NUMERIC", "DECIMAL"].includes(dataType.toUpperCase());
	if (!isNumber || precision === null || precision === undefined || scale === null || scale === undefined) {
		return dataType;
	}
	return `${dataType}(${precision},${scale})`;
}

async function extractPrimaryKeys(client: DbClient, schemaName: string, logger: Logger): Promise<Set<string>> {
	const keys = new Set<string>();

	try {
		const result = await client.query(`
			SELECT
				kcu.table_name AS "table_name",
				kcu.column_name AS "column_name"
			FROM information_schema.table_constraints tc
			JOIN information_schema.key_column_usage kcu
				ON tc.constraint_name = kcu.constraint_name
				AND tc.constraint_schema = kcu.constraint_schema
				AND tc.table_name = kcu.table_name
			WHERE tc.table_schema = $1
			  AND tc.constraint_type = 'PRIMARY KEY'
			ORDER BY kcu.table_name, kcu.ordinal_position
		`, [schemaName]);
		for (const row of parseRows(keyColumnRow, result.rows)) {
			keys.add(keyOf(row.table_name, row.column_name));
		}
	} catch (error) {
		logger.warn({ schema: schemaName, err: error }, "primary key query failed, trying SHOW PRIMARY KEYS");
	}

	if (keys.size > 0) return keys;

	try {
		const result = await client.query(`SHOW PRIMARY KEYS IN SCHEMA ${escapeIdentifier(schemaName)}`);
		for (const row of parseRows(keyColumnRow, result.rows)) {
			keys.add(keyOf(row.table_name, row.column_name));
		}
	} catch (error) {
		logger.warn({ schema: schemaName, err: error }, "SHOW PRIMARY KEYS failed, continuing without primary keys");
	}

	return keys;
}

async function extractForeignKeys(client: DbClient, schemaName: string, logger: Logger): Promise<RawConstraintRow[]> {
	try {
		const result = await client.query(`
			SELECT
				rc.constraint_name AS "constraint_name",
				kcu.table_name AS "source_table",
				kcu.column_name AS "source_column",
				pk.table_schema AS "target_schema",
				pk.table_name AS "target_table",
				pk.column_name AS "target_column"
			FROM information_schema.referential_constraints rc
			JOIN information_schema.key_column_usage kcu
				ON rc.constraint_name = kcu.constraint_name
				AND rc.constraint_schema = kcu.constraint_schema
			JOIN information_schema.key_column_usage pk
				ON rc.unique_constraint_name = pk.constraint_name
				AND rc.unique_constraint_schema = pk.constraint_schema
				AND pk.ordinal_position = kcu.position_in_unique_constraint
			WHERE kcu.table_schema = $1
			ORDER BY rc.constraint_name, kcu.ordinal_position
		`, [schemaName]);
		const rows = parseRows(foreignKeyRow, result.rows);
		if (rows.length > 0) {
			return rows.map(row => ({
				constraint_name: row.constraint_name,
				source_schema: schemaName,
				source_table: row.source_table,
				source_column: row.source_column,
				target_schema: row.target_schema ?? schemaName,
				target_table: row.target_table,
				target_column: row.target_column,
			}));
		}
	} catch (error) {
		logger.warn({ schema: schemaName, err: error }, "foreign key query failed, trying SHOW IMPORTED KEYS");
	}

	try {
		const result = await client.query(`SHOW IMPORTED KEYS IN SCHEMA ${escapeIdentifier(schemaName)}`);
		return parseRows(importedKeyRow, result.rows).map(row => ({
			constraint_name: row.fk_name,
			source_schema: schemaName,
			source_table: row.fk_table_name,
			source_column: row.fk_column_name,
			target_schema: row.pk_schema_name ?? schemaName,
			target_table: row.pk_table_name,
			target_column: row.pk_column_name,
		}));
	} catch (error) {
		logger.warn({ schema: schemaName, err: error }, "SHOW IMPORTED KEYS failed, continuing without foreign keys");
		return [];
	}
}

export function escapeIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

function keyOf(table: string, column: string): string {
	return `${table}\u0000${column}`;
}

function parseRows<S extends z.ZodTypeAny>(schema: S, rows: readonly unknown[]): z.output<S>[] {
	return rows.map(row => schema.parse(row));
}
