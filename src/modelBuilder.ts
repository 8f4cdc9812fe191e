import { v5 as uuidv5 } from "uuid";
import type { Attribute, Catalog, Entity, ModelDocument, ModelRelationship, Relationship, Table } from "./model";
import { findColumn, findTable, tableKey } from "./model";
import { EmptyModelError, MalformedCatalogError } from "./errors";

/** Namespace for entity ids; changing it changes every id ever produced. */
const ENTITY_ID_NAMESPACE = "2f6c1f5e-8d0e-4c53-9a57-3b8e6f0d4a21";

/**
 * Deterministic entity id for a table, stable across runs and independent
 * of identifier casing.
 */
export function entityId(qualifiedName: string): string {
	return uuidv5(tableKey(qualifiedName), ENTITY_ID_NAMESPACE);
}

/**
 * Assemble the model document for a catalog and its relationships.
 * Entities are ordered by qualified name, attributes by ordinal position.
 */
export function buildModel(catalog: Catalog, relationships: readonly Relationship[]): ModelDocument {
	const tables = [...catalog.tables.values()].sort(compareTables);
	if (tables.length === 0) {
		throw new EmptyModelError();
	}

	const modelRelationships = relationships.map(rel => toModelRelationship(catalog, rel));

	const foreignKeyColumns = new Set(
		relationships.map(rel => `${tableKey(rel.sourceTable)}|${tableKey(rel.sourceColumn)}`)
	);

	const entities = tables.map((table): Entity => ({
		id: entityId(table.qualifiedName),
		name: table.name,
		kind: table.kind,
		attributes: table.columns.map((column): Attribute => ({
			name: column.name,
			type: column.type,
			nativeType: column.nativeType,
			isNullable: column.isNullable,
			isPrimaryKey: column.isPrimaryKey,
			isForeignKey: foreignKeyColumns.has(`${tableKey(table.qualifiedName)}|${tableKey(column.name)}`),
		})),
	}));

	return { entities, relationships: modelRelationships };
}

function toModelRelationship(catalog: Catalog, rel: Relationship): ModelRelationship {
	const source = requireEndpoint(catalog, rel.sourceTable, rel.sourceColumn);
	const target = requireEndpoint(catalog, rel.targetTable, rel.targetColumn);

	return {
		sourceEntityId: entityId(source.table.qualifiedName),
		sourceAttribute: source.column,
		targetEntityId: entityId(target.table.qualifiedName),
		targetAttribute: target.column,
		origin: rel.origin,
		cardinality: rel.cardinality,
	};
}

function requireEndpoint(catalog: Catalog, tableName: string, columnName: string): { table: Table; column: string } {
	const table = findTable(catalog, tableName);
	if (!table) {
		throw new MalformedCatalogError(
			`Relationship references table ${tableName}, which is not in the catalog`,
			{ table: tableName, column: columnName }
		);
	}
	const column = findColumn(table, columnName);
	if (!column) {
		throw new MalformedCatalogError(
			`Relationship references column ${table.qualifiedName}.${columnName}, which does not exist`,
			{ table: table.qualifiedName, column: columnName }
		);
	}
	return { table, column: column.name };
}

function compareTables(a: Table, b: Table): number {
	const ka = tableKey(a.qualifiedName);
	const kb = tableKey(b.qualifiedName);
	return ka < kb ? -1 : ka > kb ? 1 : 0;
}
