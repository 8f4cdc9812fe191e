/**
 * Core data model types for ellie-schema-transfer.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Catalog Types ===

export type SemanticType = "INTEGER" | "DECIMAL" | "TEXT" | "DATE" | "TIMESTAMP" | "BOOLEAN" | "OTHER";

export type TableKind = "TABLE" | "VIEW";

export interface Column {
	readonly name: string;
	readonly type: SemanticType;
	/** Type text as reported by the source database */
	readonly nativeType: string;
	readonly isNullable: boolean;
	readonly ordinalPosition: number;
	readonly isPrimaryKey: boolean;
}

export interface Table {
	/** Empty when the source did not report a schema */
	readonly schema: string;
	readonly name: string;
	/** `schema.table`, or just `table` without a schema */
	readonly qualifiedName: string;
	readonly kind: TableKind;
	/** Ordered by ordinal position */
	readonly columns: readonly Column[];
	readonly primaryKey: readonly string[];
}

export interface ForeignKeyConstraint {
	readonly name?: string;
	readonly sourceTable: string;
	readonly sourceColumns: readonly string[];
	readonly targetTable: string;
	readonly targetColumns: readonly string[];
}

export interface Catalog {
	/** Keyed by {@link tableKey} of the qualified name */
	readonly tables: ReadonlyMap<string, Table>;
	readonly foreignKeys: readonly ForeignKeyConstraint[];
}

// === Relationship Types ===

export type RelationshipOrigin = "EXPLICIT" | "INFERRED";

export type Cardinality = "ONE_TO_MANY" | "ONE_TO_ONE";

/**
 * A directed reference from a column of the source table (the FK holder)
 * to a column of the target table (the referenced side).
 */
export interface Relationship {
	readonly sourceTable: string;
	readonly sourceColumn: string;
	readonly targetTable: string;
	readonly targetColumn: string;
	readonly origin: RelationshipOrigin;
	readonly cardinality: Cardinality;
}

// === Model Document Types ===

export interface Attribute {
	readonly name: string;
	readonly type: SemanticType;
	readonly nativeType: string;
	readonly isNullable: boolean;
	readonly isPrimaryKey: boolean;
	readonly isForeignKey: boolean;
}

export interface Entity {
	readonly id: string;
	readonly name: string;
	readonly kind: TableKind;
	readonly attributes: readonly Attribute[];
}

export interface ModelRelationship {
	readonly sourceEntityId: string;
	readonly sourceAttribute: string;
	readonly targetEntityId: string;
	readonly targetAttribute: string;
	readonly origin: RelationshipOrigin;
	readonly cardinality: Cardinality;
}

export interface ModelDocument {
	readonly entities: readonly Entity[];
	readonly relationships: readonly ModelRelationship[];
}

export type ModelLevel = "conceptual" | "logical" | "physical";

// === Sync Plan Types ===

export type PlanState = "NEW" | "PLANNED" | "SUBMITTED" | "CONFIRMED";

export type SyncOperation = CreateModelOperation | ReplaceEntitiesOperation | AddRelationshipsOperation;

export interface CreateModelOperation {
	readonly type: "createModel";
	readonly operation: "CREATE";
	readonly payload: ModelDocument;
}

export interface ReplaceEntitiesOperation {
	readonly type: "replaceEntities";
	readonly operation: "UPDATE";
	readonly payload: ModelDocument;
}

export interface AddRelationshipsOperation {
	readonly type: "addRelationships";
	readonly operation: "UPDATE";
	readonly payload: ModelDocument;
}

export interface SyncTarget {
	readonly modelName: string;
	readonly folderId: string;
	/** Set when the plan updates an existing remote model */
	readonly remoteModelId?: string;
}

export interface SyncPlan {
	readonly state: PlanState;
	readonly target: SyncTarget;
	readonly operations: readonly SyncOperation[];
}

// === Helpers ===

/**
 * Case-folded lookup key for identifiers. Storage keeps the original spelling.
 */
export function tableKey(name: string): string {
	return name.toLowerCase();
}

export function qualifyName(schema: string, table: string): string {
	return schema === "" ? table : `${schema}.${table}`;
}

export function sameIdentifier(a: string, b: string): boolean {
	return tableKey(a) === tableKey(b);
}

export function findTable(catalog: Catalog, qualifiedName: string): Table | undefined {
	return catalog.tables.get(tableKey(qualifiedName));
}

export function findColumn(table: Table, columnName: string): Column | undefined {
	return table.columns.find(c => sameIdentifier(c.name, columnName));
}

export function createCatalog(tables: Table[], foreignKeys: ForeignKeyConstraint[] = []): Catalog {
	return {
		tables: new Map(tables.map(t => [tableKey(t.qualifiedName), t])),
		foreignKeys,
	};
}
