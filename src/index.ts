// Core data model
export type {
  SemanticType,
  TableKind,
  Column,
  Table,
  ForeignKeyConstraint,
  Catalog,
  RelationshipOrigin,
  Cardinality,
  Relationship,
  Attribute,
  Entity,
  ModelRelationship,
  ModelDocument,
  ModelLevel,
  PlanState,
  SyncOperation,
  CreateModelOperation,
  ReplaceEntitiesOperation,
  AddRelationshipsOperation,
  SyncTarget,
  SyncPlan,
} from './model';

export { createCatalog, qualifyName, findTable, findColumn } from './model';

// Errors
export type { ErrorContext } from './errors';
export {
  TransferError,
  MalformedCatalogError,
  EmptyModelError,
  PlanTooLargeError,
  ConfigError,
  EllieApiError,
} from './errors';

// Catalog reading
export type { RawCatalog, RawTableRow, RawColumnRow, RawConstraintRow, ReadCatalogOptions } from './catalogReader';
export { readCatalog } from './catalogReader';
export { mapNativeType } from './typeMapping';

// Catalog extraction
export type { DbClient, ExtractOptions } from './catalogExtractor';
export { extractCatalogRows, listSchemas } from './catalogExtractor';
export type { SnowflakeSettings, SourceConnection, ConnectionMode } from './sourceConnection';
export { openSource } from './sourceConnection';

// Relationships and model
export type { ResolveOptions, InferredMatch } from './relationshipResolver';
export { resolveRelationships, matchReference } from './relationshipResolver';
export { buildModel, entityId } from './modelBuilder';

// Planning and execution
export type { PlanOptions } from './syncPlanner';
export { planSync, mergePlan, transition } from './syncPlanner';
export type { ExecuteOptions, ExecuteResult } from './planExecutor';
export { executePlan } from './planExecutor';

// Ellie
export type {
  EllieAttribute,
  EllieEntity,
  EllieRelationship,
  EllieModelPayload,
  EllieModelOptions,
} from './ellieFormat';
export { toEllieModel, fromEllieModel } from './ellieFormat';
export type { EllieSettings, EllieApi, EllieClientOptions } from './ellieClient';
export { EllieClient } from './ellieClient';

// Orchestration
export type { BuildOptions, TransferOptions, BuiltModel, PreparedTransfer, TransferResult } from './schemaTransfer';
export { SchemaTransfer } from './schemaTransfer';

// Configuration and logging
export type { TransferConfig } from './config';
export { loadConfig, parseConfig, saveConfig, DEFAULT_CONFIG_PATH } from './config';
export type { Logger, LogLevel } from './logger';
export { createLogger, silentLogger } from './logger';

// Mermaid diagram generation
export type { MermaidOptions } from './mermaidGenerator';
export { generateMermaid } from './mermaidGenerator';
