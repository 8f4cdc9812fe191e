import type { Catalog, ModelDocument, ModelLevel, Relationship, SyncPlan } from "./model";
import type { DbClient } from "./catalogExtractor";
import { extractCatalogRows, listSchemas } from "./catalogExtractor";
import { readCatalog } from "./catalogReader";
import { resolveRelationships } from "./relationshipResolver";
import { buildModel } from "./modelBuilder";
import { planSync } from "./syncPlanner";
import { executePlan } from "./planExecutor";
import { fromEllieModel } from "./ellieFormat";
import type { EllieApi } from "./ellieClient";
import { openSource, type SnowflakeSettings, type SourceConnection } from "./sourceConnection";
import { ConfigError } from "./errors";
import { silentLogger, type Logger } from "./logger";

export interface BuildOptions {
	readonly schemas: readonly string[];
	readonly includeViews: boolean;
	readonly inferRelationships?: boolean;
	readonly inferenceSuffixes?: readonly string[];
}

export interface TransferOptions extends BuildOptions {
	readonly modelName: string;
	readonly folderId: string;
	readonly maxEntities: number;
	readonly level: ModelLevel;
	/** Update this existing model instead of creating a new one */
	readonly remoteModelId?: string;
}

export interface BuiltModel {
	readonly catalog: Catalog;
	readonly relationships: readonly Relationship[];
	readonly document: ModelDocument;
}

export interface PreparedTransfer extends BuiltModel {
	readonly plan: SyncPlan;
	readonly remote?: ModelDocument;
}

export interface TransferResult extends PreparedTransfer {
	readonly modelId: string | undefined;
}

/**
 * High-level transfer operations.
 * Coordinates catalog extraction, model building, planning and execution.
 */
export class SchemaTransfer {
	private constructor(
		private readonly _client: DbClient,
		private readonly _logger: Logger,
		private readonly _connection?: SourceConnection
	) { }

	/**
	 * Connect to a source database: Snowflake settings, or a `pglite:` /
	 * `postgresql://` connection string.
	 */
	static async connect(source: string | SnowflakeSettings, logger: Logger = silentLogger): Promise<SchemaTransfer> {
		const connection = await openSource(source, logger);
		return new SchemaTransfer(connection.client, logger, connection);
	}

	/**
	 * Create a SchemaTransfer from an existing client (useful for testing with PGlite).
	 * The caller keeps ownership of the client.
	 */
	static fromClient(client: DbClient, logger: Logger = silentLogger): SchemaTransfer {
		return new SchemaTransfer(client, logger);
	}

	async listSchemas(): Promise<string[]> {
		return listSchemas(this._client);
	}

	/**
	 * Extract the catalog and turn it into a model document.
	 */
	async buildModel(options: BuildOptions): Promise<BuiltModel> {
		const rows = await extractCatalogRows(this._client, options.schemas, {
			includeViews: options.includeViews,
			logger: this._logger,
		});
		const catalog = readCatalog(rows, { includeViews: options.includeViews, logger: this._logger });
		const relationships = resolveRelationships(catalog, {
			infer: options.inferRelationships,
			suffixes: options.inferenceSuffixes,
			logger: this._logger,
		});
		const document = buildModel(catalog, relationships);

		this._logger.info(
			{
				entities: document.entities.length,
				explicit: relationships.filter(r => r.origin === "EXPLICIT").length,
				inferred: relationships.filter(r => r.origin === "INFERRED").length,
			},
			"model built"
		);

		return { catalog, relationships, document };
	}

	/**
	 * Build the model and plan it against the remote model, if one is named.
	 * Nothing is written to Ellie.
	 */
	async prepare(api: EllieApi | undefined, options: TransferOptions): Promise<PreparedTransfer> {
		const built = await this.buildModel(options);

		let remote: ModelDocument | undefined;
		if (options.remoteModelId !== undefined) {
			if (api === undefined) {
				throw new ConfigError("Planning an update needs an Ellie connection to fetch the remote model");
			}
			remote = fromEllieModel(await api.exportModel(options.remoteModelId));
		}

		const plan = planSync(built.document, remote, {
			modelName: options.modelName,
			folderId: options.folderId,
			maxEntities: options.maxEntities,
			...(options.remoteModelId !== undefined ? { remoteModelId: options.remoteModelId } : {}),
		});

		return { ...built, plan, ...(remote !== undefined ? { remote } : {}) };
	}

	/**
	 * Prepare and execute a transfer.
	 */
	async transfer(api: EllieApi, options: TransferOptions): Promise<TransferResult> {
		const prepared = await this.prepare(api, options);
		return this.execute(api, prepared, options.level);
	}

	/**
	 * Execute a previously prepared transfer, e.g. after the user confirmed it.
	 */
	async execute(api: EllieApi, prepared: PreparedTransfer, level: ModelLevel): Promise<TransferResult> {
		const { plan, modelId } = await executePlan(api, prepared.plan, {
			level,
			logger: this._logger,
			...(prepared.remote !== undefined ? { remote: prepared.remote } : {}),
		});
		return { ...prepared, plan, modelId };
	}

	async close(): Promise<void> {
		await this._connection?.close();
	}
}
