import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";
import * as snowflake from "snowflake-sdk";
import type { DbClient } from "./catalogExtractor";
import { ConfigError } from "./errors";
import { silentLogger, type Logger } from "./logger";

export type ConnectionMode = "standard" | "privatelink";

export interface SnowflakeSettings {
	/** Account identifier or full account URL (standard mode) */
	readonly account: string;
	readonly user: string;
	readonly password: string;
	readonly warehouse: string;
	readonly database: string;
	readonly role?: string;
	readonly connectionMode?: ConnectionMode;
	/** PrivateLink host or URL (privatelink mode) */
	readonly customUrl?: string;
}

/**
 * An open connection to the database the schema is read from.
 */
export interface SourceConnection {
	readonly client: DbClient;
	readonly kind: "snowflake" | "postgres" | "pglite";
	close(): Promise<void>;
}

/**
 * Open a source database.
 *
 * Connection string formats:
 * - `pglite:` or `pglite::memory:` - In-memory PGlite database
 * - `pglite:/path/to/dir` - PGlite database persisted to filesystem
 * - `postgres://...` or `postgresql://...` - PostgreSQL
 *
 * Settings objects connect to Snowflake.
 */
export async function openSource(source: string | SnowflakeSettings, logger: Logger = silentLogger): Promise<SourceConnection> {
	if (typeof source !== "string") {
		return connectSnowflake(source, logger);
	}

	if (source.startsWith("pglite:")) {
		const pglitePath = source.slice("pglite:".length);
		const db = new PGlite(pglitePath || undefined);
		await db.waitReady;
		return { client: db, kind: "pglite", close: () => db.close() };
	}

	if (/^postgres(ql)?:\/\//.test(source)) {
		const client = new Client({ connectionString: source });
		await client.connect();
		return {
			client: { query: (sql, params) => client.query(sql, params) },
			kind: "postgres",
			close: () => client.end(),
		};
	}

	throw new ConfigError(`Unsupported source connection string: ${source.split(":")[0]}:`, { source: source.split(":")[0] });
}

async function connectSnowflake(settings: SnowflakeSettings, logger: Logger): Promise<SourceConnection> {
	const account = snowflakeAccount(settings);
	logger.info({ account, database: settings.database, mode: settings.connectionMode ?? "standard" }, "connecting to Snowflake");

	const connection = snowflake.createConnection({
		account,
		username: settings.user,
		password: settings.password,
		warehouse: settings.warehouse,
		database: settings.database,
		...(settings.role ? { role: settings.role } : {}),
	});

	await new Promise<void>((resolve, reject) => {
		connection.connect(err => (err ? reject(err) : resolve()));
	});

	return {
		client: new SnowflakeClient(connection),
		kind: "snowflake",
		close: () => new Promise<void>((resolve, reject) => {
			connection.destroy(err => (err ? reject(err) : resolve()));
		}),
	};
}

/**
 * Runs `$n`-parameterized queries on a Snowflake connection, where binds are
 * written `:n`.
 */
export class SnowflakeClient implements DbClient {
	constructor(private readonly _connection: snowflake.Connection) { }

	query(sql: string, params: unknown[] = []): Promise<{ rows: unknown[] }> {
		return new Promise((resolve, reject) => {
			this._connection.execute({
				sqlText: toSnowflakeBinds(sql),
				binds: params.map(p => (typeof p === "number" ? p : String(p))),
				complete: (err, _stmt, rows) => {
					if (err) {
						reject(err);
					} else {
						resolve({ rows: rows ?? [] });
					}
				},
			});
		});
	}
}

export function toSnowflakeBinds(sql: string): string {
	return sql.replace(/\$(\d+)/g, ":$1");
}

export function snowflakeAccount(settings: SnowflakeSettings): string {
	if (settings.connectionMode === "privatelink") {
		if (!settings.customUrl) {
			throw new ConfigError("PrivateLink URL is required for PrivateLink connection mode");
		}
		return privateLinkAccount(settings.customUrl);
	}
	if (!settings.account) {
		throw new ConfigError("Snowflake account URL or ID is required for standard connection mode");
	}
	return extractAccountFromUrl(settings.account);
}

/**
 * `https://xy12345.eu-west-1.aws.snowflakecomputing.com` → `xy12345.eu-west-1.aws`.
 * Anything else is taken to be an account identifier already.
 */
export function extractAccountFromUrl(url: string): string {
	const match = /^https?:\/\/([^/]+?)\.snowflakecomputing\.com/.exec(url.trim());
	return match ? match[1] : url.trim();
}

/**
 * `https://acme.eu-west-1.privatelink.snowflakecomputing.com/` → `acme.eu-west-1.privatelink`.
 */
export function privateLinkAccount(url: string): string {
	return url
		.trim()
		.replace(/^https?:\/\//, "")
		.replace(/\/.*$/, "")
		.replace(/\.snowflakecomputing\.com$/, "");
}
