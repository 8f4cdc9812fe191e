import * as fs from "fs";
import { z } from "zod";
import { ConfigError } from "./errors";
import { normalizeOrganization } from "./ellieClient";

export const DEFAULT_CONFIG_PATH = "config/default_config.json";

const snowflakeSchema = z.object({
	account: z.string().default(""),
	user: z.string().default(""),
	password: z.string().default(""),
	warehouse: z.string().default("COMPUTE_WH"),
	database: z.string().default(""),
	role: z.string().default(""),
	connectionMode: z.enum(["standard", "privatelink"]).default("standard"),
	customUrl: z.string().default(""),
});

const ellieSchema = z.object({
	organization: z.string().default("").transform(value => (value === "" ? value : normalizeOrganization(value))),
	token: z.string().default(""),
	apiVersion: z.string().default("v1"),
	folderId: z.union([z.string(), z.number()]).default("").transform(String)
		.refine(value => value === "" || /^\d+$/.test(value), "Folder ID must be a number"),
});

const transferSchema = z.object({
	schemas: z.array(z.string().min(1)).default(["PUBLIC"]),
	includeViews: z.boolean().default(true),
	modelLevel: z.enum(["conceptual", "logical", "physical"]).default("physical"),
	maxEntities: z.number().int().positive().default(500),
	inferRelationships: z.boolean().default(true),
	inferenceSuffixes: z.array(z.string().min(1)).default(["_id"]),
});

export const configSchema = z.object({
	snowflake: snowflakeSchema.default({}),
	ellie: ellieSchema.default({}),
	transfer: transferSchema.default({}),
	logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
});

export type TransferConfig = z.output<typeof configSchema>;

/** Environment variables that override file settings. */
const ENV_OVERRIDES: ReadonlyArray<[string, readonly [string, string] | readonly [string]]> = [
	["SNOWFLAKE_ACCOUNT", ["snowflake", "account"]],
	["SNOWFLAKE_USER", ["snowflake", "user"]],
	["SNOWFLAKE_PASSWORD", ["snowflake", "password"]],
	["SNOWFLAKE_WAREHOUSE", ["snowflake", "warehouse"]],
	["SNOWFLAKE_DATABASE", ["snowflake", "database"]],
	["SNOWFLAKE_ROLE", ["snowflake", "role"]],
	["ELLIE_ORGANIZATION", ["ellie", "organization"]],
	["ELLIE_TOKEN", ["ellie", "token"]],
	["ELLIE_FOLDER_ID", ["ellie", "folderId"]],
	["LOG_LEVEL", ["logLevel"]],
];

/**
 * Load the configuration file (if present), apply environment overrides and
 * validate the result. A missing file yields the defaults.
 */
export function loadConfig(path: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): TransferConfig {
	let fileContent: unknown = {};
	if (fs.existsSync(path)) {
		try {
			fileContent = JSON.parse(fs.readFileSync(path, "utf-8"));
		} catch (error) {
			throw new ConfigError(`Cannot parse config file ${path}: ${error instanceof Error ? error.message : String(error)}`, { path });
		}
	}
	return parseConfig(applyEnv(fileContent, env), path);
}

export function parseConfig(input: unknown, source = "config"): TransferConfig {
	const result = configSchema.safeParse(input);
	if (!result.success) {
		const messages = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
		throw new ConfigError(`Invalid configuration in ${source}: ${messages.join("; ")}`, { source });
	}
	return result.data;
}

/**
 * Write settings back, e.g. after `config set`. Secrets are written as given.
 */
export function saveConfig(config: TransferConfig, path: string = DEFAULT_CONFIG_PATH): void {
	const dir = path.includes("/") ? path.slice(0, path.lastIndexOf("/")) : "";
	if (dir !== "" && !fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
	fs.writeFileSync(path, JSON.stringify(config, null, 2) + "\n");
}

function applyEnv(input: unknown, env: NodeJS.ProcessEnv): unknown {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		return input;
	}
	const result: Record<string, unknown> = { ...input };
	for (const [variable, path] of ENV_OVERRIDES) {
		const value = env[variable];
		if (value === undefined || value === "") continue;
		if (path.length === 1) {
			result[path[0]] = value;
		} else {
			const [section, key] = path;
			const current = result[section];
			const sectionValue = typeof current === "object" && current !== null ? current : {};
			result[section] = { ...sectionValue, [key]: value };
		}
	}
	return result;
}
