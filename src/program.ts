import { Command } from "commander";
import * as readline from "readline";
import * as fs from "fs";
import type { ModelDocument, SyncPlan } from "./model";
import { SchemaTransfer, type TransferOptions } from "./schemaTransfer";
import { EllieClient } from "./ellieClient";
import { toEllieModel } from "./ellieFormat";
import { generateMermaid } from "./mermaidGenerator";
import { DEFAULT_CONFIG_PATH, loadConfig, parseConfig, saveConfig, type TransferConfig } from "./config";
import { EmptyModelError, TransferError } from "./errors";
import { createLogger, type Logger } from "./logger";

async function confirm(message: string): Promise<boolean> {
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	return new Promise((resolve) => {
		rl.question(`${message} (y/N) `, (answer) => {
			rl.close();
			resolve(answer.toLowerCase() === "y" || answer.toLowerCase() === "yes");
		});
	});
}

function printPlan(plan: SyncPlan, document: ModelDocument): void {
	const explicit = document.relationships.filter(r => r.origin === "EXPLICIT").length;
	const inferred = document.relationships.length - explicit;
	console.log(`Model "${plan.target.modelName}": ${document.entities.length} entities, ${explicit} explicit and ${inferred} inferred relationships`);

	if (plan.operations.length === 0) {
		console.log("No changes to apply.");
		return;
	}
	console.log("Operations:");
	for (const op of plan.operations) {
		switch (op.type) {
			case "createModel":
				console.log(`  CREATE model${plan.target.folderId ? ` in folder ${plan.target.folderId}` : ""}`);
				break;
			case "replaceEntities":
				console.log(`  UPDATE ${op.payload.entities.length} entities`);
				for (const entity of op.payload.entities) {
					console.log(`    ~ ${entity.name}`);
				}
				break;
			case "addRelationships":
				console.log(`  UPDATE add ${op.payload.relationships.length} relationships`);
				break;
		}
	}
	console.log(`Total: ${plan.operations.length} operation(s)`);
}

interface CommonOptions {
	config: string;
	source?: string;
	schema?: string[];
	views: boolean;
}

interface PlanCommandOptions extends CommonOptions {
	modelName?: string;
	folderId?: string;
	modelId?: string;
	maxEntities?: number;
}

function settings(options: CommonOptions): { config: TransferConfig; logger: Logger } {
	const config = loadConfig(options.config);
	return { config, logger: createLogger(config.logLevel) };
}

async function withTransfer<T>(
	options: CommonOptions,
	fn: (transfer: SchemaTransfer, config: TransferConfig, logger: Logger) => Promise<T>
): Promise<T> {
	const { config, logger } = settings(options);
	const transfer = await SchemaTransfer.connect(options.source ?? config.snowflake, logger);
	try {
		return await fn(transfer, config, logger);
	} finally {
		await transfer.close();
	}
}

function transferOptions(options: PlanCommandOptions, config: TransferConfig): TransferOptions {
	const schemas = options.schema ?? config.transfer.schemas;
	return {
		schemas,
		includeViews: options.views && config.transfer.includeViews,
		inferRelationships: config.transfer.inferRelationships,
		inferenceSuffixes: config.transfer.inferenceSuffixes,
		modelName: options.modelName ?? schemas[0],
		folderId: options.folderId ?? config.ellie.folderId,
		maxEntities: options.maxEntities ?? config.transfer.maxEntities,
		level: config.transfer.modelLevel,
		...(options.modelId !== undefined ? { remoteModelId: options.modelId } : {}),
	};
}

function ellieClient(config: TransferConfig, logger: Logger): EllieClient {
	if (!config.ellie.organization || !config.ellie.token) {
		throw new TransferError("Ellie organization and token are required (config file or ELLIE_ORGANIZATION / ELLIE_TOKEN)");
	}
	return new EllieClient(
		{ organization: config.ellie.organization, token: config.ellie.token, apiVersion: config.ellie.apiVersion },
		{ logger }
	);
}

function requireFolderId(folderId: string): void {
	if (!folderId) {
		throw new TransferError("Folder ID is required. Pass --folder-id or set ellie.folderId.");
	}
}

function parseCount(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (Number.isNaN(parsed)) {
		throw new TransferError(`Not a number: ${value}`);
	}
	return parsed;
}

function addCommonOptions(command: Command): Command {
	return command
		.option("-c, --config <file>", "Configuration file", DEFAULT_CONFIG_PATH)
		.option("-s, --source <connection>", "Read from pglite:<dir> or postgresql://... instead of Snowflake")
		.option("--schema <names...>", "Schemas to transfer (defaults to transfer.schemas)")
		.option("--no-views", "Exclude views");
}

function addPlanOptions(command: Command): Command {
	return command
		.option("-n, --model-name <name>", "Model name (defaults to the first schema)")
		.option("-f, --folder-id <id>", "Ellie folder to create the model in")
		.option("-m, --model-id <id>", "Update this existing Ellie model")
		.option("--max-entities <number>", "Refuse plans with more entities than this", parseCount);
}

/**
 * Build the command-line program. Each call returns a fresh instance.
 */
export function createProgram(): Command {
	const program = new Command();

	program
		.name("ellie-transfer")
		.description("Transfer Snowflake schema metadata into Ellie.ai data models")
		.version("1.0.0");

	program
		.command("init-config")
		.description("Write a configuration file with default settings")
		.option("-c, --config <file>", "Configuration file", DEFAULT_CONFIG_PATH)
		.action((options: { config: string }) => {
			if (fs.existsSync(options.config)) {
				throw new TransferError(`${options.config} already exists`);
			}
			saveConfig(parseConfig({}), options.config);
			console.log(`Wrote ${options.config}`);
		});

	addCommonOptions(
		program
			.command("schemas")
			.description("List the schemas of the source database")
	).action(async (options: CommonOptions) => {
		await withTransfer(options, async (transfer) => {
			for (const schema of await transfer.listSchemas()) {
				console.log(schema);
			}
		});
	});

	addCommonOptions(addPlanOptions(
		program
			.command("preview")
			.description("Show what a transfer would do without writing to Ellie")
			.option("--json", "Print the Ellie request body instead of a summary")
	)).action(async (options: PlanCommandOptions & { json?: boolean }) => {
		await withTransfer(options, async (transfer, config, logger) => {
			const opts = transferOptions(options, config);
			const api = opts.remoteModelId !== undefined ? ellieClient(config, logger) : undefined;
			const prepared = await transfer.prepare(api, opts);

			if (options.json) {
				const body = toEllieModel(prepared.document, {
					name: opts.modelName,
					level: opts.level,
					...(opts.folderId ? { folderId: opts.folderId } : {}),
				});
				console.log(JSON.stringify(body, null, 2));
			} else {
				printPlan(prepared.plan, prepared.document);
			}
		});
	});

	addCommonOptions(
		program
			.command("mermaid")
			.description("Export the model as a Mermaid ER diagram")
			.option("-o, --output <file>", "Output file (defaults to stdout)")
			.option("--no-columns", "Hide column details")
	).action(async (options: CommonOptions & { output?: string; columns: boolean }) => {
		await withTransfer(options, async (transfer, config) => {
			const { document } = await transfer.buildModel({
				schemas: options.schema ?? config.transfer.schemas,
				includeViews: options.views && config.transfer.includeViews,
				inferRelationships: config.transfer.inferRelationships,
				inferenceSuffixes: config.transfer.inferenceSuffixes,
			});
			const mermaid = generateMermaid(document, { showColumns: options.columns });

			if (options.output) {
				fs.writeFileSync(options.output, mermaid);
				console.log(`Exported to ${options.output}`);
			} else {
				console.log(mermaid);
			}
		});
	});

	addCommonOptions(addPlanOptions(
		program
			.command("transfer")
			.description("Create or update the Ellie model (interactive by default)")
			.option("-y, --yes", "Skip confirmation prompt")
			.option("--dry-run", "Plan against Ellie but send nothing")
	)).action(async (options: PlanCommandOptions & { yes?: boolean; dryRun?: boolean }) => {
		await withTransfer(options, async (transfer, config, logger) => {
			const opts = transferOptions(options, config);
			if (opts.remoteModelId === undefined) {
				requireFolderId(opts.folderId);
			}
			const api = ellieClient(config, logger);
			const prepared = await transfer.prepare(api, opts);

			printPlan(prepared.plan, prepared.document);
			if (prepared.plan.operations.length === 0) {
				return;
			}
			if (options.dryRun) {
				console.log("Dry run: nothing was sent to Ellie.");
				return;
			}

			if (!options.yes) {
				const confirmed = await confirm("\nApply these changes?");
				if (!confirmed) {
					console.log("Aborted.");
					return;
				}
			}

			const result = await transfer.execute(api, prepared, opts.level);
			console.log(`Model ${result.plan.target.modelName} ${opts.remoteModelId ? "updated" : "created"}.`);
			console.log(api.modelUrl(opts.level, result.modelId, opts.modelName));
			if (result.relationships.length === 0) {
				console.log("No relationships were found. Add foreign keys to the schema or draw them in Ellie.");
			}
		});
	});

	return program;
}

/**
 * The message printed for an error that ends the program.
 */
export function describeError(error: unknown): string {
	if (error instanceof EmptyModelError) {
		return `${error.message}. Check the schema names and whether views are excluded.`;
	}
	if (error instanceof TransferError) {
		return error.message;
	}
	return error instanceof Error ? error.stack ?? error.message : String(error);
}
