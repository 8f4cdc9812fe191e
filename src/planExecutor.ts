import type { ModelDocument, ModelLevel, SyncPlan, SyncTarget } from "./model";
import type { EllieApi } from "./ellieClient";
import { toEllieModel, type EllieModelOptions } from "./ellieFormat";
import { mergePlan, transition } from "./syncPlanner";
import { TransferError } from "./errors";
import { silentLogger, type Logger } from "./logger";

export interface ExecuteOptions {
	readonly level: ModelLevel;
	/** The remote document the plan was computed against (update plans only) */
	readonly remote?: ModelDocument;
	readonly logger?: Logger;
}

export interface ExecuteResult {
	readonly plan: SyncPlan;
	readonly modelId: string | undefined;
}

/**
 * Submit a PLANNED plan to Ellie.
 *
 * A create plan posts the whole model. Update operations are merged into the
 * remote document and sent with a single update, so a retry after a failure
 * sends the same body again.
 */
export async function executePlan(api: EllieApi, plan: SyncPlan, options: ExecuteOptions): Promise<ExecuteResult> {
	const logger = options.logger ?? silentLogger;
	const { target } = plan;
	const submitted = transition(plan, "SUBMITTED");

	if (plan.operations.length === 0) {
		logger.info({ model: target.modelName }, "model already up to date");
		return { plan: transition(submitted, "CONFIRMED"), modelId: target.remoteModelId };
	}

	const create = plan.operations.find(op => op.type === "createModel");
	let modelId: string | undefined;

	if (create) {
		const payload = toEllieModel(create.payload, ellieOptions(target, options.level));
		modelId = await api.createModel(payload);
	} else {
		if (target.remoteModelId === undefined || options.remote === undefined) {
			throw new TransferError("An update plan needs the remote model id and its current document", { model: target.modelName });
		}
		const merged = mergePlan(options.remote, plan);
		const payload = toEllieModel(merged, ellieOptions(target, options.level));
		await api.updateModel(target.remoteModelId, payload);
		modelId = target.remoteModelId;
	}

	logger.info({ model: target.modelName, modelId, operations: plan.operations.length }, "plan confirmed");
	return { plan: transition(submitted, "CONFIRMED"), modelId };
}

function ellieOptions(target: SyncTarget, level: ModelLevel): EllieModelOptions {
	return {
		name: target.modelName,
		level,
		...(target.folderId !== "" ? { folderId: target.folderId } : {}),
	};
}
