import type {
	Entity,
	ModelDocument,
	ModelRelationship,
	PlanState,
	SyncOperation,
	SyncPlan,
	SyncTarget,
} from "./model";
import { PlanTooLargeError, TransferError } from "./errors";

export interface PlanOptions extends SyncTarget {
	/** Upper bound on the entities a single operation may carry */
	readonly maxEntities: number;
}

/**
 * Compute the operations that bring the remote model in line with `local`.
 *
 * Without a remote document the plan creates the model. With one, it
 * replaces new or changed entities and adds missing relationships. Remote
 * entities unknown locally are left alone. Planning a document against
 * itself yields no operations.
 */
export function planSync(local: ModelDocument, remote: ModelDocument | undefined, options: PlanOptions): SyncPlan {
	if (!Number.isInteger(options.maxEntities) || options.maxEntities < 1) {
		throw new TransferError(`maxEntities must be a positive integer, got ${options.maxEntities}`);
	}

	const operations: SyncOperation[] = remote === undefined
		? [{ type: "createModel", operation: "CREATE", payload: local }]
		: planUpdate(local, remote);

	for (const op of operations) {
		if (op.payload.entities.length > options.maxEntities) {
			throw new PlanTooLargeError(op.payload.entities.length, options.maxEntities, op.type);
		}
	}

	const target: SyncTarget = {
		modelName: options.modelName,
		folderId: options.folderId,
		...(options.remoteModelId !== undefined ? { remoteModelId: options.remoteModelId } : {}),
	};

	return transition({ state: "NEW", target, operations: [] }, "PLANNED", operations);
}

function planUpdate(local: ModelDocument, remote: ModelDocument): SyncOperation[] {
	const operations: SyncOperation[] = [];

	const remoteEntities = new Map(remote.entities.map(e => [e.id, e]));
	const changed = local.entities.filter(entity => {
		const existing = remoteEntities.get(entity.id);
		return existing === undefined || entityFingerprint(existing) !== entityFingerprint(entity);
	});
	if (changed.length > 0) {
		operations.push({
			type: "replaceEntities",
			operation: "UPDATE",
			payload: { entities: changed, relationships: [] },
		});
	}

	const remoteRelationships = new Set(remote.relationships.map(relationshipKey));
	const missing = local.relationships.filter(rel => !remoteRelationships.has(relationshipKey(rel)));
	if (missing.length > 0) {
		operations.push({
			type: "addRelationships",
			operation: "UPDATE",
			payload: { entities: [], relationships: missing },
		});
	}

	return operations;
}

/**
 * Apply a plan to a working copy of the remote document. The input is not
 * modified, and applying the same plan twice gives the same result.
 * Relationships whose entity or attribute is gone are dropped.
 */
export function mergePlan(remote: ModelDocument, plan: SyncPlan): ModelDocument {
	let entities = [...remote.entities];
	let relationships = [...remote.relationships];

	for (const op of plan.operations) {
		switch (op.type) {
			case "createModel":
				entities = [...op.payload.entities];
				relationships = [...op.payload.relationships];
				break;
			case "replaceEntities":
				for (const entity of op.payload.entities) {
					const index = entities.findIndex(e => e.id === entity.id);
					if (index === -1) {
						entities.push(entity);
					} else {
						entities[index] = entity;
					}
				}
				break;
			case "addRelationships": {
				const present = new Set(relationships.map(relationshipKey));
				for (const rel of op.payload.relationships) {
					if (!present.has(relationshipKey(rel))) {
						relationships.push(rel);
						present.add(relationshipKey(rel));
					}
				}
				break;
			}
		}
	}

	// Replaced entities may have lost attributes that remote relationships still use
	const attributes = new Map(entities.map(e => [e.id, new Set(e.attributes.map(a => a.name.toLowerCase()))]));
	const hasEndpoint = (entityId: string, attribute: string): boolean =>
		attributes.get(entityId)?.has(attribute.toLowerCase()) ?? false;

	return {
		entities,
		relationships: relationships.filter(rel =>
			hasEndpoint(rel.sourceEntityId, rel.sourceAttribute) && hasEndpoint(rel.targetEntityId, rel.targetAttribute)
		),
	};
}

const NEXT_STATE: Readonly<Record<PlanState, PlanState | undefined>> = {
	NEW: "PLANNED",
	PLANNED: "SUBMITTED",
	SUBMITTED: "CONFIRMED",
	CONFIRMED: undefined,
};

/**
 * Move a plan one step along NEW → PLANNED → SUBMITTED → CONFIRMED.
 */
export function transition(plan: SyncPlan, next: PlanState, operations = plan.operations): SyncPlan {
	if (NEXT_STATE[plan.state] !== next) {
		throw new TransferError(`Cannot move a ${plan.state} plan to ${next}`, { from: plan.state, to: next });
	}
	return { ...plan, state: next, operations };
}

/**
 * The parts of an entity that survive an export from Ellie.
 */
function entityFingerprint(entity: Entity): string {
	return JSON.stringify([
		entity.name,
		entity.attributes.map(a => [a.name, a.nativeType, a.isPrimaryKey, a.isForeignKey]),
	]);
}

function relationshipKey(rel: ModelRelationship): string {
	return [
		rel.sourceEntityId,
		rel.sourceAttribute.toLowerCase(),
		rel.targetEntityId,
		rel.targetAttribute.toLowerCase(),
	].join("|");
}
