import { z } from "zod";
import type { Entity, ModelDocument, ModelLevel, ModelRelationship } from "./model";
import { mapNativeType } from "./typeMapping";
import { TransferError } from "./errors";

// === Wire types ===

export interface EllieAttribute {
	name: string;
	metadata: {
		PK: boolean;
		FK: boolean;
		"DATA TYPE": string;
	};
}

export interface EllieEntity {
	id: string;
	name: string;
	attributes: EllieAttribute[];
}

export interface EllieRelationship {
	/** The referenced ("one") side */
	sourceEntity: { id: string; name: string; startType: "one"; attributeNames: string[] };
	/** The referencing side */
	targetEntity: { id: string; name: string; endType: "one" | "many"; attributeNames: string[] };
	description: string[];
}

export interface EllieModelPayload {
	model: {
		name: string;
		level: ModelLevel;
		folderId?: number;
		entities: EllieEntity[];
		relationships: EllieRelationship[];
	};
}

export interface EllieModelOptions {
	readonly name: string;
	readonly level: ModelLevel;
	readonly folderId?: string;
}

/**
 * Convert a model document into the body Ellie's model endpoints accept.
 */
export function toEllieModel(document: ModelDocument, options: EllieModelOptions): EllieModelPayload {
	const byId = new Map(document.entities.map(e => [e.id, e]));

	const entities = document.entities.map((entity): EllieEntity => ({
		id: entity.id,
		name: entity.name,
		attributes: entity.attributes.map(attr => ({
			name: attr.name,
			metadata: {
				PK: attr.isPrimaryKey,
				FK: attr.isForeignKey,
				"DATA TYPE": attr.nativeType,
			},
		})),
	}));

	const relationships = document.relationships.map((rel): EllieRelationship => ({
		sourceEntity: {
			id: rel.targetEntityId,
			name: entityName(byId, rel.targetEntityId),
			startType: "one",
			attributeNames: [rel.targetAttribute],
		},
		targetEntity: {
			id: rel.sourceEntityId,
			name: entityName(byId, rel.sourceEntityId),
			endType: rel.cardinality === "ONE_TO_ONE" ? "one" : "many",
			attributeNames: [rel.sourceAttribute],
		},
		description: [],
	}));

	return {
		model: {
			name: options.name,
			level: options.level,
			...(options.folderId !== undefined ? { folderId: parseFolderId(options.folderId) } : {}),
			entities,
			relationships,
		},
	};
}

function entityName(byId: ReadonlyMap<string, Entity>, id: string): string {
	const entity = byId.get(id);
	if (!entity) {
		throw new TransferError(`Relationship references entity ${id}, which is not in the document`, { entity: id });
	}
	return entity.name;
}

export function parseFolderId(folderId: string): number {
	if (!/^\d+$/.test(folderId.trim())) {
		throw new TransferError(`Folder ID must be a number, got "${folderId}"`, { folderId });
	}
	return Number(folderId.trim());
}

// === Exported model parsing ===

const id = z.union([z.string(), z.number()]).transform(String);

const ellieAttributeSchema = z.object({
	name: z.string(),
	metadata: z.object({
		PK: z.boolean().optional(),
		FK: z.boolean().optional(),
		"DATA TYPE": z.string().optional(),
	}).partial().nullish(),
});

const ellieEntitySchema = z.object({
	id,
	name: z.string(),
	attributes: z.array(ellieAttributeSchema).default([]),
});

const ellieEndpointSchema = z.object({
	id,
	attributeNames: z.array(z.string()).default([]),
	endType: z.string().optional(),
});

const ellieRelationshipSchema = z.object({
	sourceEntity: ellieEndpointSchema,
	targetEntity: ellieEndpointSchema,
});

const ellieModelSchema = z.object({
	id: id.optional(),
	entities: z.array(ellieEntitySchema).default([]),
	relationships: z.array(ellieRelationshipSchema).default([]),
});

const ellieExportSchema = z.union([
	z.object({ model: ellieModelSchema }).transform(body => body.model),
	ellieModelSchema,
]);

/**
 * Map a model exported from Ellie back to a document. Relationships drawn
 * without attributes are skipped; composite ones split per attribute pair.
 */
export function fromEllieModel(json: unknown): ModelDocument {
	const result = ellieExportSchema.safeParse(json);
	if (!result.success) {
		const issue = result.error.issues[0];
		const path = issue?.path.join(".") ?? "";
		throw new TransferError(`Unexpected model format from Ellie: ${path ? `${path}: ` : ""}${issue?.message ?? "invalid"}`);
	}
	const model = result.data;

	const entities = model.entities.map((entity): Entity => ({
		id: entity.id,
		name: entity.name,
		kind: "TABLE",
		attributes: entity.attributes.map(attr => {
			const nativeType = attr.metadata?.["DATA TYPE"] ?? "";
			return {
				name: attr.name,
				type: mapNativeType(nativeType),
				nativeType,
				isNullable: true,
				isPrimaryKey: attr.metadata?.PK ?? false,
				isForeignKey: attr.metadata?.FK ?? false,
			};
		}),
	}));

	const relationships: ModelRelationship[] = [];
	for (const rel of model.relationships) {
		const referenced = rel.sourceEntity;
		const referencing = rel.targetEntity;
		const pairs = Math.min(referenced.attributeNames.length, referencing.attributeNames.length);
		for (let i = 0; i < pairs; i++) {
			relationships.push({
				sourceEntityId: referencing.id,
				sourceAttribute: referencing.attributeNames[i],
				targetEntityId: referenced.id,
				targetAttribute: referenced.attributeNames[i],
				origin: "EXPLICIT",
				cardinality: referencing.endType === "one" ? "ONE_TO_ONE" : "ONE_TO_MANY",
			});
		}
	}

	return { entities, relationships };
}
