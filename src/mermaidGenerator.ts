import type { ModelDocument, SemanticType } from "./model";

export interface MermaidOptions {
	/** Include attribute details in entities */
	readonly showColumns?: boolean;
}

/**
 * Generate a Mermaid ER diagram from a model document.
 */
export function generateMermaid(document: ModelDocument, options: MermaidOptions = {}): string {
	const showColumns = options.showColumns ?? true;
	const names = new Map(document.entities.map(e => [e.id, escapeEntityName(e.name)]));

	const lines: string[] = ["erDiagram"];

	for (const entity of document.entities) {
		lines.push(`    ${escapeEntityName(entity.name)} {`);
		if (showColumns) {
			for (const attr of entity.attributes) {
				const isPK = attr.isPrimaryKey;
				const isFK = attr.isForeignKey;
				// Mermaid supports comma-separated keys like "PK,FK" but not "PK FK"
				const keyMarker = isPK && isFK ? " PK,FK" : isPK ? " PK" : isFK ? " FK" : "";
				const nullComment = attr.isNullable ? ' "nullable"' : "";
				lines.push(
					`        ${mermaidType(attr.type)} ${escapeAttributeName(attr.name)}${keyMarker}${nullComment}`
				);
			}
		}
		lines.push("    }");
	}

	for (const rel of document.relationships) {
		const target = names.get(rel.targetEntityId) ?? rel.targetEntityId;
		const source = names.get(rel.sourceEntityId) ?? rel.sourceEntityId;

		// Explicit foreign keys use a solid line, inferred ones a dotted line
		const lineStyle = rel.origin === "EXPLICIT" ? "--" : "..";
		const sourceEnd = rel.cardinality === "ONE_TO_ONE" ? "||" : "o{";
		const label = rel.sourceAttribute.replace(/"/g, "'");

		// targetEntity (referenced) has exactly one (||), sourceEntity (FK holder) has many (o{)
		lines.push(`    ${target} ||${lineStyle}${sourceEnd} ${source} : "${label}"`);
	}

	return lines.join("\n");
}

/**
 * Escape entity names (table names) for Mermaid ER diagrams.
 * Entity names can be quoted if they contain special characters.
 */
function escapeEntityName(name: string): string {
	if (/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name)) {
		return name;
	}
	return `"${name.replace(/"/g, '\\"')}"`;
}

/**
 * Attributes cannot be quoted (quotes mean comments in Mermaid ER).
 */
function escapeAttributeName(name: string): string {
	return name.replace(/[^a-zA-Z0-9_]/g, "_");
}

function mermaidType(type: SemanticType): string {
	switch (type) {
		case "INTEGER":
			return "int";
		case "DECIMAL":
			return "decimal";
		case "TEXT":
			return "string";
		case "DATE":
			return "date";
		case "TIMESTAMP":
			return "timestamp";
		case "BOOLEAN":
			return "bool";
		case "OTHER":
			return "other";
	}
}
