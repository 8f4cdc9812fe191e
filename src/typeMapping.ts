import type { SemanticType } from "./model";

/**
 * Map a native SQL type (Snowflake or ANSI information-schema spelling) to
 * the semantic type enum. Unknown types map to OTHER.
 */
export function mapNativeType(nativeType: string): SemanticType {
	const upper = nativeType.trim().toUpperCase();
	const params = /\(([^)]*)\)/.exec(upper)?.[1];
	const baseType = upper
		.replace(/\(.*?\)/g, "")
		.replace(/\s+WITH(OUT)?\s+(LOCAL\s+)?TIME\s+ZONE$/, "")
		.replace(/\s+/g, " ")
		.trim();

	switch (baseType) {
		case "INT":
		case "INTEGER":
		case "BIGINT":
		case "SMALLINT":
		case "TINYINT":
		case "BYTEINT":
		case "INT2":
		case "INT4":
		case "INT8":
		case "SERIAL":
		case "SMALLSERIAL":
		case "BIGSERIAL":
			return "INTEGER";

		case "NUMBER":
		case "NUMERIC":
		case "DECIMAL":
			return hasZeroScale(params) ? "INTEGER" : "DECIMAL";

		case "FLOAT":
		case "FLOAT4":
		case "FLOAT8":
		case "DOUBLE":
		case "DOUBLE PRECISION":
		case "REAL":
			return "DECIMAL";

		case "VARCHAR":
		case "CHAR":
		case "CHARACTER":
		case "CHARACTER VARYING":
		case "NCHAR":
		case "NVARCHAR":
		case "NVARCHAR2":
		case "CHAR VARYING":
		case "NCHAR VARYING":
		case "STRING":
		case "TEXT":
			return "TEXT";

		case "DATE":
			return "DATE";

		case "DATETIME":
		case "TIMESTAMP":
		case "TIMESTAMP_LTZ":
		case "TIMESTAMP_NTZ":
		case "TIMESTAMP_TZ":
		case "TIMESTAMPTZ":
			return "TIMESTAMP";

		case "BOOLEAN":
		case "BOOL":
			return "BOOLEAN";

		default:
			return "OTHER";
	}
}

function hasZeroScale(params: string | undefined): boolean {
	if (params === undefined) return false;
	const parts = params.split(",").map(p => p.trim());
	return parts.length === 2 && parts[1] === "0";
}
