export type ErrorContext = Readonly<Record<string, string | number | undefined>>;

/**
 * Base class of every error raised by the transfer pipeline.
 * `context` names the tables, columns or values involved.
 */
export class TransferError extends Error {
	constructor(message: string, readonly context: ErrorContext = {}) {
		super(message);
		this.name = new.target.name;
	}
}

/** Input metadata is inconsistent (unknown table, table without columns, bad row). */
export class MalformedCatalogError extends TransferError { }

/** Nothing left to transfer after filtering. */
export class EmptyModelError extends TransferError {
	constructor(message = "The schema contains no tables to model", context: ErrorContext = {}) {
		super(message, context);
	}
}

/** An operation would carry more entities than the configured maximum. */
export class PlanTooLargeError extends TransferError {
	constructor(readonly entityCount: number, readonly maxEntities: number, operation: string) {
		super(
			`Operation ${operation} would transfer ${entityCount} entities, more than the maximum of ${maxEntities}. ` +
			"Select fewer schemas, exclude views or raise maxEntities.",
			{ operation, entityCount, maxEntities }
		);
	}
}

export class ConfigError extends TransferError { }

export class EllieApiError extends TransferError {
	constructor(message: string, readonly status: number | undefined, readonly body: string) {
		super(message, { status, body });
	}
}
