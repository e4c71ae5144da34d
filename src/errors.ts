/**
 * Error taxonomy for the moderation core.
 *
 * Mutations that target a missing record are not errors: they report `false`.
 *
 * @module errors
 */

export type ModerationErrorCode = "VALIDATION_ERROR" | "TRANSIENT_STORE_ERROR";

/** Base class for errors raised by the moderation core. */
export class ModerationError extends Error {
	readonly code: ModerationErrorCode;

	constructor(message: string, code: ModerationErrorCode, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Rejected input to a mutation. Raised before anything is written.
 */
export class ValidationError extends ModerationError {
	readonly field: string;

	constructor(field: string, message: string) {
		super(message, "VALIDATION_ERROR");
		this.field = field;
	}
}

/**
 * Storage unreachable, busy or closed. The message pipeline treats it as Allow.
 */
export class TransientStoreError extends ModerationError {
	readonly operation: string;

	constructor(operation: string, cause: unknown) {
		super(
			`Store unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
			"TRANSIENT_STORE_ERROR",
			{ cause },
		);
		this.operation = operation;
	}
}
