/**
 * DeskError hierarchy — structured error classification.
 *
 * Every error carries a category and a stable code. Boundary adapters use the
 * category to decide whether a record is skipped (invalid input) or whether the
 * failure surfaces to the caller of a cascade.
 */

/** Error categories for desk operations. */
export const ErrorCategory = {
	InvalidInput: "invalid_input",
	NotFound: "not_found",
	Unsupported: "unsupported",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing DeskError subclasses with optional cause chain. */
interface DeskErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & DeskErrorOptions;

/** Base error class for every failure raised by the desk. */
export class DeskError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "DeskError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	/** True when the failure came from an input record rather than from desk state. */
	get isInputError(): boolean {
		return this.category === ErrorCategory.InvalidInput;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Lookup of a key the store has never seen. */
export class NotFoundError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NOT_FOUND", ErrorCategory.NotFound, context);
		this.name = "NotFoundError";
	}
}

/** An event references an instrument outside the static catalog. */
export class UnknownInstrumentError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNKNOWN_INSTRUMENT", ErrorCategory.InvalidInput, context);
		this.name = "UnknownInstrumentError";
	}
}

/** A trade references a book outside the fixed book set. */
export class UnknownBookError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNKNOWN_BOOK", ErrorCategory.InvalidInput, context);
		this.name = "UnknownBookError";
	}
}

/** Text or a record that does not match the expected grammar. */
export class MalformedInputError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "MALFORMED_INPUT", ErrorCategory.InvalidInput, context);
		this.name = "MalformedInputError";
	}
}

/** A capability that exists in the contract but has no defined behavior. */
export class UnsupportedOperationError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNSUPPORTED_OPERATION", ErrorCategory.Unsupported, context);
		this.name = "UnsupportedOperationError";
	}
}

/** A lifecycle event that the inquiry state machine does not allow. */
export class InvalidTransitionError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_TRANSITION", ErrorCategory.InvalidInput, context);
		this.name = "InvalidTransitionError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends DeskError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Wrap anything thrown into a DeskError, keeping DeskErrors as they are. */
export function toDeskError(error: unknown): DeskError {
	if (error instanceof DeskError) return error;
	if (error instanceof Error) {
		return new DeskError(error.message, "INTERNAL_ERROR", ErrorCategory.Fatal, { cause: error });
	}
	return new DeskError(String(error), "INTERNAL_ERROR", ErrorCategory.Fatal, { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

export function isUnknownInstrumentError(e: unknown): e is UnknownInstrumentError {
	return e instanceof UnknownInstrumentError;
}

export function isUnknownBookError(e: unknown): e is UnknownBookError {
	return e instanceof UnknownBookError;
}

export function isMalformedInputError(e: unknown): e is MalformedInputError {
	return e instanceof MalformedInputError;
}

export function isUnsupportedOperationError(e: unknown): e is UnsupportedOperationError {
	return e instanceof UnsupportedOperationError;
}

export function isInvalidTransitionError(e: unknown): e is InvalidTransitionError {
	return e instanceof InvalidTransitionError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
