/**
 * Result<T, E> for boundary code.
 *
 * Parsers and validators return a Result so adapters can report and skip a
 * bad record. Stage ingestion throws instead, so a failure inside a cascade
 * reaches whoever started it.
 */

export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Rewrites the error, e.g. to wrap a field issue into a record-level one. */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
	return result.ok ? result : err(fn(result.error));
}

/** Crosses back from a Result into throwing code. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
	if (!result.ok) throw result.error;
	return result.value;
}
