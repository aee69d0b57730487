/**
 * Result<T, E> — a resolved outcome held as a value instead of a throw.
 *
 * Returned by `toResult()` on attempts and catchers, and by the validation
 * wrapper.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = unknown> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Accessors ────────────────────────────────────────────────────────

/** Type guard: narrows a Result to its success variant. */
export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

/** Type guard: narrows a Result to its error variant. */
export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/** Extract the success value or return the provided fallback on error. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

/**
 * Run `fn` and capture its outcome. The thrown value is kept as-is, so
 * non-Error throws survive the round trip.
 */
export function tryCatch<T>(fn: () => T): Result<T, unknown> {
	try {
		return ok(fn());
	} catch (e) {
		return err(e);
	}
}
