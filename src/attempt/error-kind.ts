/**
 * Error kinds — the classes a catcher is allowed to intercept.
 *
 * Matching is `instanceof`, so a kind also catches its subclasses.
 * Thrown primitives never match.
 */

/** Any error class whose instances are `E`. */
export type ErrorKind<E> = abstract new (...args: never[]) => E;

/** Instance type of a kind, distributed over unions of kinds. */
export type KindInstance<K> = K extends ErrorKind<infer E> ? E : never;

/** Type guard: the thrown value is an instance of `kind`. */
export function isKind<E>(error: unknown, kind: ErrorKind<E>): error is E {
	return error instanceof kind;
}

/** True when the thrown value is an instance of at least one of `kinds`. */
export function matchesKind(error: unknown, kinds: readonly ErrorKind<unknown>[]): boolean {
	return kinds.some((kind) => error instanceof kind);
}

/** Short label for a thrown value, used in diagnostics. */
export function describeThrown(error: unknown): string {
	if (error instanceof Error) return `${error.name}: ${error.message}`;
	return `non-error ${typeof error}`;
}
