/**
 * Dispatch types — branches and the permissive-mode default policy.
 *
 * Branches producing different types need the union spelled out, e.g.
 * `switchOn(x).exhaustive<string | number>(...)`.
 */

/** A condition paired with a deferred producer. The condition is fixed when the branch is built. */
export interface Branch<T> {
	readonly condition: unknown;
	readonly producer: () => T;
}

/**
 * What `select()` yields when no branch matches. `default` wins whenever the
 * key is present, including falsy values such as `0` or `""`.
 */
export type SelectOptions<D> =
	| { readonly default: D; readonly defaultFactory?: never }
	| { readonly defaultFactory: () => D; readonly default?: never };
