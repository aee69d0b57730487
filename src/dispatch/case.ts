import type { Branch } from "./types.js";

/** Holds a condition until a producer is attached with `to()`. */
export class CaseBuilder {
	readonly condition: unknown;

	constructor(condition: unknown) {
		this.condition = condition;
	}

	/** Pair the condition with a producer. The producer runs only if this branch is selected. */
	to<T>(producer: () => T): Branch<T> {
		return Object.freeze({ condition: this.condition, producer });
	}
}

/**
 * Start a branch. The condition is evaluated at the call site, any value is
 * accepted and tested by truthiness.
 *
 * @example
 * ```ts
 * when(n > 0).to(() => "Positive")
 * ```
 */
export function when(condition: unknown): CaseBuilder {
	return new CaseBuilder(condition);
}
