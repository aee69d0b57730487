/**
 * Switch — first-match dispatch over pre-computed branch conditions.
 *
 * Two policies share one linear pass:
 * - `exhaustive()` throws UnexpectedCaseError when nothing matches.
 * - `select()` falls back to a default value, a default factory, or `undefined`.
 *
 * Only the selected producer is invoked.
 */

import { describeValue } from "../shared/describe.js";
import { getLogger } from "../shared/diagnostics.js";
import { UnexpectedCaseError } from "../shared/errors.js";
import type { Branch, SelectOptions } from "./types.js";

function firstMatch<T>(branches: readonly Branch<T>[]): Branch<T> | undefined {
	for (const branch of branches) {
		if (branch.condition) return branch;
	}
	return undefined;
}

export class Switch<S> {
	/** Value under inspection. Used for diagnostics only, never for matching. */
	readonly subject: S;

	constructor(subject: S) {
		this.subject = subject;
	}

	/**
	 * Resolve to the first matching branch's result.
	 * @throws UnexpectedCaseError when no condition is truthy
	 */
	exhaustive<T>(...branches: readonly Branch<T>[]): T {
		const match = firstMatch(branches);
		if (match === undefined) {
			const repr = describeValue(this.subject);
			getLogger().debug({ subject: repr, branches: branches.length }, "no matching case");
			throw new UnexpectedCaseError(this.subject, repr);
		}
		return match.producer();
	}

	/** Resolve to the first matching branch's result, or `undefined` when none match. */
	select<T>(branches: readonly Branch<T>[]): T | undefined;
	/** Resolve to the first matching branch's result, or the default when none match. */
	select<T, D>(branches: readonly Branch<T>[], options: SelectOptions<D>): T | D;
	select<T, D>(branches: readonly Branch<T>[], options?: SelectOptions<D>): T | D | undefined {
		const match = firstMatch(branches);
		if (match !== undefined) return match.producer();

		if (options === undefined) return undefined;
		if ("default" in options) {
			getLogger().debug({ subject: describeValue(this.subject) }, "default value taken");
			return options.default;
		}
		if (options.defaultFactory !== undefined) {
			getLogger().debug({ subject: describeValue(this.subject) }, "default factory taken");
			return options.defaultFactory();
		}
		return undefined;
	}
}

/**
 * Begin a dispatch on `subject`.
 *
 * @example
 * ```ts
 * const sign = (n: number) =>
 *   switchOn(n).exhaustive(
 *     when(n < 0).to(() => "Negative"),
 *     when(n === 0).to(() => "Zero"),
 *     when(n > 0).to(() => "Positive"),
 *   );
 * ```
 */
export function switchOn<S>(subject: S): Switch<S> {
	return new Switch(subject);
}
