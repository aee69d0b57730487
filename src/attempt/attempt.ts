/**
 * Attempt — a zero-argument computation held back until `unwrap()`.
 *
 * `map` composes transforms; `catch` moves into the Catcher combinators.
 * Both return new objects and leave the receiver untouched.
 *
 * @example
 * ```ts
 * const parsePort = (raw: string) =>
 *   attempt(() => JSON.parse(raw))
 *     .map(Number)
 *     .catch(SyntaxError)
 *     .fallback(8080)
 *     .unwrap();
 * ```
 */

import { type Result, tryCatch } from "../shared/result.js";
import { Catcher } from "./catcher.js";
import type { ErrorKind, KindInstance } from "./error-kind.js";

export class Attempt<T> {
	private readonly fn: () => T;

	constructor(fn: () => T) {
		this.fn = fn;
	}

	/** Run the computation. Errors propagate unchanged. */
	unwrap(): T {
		const fn = this.fn;
		return fn();
	}

	/** Direct-invocation form: a function that runs `unwrap()`. */
	toThunk(): () => T {
		return () => this.unwrap();
	}

	toResult(): Result<T, unknown> {
		return tryCatch(() => this.unwrap());
	}

	/** Apply `transform` to the result. Skipped when the computation throws. */
	map<U>(transform: (value: T) => U): Attempt<U> {
		const inner = this.fn;
		return new Attempt(() => transform(inner()));
	}

	/** Track `kinds` for the Catcher combinators that follow. */
	catch<K extends ErrorKind<unknown>[]>(...kinds: K): Catcher<T, KindInstance<K[number]>> {
		return new Catcher(this.fn, kinds);
	}
}

export function attempt<T>(fn: () => T): Attempt<T> {
	return new Attempt(fn);
}
