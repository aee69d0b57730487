/**
 * Catcher — recovery and cleanup combinators over a deferred computation.
 *
 * Every combinator wraps the previous function and returns a new Catcher,
 * so the innermost step runs first and existing chains can be forked freely.
 * Nothing runs until `unwrap()`.
 */

import { getLogger } from "../shared/diagnostics.js";
import { type Result, tryCatch } from "../shared/result.js";
import {
	type ErrorKind,
	type KindInstance,
	describeThrown,
	isKind,
	matchesKind,
} from "./error-kind.js";

/**
 * @typeParam T - value produced on success
 * @typeParam E - union of the tracked error kinds' instances
 */
export class Catcher<T, E = never> {
	/** Kinds `fallback()` intercepts, in the order given to `catch()`. */
	readonly kinds: readonly ErrorKind<unknown>[];
	private readonly fn: () => T;

	constructor(fn: () => T, kinds: readonly ErrorKind<unknown>[]) {
		this.fn = fn;
		this.kinds = Object.freeze([...kinds]);
	}

	/** Resolve to `value` when the computation throws one of the tracked kinds. */
	fallback<R>(value: R): Catcher<T | R, E> {
		const inner = this.fn;
		const kinds = this.kinds;
		return new Catcher<T | R, E>(() => {
			try {
				return inner();
			} catch (error) {
				if (!matchesKind(error, kinds)) throw error;
				getLogger().debug({ error: describeThrown(error) }, "fallback value taken");
				return value;
			}
		}, kinds);
	}

	/**
	 * Resolve to `handler(error)` when the computation throws an instance of `kind`.
	 * Other errors propagate, including tracked kinds that are not `kind`.
	 */
	recover<X, R>(kind: ErrorKind<X>, handler: (error: X) => R): Catcher<T | R, E> {
		const inner = this.fn;
		return new Catcher<T | R, E>(() => {
			try {
				return inner();
			} catch (error) {
				if (!isKind(error, kind)) throw error;
				getLogger().debug({ error: describeThrown(error) }, "recovering");
				return handler(error);
			}
		}, this.kinds);
	}

	/**
	 * Run `action` after the computation on both the success and failure path.
	 * The outcome is left alone unless `action` throws, in which case its error wins.
	 */
	cleanup(action: () => unknown): Catcher<T, E> {
		const inner = this.fn;
		return new Catcher<T, E>(() => {
			try {
				return inner();
			} finally {
				runCleanup(action);
			}
		}, this.kinds);
	}

	/** Run the chain, returning its value or throwing whatever escaped it. */
	unwrap(): T {
		const fn = this.fn;
		return fn();
	}

	/** The chain as a plain zero-argument function. */
	toThunk(): () => T {
		return () => this.unwrap();
	}

	/** Run the chain, capturing an escaping error instead of throwing it. */
	toResult(): Result<T, unknown> {
		return tryCatch(() => this.unwrap());
	}
}

function runCleanup(action: () => unknown): void {
	try {
		action();
	} catch (error) {
		getLogger().debug({ error: describeThrown(error) }, "cleanup action failed");
		throw error;
	}
}

/** Build a catcher directly from a computation and the kinds it tracks. */
export function catcher<T, K extends ErrorKind<unknown>[]>(
	fn: () => T,
	...kinds: K
): Catcher<T, KindInstance<K[number]>> {
	return new Catcher(fn, kinds);
}
