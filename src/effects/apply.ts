/**
 * apply — feed a computed value to a function and hand the value back.
 *
 * Unlike the other combinators in this package, an Applier runs its producer
 * immediately; the returned thunk only replays the value it already computed.
 */

export interface Applier<T> {
	/** Compute the value once, pass it to the function, return a thunk of the value. */
	(producer: () => T): () => T;
	/** Compute the iterable once, feed each element to the function, return a thunk of it. */
	foreach<I extends Iterable<T>>(producer: () => I): () => I;
}

function makeApplier<T>(fn: (value: T) => unknown): Applier<T> {
	const applier = (producer: () => T): (() => T) => {
		const result = producer();
		fn(result);
		return () => result;
	};
	return Object.assign(applier, {
		foreach<I extends Iterable<T>>(producer: () => I): () => I {
			const results = producer();
			for (const item of results) fn(item);
			return () => results;
		},
	});
}

/** Like `apply`, but spreads each tuple into `fn`'s positional parameters. */
function unpackTo<A extends readonly unknown[]>(fn: (...args: A) => unknown): Applier<A> {
	return makeApplier<A>((args) => fn(...args));
}

function applyTo<T>(fn: (value: T) => unknown): Applier<T> {
	return makeApplier(fn);
}

/**
 * @example
 * ```ts
 * const seen: number[] = [];
 * apply((n: number) => seen.push(n))(() => 1);
 * apply((n: number) => seen.push(n)).foreach(() => [2, 3]);
 * const pairs: Array<[number, number]> = [[2, 5]];
 * apply.unpackTo((a: number, b: number) => seen.push(a * b)).foreach(() => pairs);
 * ```
 */
export const apply = Object.assign(applyTo, { unpackTo });
