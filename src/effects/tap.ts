/**
 * tap — sequence side effects inside a single expression.
 *
 * JavaScript evaluates arguments left to right before the call, so by the
 * time `tap` runs every side effect has already happened in source order.
 * `tap` only picks the return value.
 *
 * @example
 * ```ts
 * const addAndLog = (a: number, b: number) =>
 *   tap(log.push(`${a} + ${b}`), log.push("done"), ret(a + b));
 * ```
 */

const RET = Symbol("inline-flow.ret");

/** Marks the value `tap` should return. */
export interface Ret<T> {
	readonly [RET]: true;
	readonly value: T;
}

export function ret<T>(value: T): Ret<T> {
	return { [RET]: true, value };
}

function isRet(arg: unknown): arg is Ret<unknown> {
	return typeof arg === "object" && arg !== null && RET in arg;
}

export function tap<T>(...args: [...sideEffects: unknown[], ret: Ret<T>]): T;
export function tap(...sideEffects: unknown[]): undefined;
export function tap(...args: unknown[]): unknown {
	const last = args[args.length - 1];
	return isRet(last) ? last.value : undefined;
}
