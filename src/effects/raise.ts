/**
 * Throw from expression position, e.g. `value ?? raise(new RangeError("missing"))`.
 */
export function raise(error: unknown): never {
	throw error;
}
