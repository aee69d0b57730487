import { inspect } from "node:util";
import { getConfig } from "./config.js";

/**
 * Single-line representation of a value for diagnostics, e.g. `0`, `'abc'`,
 * `{ id: 1 }`. Longer output is cut to `maxLength` characters ending in "…".
 */
export function describeValue(value: unknown, maxLength = getConfig().reprMaxLength): string {
	const repr = inspect(value, { depth: 2, breakLength: Number.POSITIVE_INFINITY, compact: true });
	if (repr.length <= maxLength) return repr;
	return `${repr.slice(0, Math.max(0, maxLength - 1))}…`;
}
