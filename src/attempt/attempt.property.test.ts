import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { raise } from "../effects/raise.js";
import { attempt } from "./attempt.js";

class Tracked extends Error {}
class Untracked extends Error {}

/** 0 succeeds, 1 throws a tracked kind, 2 throws an untracked kind. */
const outcome = fc.constantFrom(0, 1, 2);

function computation(kind: number, value: number): () => number {
	return () =>
		kind === 1 ? raise(new Tracked("t")) : kind === 2 ? raise(new Untracked("u")) : value;
}

describe("Attempt / Catcher (property-based)", () => {
	it("map(f) equals applying f to the base value", () => {
		fc.assert(
			fc.property(fc.integer(), fc.integer({ min: -50, max: 50 }), (value, k) => {
				const f = (x: number) => x * k + 1;
				expect(attempt(() => value).map(f).unwrap()).toBe(f(value));
			}),
		);
	});

	it("fallback(v) yields v exactly when a tracked kind is thrown", () => {
		fc.assert(
			fc.property(outcome, fc.integer(), fc.integer(), (kind, value, fallback) => {
				const result = attempt(computation(kind, value))
					.catch(Tracked)
					.fallback(fallback)
					.toResult();

				if (kind === 0) expect(result).toEqual({ ok: true, value });
				if (kind === 1) expect(result).toEqual({ ok: true, value: fallback });
				if (kind === 2) {
					expect(result.ok).toBe(false);
					if (!result.ok) expect(result.error).toBeInstanceOf(Untracked);
				}
			}),
		);
	});

	it("cleanup runs exactly once per resolution whatever the outcome", () => {
		fc.assert(
			fc.property(outcome, fc.integer(), fc.integer({ min: 1, max: 5 }), (kind, value, runs) => {
				let cleanups = 0;
				const chain = attempt(computation(kind, value)).catch(Tracked).cleanup(() => {
					cleanups++;
				});

				for (let i = 0; i < runs; i++) chain.toResult();

				expect(cleanups).toBe(runs);
			}),
		);
	});
});
