import { describe, expect, it } from "vitest";
import { err, isErr, isOk, ok, tryCatch, unwrapOr } from "./result.js";

describe("Result", () => {
	describe("ok / err factories", () => {
		it("ok wraps a value", () => {
			const r = ok(42);
			expect(r.ok).toBe(true);
			if (r.ok) expect(r.value).toBe(42);
		});

		it("err wraps an error", () => {
			const r = err("something failed");
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBe("something failed");
		});
	});

	describe("isOk / isErr type guards", () => {
		it("correctly narrows ok result", () => {
			const r = ok(10);
			expect(isOk(r)).toBe(true);
			expect(isErr(r)).toBe(false);
		});

		it("correctly narrows err result", () => {
			const r = err("fail");
			expect(isOk(r)).toBe(false);
			expect(isErr(r)).toBe(true);
		});
	});

	describe("unwrapOr", () => {
		it("returns the value for ok", () => {
			expect(unwrapOr(ok(5), 0)).toBe(5);
		});

		it("returns the fallback for err", () => {
			expect(unwrapOr(err("nope"), 0)).toBe(0);
		});
	});

	describe("tryCatch", () => {
		it("captures a returned value", () => {
			expect(tryCatch(() => "done")).toEqual(ok("done"));
		});

		it("captures the thrown error by identity", () => {
			const error = new RangeError("out of range");
			const r = tryCatch(() => {
				throw error;
			});
			expect(isErr(r)).toBe(true);
			if (!r.ok) expect(r.error).toBe(error);
		});

		it("keeps thrown non-Error values as they are", () => {
			const r = tryCatch(() => {
				throw "plain string";
			});
			expect(r).toEqual(err("plain string"));
		});
	});
});
