import { describe, expect, it } from "vitest";
import { describeThrown, isKind, matchesKind } from "./error-kind.js";

class ParseError extends SyntaxError {}

describe("error kinds", () => {
	describe("isKind", () => {
		it("matches instances and subclasses", () => {
			expect(isKind(new ParseError("x"), SyntaxError)).toBe(true);
			expect(isKind(new ParseError("x"), ParseError)).toBe(true);
			expect(isKind(new SyntaxError("x"), ParseError)).toBe(false);
		});

		it("never matches primitives", () => {
			expect(isKind("SyntaxError", SyntaxError)).toBe(false);
			expect(isKind(undefined, Error)).toBe(false);
		});
	});

	describe("matchesKind", () => {
		it("is true when any kind matches", () => {
			expect(matchesKind(new TypeError("t"), [RangeError, TypeError])).toBe(true);
		});

		it("is false for an empty kind list", () => {
			expect(matchesKind(new Error("e"), [])).toBe(false);
		});
	});

	describe("describeThrown", () => {
		it("uses name and message for errors", () => {
			expect(describeThrown(new RangeError("too big"))).toBe("RangeError: too big");
		});

		it("names the type of anything else", () => {
			expect(describeThrown("boom")).toBe("non-error string");
			expect(describeThrown(null)).toBe("non-error object");
		});
	});
});
