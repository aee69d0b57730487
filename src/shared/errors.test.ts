import { describe, expect, it } from "vitest";
import {
	ConfigError,
	InlineFlowError,
	UnexpectedCaseError,
	isConfigError,
	isUnexpectedCase,
} from "./errors.js";

describe("InlineFlowError hierarchy", () => {
	describe("error codes", () => {
		const cases: Array<[string, InlineFlowError, string]> = [
			["UnexpectedCaseError", new UnexpectedCaseError(0, "0"), "UNEXPECTED_CASE"],
			["ConfigError", new ConfigError("bad config"), "CONFIG_ERROR"],
		];

		it.each(cases)("%s has code %s", (name, error, expected) => {
			expect(error.code).toBe(expected);
			expect(error.name).toBe(name);
			expect(error).toBeInstanceOf(InlineFlowError);
			expect(error).toBeInstanceOf(Error);
		});
	});

	describe("UnexpectedCaseError", () => {
		it("keeps the subject value and puts its representation in the message", () => {
			const subject = { id: 7 };
			const error = new UnexpectedCaseError(subject, "{ id: 7 }");

			expect(error.subject).toBe(subject);
			expect(error.message).toBe("No matching case found for value: { id: 7 }");
			expect(error.context).toEqual({ subject: "{ id: 7 }" });
		});

		it("serializes with its hint", () => {
			const json = new UnexpectedCaseError("x", "'x'").toJSON();

			expect(json).toEqual({
				name: "UnexpectedCaseError",
				message: "No matching case found for value: 'x'",
				code: "UNEXPECTED_CASE",
				hint: "add a branch for this value or use select() with a default",
				context: { subject: "'x'" },
			});
		});
	});

	describe("ConfigError", () => {
		it("moves cause out of the context", () => {
			const cause = new Error("root");
			const error = new ConfigError("bad", { cause, key: "INLINE_FLOW_LOG_LEVEL" });

			expect(error.cause).toBe(cause);
			expect(error.context).toEqual({ key: "INLINE_FLOW_LOG_LEVEL" });
		});

		it("omits hint from JSON when none was given", () => {
			expect(new ConfigError("bad").toJSON()).toEqual({
				name: "ConfigError",
				message: "bad",
				code: "CONFIG_ERROR",
				context: {},
			});
		});
	});

	describe("type guards", () => {
		it("isUnexpectedCase", () => {
			expect(isUnexpectedCase(new UnexpectedCaseError(1, "1"))).toBe(true);
			expect(isUnexpectedCase(new ConfigError("x"))).toBe(false);
			expect(isUnexpectedCase("No matching case")).toBe(false);
		});

		it("isConfigError", () => {
			expect(isConfigError(new ConfigError("x"))).toBe(true);
			expect(isConfigError(new Error("x"))).toBe(false);
		});
	});
});
