import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { captureLogs } from "../__tests__/capture-logs.js";
import { configure, resetConfig } from "./config.js";
import { getLogger, setLogger } from "./diagnostics.js";

beforeEach(() => {
	vi.stubEnv("INLINE_FLOW_LOG_LEVEL", "");
	vi.stubEnv("INLINE_FLOW_REPR_MAX_LENGTH", "");
	resetConfig();
});

afterEach(() => {
	vi.unstubAllEnvs();
	setLogger(undefined);
	resetConfig();
});

describe("diagnostics logger", () => {
	it("returns the same default logger until the config changes", () => {
		const first = getLogger();

		expect(getLogger()).toBe(first);
		configure({ logLevel: "debug" });
		expect(getLogger()).not.toBe(first);
	});

	it("prefers a logger passed to setLogger", () => {
		const { logger, entries } = captureLogs();
		setLogger(logger);

		getLogger().debug({ step: 1 }, "custom");

		expect(entries()).toHaveLength(1);
		expect(entries()[0]).toMatchObject({ step: 1, msg: "custom" });
	});

	it("keeps the custom logger across config changes", () => {
		const { logger } = captureLogs();
		setLogger(logger);
		configure({ logLevel: "info" });

		expect(getLogger()).toBe(logger);
	});

	it("restores the default when cleared", () => {
		const { logger } = captureLogs();
		setLogger(logger);
		setLogger(undefined);

		expect(getLogger()).not.toBe(logger);
	});
});
