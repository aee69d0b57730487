/**
 * Process-wide diagnostics logger used by dispatch and catcher internals.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import { getConfig, onConfigChange, takeEnvProblem } from "./config.js";
import { InlineFlowError } from "./errors.js";

let defaultLogger: Logger | undefined;
let customLogger: Logger | undefined;

onConfigChange((config) => {
	defaultLogger = createLogger({ level: config.logLevel }).child({ lib: "inline-flow" });
});

function reportEnvProblem(logger: Logger): void {
	const problem = takeEnvProblem();
	if (problem === undefined) return;
	const detail = problem instanceof InlineFlowError ? problem.toJSON() : { error: String(problem) };
	logger.warn(detail, "invalid environment configuration ignored, using defaults");
}

/** The logger in effect: the one passed to `setLogger()`, else one built from the config. */
export function getLogger(): Logger {
	const { logLevel } = getConfig();
	if (customLogger !== undefined) {
		reportEnvProblem(customLogger);
		return customLogger;
	}
	if (defaultLogger === undefined) {
		defaultLogger = createLogger({ level: logLevel }).child({ lib: "inline-flow" });
	}
	reportEnvProblem(defaultLogger);
	return defaultLogger;
}

/** Route diagnostics to `logger`; pass `undefined` to restore the config-driven default. */
export function setLogger(logger: Logger | undefined): void {
	customLogger = logger;
}
