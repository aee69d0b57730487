/**
 * Library configuration.
 *
 * Values come from defaults, then INLINE_FLOW_* environment variables, then
 * explicit `configure()` calls, in increasing precedence.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { tryCatch } from "./result.js";

export interface InlineFlowConfig {
	/** Level of the default diagnostics logger */
	readonly logLevel: LogLevel;
	/** Maximum characters of a subject representation in error messages */
	readonly reprMaxLength: number;
}

export const DEFAULT_CONFIG: InlineFlowConfig = {
	logLevel: "silent",
	reprMaxLength: 120,
};

const POSITIVE_INT = "must be a positive integer";

const envSchema = z.object({
	INLINE_FLOW_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
	INLINE_FLOW_REPR_MAX_LENGTH: z
		.string()
		.regex(/^\d+$/, POSITIVE_INT)
		.transform((raw) => Number.parseInt(raw, 10))
		.refine((n) => n > 0, POSITIVE_INT)
		.optional(),
});

const overridesSchema = z.object({
	logLevel: z.enum(LOG_LEVELS).optional(),
	reprMaxLength: z.number().int(POSITIVE_INT).positive(POSITIVE_INT).optional(),
});

/** Mutable builder shape for constructing Partial<InlineFlowConfig>. */
interface MutableConfig {
	logLevel?: LogLevel;
	reprMaxLength?: number;
}

function pick(logLevel: LogLevel | undefined, reprMaxLength: number | undefined): MutableConfig {
	const result: MutableConfig = {};
	if (logLevel !== undefined) result.logLevel = logLevel;
	if (reprMaxLength !== undefined) result.reprMaxLength = reprMaxLength;
	return result;
}

/**
 * Reads config values from environment variables.
 * Supported: INLINE_FLOW_LOG_LEVEL, INLINE_FLOW_REPR_MAX_LENGTH.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<InlineFlowConfig> {
	const parsed = validate(envSchema, {
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		INLINE_FLOW_LOG_LEVEL: env["INLINE_FLOW_LOG_LEVEL"] || undefined,
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		INLINE_FLOW_REPR_MAX_LENGTH: env["INLINE_FLOW_REPR_MAX_LENGTH"] || undefined,
	});
	if (!parsed.ok) {
		throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error.issues)}`, {
			cause: parsed.error,
		});
	}
	return pick(parsed.value.INLINE_FLOW_LOG_LEVEL, parsed.value.INLINE_FLOW_REPR_MAX_LENGTH);
}

let current: InlineFlowConfig | undefined;
let envProblem: unknown;
const listeners: Array<(config: InlineFlowConfig) => void> = [];

/** Env values over the defaults; an invalid environment is recorded and ignored. */
function loadConfig(): InlineFlowConfig {
	const fromEnv = tryCatch(() => configFromEnv());
	if (fromEnv.ok) return { ...DEFAULT_CONFIG, ...fromEnv.value };
	envProblem = fromEnv.error;
	return DEFAULT_CONFIG;
}

/** The active configuration; env values are read on first access. */
export function getConfig(): InlineFlowConfig {
	if (current === undefined) {
		current = loadConfig();
	}
	return current;
}

/**
 * The error from reading an invalid environment, handed out once.
 * Returns `undefined` when the environment was valid or already reported.
 */
export function takeEnvProblem(): unknown {
	const problem = envProblem;
	envProblem = undefined;
	return problem;
}

/**
 * Override parts of the active configuration.
 * @throws ConfigError if an override holds an invalid value
 */
export function configure(overrides: Partial<InlineFlowConfig>): InlineFlowConfig {
	const parsed = validate(overridesSchema, overrides);
	if (!parsed.ok) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error.issues)}`, {
			cause: parsed.error,
		});
	}
	const next = {
		...getConfig(),
		...pick(parsed.value.logLevel, parsed.value.reprMaxLength),
	};
	current = next;
	for (const listener of listeners) listener(next);
	return next;
}

/** Drop overrides; the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
	current = undefined;
	envProblem = undefined;
	for (const listener of listeners) listener(getConfig());
}

/** Subscribe to configuration changes. Returns an unsubscribe function. */
export function onConfigChange(listener: (config: InlineFlowConfig) => void): () => void {
	listeners.push(listener);
	return () => {
		const i = listeners.indexOf(listener);
		if (i >= 0) listeners.splice(i, 1);
	};
}
