/**
 * Logger wrapper — structured logging backed by pino.
 *
 * The library logs its own events at debug level (plus one warning for an
 * invalid environment), so the default level is "silent" and hosts opt in
 * through configuration or `setLogger()`.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

/** Log severity levels from least to most severe, plus "silent". */
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	trace(msg: string): void;
	trace(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type Method = "trace" | "debug" | "info" | "warn" | "error";

function forward(pinoLogger: pino.Logger, method: Method) {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[method](msgOrObj);
		} else {
			pinoLogger[method](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace: forward(pinoLogger, "trace"),
		debug: forward(pinoLogger, "debug"),
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and a custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ subject: "0" }, "no matching case");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const { destination } = config;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}
