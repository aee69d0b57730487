/**
 * InlineFlowError hierarchy — structured errors raised by the library itself.
 *
 * Errors thrown by user computations are never wrapped in these types;
 * they propagate unchanged.
 */

/** Base error class for failures originating inside the library. */
export class InlineFlowError extends Error {
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(message: string, code: string, context: Record<string, unknown> = {}, hint?: string) {
		super(message);
		this.name = "InlineFlowError";
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Raised by strict dispatch when no branch condition holds. */
export class UnexpectedCaseError extends InlineFlowError {
	readonly subject: unknown;

	constructor(subject: unknown, repr: string) {
		super(
			`No matching case found for value: ${repr}`,
			"UNEXPECTED_CASE",
			{ subject: repr },
			"add a branch for this value or use select() with a default",
		);
		this.name = "UnexpectedCaseError";
		this.subject = subject;
	}
}

type ConfigErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Invalid or missing configuration. */
export class ConfigError extends InlineFlowError {
	constructor(message: string, context: ConfigErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for UnexpectedCaseError. */
export function isUnexpectedCase(e: unknown): e is UnexpectedCaseError {
	return e instanceof UnexpectedCaseError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
