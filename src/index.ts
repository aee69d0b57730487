// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrapOr,
	tryCatch,
	InlineFlowError,
	UnexpectedCaseError,
	ConfigError,
	isUnexpectedCase,
	isConfigError,
	type InlineFlowConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	configure,
	getConfig,
	resetConfig,
	onConfigChange,
	getLogger,
	setLogger,
	describeValue,
} from "./shared/index.js";

// ── Dispatch ─────────────────────────────────────────────────────────
export {
	type Branch,
	type SelectOptions,
	CaseBuilder,
	Switch,
	when,
	switchOn,
} from "./dispatch/index.js";

// ── Deferred computations ────────────────────────────────────────────
export {
	type ErrorKind,
	type KindInstance,
	Attempt,
	Catcher,
	attempt,
	catcher,
	isKind,
	matchesKind,
} from "./attempt/index.js";

// ── Side effects ─────────────────────────────────────────────────────
export { type Applier, type Ret, apply, ret, tap, raise } from "./effects/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export {
	type ValidationIssue,
	ValidationError,
	validate,
	formatIssues,
	z,
} from "./lib/validation/index.js";
