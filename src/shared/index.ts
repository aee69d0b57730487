export { type Result, ok, err, isOk, isErr, unwrapOr, tryCatch } from "./result.js";

export {
	InlineFlowError,
	UnexpectedCaseError,
	ConfigError,
	isUnexpectedCase,
	isConfigError,
} from "./errors.js";

export {
	type InlineFlowConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	configure,
	getConfig,
	resetConfig,
	onConfigChange,
} from "./config.js";

export { getLogger, setLogger } from "./diagnostics.js";
export { describeValue } from "./describe.js";
