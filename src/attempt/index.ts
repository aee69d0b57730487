export { Attempt, attempt } from "./attempt.js";
export { Catcher, catcher } from "./catcher.js";
export { type ErrorKind, type KindInstance, isKind, matchesKind } from "./error-kind.js";
