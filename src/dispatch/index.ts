export type { Branch, SelectOptions } from "./types.js";
export { CaseBuilder, when } from "./case.js";
export { Switch, switchOn } from "./switch.js";
