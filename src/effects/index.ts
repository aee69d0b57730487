export { type Ret, ret, tap } from "./tap.js";
export { type Applier, apply } from "./apply.js";
export { raise } from "./raise.js";
