/**
 * Sign classifier — strict and permissive dispatch side by side.
 */

import { UnexpectedCaseError, attempt, switchOn, when } from "../src/index.js";

const strict = (n: number) =>
	switchOn(n).exhaustive(when(n < 0).to(() => "Negative"), when(n > 0).to(() => "Positive"));

const permissive = (n: number) => {
	const branches = [when(n < 0).to(() => "Negative"), when(n > 0).to(() => "Positive")];
	return switchOn(n).select(branches, { default: "Zero" });
};

for (const n of [-2, 0, 5]) {
	const label = attempt(() => strict(n))
		.catch(UnexpectedCaseError)
		.recover(UnexpectedCaseError, (e) => `unhandled (${e.message})`)
		.unwrap();
	console.log(n, label, permissive(n));
}
