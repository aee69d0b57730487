import { bench, describe } from "vitest";
import { when } from "../src/dispatch/case.js";
import { switchOn } from "../src/dispatch/switch.js";

describe("dispatch", () => {
	const classify = (n: number): string =>
		switchOn(n).exhaustive(
			when(n < 0).to(() => "negative"),
			when(n === 0).to(() => "zero"),
			when(n < 10).to(() => "small"),
			when(n < 100).to(() => "medium"),
			when(true).to(() => "large"),
		);

	bench("exhaustive, 5 branches, 1000x", () => {
		for (let i = -10; i < 990; i++) {
			classify(i);
		}
	});

	bench("select with default, 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			switchOn(i).select([when(i % 3 === 0).to(() => "fizz")], { default: "none" });
		}
	});
});
