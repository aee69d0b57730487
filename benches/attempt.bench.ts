import { bench, describe } from "vitest";
import { attempt } from "../src/attempt/attempt.js";
import { raise } from "../src/effects/raise.js";

describe("attempt", () => {
	const failing = attempt((): number => raise(new RangeError("boom")));
	const chain = failing
		.catch(RangeError)
		.cleanup(() => undefined)
		.recover(RangeError, () => -1);

	bench("map chain of 3, 1000x", () => {
		const mapped = attempt(() => 1)
			.map((x) => x + 1)
			.map((x) => x * 2)
			.map(String);
		for (let i = 0; i < 1000; i++) {
			mapped.unwrap();
		}
	});

	bench("catch + cleanup + recover on failure, 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			chain.unwrap();
		}
	});

	bench("fallback on success, 1000x", () => {
		const ok = attempt(() => 1).catch(RangeError).fallback(0);
		for (let i = 0; i < 1000; i++) {
			ok.unwrap();
		}
	});
});
