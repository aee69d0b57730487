/**
 * Config reader — parses key=value lines with every decision made in an
 * expression, logging diagnostics to stdout.
 */

import { apply, attempt, configure, raise, switchOn, when } from "../src/index.js";

configure({ logLevel: "debug" });

class MalformedLine extends Error {}

const parseLine = (line: string): [string, number] => {
	const [key, value] = line.split("=");
	return key !== undefined && value !== undefined
		? [key.trim(), Number(value)]
		: raise(new MalformedLine(line));
};

const describe = ([key, value]: [string, number]): string =>
	switchOn(value).select(
		[
			when(Number.isNaN(value)).to(() => `${key}: not a number`),
			when(value < 0).to(() => `${key}: negative`),
			when(value === 0).to(() => `${key}: zero`),
		],
		{ defaultFactory: () => `${key}: ${value}` },
	);

const lines = ["retries=3", "timeout=0", "depth=-1", "name=abc", "garbage"];

const seen: string[] = [];
const parsed = lines.map((line) =>
	attempt(() => parseLine(line))
		.map(describe)
		.catch(MalformedLine)
		.recover(MalformedLine, (e) => `skipped: ${e.message}`)
		.cleanup(() => seen.push(line))
		.unwrap(),
);

apply((text: string) => console.log(text)).foreach(() => parsed);
console.log(`processed ${seen.length} lines`);
