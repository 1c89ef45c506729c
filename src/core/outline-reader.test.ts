import { describe, expect, test } from "vitest";
import { Logger } from "../logging/logger.js";
import { ParseError } from "./errors.js";
import { computeDepth, readOutline } from "./outline-reader.js";

const OPTIONS = { completeMarkers: ["[complete]", "[x]"] };

function capture(): { logger: Logger; warnings: string[] } {
	const warnings: string[] = [];
	return { logger: new Logger((msg) => warnings.push(msg)), warnings };
}

describe("computeDepth", () => {
	test.each([
		["", 0],
		["\t", 1],
		["\t\t", 2],
		["  ", 1],
		["      ", 3],
	])("depth of %j is %i", (indent, expected) => {
		expect(computeDepth(indent, 1)).toBe(expected);
	});

	test("rejects mixed tabs and spaces", () => {
		expect(() => computeDepth(" \t", 4)).toThrow(ParseError);
		expect(() => computeDepth(" \t", 4)).toThrow("line 4: indentation mixes tabs and spaces");
	});

	test("rejects an odd number of spaces", () => {
		expect(() => computeDepth("   ", 2)).toThrow("line 2: odd indentation of 3 spaces");
	});
});

describe("readOutline", () => {
	test("strips bullets and completion markers, keeps order and depth", () => {
		const text = [
			"- task a",
			'\t"needs review"',
			"- [complete] task b",
			"",
			"---",
			"  - task a -> task b",
			"",
		].join("\n");

		expect(readOutline(text, OPTIONS)).toEqual([
			{ line: 1, depth: 0, text: "task a", completed: false, bullet: true },
			{ line: 2, depth: 1, text: '"needs review"', completed: false, bullet: false },
			{ line: 3, depth: 0, text: "task b", completed: true, bullet: true },
			{ line: 6, depth: 1, text: "task a -> task b", completed: false, bullet: true },
		]);
	});

	test("matches completion markers case-insensitively after any bullet", () => {
		const records = readOutline("* [X] Done thing\n+ [Complete] other\n• plain", OPTIONS);
		expect(records.map((r) => [r.text, r.completed])).toEqual([
			["Done thing", true],
			["other", true],
			["plain", false],
		]);
	});

	test("only honours configured markers", () => {
		const records = readOutline("- [done] a\n- [x] b", { completeMarkers: ["[done]"] });
		expect(records.map((r) => [r.text, r.completed])).toEqual([
			["a", true],
			["[x] b", false],
		]);
	});

	test("keeps a leading arrow rather than reading it as a bullet", () => {
		expect(readOutline("-> b", OPTIONS)[0]).toMatchObject({ text: "-> b", bullet: false });
	});

	test("records whether the line had a bullet", () => {
		const records = readOutline('- a\n  "note\n* b\nplain', OPTIONS);
		expect(records.map((r) => r.bullet)).toEqual([true, false, true, false]);
	});

	test("handles CRLF line endings", () => {
		const records = readOutline("- a\r\n\t- b\r\n", OPTIONS);
		expect(records).toEqual([
			{ line: 1, depth: 0, text: "a", completed: false, bullet: true },
			{ line: 2, depth: 1, text: "b", completed: false, bullet: true },
		]);
	});

	test("recovers malformed indentation as top-level with a warning", () => {
		const { logger, warnings } = capture();
		const records = readOutline("- a\n \t- b\n   - c", OPTIONS, logger);

		expect(records.map((r) => [r.text, r.depth])).toEqual([
			["a", 0],
			["b", 0],
			["c", 0],
		]);
		expect(warnings).toHaveLength(2);
		expect(warnings[0]).toMatch(/WARN: line 2: indentation mixes tabs and spaces; treating as top-level$/);
		expect(warnings[1]).toMatch(/WARN: line 3: odd indentation of 3 spaces; treating as top-level$/);
	});

	test("skips blank lines and bare bullets", () => {
		expect(readOutline("\n   \n-\n- \n--\n", OPTIONS)).toEqual([]);
	});
});
