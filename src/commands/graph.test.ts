import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SETTINGS_FILE } from "../config/settings.js";
import { ConfigError } from "../core/errors.js";

const FIXTURE = `- [complete] set up repo
- write parser -> set up repo
  "split lexer
  from parser"
- await design review
`;

let tmpDir: string;

beforeEach(async () => {
	tmpDir = await mkdtemp(join(tmpdir(), "outline-deps-graph-"));
	await writeFile(join(tmpDir, "deps.txt"), FIXTURE);
	vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
	vi.restoreAllMocks();
	await rm(tmpDir, { recursive: true, force: true });
});

async function runGraph(args: string[]): Promise<string> {
	const { graphCommand } = await import("./graph.js");
	const lines: string[] = [];
	const origLog = console.log;
	console.log = (...a: unknown[]) => lines.push(a.join(" "));
	try {
		await graphCommand.parseAsync(["node", "graph", ...args]);
	} finally {
		console.log = origLog;
	}
	return lines.join("\n");
}

describe("graph command", () => {
	test("prints the DOT description", async () => {
		const output = await runGraph(["--project-root", tmpDir]);
		expect(output).toBe(
			[
				"digraph G {",
				'\trankdir="LR"',
				"",
				'\t"write parser" -> "set up repo"',
				'\t"set up repo" [label="set up repo",style=filled,fillcolor="lightgrey"]',
				'\t"write parser" [label="split lexer\\lfrom parser\\l",style=filled,fillcolor="green"]',
				'\t"await design review" [label="await design review",style=filled,fillcolor="lightblue"]',
				"}",
			].join("\n"),
		);
	});

	test("applies the project settings file", async () => {
		await writeFile(
			join(tmpDir, SETTINGS_FILE),
			JSON.stringify({ rankdir: "TB", colors: { ready: "palegreen" } }),
		);
		const output = await runGraph(["--project-root", tmpDir]);
		expect(output).toContain('\trankdir="TB"');
		expect(output).toContain('fillcolor="palegreen"');
	});

	test("invalid settings fail with ConfigError", async () => {
		await writeFile(join(tmpDir, SETTINGS_FILE), JSON.stringify({ wrapWidth: "wide" }));
		await expect(runGraph(["--project-root", tmpDir])).rejects.toBeInstanceOf(ConfigError);
	});
});
