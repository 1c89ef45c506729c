import type { StatusColors } from "../config/settings.js";
import type { DependencyGraph } from "./dependency-graph.js";
import { classifyAll } from "./status.js";

export interface DotOptions {
	rankdir: "LR" | "RL" | "TB" | "BT";
	wrapWidth: number;
	colors: StatusColors;
}

export function quoteId(text: string): string {
	return `"${escapeDot(text)}"`;
}

function escapeDot(text: string): string {
	return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** Greedy word wrap; a word longer than `width` gets a line of its own. */
export function wrapText(text: string, width: number): string[] {
	if (width <= 0) return [text];
	const lines: string[] = [];
	let current = "";
	for (const word of text.split(/\s+/).filter((w) => w !== "")) {
		if (current === "") {
			current = word;
		} else if (current.length + 1 + word.length <= width) {
			current += ` ${word}`;
		} else {
			lines.push(current);
			current = word;
		}
	}
	if (current !== "") lines.push(current);
	return lines;
}

// Comment labels are wrapped; multi-line labels use Graphviz's left-justified line break
function formatLabel(text: string, wrapWidth: number): string {
	const lines = text.split("\n").flatMap((line) => wrapText(line, wrapWidth));
	if (lines.length <= 1) return quoteId(lines[0] ?? "");
	return `"${lines.map(escapeDot).join("\\l")}\\l"`;
}

export function renderDot(graph: DependencyGraph, options: DotOptions): string {
	const statuses = classifyAll(graph);
	const out: string[] = ["digraph G {", `\trankdir=${quoteId(options.rankdir)}`, ""];

	for (const { from, to } of graph.edges()) {
		out.push(`\t${quoteId(from)} -> ${quoteId(to)}`);
	}

	for (const [name, status] of statuses) {
		const comment = graph.label(name);
		const label = comment === undefined ? quoteId(name) : formatLabel(comment, options.wrapWidth);
		out.push(`\t${quoteId(name)} [label=${label},style=filled,fillcolor=${quoteId(options.colors[status])}]`);
	}

	out.push("}");
	return out.join("\n");
}
