import { Command } from "commander";
import type { TaskStatus } from "../config/types.js";
import { classifyAll, summarize } from "../core/status.js";
import { Logger } from "../logging/logger.js";
import { type InputOptions, openGraph, warnCycles, withInputOptions } from "./shared.js";

const STATUS_ICONS: Record<TaskStatus, string> = {
	complete: "[+]",
	awaiting: "[~]",
	ready: "[>]",
	blocked: "[ ]",
};

interface StatusOptions extends InputOptions {
	json?: boolean;
}

export const statusCommand = withInputOptions(
	new Command("status").description("Show a summary of task statuses"),
)
	.option("--json", "Output raw JSON")
	.action(async (opts: StatusOptions) => {
		const logger = new Logger();
		const { graph } = await openGraph(opts, logger);
		warnCycles(graph, logger);
		const summary = summarize(graph);
		const statuses = classifyAll(graph);

		if (opts.json) {
			console.log(
				JSON.stringify({
					...summary,
					edges: graph.edgeCount,
					tasks: Object.fromEntries([...statuses].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
				}),
			);
			return;
		}

		console.log(
			`Total: ${summary.total} | Complete: ${summary.complete} | Awaiting: ${summary.awaiting} | Ready: ${summary.ready} | Blocked: ${summary.blocked}\n`,
		);

		for (const name of [...statuses.keys()].sort()) {
			const status = statuses.get(name) ?? "blocked";
			console.log(`  ${STATUS_ICONS[status]} ${name}`);
		}
	});
