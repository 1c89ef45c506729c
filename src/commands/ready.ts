import { Command } from "commander";
import { normalizeName } from "../core/line-classifier.js";
import { listByStatus } from "../core/status.js";
import { Logger } from "../logging/logger.js";
import { type InputOptions, openGraph, withInputOptions } from "./shared.js";

interface ReadyOptions extends InputOptions {
	of?: string;
	json?: boolean;
}

export const readyCommand = withInputOptions(
	new Command("ready").description("List tasks ready to start (all dependencies complete)"),
)
	.option("--of <task>", "Only consider the direct dependencies of this task")
	.option("--json", "Output as JSON")
	.action(async (opts: ReadyOptions) => {
		const logger = new Logger();
		const { graph } = await openGraph(opts, logger);
		const scope = opts.of === undefined ? undefined : normalizeName(opts.of);
		const ready = listByStatus(graph, "ready", scope);

		if (opts.json) {
			console.log(JSON.stringify(ready));
			return;
		}

		for (const name of ready) {
			console.log(name);
		}
	});
