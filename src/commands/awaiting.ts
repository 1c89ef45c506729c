import { Command } from "commander";
import { listByStatus } from "../core/status.js";
import { Logger } from "../logging/logger.js";
import { type InputOptions, openGraph, withInputOptions } from "./shared.js";

interface AwaitingOptions extends InputOptions {
	json?: boolean;
}

export const awaitingCommand = withInputOptions(
	new Command("awaiting").description("List tasks waiting on an external event"),
)
	.option("--json", "Output as JSON")
	.action(async (opts: AwaitingOptions) => {
		const logger = new Logger();
		const { graph } = await openGraph(opts, logger);
		const awaiting = listByStatus(graph, "awaiting");

		if (opts.json) {
			console.log(JSON.stringify(awaiting));
			return;
		}

		for (const name of awaiting) {
			console.log(name);
		}
	});
