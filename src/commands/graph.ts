import { Command } from "commander";
import { renderDot } from "../core/dot-export.js";
import { Logger } from "../logging/logger.js";
import { type InputOptions, openGraph, warnCycles, withInputOptions } from "./shared.js";

export const graphCommand = withInputOptions(
	new Command("graph").description("Print the dependency graph in Graphviz DOT format"),
).action(async (opts: InputOptions) => {
	const logger = new Logger();
	const { graph, settings } = await openGraph(opts, logger);
	warnCycles(graph, logger);
	console.log(renderDot(graph, settings));
});
