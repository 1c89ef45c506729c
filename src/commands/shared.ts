import { resolve } from "node:path";
import type { Command } from "commander";
import { type Settings, loadSettings, resolveInputPath } from "../config/settings.js";
import type { DependencyGraph } from "../core/dependency-graph.js";
import { loadGraph } from "../core/load-graph.js";
import type { Logger } from "../logging/logger.js";

export interface InputOptions {
	input?: string;
	projectRoot: string;
	config?: string;
}

export function withInputOptions(command: Command): Command {
	return command
		.option("--input <file>", "Outline export to read (default: deps.txt in the project root)")
		.option("--project-root <path>", "Project root directory", process.cwd())
		.option("--config <file>", "Settings file (default: outline-deps.config.json in the project root)");
}

export async function openGraph(
	opts: InputOptions,
	logger: Logger,
): Promise<{ graph: DependencyGraph; settings: Settings }> {
	const projectRoot = resolve(opts.projectRoot);
	const settings = await loadSettings(projectRoot, opts.config);
	const graph = await loadGraph(resolveInputPath(settings, projectRoot, opts.input), settings, logger);
	return { graph, settings };
}

export function warnCycles(graph: DependencyGraph, logger: Logger): void {
	const cyclic = graph.cyclicNodes();
	if (cyclic.length > 0) {
		logger.warn(`dependency cycle among: ${cyclic.join(", ")}`);
	}
}
