import { readFile } from "node:fs/promises";
import type { Settings } from "../config/settings.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { DependencyGraph } from "./dependency-graph.js";
import { InputNotFoundError } from "./errors.js";
import { classifyOutline } from "./line-classifier.js";
import { readOutline } from "./outline-reader.js";

export function parseOutline(
	text: string,
	settings: Pick<Settings, "completeMarkers" | "awaitPrefix">,
	logger: Logger = silentLogger,
): DependencyGraph {
	const records = readOutline(text, { completeMarkers: settings.completeMarkers }, logger);
	const lines = classifyOutline(records, logger);
	return DependencyGraph.build(lines, { awaitPrefix: settings.awaitPrefix }, logger);
}

export async function loadGraph(
	filePath: string,
	settings: Settings,
	logger: Logger = silentLogger,
): Promise<DependencyGraph> {
	let text: string;
	try {
		text = await readFile(filePath, "utf-8");
	} catch (error) {
		throw new InputNotFoundError(filePath, error);
	}
	return parseOutline(text, settings, logger);
}
