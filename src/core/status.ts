import type { StatusSummary, TaskStatus } from "../config/types.js";
import type { DependencyGraph } from "./dependency-graph.js";

export function classifyNode(graph: DependencyGraph, name: string): TaskStatus {
	const node = graph.getNode(name);
	if (!node) throw new Error(`Task not found: ${name}`);
	if (node.complete) return "complete";
	if (node.awaiting) return "awaiting";
	const allDepsComplete = graph
		.dependencies(name)
		.every((dep) => graph.getNode(dep)?.complete === true);
	return allDepsComplete ? "ready" : "blocked";
}

export function classifyAll(graph: DependencyGraph): Map<string, TaskStatus> {
	const statuses = new Map<string, TaskStatus>();
	for (const name of graph.nodeNames()) {
		statuses.set(name, classifyNode(graph, name));
	}
	return statuses;
}

/**
 * Sorted names of every task with the given status. With `scope`, only the
 * direct dependencies of that task are considered.
 */
export function listByStatus(graph: DependencyGraph, status: TaskStatus, scope?: string): string[] {
	let candidates = graph.nodeNames();
	if (scope !== undefined) {
		if (!graph.getNode(scope)) throw new Error(`Task not found: ${scope}`);
		candidates = graph.dependencies(scope);
	}
	return candidates.filter((name) => classifyNode(graph, name) === status).sort();
}

export function summarize(graph: DependencyGraph): StatusSummary {
	const statuses = [...classifyAll(graph).values()];
	return {
		total: statuses.length,
		complete: statuses.filter((s) => s === "complete").length,
		awaiting: statuses.filter((s) => s === "awaiting").length,
		ready: statuses.filter((s) => s === "ready").length,
		blocked: statuses.filter((s) => s === "blocked").length,
	};
}
