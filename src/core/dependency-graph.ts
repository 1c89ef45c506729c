import type { ClassifiedLine, Edge, TaskNode } from "../config/types.js";
import { type Logger, silentLogger } from "../logging/logger.js";

export interface BuildOptions {
	awaitPrefix: string;
}

export function isAwaiting(name: string, awaitPrefix: string): boolean {
	return name.trimStart().toLowerCase().startsWith(awaitPrefix.toLowerCase());
}

/**
 * Task dependency graph. An edge `from -> to` means `from` depends on `to`.
 * Nodes and edges keep first-seen order.
 */
export class DependencyGraph {
	private nodes: Map<string, TaskNode>;
	private deps: Map<string, Set<string>>;

	private constructor(nodes: Map<string, TaskNode>, deps: Map<string, Set<string>>) {
		this.nodes = nodes;
		this.deps = deps;
	}

	static build(
		lines: Iterable<ClassifiedLine>,
		options: BuildOptions,
		logger: Logger = silentLogger,
	): DependencyGraph {
		const nodes = new Map<string, TaskNode>();
		const deps = new Map<string, Set<string>>();

		const ensure = (name: string): TaskNode => {
			let node = nodes.get(name);
			if (!node) {
				node = { name, complete: false, awaiting: false, comments: [] };
				nodes.set(name, node);
			}
			return node;
		};

		for (const line of lines) {
			switch (line.kind) {
				case "node": {
					const node = ensure(line.name);
					if (line.completed) node.complete = true;
					break;
				}
				case "edge": {
					ensure(line.from);
					ensure(line.to);
					let targets = deps.get(line.from);
					if (!targets) {
						targets = new Set();
						deps.set(line.from, targets);
					}
					targets.add(line.to);
					break;
				}
				case "comment": {
					if (line.target === null) {
						logger.warn(`line ${line.line}: comment has no task to attach to; dropped`);
						break;
					}
					if (line.text !== "") ensure(line.target).comments.push(line.text);
					break;
				}
			}
		}

		for (const node of nodes.values()) {
			node.awaiting = isAwaiting(node.name, options.awaitPrefix);
		}

		return new DependencyGraph(nodes, deps);
	}

	get nodeCount(): number {
		return this.nodes.size;
	}

	get edgeCount(): number {
		let count = 0;
		for (const targets of this.deps.values()) count += targets.size;
		return count;
	}

	nodeNames(): string[] {
		return [...this.nodes.keys()];
	}

	getNode(name: string): TaskNode | null {
		const node = this.nodes.get(name);
		return node ? { ...node, comments: [...node.comments] } : null;
	}

	label(name: string): string | undefined {
		const node = this.nodes.get(name);
		if (!node || node.comments.length === 0) return undefined;
		return node.comments.join("\n");
	}

	edges(): Edge[] {
		const result: Edge[] = [];
		for (const [from, targets] of this.deps) {
			for (const to of targets) result.push({ from, to });
		}
		return result;
	}

	dependencies(name: string): string[] {
		return [...(this.deps.get(name) ?? [])];
	}

	dependents(name: string): string[] {
		const result: string[] = [];
		for (const [from, targets] of this.deps) {
			if (targets.has(name)) result.push(from);
		}
		return result.sort();
	}

	transitiveUpstream(name: string): string[] {
		const visited = new Set<string>();
		const queue = [name];
		for (let i = 0; i < queue.length; i++) {
			const current = queue[i];
			if (current === undefined) continue;
			for (const dep of this.deps.get(current) ?? []) {
				if (!visited.has(dep)) {
					visited.add(dep);
					queue.push(dep);
				}
			}
		}
		return [...visited].sort();
	}

	/** Tasks that can reach themselves through their dependencies. */
	cyclicNodes(): string[] {
		return this.nodeNames()
			.filter((name) => this.transitiveUpstream(name).includes(name))
			.sort();
	}
}
