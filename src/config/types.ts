export type TaskStatus = "complete" | "awaiting" | "ready" | "blocked";

// One non-blank line of the outline export
export interface OutlineRecord {
	line: number; // 1-based line number in the source file
	depth: number;
	text: string; // bullet and completion marker already stripped
	completed: boolean;
	bullet: boolean; // line started with a bullet marker
}

export interface NodeDecl {
	kind: "node";
	name: string;
	line: number;
	depth: number;
	completed: boolean;
}

export interface EdgeDecl {
	kind: "edge";
	from: string; // dependent
	to: string; // dependency
	line: number;
	depth: number;
}

export interface Comment {
	kind: "comment";
	text: string;
	line: number;
	depth: number;
	target: string | null; // node the comment is attached to, null when orphaned
}

export type ClassifiedLine = NodeDecl | EdgeDecl | Comment;

export interface TaskNode {
	name: string;
	complete: boolean;
	awaiting: boolean;
	comments: string[];
}

export interface Edge {
	from: string;
	to: string;
}

export interface StatusSummary {
	total: number;
	complete: number;
	awaiting: number;
	ready: number;
	blocked: number;
}
