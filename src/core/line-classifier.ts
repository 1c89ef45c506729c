import type { ClassifiedLine, Comment, OutlineRecord } from "../config/types.js";
import { type Logger, silentLogger } from "../logging/logger.js";

export const ARROW = "->";

export function normalizeName(text: string): string {
	return text.trim().replace(/\s+/g, " ").toLowerCase();
}

type SingleLine =
	| { kind: "node"; name: string; ambiguous: boolean }
	| { kind: "edge"; from: string; to: string }
	| { kind: "comment"; text: string; closed: boolean };

function unquote(text: string): string {
	return text.replace(/^"/, "").replace(/"$/, "").trim();
}

/**
 * Classify a single outline line without context. Arrow detection wins over
 * comment detection; an arrow that does not separate exactly two names is
 * reported as ambiguous and kept as a node.
 */
export function classifyLine(record: OutlineRecord): SingleLine {
	const text = record.text;

	if (text.includes(ARROW)) {
		const parts = text.split(ARROW).map(normalizeName);
		const [from, to] = parts;
		if (parts.length === 2 && from && to) {
			return { kind: "edge", from, to };
		}
		return { kind: "node", name: normalizeName(text), ambiguous: true };
	}

	if (text.startsWith('"')) {
		return { kind: "comment", text: unquote(text), closed: text.length > 1 && text.endsWith('"') };
	}

	return { kind: "node", name: normalizeName(text), ambiguous: false };
}

interface OpenComment {
	start: OutlineRecord;
	lines: string[];
	target: string | null;
}

interface TaskFrame {
	depth: number;
	name: string;
}

/**
 * Classify the full record stream: joins multi-line quoted comments and
 * attaches each comment to the nearest enclosing task line.
 */
export function classifyOutline(
	records: OutlineRecord[],
	logger: Logger = silentLogger,
): ClassifiedLine[] {
	const out: ClassifiedLine[] = [];
	// Most recent task lines, shallowest first
	const stack: TaskFrame[] = [];
	let open: OpenComment | null = null;

	const enclosingTask = (depth: number): string | null => {
		for (let i = stack.length - 1; i >= 0; i--) {
			const frame = stack[i];
			if (frame && frame.depth <= depth) return frame.name;
		}
		return null;
	};

	const emit = (comment: OpenComment): void => {
		const entry: Comment = {
			kind: "comment",
			text: comment.lines.join("\n"),
			line: comment.start.line,
			depth: comment.start.depth,
			target: comment.target,
		};
		out.push(entry);
	};

	const closeUnterminated = (comment: OpenComment): void => {
		logger.warn(`line ${comment.start.line}: unterminated comment`);
		emit(comment);
	};

	const pushTask = (depth: number, name: string): void => {
		while (stack.length > 0 && (stack[stack.length - 1]?.depth ?? -1) >= depth) {
			stack.pop();
		}
		stack.push({ depth, name });
	};

	for (const record of records) {
		const single = classifyLine(record);

		if (open) {
			// A bullet, a shallower line or an edge starts a new entry
			if (single.kind === "edge" || record.bullet || record.depth < open.start.depth) {
				closeUnterminated(open);
				open = null;
			} else {
				const text = record.text;
				open.lines.push(unquote(text));
				if (text.endsWith('"')) {
					emit(open);
					open = null;
				}
				continue;
			}
		}

		switch (single.kind) {
			case "edge":
				pushTask(record.depth, single.from);
				out.push({
					kind: "edge",
					from: single.from,
					to: single.to,
					line: record.line,
					depth: record.depth,
				});
				break;
			case "node":
				if (single.ambiguous) {
					logger.warn(`line ${record.line}: ambiguous edge syntax "${record.text}"; treating as a task`);
				}
				pushTask(record.depth, single.name);
				out.push({
					kind: "node",
					name: single.name,
					line: record.line,
					depth: record.depth,
					completed: record.completed,
				});
				break;
			case "comment": {
				const comment: OpenComment = {
					start: record,
					lines: [single.text],
					target: enclosingTask(record.depth),
				};
				if (single.closed) {
					emit(comment);
				} else {
					open = comment;
				}
				break;
			}
		}
	}

	if (open) closeUnterminated(open);

	return out;
}
