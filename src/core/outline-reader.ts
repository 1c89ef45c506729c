import type { OutlineRecord } from "../config/types.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { ParseError } from "./errors.js";

export interface ReadOptions {
	completeMarkers: string[];
}

const BULLET = /^[-*+•](?!>)\s*/;
const SEPARATOR = /^-*$/;

/**
 * Nesting depth from a line's leading whitespace: one level per tab, or one
 * level per two spaces. Mixed or odd indentation has no defined depth.
 */
export function computeDepth(indent: string, line: number): number {
	if (indent.length === 0) return 0;
	const tabs = indent.split("\t").length - 1;
	const spaces = indent.length - tabs;
	if (tabs > 0 && spaces > 0) {
		throw new ParseError(line, "indentation mixes tabs and spaces");
	}
	if (tabs > 0) return tabs;
	if (spaces % 2 !== 0) {
		throw new ParseError(line, `odd indentation of ${spaces} spaces`);
	}
	return spaces / 2;
}

function stripMarker(text: string, markers: string[]): { text: string; completed: boolean } {
	const lower = text.toLowerCase();
	for (const marker of markers) {
		if (lower.startsWith(marker.toLowerCase())) {
			return { text: text.slice(marker.length).trim(), completed: true };
		}
	}
	return { text, completed: false };
}

export function readOutline(
	text: string,
	options: ReadOptions,
	logger: Logger = silentLogger,
): OutlineRecord[] {
	const records: OutlineRecord[] = [];
	const lines = text.split(/\r?\n/);

	for (const [index, raw] of lines.entries()) {
		const line = index + 1;
		if (raw.trim() === "") continue;

		const indent = raw.match(/^[ \t]*/)?.[0] ?? "";
		let depth: number;
		try {
			depth = computeDepth(indent, line);
		} catch (error) {
			if (!(error instanceof ParseError)) throw error;
			logger.warn(`${error.message}; treating as top-level`);
			depth = 0;
		}

		const rest = raw.slice(indent.length);
		const bullet = BULLET.test(rest);
		const body = rest.replace(BULLET, "").trim();
		const stripped = stripMarker(body, options.completeMarkers);
		if (SEPARATOR.test(stripped.text)) continue;

		records.push({ line, depth, text: stripped.text, completed: stripped.completed, bullet });
	}

	return records;
}
