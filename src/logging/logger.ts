export type LogSink = (msg: string) => void;

export function formatElapsed(elapsedSec: number): string {
	const h = Math.floor(elapsedSec / 3600);
	const m = Math.floor((elapsedSec % 3600) / 60);
	const s = elapsedSec % 60;
	return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
}

/**
 * Diagnostics logger. Both sinks default to stderr: stdout is reserved for
 * the DOT graph and task listings.
 */
export class Logger {
	private startTime: number;
	private info: LogSink;
	private error: LogSink;

	constructor(info?: LogSink, error?: LogSink) {
		this.startTime = Date.now();
		this.info = info ?? ((msg) => console.error(msg));
		this.error = error ?? ((msg) => console.error(msg));
	}

	private ts(): string {
		const elapsed = Math.floor((Date.now() - this.startTime) / 1000);
		return formatElapsed(elapsed);
	}

	warn(msg: string): void {
		this.info(`[${this.ts()}] WARN: ${msg}`);
	}

	err(msg: string): void {
		this.error(`[${this.ts()}] ERROR: ${msg}`);
	}
}

/** Logger that drops everything; for callers that do not care about warnings. */
export const silentLogger = new Logger(
	() => {},
	() => {},
);
