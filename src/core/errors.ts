export type ErrorKind = "InputNotFound" | "MalformedLine" | "InvalidConfig";

export class OutlineDepsError extends Error {
	readonly kind: ErrorKind;

	constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.kind = kind;
	}
}

export class InputNotFoundError extends OutlineDepsError {
	readonly path: string;

	constructor(path: string, cause?: unknown) {
		super("InputNotFound", `Cannot read input file: ${path}`, { cause });
		this.path = path;
	}
}

export class ParseError extends OutlineDepsError {
	readonly line: number;

	constructor(line: number, message: string) {
		super("MalformedLine", `line ${line}: ${message}`);
		this.line = line;
	}
}

export class ConfigError extends OutlineDepsError {
	constructor(message: string, cause?: unknown) {
		super("InvalidConfig", message, { cause });
	}
}

export function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
