import { Command } from "commander";
import { awaitingCommand } from "./commands/awaiting.js";
import { graphCommand } from "./commands/graph.js";
import { readyCommand } from "./commands/ready.js";
import { statusCommand } from "./commands/status.js";
import { Logger } from "./logging/logger.js";

export function createProgram(): Command {
	const program = new Command()
		.name("outline-deps")
		.description("Build a task dependency graph from an outline export")
		.version("1.0.0");

	program.addCommand(graphCommand, { isDefault: true });
	program.addCommand(readyCommand);
	program.addCommand(awaitingCommand);
	program.addCommand(statusCommand);

	return program;
}

/** Run the CLI; any failure is logged and turns into exit code 1. */
export async function run(argv: string[] = process.argv, logger: Logger = new Logger()): Promise<void> {
	try {
		await createProgram().parseAsync(argv);
	} catch (error) {
		logger.err(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	}
}
