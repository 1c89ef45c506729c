import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError, errorCode } from "../core/errors.js";

export const SETTINGS_FILE = "outline-deps.config.json";

const StatusColorsSchema = z
	.object({
		complete: z.string().min(1).default("lightgrey"),
		awaiting: z.string().min(1).default("lightblue"),
		ready: z.string().min(1).default("green"),
		blocked: z.string().min(1).default("white"),
	})
	.strict();

export const SettingsSchema = z
	.object({
		input: z.string().min(1).default("deps.txt"),
		awaitPrefix: z.string().min(1).default("await"),
		completeMarkers: z.array(z.string().min(1)).min(1).default(["[complete]", "[x]"]),
		wrapWidth: z.number().int().nonnegative().default(30),
		rankdir: z.enum(["LR", "RL", "TB", "BT"]).default("LR"),
		colors: StatusColorsSchema.default({}),
	})
	.strict();

export type Settings = z.infer<typeof SettingsSchema>;
export type StatusColors = z.infer<typeof StatusColorsSchema>;

export function defaultSettings(): Settings {
	return SettingsSchema.parse({});
}

export function parseSettings(raw: string, source: string): Settings {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		throw new ConfigError(`${source} is not valid JSON`, error);
	}
	const result = SettingsSchema.safeParse(json);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid settings in ${source}: ${issues}`, result.error);
	}
	return result.data;
}

/**
 * Load settings from an explicit `--config` path, or from
 * `outline-deps.config.json` in the project root when that file exists.
 */
export async function loadSettings(projectRoot: string, configPath?: string): Promise<Settings> {
	const file = configPath ? resolve(configPath) : join(projectRoot, SETTINGS_FILE);
	let raw: string;
	try {
		raw = await readFile(file, "utf-8");
	} catch (error) {
		if (!configPath && errorCode(error) === "ENOENT") {
			return defaultSettings();
		}
		throw new ConfigError(`Cannot read settings file: ${file}`, error);
	}
	return parseSettings(raw, file);
}

export function resolveInputPath(settings: Settings, projectRoot: string, input?: string): string {
	return input ? resolve(input) : resolve(projectRoot, settings.input);
}
