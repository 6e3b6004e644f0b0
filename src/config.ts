import { loadConfig } from "c12";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { logWarning } from "./logger.js";
import type { IntlWrapperConfig, ResolvedConfig } from "./types.js";

export const CONFIG_NAME = "intl-wrapper";
export const DEFAULT_HEADER = "Generated by the wrapper generator";
export const DEFAULT_CLASS_NAME = "Messages";
export const DEFAULT_INCLUDE = ["lib/**/*.g.dart"] as const;

export const DART_CLASS_NAME = /^[A-Z][A-Za-z0-9]*$/;

const configSchema = z.object({
	header: z.string().min(1).default(DEFAULT_HEADER),
	className: z
		.string()
		.regex(DART_CLASS_NAME, {
			message: "className must be letters and digits, starting with an upper-case letter",
		})
		.default(DEFAULT_CLASS_NAME),
	naming: z.enum(["declared", "configured"]).default("declared"),
	contextExtension: z.boolean().default(false),
	privateDelegate: z.boolean().default(false),
	include: z
		.array(z.string().min(1))
		.min(1)
		.default([...DEFAULT_INCLUDE]),
	exclude: z.array(z.string().min(1)).default([]),
	concurrency: z.number().int().positive().default(10),
});

export function defineConfig(config: IntlWrapperConfig): IntlWrapperConfig {
	return config;
}

export function defaultConfig(): ResolvedConfig {
	return configSchema.parse({});
}

/**
 * Validates raw config. Invalid options fall back to their defaults while the
 * valid ones are kept; this never throws.
 */
export function resolveWrapperConfig(raw: unknown): ResolvedConfig {
	if (raw == null) return defaultConfig();
	if (typeof raw !== "object" || Array.isArray(raw)) {
		logWarning(`Ignoring ${CONFIG_NAME} config: expected an object. Using defaults.`);
		return defaultConfig();
	}

	const result = configSchema.safeParse(raw);
	if (result.success) return result.data;

	const invalidKeys = new Set(result.error.issues.map((i) => String(i.path[0])));
	const errors = result.error.issues
		.map((i) => `  - ${i.path.join(".")}: ${i.message}`)
		.join("\n");
	logWarning(`Invalid ${CONFIG_NAME} config, using defaults for these options:\n${errors}`);

	const kept = Object.fromEntries(
		Object.entries(raw).filter(([key]) => !invalidKeys.has(key)),
	);
	const retry = configSchema.safeParse(kept);
	return retry.success ? retry.data : defaultConfig();
}

export async function loadWrapperConfig(cwd: string = process.cwd()): Promise<ResolvedConfig> {
	let raw: unknown;
	try {
		const { config } = await loadConfig({ name: CONFIG_NAME, cwd });
		raw = config;
	} catch (err) {
		logWarning(`Could not load ${CONFIG_NAME} config: ${errorMessage(err)}. Using defaults.`);
		return defaultConfig();
	}
	return resolveWrapperConfig(raw);
}
