/**
 * Pure functions extracted from cli.ts for testability.
 */

import { relative, sep } from "node:path";
import { DART_CLASS_NAME } from "./config.js";

export interface ParsedGenerateFlags {
	dryRun: boolean;
	verbose: boolean;
}

/**
 * Parse raw CLI args into generate command flags.
 * Mirrors the logic in main.run() for the default generate command.
 */
export function parseGenerateFlags(rawArgs: string[]): ParsedGenerateFlags {
	return {
		dryRun: rawArgs.includes("--dry-run"),
		verbose: rawArgs.includes("--verbose"),
	};
}

/**
 * Leading flags with no subcommand run `generate`. citty also calls the main
 * command after a subcommand, so any subcommand name disables the fallback.
 */
export function shouldRunDefaultGenerate(
	rawArgs: string[],
	subCommands: readonly string[],
): boolean {
	if (!rawArgs[0]?.startsWith("-")) return false;
	return !rawArgs.some((arg) => subCommands.includes(arg));
}

export function validateClassName(name: string): boolean {
	return DART_CLASS_NAME.test(name);
}

/** Project-relative path with forward slashes, for log lines. */
export function displayPath(cwd: string, path: string): string {
	return relative(cwd, path).split(sep).join("/");
}
