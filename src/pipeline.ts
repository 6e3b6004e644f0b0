import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import pLimit from "p-limit";
import { glob } from "tinyglobby";
import { CONFIG_NAME, loadWrapperConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { Formatter } from "./formatter.js";
import { generateWrapper } from "./generator.js";
import type { GenerationOutcome, ResolvedConfig, SkipReason } from "./types.js";
import { isCatalogueAsset, WRAPPER_SUFFIX, writeWrapper } from "./writer.js";

export type AssetKind = "catalogue" | "config" | "other";

const CONFIG_FILE_PATTERN = new RegExp(
	`^(?:${CONFIG_NAME}\\.config\\.(?:[cm]?[jt]s|json)|\\.${CONFIG_NAME}rc)$`,
);

export function classifyAsset(path: string): AssetKind {
	if (isCatalogueAsset(path)) return "catalogue";
	if (CONFIG_FILE_PATTERN.test(basename(path))) return "config";
	return "other";
}

// --- Single asset ---

export interface GenerateAssetOptions {
	dryRun?: boolean;
	formatter?: Formatter;
}

/**
 * Reads, generates and writes one catalogue. The wrapper is written only after
 * formatting succeeded, and never in dry-run mode.
 */
export async function generateForAsset(
	inputPath: string,
	config: ResolvedConfig,
	options: GenerateAssetOptions = {},
): Promise<GenerationOutcome> {
	const inputText = await readFile(inputPath, "utf-8");
	const outcome = generateWrapper({ inputPath, inputText, config }, options.formatter);

	if (outcome.kind === "generated" && !options.dryRun) {
		await writeWrapper(outcome.outputPath, outcome.contents);
	}
	return outcome;
}

// --- Generate step ---

export interface GeneratedWrapper {
	inputPath: string;
	outputPath: string;
	contents: string;
}

export interface SkippedAsset {
	inputPath: string;
	reason: SkipReason;
}

export interface FailedAsset {
	inputPath: string;
	error: Error;
}

export interface GenerateStepInput {
	config: ResolvedConfig;
	cwd: string;
	dryRun?: boolean;
	formatter?: Formatter;
	callbacks?: {
		onProgress?: (completed: number, total: number) => void;
	};
}

export interface GenerateStepResult {
	generated: GeneratedWrapper[];
	skipped: SkippedAsset[];
	failed: FailedAsset[];
	filesProcessed: number;
}

function byInputPath(a: { inputPath: string }, b: { inputPath: string }): number {
	return a.inputPath < b.inputPath ? -1 : a.inputPath > b.inputPath ? 1 : 0;
}

export async function runGenerateStep(input: GenerateStepInput): Promise<GenerateStepResult> {
	const { config, cwd, callbacks } = input;

	const files = (
		await glob(config.include, {
			ignore: [...config.exclude, `**/*${WRAPPER_SUFFIX}`],
			cwd,
			absolute: true,
		})
	).filter((file) => classifyAsset(file) === "catalogue");

	const limit = pLimit(config.concurrency);
	let completed = 0;

	const settled = await Promise.all(
		files.map((inputPath) =>
			limit(async (): Promise<GenerationOutcome | FailedAsset> => {
				try {
					return await generateForAsset(inputPath, config, {
						dryRun: input.dryRun,
						formatter: input.formatter,
					});
				} catch (err) {
					return {
						inputPath,
						error: err instanceof Error ? err : new Error(errorMessage(err)),
					};
				} finally {
					completed++;
					callbacks?.onProgress?.(completed, files.length);
				}
			}),
		),
	);

	const result: GenerateStepResult = {
		generated: [],
		skipped: [],
		failed: [],
		filesProcessed: files.length,
	};

	for (const entry of settled) {
		if ("error" in entry) {
			result.failed.push(entry);
		} else if (entry.kind === "generated") {
			result.generated.push({
				inputPath: entry.inputPath,
				outputPath: entry.outputPath,
				contents: entry.contents,
			});
		} else {
			result.skipped.push({ inputPath: entry.inputPath, reason: entry.reason });
		}
	}

	result.generated.sort(byInputPath);
	result.skipped.sort(byInputPath);
	result.failed.sort(byInputPath);
	return result;
}

// --- Build engine hook ---

export type AssetChange =
	| { kind: "catalogue"; outcome: GenerationOutcome }
	| { kind: "config-reloaded"; config: ResolvedConfig }
	| { kind: "ignored" };

export interface AssetChangeContext {
	cwd: string;
	config: ResolvedConfig;
}

/**
 * Entry point for a build engine that reports changed files. Config changes
 * only refresh the config for later catalogue changes; they produce no output.
 */
export async function handleAssetChange(
	path: string,
	context: AssetChangeContext,
): Promise<AssetChange> {
	switch (classifyAsset(path)) {
		case "catalogue":
			return {
				kind: "catalogue",
				outcome: await generateForAsset(resolve(context.cwd, path), context.config),
			};
		case "config":
			return { kind: "config-reloaded", config: await loadWrapperConfig(context.cwd) };
		default:
			return { kind: "ignored" };
	}
}
