import pc from "picocolors";
import type { SkipReason } from "./types.js";

export interface RunSummary {
	generated: number;
	skipped: number;
	failed: number;
	duration: number;
}

export function logStart(assetCount: number): void {
	console.log(
		`\n${pc.bold("intl-wrapper")} ${pc.dim("·")} ${assetCount} catalogue ${assetCount === 1 ? "file" : "files"}\n`,
	);
}

export function logGenerated(inputPath: string, outputPath: string): void {
	console.log(`${pc.green("✔")} ${inputPath} ${pc.dim("→")} ${pc.bold(outputPath)}`);
}

const SKIP_REASONS: Record<SkipReason, string> = {
	"missing-declaration": "no Messages class declaration",
};

export function logSkipped(inputPath: string, reason: SkipReason): void {
	console.log(`${pc.dim("○")} ${pc.dim(`${inputPath} (${SKIP_REASONS[reason]})`)}`);
}

export function logFailed(inputPath: string, message: string): void {
	console.error(`${pc.red("✖")} ${inputPath}: ${message}`);
}

export function logSummary(summary: RunSummary): void {
	const parts: string[] = [pc.green(`${summary.generated} generated`)];

	if (summary.skipped > 0) {
		parts.push(pc.dim(`${summary.skipped} skipped`));
	}
	if (summary.failed > 0) {
		parts.push(pc.red(`${summary.failed} failed`));
	}

	const time = pc.dim(`(${(summary.duration / 1000).toFixed(1)}s)`);
	console.log(`\n${pc.bold("Done!")} ${parts.join(pc.dim(" · "))} ${time}\n`);
}

export function logDryRun(outputPath: string, contents: string): void {
	console.log(`${pc.cyan("●")} ${pc.bold(outputPath)} ${pc.dim("(dry run)")}`);
	for (const line of contents.trimEnd().split("\n")) {
		console.log(pc.dim(`  ${line}`));
	}
}

export function logError(message: string): void {
	console.error(`${pc.red("✖")} ${message}`);
}

export function logWarning(message: string): void {
	console.log(`${pc.yellow("⚠")} ${message}`);
}

export function logVerbose(message: string, verbose: boolean): void {
	if (verbose) {
		console.log(pc.dim(`  ${message}`));
	}
}
