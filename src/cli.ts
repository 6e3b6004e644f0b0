#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { displayPath, parseGenerateFlags, shouldRunDefaultGenerate } from "./cli-utils.js";
import { loadWrapperConfig } from "./config.js";
import {
	logDryRun,
	logError,
	logFailed,
	logGenerated,
	logSkipped,
	logStart,
	logSummary,
	logVerbose,
	logWarning,
} from "./logger.js";
import { runGenerateStep } from "./pipeline.js";

const generateCommand = defineCommand({
	meta: {
		name: "generate",
		description: "Generate Flutter localization wrappers for message catalogues",
	},
	args: {
		"dry-run": {
			type: "boolean",
			description: "Print the wrappers without writing files",
			default: false,
		},
		verbose: {
			type: "boolean",
			description: "Verbose output",
			default: false,
		},
	},
	async run({ args }) {
		const cwd = process.cwd();
		const config = await loadWrapperConfig(cwd);
		const start = Date.now();

		logVerbose(
			`naming: ${config.naming}, include: ${config.include.join(", ")}`,
			args.verbose,
		);

		const result = await runGenerateStep({
			config,
			cwd,
			dryRun: args["dry-run"],
		});

		if (result.filesProcessed === 0) {
			logWarning(`No catalogue files matched ${config.include.join(", ")}`);
			return;
		}

		logStart(result.filesProcessed);

		for (const wrapper of result.generated) {
			const outputPath = displayPath(cwd, wrapper.outputPath);
			if (args["dry-run"]) {
				logDryRun(outputPath, wrapper.contents);
			} else {
				logGenerated(displayPath(cwd, wrapper.inputPath), outputPath);
			}
		}
		for (const asset of result.skipped) {
			logSkipped(displayPath(cwd, asset.inputPath), asset.reason);
		}
		for (const asset of result.failed) {
			logFailed(displayPath(cwd, asset.inputPath), asset.error.message);
			logVerbose(asset.error.stack ?? "", args.verbose);
		}

		logSummary({
			generated: result.generated.length,
			skipped: result.skipped.length,
			failed: result.failed.length,
			duration: Date.now() - start,
		});

		if (result.failed.length > 0) {
			logError(`${result.failed.length} catalogue(s) could not be generated.`);
			process.exit(1);
		}
	},
});

const initCommand = defineCommand({
	meta: {
		name: "init",
		description: "Interactive setup wizard for intl-wrapper",
	},
	async run() {
		const { runInitWizard } = await import("./init.js");
		await runInitWizard();
	},
});

const subCommands = {
	generate: generateCommand,
	init: initCommand,
};

const main = defineCommand({
	meta: {
		name: "intl-wrapper",
		version: "0.1.0",
		description: "Flutter localization wrappers for message catalogues",
	},
	subCommands,
	async run({ rawArgs }) {
		if (rawArgs.length === 0) {
			console.log(`
  intl-wrapper — Flutter localization wrappers for message catalogues

  Usage:
    intl-wrapper <command> [flags]

  Commands:
    init        Interactive setup wizard
    generate    Write a .flutter.g.dart wrapper beside every .g.dart catalogue

  Flags:
    --dry-run   Print wrappers without writing files
    --verbose   Verbose output

  Examples:
    intl-wrapper init                 # Create intl-wrapper.config.ts
    intl-wrapper generate             # Generate all wrappers
    intl-wrapper --dry-run            # Preview without writing
`);
			return;
		}

		if (shouldRunDefaultGenerate(rawArgs, Object.keys(subCommands))) {
			const { dryRun, verbose } = parseGenerateFlags(rawArgs);

			await generateCommand.run?.({
				args: {
					_: rawArgs,
					"dry-run": dryRun,
					verbose,
				},
				rawArgs,
				cmd: generateCommand,
			});
		}
	},
});

runMain(main);
