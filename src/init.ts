import * as p from "@clack/prompts";
import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { validateClassName } from "./cli-utils.js";
import { CONFIG_NAME, DEFAULT_CLASS_NAME, DEFAULT_HEADER, DEFAULT_INCLUDE } from "./config.js";
import type { NamingStrategy } from "./types.js";

export interface InitOptions {
	naming: NamingStrategy;
	className?: string;
	header: string;
	contextExtension: boolean;
	privateDelegate: boolean;
	include: string[];
}

function cancel(): never {
	p.cancel("Setup cancelled.");
	process.exit(0);
}

export function parseIncludePatterns(answer: string): string[] {
	return answer
		.split(",")
		.map((pattern) => pattern.trim())
		.filter(Boolean);
}

/**
 * Only options that differ from the defaults are written. The config type is
 * imported with `import type`, so loading the file never resolves this package.
 */
export function generateConfigFile(opts: InitOptions): string {
	const lines: string[] = [];

	lines.push(`import type { IntlWrapperConfig } from "${CONFIG_NAME}";`);
	lines.push(``);
	lines.push(`export default {`);
	if (opts.header !== DEFAULT_HEADER) {
		lines.push(`  header: ${JSON.stringify(opts.header)},`);
	}
	if (opts.naming === "configured") {
		lines.push(`  naming: "configured",`);
		lines.push(`  className: ${JSON.stringify(opts.className ?? DEFAULT_CLASS_NAME)},`);
	}
	if (opts.contextExtension) {
		lines.push(`  contextExtension: true,`);
	}
	if (opts.privateDelegate) {
		lines.push(`  privateDelegate: true,`);
	}
	const isDefaultInclude =
		opts.include.length === DEFAULT_INCLUDE.length &&
		opts.include.every((pattern, i) => pattern === DEFAULT_INCLUDE[i]);
	if (opts.include.length > 0 && !isDefaultInclude) {
		lines.push(`  include: [${opts.include.map((i) => JSON.stringify(i)).join(", ")}],`);
	}
	lines.push(`} satisfies IntlWrapperConfig;`);
	lines.push(``);

	return lines.join("\n");
}

export async function runInitWizard(): Promise<void> {
	const cwd = process.cwd();
	const configPath = join(cwd, `${CONFIG_NAME}.config.ts`);

	p.intro(`${CONFIG_NAME} setup`);

	if (existsSync(configPath)) {
		const overwrite = await p.confirm({
			message: `${CONFIG_NAME}.config.ts already exists. Overwrite?`,
		});
		if (p.isCancel(overwrite)) cancel();
		if (!overwrite) {
			p.outro("Keeping existing config.");
			return;
		}
	}

	const naming = await p.select({
		message: "Class naming:",
		options: [
			{
				value: "declared" as const,
				label: "From the catalogue",
				hint: "class FooMessages { ... } -> FooLocalizations",
			},
			{
				value: "configured" as const,
				label: "From a fixed class name",
				hint: "every catalogue uses the same name",
			},
		],
	});
	if (p.isCancel(naming)) cancel();

	let className: string | undefined;
	if (naming === "configured") {
		const answer = await p.text({
			message: "Messages class name:",
			initialValue: DEFAULT_CLASS_NAME,
			validate(value) {
				if (!validateClassName(value)) {
					return "Use letters and digits only, starting with an upper-case letter.";
				}
			},
		});
		if (p.isCancel(answer)) cancel();
		className = answer;
	}

	const header = await p.text({
		message: "Header comment:",
		initialValue: DEFAULT_HEADER,
		validate(value) {
			if (!value.trim()) return "The header cannot be empty.";
		},
	});
	if (p.isCancel(header)) cancel();

	const contextExtension = await p.confirm({
		message: "Add a BuildContext extension getter?",
		initialValue: false,
	});
	if (p.isCancel(contextExtension)) cancel();

	const privateDelegate = await p.confirm({
		message: "Make the delegate class library-private?",
		initialValue: false,
	});
	if (p.isCancel(privateDelegate)) cancel();

	const include = await p.text({
		message: "Catalogue glob patterns (comma separated):",
		initialValue: DEFAULT_INCLUDE.join(", "),
		validate(value) {
			if (parseIncludePatterns(value).length === 0) return "Enter at least one glob pattern.";
		},
	});
	if (p.isCancel(include)) cancel();

	const content = generateConfigFile({
		naming,
		className,
		header,
		contextExtension,
		privateDelegate,
		include: parseIncludePatterns(include),
	});
	await writeFile(configPath, content, "utf-8");

	p.outro(`Created ${CONFIG_NAME}.config.ts. Run \`${CONFIG_NAME} generate\` next.`);
}
