import type { ClassNameInfo, ResolvedConfig } from "./types.js";

const MESSAGES_SUFFIX = "Messages";

// The catalogue is machine-generated, so the declaration line is enough.
const DECLARATION_PATTERN = /\bclass\s+([A-Z][A-Za-z0-9]*)?Messages\s*\{/;

/**
 * Returns the `<Prefix>` of the first `class <Prefix>Messages {` declaration,
 * `""` for a plain `Messages` class, or `undefined` when there is none.
 */
export function extractPrefix(source: string): string | undefined {
	const match = DECLARATION_PATTERN.exec(source);
	if (!match) return undefined;
	return match[1] ?? "";
}

export function prefixFromClassName(className: string): string {
	return className.endsWith(MESSAGES_SUFFIX)
		? className.slice(0, -MESSAGES_SUFFIX.length)
		: className;
}

export function classNamesFromPrefix(
	prefix: string,
	options: { privateDelegate?: boolean } = {},
): ClassNameInfo {
	const messagesClassName = `${prefix}${MESSAGES_SUFFIX}`;
	// A bare "Localizations" would shadow the framework class used by `of`.
	const stem = prefix === "" ? messagesClassName : prefix;
	const localizationsClassName = `${stem}Localizations`;
	const delegateClassName = `${options.privateDelegate ? "_" : ""}${localizationsClassName}Delegate`;

	return {
		prefix,
		localizationsClassName,
		delegateClassName,
		messagesClassName,
	};
}

/**
 * `declared` reads the prefix from the catalogue and yields `undefined` when
 * the catalogue has no declaration; `configured` always uses `className`.
 */
export function resolveClassNames(
	source: string,
	config: Pick<ResolvedConfig, "naming" | "className" | "privateDelegate">,
): ClassNameInfo | undefined {
	const prefix =
		config.naming === "configured"
			? prefixFromClassName(config.className)
			: extractPrefix(source);
	if (prefix === undefined) return undefined;
	return classNamesFromPrefix(prefix, { privateDelegate: config.privateDelegate });
}

export function lowerFirst(name: string): string {
	return name.charAt(0).toLowerCase() + name.slice(1);
}
