import { FormattingError } from "./errors.js";

export interface Formatter {
	format(source: string): string;
}

const INDENT = "  ";

const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
const OPENING = new Set(["(", "[", "{"]);

interface OpenBracket {
	char: string;
	level: number;
	line: number;
}

/**
 * Canonical layout for emitted Dart: every line that leaves brackets open adds
 * one indent level, closed again by the line that closes them. Trailing
 * whitespace and repeated blank lines are dropped. Idempotent.
 */
export function formatDart(source: string): string {
	// Open-bracket count per indent level.
	const levels: number[] = [];
	const brackets: OpenBracket[] = [];
	const out: string[] = [];

	const lines = source.split(/\r\n?|\n/);
	for (let i = 0; i < lines.length; i++) {
		const lineNumber = i + 1;
		const text = lines[i].trim();

		if (text === "") {
			if (out.length > 0 && out[out.length - 1] !== "") out.push("");
			continue;
		}

		let indent: number | undefined;
		let lineLevel: number | undefined;
		let quote: string | undefined;

		for (let j = 0; j < text.length; j++) {
			const ch = text[j];

			if (quote) {
				if (ch === "\\") j++;
				else if (ch === quote) quote = undefined;
				continue;
			}

			if (ch in CLOSING) {
				const open = brackets.pop();
				if (!open || open.char !== CLOSING[ch]) {
					throw new FormattingError(`Unbalanced "${ch}" at line ${lineNumber}`, {
						line: lineNumber,
					});
				}
				levels[open.level]--;
				while (levels.length > 0 && levels[levels.length - 1] === 0) {
					levels.pop();
					if (lineLevel === levels.length) lineLevel = undefined;
				}
				continue;
			}

			if (ch === " " || ch === "\t") continue;
			// Leading closers dedent the line they start.
			indent ??= levels.length;

			if (ch === "/" && text[j + 1] === "/") break;
			if (ch === "'" || ch === '"') {
				quote = ch;
			} else if (OPENING.has(ch)) {
				if (lineLevel === undefined) {
					levels.push(0);
					lineLevel = levels.length - 1;
				}
				levels[lineLevel]++;
				brackets.push({ char: ch, level: lineLevel, line: lineNumber });
			}
		}

		if (quote) {
			throw new FormattingError(`Unterminated string literal at line ${lineNumber}`, {
				line: lineNumber,
			});
		}

		out.push(`${INDENT.repeat(indent ?? levels.length)}${text}`);
	}

	const unclosed = brackets.pop();
	if (unclosed) {
		throw new FormattingError(`Unclosed "${unclosed.char}" opened at line ${unclosed.line}`, {
			line: unclosed.line,
		});
	}

	while (out.length > 0 && out[out.length - 1] === "") out.pop();
	return out.length > 0 ? `${out.join("\n")}\n` : "";
}

export const dartFormatter: Formatter = { format: formatDart };
