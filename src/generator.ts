import { basename } from "node:path";
import { buildDocument } from "./builder.js";
import { emitDocument } from "./emitter.js";
import { errorMessage, FormattingError } from "./errors.js";
import { dartFormatter, type Formatter } from "./formatter.js";
import { resolveClassNames } from "./naming.js";
import type { GenerationOutcome, GenerationRequest } from "./types.js";
import { outputPathFor } from "./writer.js";

/**
 * Runs one catalogue through name resolution, model building, emission and
 * formatting. No I/O; throws `PathMismatchError` or `FormattingError`.
 */
export function generateWrapper(
	request: GenerationRequest,
	formatter: Formatter = dartFormatter,
): GenerationOutcome {
	const { inputPath, inputText, config } = request;
	const outputPath = outputPathFor(inputPath);

	const classNames = resolveClassNames(inputText, config);
	if (!classNames) {
		return { kind: "skipped", inputPath, reason: "missing-declaration" };
	}

	const model = buildDocument(classNames, config, basename(inputPath));
	const source = emitDocument(model);

	let contents: string;
	try {
		contents = formatter.format(source);
	} catch (err) {
		if (err instanceof FormattingError) throw err;
		throw new FormattingError(`Formatter rejected output for ${inputPath}: ${errorMessage(err)}`, {
			cause: err,
		});
	}

	return { kind: "generated", inputPath, outputPath, contents, classNames };
}
