export class PathMismatchError extends Error {
	readonly inputPath: string;
	readonly expectedSuffix: string;

	constructor(inputPath: string, expectedSuffix: string) {
		super(`Cannot derive an output path: "${inputPath}" does not end with "${expectedSuffix}"`);
		this.name = "PathMismatchError";
		this.inputPath = inputPath;
		this.expectedSuffix = expectedSuffix;
	}
}

/**
 * Raised when emitted text cannot be canonicalized. Always an internal
 * construction defect; the asset is never written.
 */
export class FormattingError extends Error {
	readonly line?: number;

	constructor(message: string, options?: { line?: number; cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = "FormattingError";
		this.line = options?.line;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
