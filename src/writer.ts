import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PathMismatchError } from "./errors.js";

export const CATALOGUE_SUFFIX = ".g.dart";
export const WRAPPER_SUFFIX = ".flutter.g.dart";

export function outputPathFor(inputPath: string): string {
	if (!inputPath.endsWith(CATALOGUE_SUFFIX)) {
		throw new PathMismatchError(inputPath, CATALOGUE_SUFFIX);
	}
	return `${inputPath.slice(0, -CATALOGUE_SUFFIX.length)}${WRAPPER_SUFFIX}`;
}

/** Wrappers share the catalogue suffix but are never inputs themselves. */
export function isCatalogueAsset(path: string): boolean {
	return path.endsWith(CATALOGUE_SUFFIX) && !path.endsWith(WRAPPER_SUFFIX);
}

export async function writeWrapper(outputPath: string, contents: string): Promise<void> {
	await mkdir(dirname(outputPath), { recursive: true });
	await writeFile(outputPath, contents, "utf-8");
}
