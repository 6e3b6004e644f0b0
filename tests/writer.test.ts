import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PathMismatchError } from "../src/errors.js";
import { isCatalogueAsset, outputPathFor, writeWrapper } from "../src/writer.js";

describe("outputPathFor", () => {
	it("replaces the catalogue suffix with the wrapper suffix", () => {
		expect(outputPathFor("lib/intl_en.g.dart")).toBe("lib/intl_en.flutter.g.dart");
		expect(outputPathFor("/abs/app/lib/src/messages.g.dart")).toBe(
			"/abs/app/lib/src/messages.flutter.g.dart",
		);
	});

	it("fails with PathMismatchError for other paths", () => {
		expect(() => outputPathFor("lib/intl_en.dart")).toThrow(PathMismatchError);
		expect(() => outputPathFor("lib/intl_en.g.dart.bak")).toThrow(
			'"lib/intl_en.g.dart.bak" does not end with ".g.dart"',
		);
	});
});

describe("isCatalogueAsset", () => {
	it("accepts catalogues and rejects wrappers", () => {
		expect(isCatalogueAsset("lib/intl_en.g.dart")).toBe(true);
		expect(isCatalogueAsset("lib/intl_en.flutter.g.dart")).toBe(false);
		expect(isCatalogueAsset("lib/main.dart")).toBe(false);
	});
});

describe("writeWrapper", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "writer-test-"));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("creates parent directories recursively", async () => {
		const outputPath = join(tempDir, "lib", "src", "intl_en.flutter.g.dart");
		await writeWrapper(outputPath, "// wrapper\n");

		expect(existsSync(outputPath)).toBe(true);
		expect(await readFile(outputPath, "utf-8")).toBe("// wrapper\n");
	});

	it("replaces the whole file", async () => {
		const outputPath = join(tempDir, "intl_en.flutter.g.dart");
		await writeWrapper(outputPath, "// first version with more text\n");
		await writeWrapper(outputPath, "// second\n");

		expect(await readFile(outputPath, "utf-8")).toBe("// second\n");
	});
});
