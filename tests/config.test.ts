import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("c12", () => ({
	loadConfig: vi.fn(),
}));

import { loadConfig } from "c12";
import {
	DEFAULT_CLASS_NAME,
	DEFAULT_HEADER,
	defaultConfig,
	defineConfig,
	loadWrapperConfig,
	resolveWrapperConfig,
} from "../src/config.js";

const mockLoadConfig = vi.mocked(loadConfig);

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
	vi.restoreAllMocks();
	mockLoadConfig.mockReset();
});

describe("defaultConfig", () => {
	it("provides the documented defaults", () => {
		expect(defaultConfig()).toEqual({
			header: DEFAULT_HEADER,
			className: DEFAULT_CLASS_NAME,
			naming: "declared",
			contextExtension: false,
			privateDelegate: false,
			include: ["lib/**/*.g.dart"],
			exclude: [],
			concurrency: 10,
		});
		expect(DEFAULT_HEADER).toBe("Generated by the wrapper generator");
		expect(DEFAULT_CLASS_NAME).toBe("Messages");
	});

	it("returns a fresh object each time", () => {
		const a = defaultConfig();
		a.include.push("extra/**/*.g.dart");
		expect(defaultConfig().include).toEqual(["lib/**/*.g.dart"]);
	});
});

describe("resolveWrapperConfig", () => {
	it("uses defaults when the config is absent", () => {
		expect(resolveWrapperConfig(undefined)).toEqual(defaultConfig());
		expect(resolveWrapperConfig({})).toEqual(defaultConfig());
	});

	it("keeps provided options", () => {
		const config = resolveWrapperConfig({
			header: "Do not edit",
			className: "AppMessages",
			naming: "configured",
			contextExtension: true,
		});
		expect(config.header).toBe("Do not edit");
		expect(config.className).toBe("AppMessages");
		expect(config.naming).toBe("configured");
		expect(config.contextExtension).toBe(true);
		expect(config.privateDelegate).toBe(false);
	});

	it("falls back per option when a value is malformed", () => {
		const config = resolveWrapperConfig({ header: 42, className: "AppMessages" });
		expect(config.header).toBe(DEFAULT_HEADER);
		expect(config.className).toBe("AppMessages");
		expect(console.log).toHaveBeenCalledTimes(1);
	});

	it("rejects class names that are not Dart identifiers", () => {
		expect(resolveWrapperConfig({ className: "my-messages" }).className).toBe(
			DEFAULT_CLASS_NAME,
		);
	});

	it("rejects class names that start with a lower-case letter", () => {
		expect(resolveWrapperConfig({ className: "appMessages" }).className).toBe(
			DEFAULT_CLASS_NAME,
		);
	});

	it("uses defaults for a non-object config", () => {
		expect(resolveWrapperConfig("header=x")).toEqual(defaultConfig());
		expect(resolveWrapperConfig([1, 2])).toEqual(defaultConfig());
	});
});

describe("loadWrapperConfig", () => {
	it("validates what c12 loaded", async () => {
		mockLoadConfig.mockResolvedValueOnce({
			config: { header: "From file", privateDelegate: true },
		});

		const config = await loadWrapperConfig("/project");

		expect(mockLoadConfig).toHaveBeenCalledWith({ name: "intl-wrapper", cwd: "/project" });
		expect(config.header).toBe("From file");
		expect(config.privateDelegate).toBe(true);
	});

	it("degrades to defaults when the config file cannot be loaded", async () => {
		mockLoadConfig.mockRejectedValueOnce(new Error("Unexpected token"));

		const config = await loadWrapperConfig("/project");

		expect(config).toEqual(defaultConfig());
		expect(console.log).toHaveBeenCalledTimes(1);
	});
});

describe("defineConfig", () => {
	it("returns the config unchanged", () => {
		const config = { header: "x" };
		expect(defineConfig(config)).toBe(config);
	});
});
