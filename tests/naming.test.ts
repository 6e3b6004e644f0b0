import { describe, expect, it } from "vitest";
import {
	classNamesFromPrefix,
	extractPrefix,
	lowerFirst,
	prefixFromClassName,
	resolveClassNames,
} from "../src/naming.js";

const catalogue = `// Generated by package:messages_builder
import 'package:messages/messages.dart';

class FooMessages {
  static const knownLocales = ['en', 'pt_BR', 'fr'];

  String get greeting => _get(0);
}
`;

describe("extractPrefix", () => {
	it("returns the prefix of a <Prefix>Messages declaration", () => {
		expect(extractPrefix(catalogue)).toBe("Foo");
	});

	it("returns an empty prefix for a plain Messages class", () => {
		expect(extractPrefix("class Messages {\n}")).toBe("");
	});

	it("returns undefined when no declaration exists", () => {
		expect(extractPrefix("class FooStrings {\n}")).toBeUndefined();
		expect(extractPrefix("")).toBeUndefined();
	});

	it("tolerates extra whitespace around the name", () => {
		expect(extractPrefix("class   AppMessages{")).toBe("App");
	});

	it("uses the first declaration", () => {
		expect(extractPrefix("class AMessages {}\nclass BMessages {}")).toBe("A");
	});

	it("requires the prefix to start with an upper-case letter", () => {
		expect(extractPrefix("class fooMessages {")).toBeUndefined();
		expect(extractPrefix("class fooMessages {}\nclass BarMessages {}")).toBe("Bar");
	});

	it("does not match names that merely end in class", () => {
		expect(extractPrefix("subclass FooMessages {")).toBeUndefined();
	});
});

describe("classNamesFromPrefix", () => {
	it("suffixes the prefix", () => {
		expect(classNamesFromPrefix("Foo")).toEqual({
			prefix: "Foo",
			localizationsClassName: "FooLocalizations",
			delegateClassName: "FooLocalizationsDelegate",
			messagesClassName: "FooMessages",
		});
	});

	it("stems an empty prefix on the messages class name", () => {
		expect(classNamesFromPrefix("")).toEqual({
			prefix: "",
			localizationsClassName: "MessagesLocalizations",
			delegateClassName: "MessagesLocalizationsDelegate",
			messagesClassName: "Messages",
		});
	});

	it("makes the delegate library-private on request", () => {
		expect(classNamesFromPrefix("Foo", { privateDelegate: true }).delegateClassName).toBe(
			"_FooLocalizationsDelegate",
		);
	});
});

describe("prefixFromClassName", () => {
	it("strips a trailing Messages", () => {
		expect(prefixFromClassName("AppMessages")).toBe("App");
		expect(prefixFromClassName("Messages")).toBe("");
	});

	it("keeps names without the suffix", () => {
		expect(prefixFromClassName("Strings")).toBe("Strings");
	});
});

describe("resolveClassNames", () => {
	const declared = { naming: "declared" as const, className: "Messages", privateDelegate: false };
	const configured = { naming: "configured" as const, className: "AppMessages", privateDelegate: false };

	it("reads the declaration in declared mode", () => {
		expect(resolveClassNames(catalogue, declared)?.messagesClassName).toBe("FooMessages");
	});

	it("skips inputs without a declaration in declared mode", () => {
		expect(resolveClassNames("void main() {}", declared)).toBeUndefined();
	});

	it("ignores the input in configured mode", () => {
		expect(resolveClassNames(catalogue, configured)?.localizationsClassName).toBe(
			"AppLocalizations",
		);
		expect(resolveClassNames("void main() {}", configured)?.messagesClassName).toBe(
			"AppMessages",
		);
	});
});

describe("lowerFirst", () => {
	it("lower-cases the first letter only", () => {
		expect(lowerFirst("FooLocalizations")).toBe("fooLocalizations");
		expect(lowerFirst("")).toBe("");
	});
});
