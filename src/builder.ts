import { lowerFirst } from "./naming.js";
import type {
	ClassNameInfo,
	ClassSpec,
	DocumentModel,
	ExtensionSpec,
	FieldSpec,
	MethodSpec,
	ResolvedConfig,
	TypeRef,
} from "./types.js";

export const FRAMEWORK_IMPORTS = [
	"package:flutter/services.dart",
	"package:flutter/widgets.dart",
	"package:flutter_localizations/flutter_localizations.dart",
	"package:messages/package_intl_object.dart",
] as const;

// Load precedence in Flutter follows list order; the generated delegate must come first.
export const DEFAULT_DELEGATES = [
	"GlobalMaterialLocalizations.delegate",
	"GlobalCupertinoLocalizations.delegate",
	"GlobalWidgetsLocalizations.delegate",
] as const;

const LOCALE: TypeRef = { name: "Locale" };
const BOOL: TypeRef = { name: "bool" };
const BUILD_CONTEXT: TypeRef = { name: "BuildContext" };

function ref(name: string, ...typeArguments: TypeRef[]): TypeRef {
	return typeArguments.length > 0 ? { name, typeArguments } : { name };
}

function nullable(type: TypeRef): TypeRef {
	return { ...type, nullable: true };
}

function listLiteral(items: readonly string[]): string {
	return ["[", ...items.map((item) => `${item},`), "]"].join("\n");
}

function delegateType(names: ClassNameInfo): TypeRef {
	return ref("LocalizationsDelegate", ref(names.messagesClassName));
}

function buildLocalizationsClass(names: ClassNameInfo): ClassSpec {
	const messages = names.messagesClassName;

	const fields: FieldSpec[] = [
		{
			kind: "field",
			name: "localizationsDelegates",
			type: ref("Iterable", ref("LocalizationsDelegate", ref("dynamic"))),
			isStatic: true,
			initializer: listLiteral(["delegate", ...DEFAULT_DELEGATES]),
		},
		{
			kind: "field",
			name: "delegate",
			type: delegateType(names),
			isStatic: true,
			initializer: `${names.delegateClassName}()`,
		},
	];

	const methods: MethodSpec[] = [
		{
			kind: "getter",
			name: "supportedLocales",
			isStatic: true,
			isOverride: false,
			isAsync: false,
			parameters: [],
			returns: ref("List", LOCALE),
			body: {
				kind: "block",
				statements: [
					`return ${messages}.knownLocales.map((e) {`,
					"var split = e.split('_');",
					"var code = split.length > 1 ? split[1] : null;",
					"return Locale(split.first, code);",
					"}).toList();",
				],
			},
		},
		{
			kind: "method",
			name: "of",
			isStatic: true,
			isOverride: false,
			isAsync: false,
			parameters: [{ name: "context", type: BUILD_CONTEXT }],
			returns: nullable(ref(messages)),
			body: {
				kind: "expression",
				expression: `Localizations.of<${messages}>(context, ${messages})`,
			},
		},
	];

	return { kind: "class", name: names.localizationsClassName, fields, methods };
}

function buildDelegateClass(names: ClassNameInfo): ClassSpec {
	const messages = names.messagesClassName;
	const localeParameter = [{ name: "locale", type: LOCALE }];

	return {
		kind: "class",
		name: names.delegateClassName,
		superType: delegateType(names),
		fields: [],
		methods: [
			{
				kind: "method",
				name: "isSupported",
				isStatic: false,
				isOverride: true,
				isAsync: false,
				parameters: localeParameter,
				returns: BOOL,
				body: {
					kind: "expression",
					expression: `${messages}.knownLocales.contains(locale.toString())`,
				},
			},
			{
				kind: "method",
				name: "load",
				isStatic: false,
				isOverride: true,
				isAsync: true,
				parameters: localeParameter,
				returns: ref("Future", ref(messages)),
				body: {
					kind: "block",
					statements: [
						"await messages.loadLocale(locale.toString());",
						"return messages;",
					],
				},
			},
			{
				kind: "method",
				name: "shouldReload",
				isStatic: false,
				isOverride: true,
				isAsync: false,
				parameters: [{ name: "old", type: delegateType(names) }],
				returns: BOOL,
				body: { kind: "expression", expression: "false" },
			},
		],
	};
}

function buildMessagesSingleton(names: ClassNameInfo): FieldSpec {
	return {
		kind: "field",
		name: "messages",
		type: ref(names.messagesClassName),
		isStatic: false,
		initializer: `${names.messagesClassName}(rootBundle.loadString, const OldIntlObject())`,
	};
}

function buildContextExtension(names: ClassNameInfo): ExtensionSpec {
	return {
		kind: "extension",
		name: `${names.localizationsClassName}Extension`,
		on: BUILD_CONTEXT,
		getterName: lowerFirst(names.localizationsClassName),
		getterExpression: `${names.localizationsClassName}.of(this)`,
		returns: nullable(ref(names.messagesClassName)),
	};
}

/**
 * Assembles the wrapper library for one catalogue. `inputFileName` is the
 * catalogue's base name; the wrapper is written beside it and imports it
 * relatively.
 */
export function buildDocument(
	names: ClassNameInfo,
	config: Pick<ResolvedConfig, "header" | "contextExtension">,
	inputFileName: string,
): DocumentModel {
	const imports = [...new Set<string>([...FRAMEWORK_IMPORTS, inputFileName])];

	return {
		headerComment: config.header,
		imports,
		classes: [buildLocalizationsClass(names), buildDelegateClass(names)],
		topLevelFields: [buildMessagesSingleton(names)],
		extensions: config.contextExtension ? [buildContextExtension(names)] : [],
	};
}
