export type NamingStrategy = "declared" | "configured";

export interface IntlWrapperConfig {
	header?: string;
	className?: string;
	naming?: NamingStrategy;
	contextExtension?: boolean;
	privateDelegate?: boolean;
	include?: string[];
	exclude?: string[];
	concurrency?: number;
}

export interface ResolvedConfig {
	header: string;
	className: string;
	naming: NamingStrategy;
	contextExtension: boolean;
	privateDelegate: boolean;
	include: string[];
	exclude: string[];
	concurrency: number;
}

export interface GenerationRequest {
	inputPath: string;
	inputText: string;
	config: ResolvedConfig;
}

export interface ClassNameInfo {
	/** Empty when the catalogue declares plain `Messages`. */
	prefix: string;
	localizationsClassName: string;
	delegateClassName: string;
	messagesClassName: string;
}

// --- Document model ---

export interface TypeRef {
	readonly name: string;
	readonly typeArguments?: readonly TypeRef[];
	readonly nullable?: boolean;
}

export interface ParameterSpec {
	readonly name: string;
	readonly type: TypeRef;
}

export interface FieldSpec {
	readonly kind: "field";
	readonly name: string;
	readonly type: TypeRef;
	readonly isStatic: boolean;
	/** Dart expression; may span several lines. */
	readonly initializer: string;
}

export type MethodBody =
	| { readonly kind: "expression"; readonly expression: string }
	| { readonly kind: "block"; readonly statements: readonly string[] };

export interface MethodSpec {
	readonly kind: "method" | "getter";
	readonly name: string;
	readonly isStatic: boolean;
	readonly isOverride: boolean;
	readonly isAsync: boolean;
	readonly parameters: readonly ParameterSpec[];
	readonly returns: TypeRef;
	readonly body: MethodBody;
}

export interface ClassSpec {
	readonly kind: "class";
	readonly name: string;
	readonly superType?: TypeRef;
	readonly fields: readonly FieldSpec[];
	readonly methods: readonly MethodSpec[];
}

export interface ExtensionSpec {
	readonly kind: "extension";
	readonly name: string;
	readonly on: TypeRef;
	readonly getterName: string;
	readonly getterExpression: string;
	readonly returns: TypeRef;
}

export interface DocumentModel {
	readonly headerComment: string;
	/** Module URIs. Ordering is decided by the emitter, not by this list. */
	readonly imports: readonly string[];
	readonly classes: readonly ClassSpec[];
	readonly topLevelFields: readonly FieldSpec[];
	readonly extensions: readonly ExtensionSpec[];
}

// --- Outcomes ---

export type SkipReason = "missing-declaration";

export type GenerationOutcome =
	| {
			kind: "generated";
			inputPath: string;
			outputPath: string;
			contents: string;
			classNames: ClassNameInfo;
	  }
	| {
			kind: "skipped";
			inputPath: string;
			reason: SkipReason;
	  };
