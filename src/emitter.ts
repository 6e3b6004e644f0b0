import type {
	ClassSpec,
	DocumentModel,
	ExtensionSpec,
	FieldSpec,
	MethodSpec,
	TypeRef,
} from "./types.js";

export function printType(type: TypeRef): string {
	const args =
		type.typeArguments && type.typeArguments.length > 0
			? `<${type.typeArguments.map(printType).join(", ")}>`
			: "";
	return `${type.name}${args}${type.nullable ? "?" : ""}`;
}

function directiveGroup(uri: string): number {
	if (uri.startsWith("dart:")) return 0;
	if (uri.startsWith("package:")) return 1;
	return 2;
}

/**
 * Dart directive order: `dart:` first, then `package:`, then relative URIs,
 * each group sorted. Returns the non-empty groups.
 */
export function orderImports(imports: readonly string[]): string[][] {
	const groups: string[][] = [[], [], []];
	for (const uri of new Set(imports)) {
		groups[directiveGroup(uri)].push(uri);
	}
	return groups
		.map((group) => group.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)))
		.filter((group) => group.length > 0);
}

function emitHeader(comment: string): string[] {
	return comment.split(/\r\n?|\n/).map((line) => (line.trim() ? `// ${line.trim()}` : "//"));
}

function emitField(field: FieldSpec): string[] {
	const modifier = field.isStatic ? "static " : "";
	return `${modifier}${printType(field.type)} ${field.name} = ${field.initializer};`.split("\n");
}

function emitMethod(method: MethodSpec): string[] {
	const lines: string[] = [];
	if (method.isOverride) lines.push("@override");

	const modifier = method.isStatic ? "static " : "";
	const params =
		method.kind === "getter"
			? ""
			: `(${method.parameters.map((p) => `${printType(p.type)} ${p.name}`).join(", ")})`;
	const accessor = method.kind === "getter" ? "get " : "";
	const asyncMarker = method.isAsync ? " async" : "";
	const signature = `${modifier}${printType(method.returns)} ${accessor}${method.name}${params}${asyncMarker}`;

	if (method.body.kind === "expression") {
		lines.push(`${signature} => ${method.body.expression};`);
	} else {
		lines.push(`${signature} {`, ...method.body.statements, "}");
	}
	return lines;
}

function joinMembers(members: string[][]): string[] {
	return members.flatMap((member, i) => (i === 0 ? member : ["", ...member]));
}

function emitClass(spec: ClassSpec): string[] {
	const superClause = spec.superType ? ` extends ${printType(spec.superType)}` : "";
	return [
		`class ${spec.name}${superClause} {`,
		...joinMembers([...spec.fields.map(emitField), ...spec.methods.map(emitMethod)]),
		"}",
	];
}

function emitExtension(spec: ExtensionSpec): string[] {
	return [
		`extension ${spec.name} on ${printType(spec.on)} {`,
		`${printType(spec.returns)} get ${spec.getterName} => ${spec.getterExpression};`,
		"}",
	];
}

/**
 * Serializes the model to Dart source. Indentation is left to the formatter.
 */
export function emitDocument(model: DocumentModel): string {
	const sections: string[][] = [
		emitHeader(model.headerComment),
		...orderImports(model.imports).map((group) => group.map((uri) => `import '${uri}';`)),
		...model.classes.map(emitClass),
		...model.topLevelFields.map(emitField),
		...model.extensions.map(emitExtension),
	];
	return `${joinMembers(sections).join("\n")}\n`;
}
