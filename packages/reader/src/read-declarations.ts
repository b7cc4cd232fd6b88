import ts from "typescript";
import {
  checkIdent,
  createDiagnosticEmitter,
  declareType,
  DiagnosticAccumulator,
  fail,
  fieldName,
  flatMapResult,
  LibBuilder,
  ok,
  Sizing,
  SymbolRef,
  transpileDiagnostics,
  Ty,
  debug,
  type EnumVariant,
  type LibDependency,
  type NamedField,
  type Result,
  type SymbolicLib,
  type TesseraDiagnostic,
  type TypeDeclaration,
  type TypeLib,
  type UnionVariant,
} from "@tessera/compiler";

export interface ReadDeclarationsOptions {
  /** Name of the library the declarations are compiled into. */
  readonly lib: string;
  readonly dependencies?: readonly LibDependency[];
  /** Used for parsing and in messages. */
  readonly fileName?: string;
}

/** Keywords with an unambiguous counterpart in a dependency named `Std`. */
const STD_KEYWORDS: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.StringKeyword, "String"],
  [ts.SyntaxKind.BooleanKeyword, "Bool"],
]);

const LIST_NAMES = new Set(["Array", "ReadonlyArray"]);
const SET_NAMES = new Set(["Set", "ReadonlySet"]);
const MAP_NAMES = new Set(["Map", "ReadonlyMap"]);

/**
 * Transpiles the `interface`, `type` and `enum` declarations of one
 * TypeScript source into a symbolic library. Every construct without a
 * strict-type counterpart is reported; nothing is skipped silently.
 */
export function readDeclarations(source: string, options: ReadDeclarationsOptions): Result<SymbolicLib> {
  const fileName = options.fileName ?? "declarations.ts";
  const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const reader = new DeclarationReader(sourceFile, options.dependencies ?? []);
  const builder = new LibBuilder(options.lib, options.dependencies ?? []);

  for (const statement of sourceFile.statements) {
    const decl = reader.read(statement);
    if (decl) builder.transpile(decl);
  }

  const acc = new DiagnosticAccumulator();
  acc.pushAll(reader.diagnostics);
  const symbols = acc.merge(builder.compileSymbols());
  debug.transpile("read", { fileName, lib: options.lib, problems: acc.diagnostics.length });
  return symbols && !acc.hasErrors ? ok(symbols) : fail(acc.diagnostics);
}

/** `readDeclarations` followed by the compile stage. */
export function compileDeclarations(source: string, options: ReadDeclarationsOptions): Result<TypeLib> {
  return flatMapResult(readDeclarations(source, options), (lib) => lib.compile());
}

// =============================================================================
// Reader
// =============================================================================

class DeclarationReader {
  readonly diagnostics: TesseraDiagnostic[] = [];
  private readonly emitter = createDiagnosticEmitter(transpileDiagnostics, { stage: "transpile" });
  private readonly localNames = new Set<string>();
  private current = "";

  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly dependencies: readonly LibDependency[],
  ) {
    for (const statement of sourceFile.statements) {
      if (
        ts.isInterfaceDeclaration(statement) ||
        ts.isTypeAliasDeclaration(statement) ||
        ts.isEnumDeclaration(statement)
      ) {
        this.localNames.add(statement.name.text);
      }
    }
  }

  read(statement: ts.Statement): TypeDeclaration | null {
    if (ts.isImportDeclaration(statement) || ts.isExportDeclaration(statement)) return null;
    if (
      !ts.isInterfaceDeclaration(statement) &&
      !ts.isTypeAliasDeclaration(statement) &&
      !ts.isEnumDeclaration(statement)
    ) {
      this.current = "(statement)";
      return this.unsupported(statement, "statement that declares no type");
    }

    const name = statement.name.text;
    this.current = name;
    const invalid = checkIdent(name);
    if (invalid) return this.invalid(invalid.message);

    if (ts.isEnumDeclaration(statement)) {
      const ty = this.enumType(statement);
      return ty ? declareType(name, ty) : null;
    }
    if (statement.typeParameters && statement.typeParameters.length > 0) {
      return this.unsupported(statement, "generic declaration");
    }
    if (ts.isInterfaceDeclaration(statement)) {
      if (statement.heritageClauses && statement.heritageClauses.length > 0) {
        return this.unsupported(statement, "interface inheritance");
      }
      const ty = this.structType(statement.members);
      return ty ? declareType(name, ty) : null;
    }
    const ty = this.typeOf(statement.type);
    return ty ? declareType(name, ty) : null;
  }

  // ---------------------------------------------------------------------------
  // Shapes
  // ---------------------------------------------------------------------------

  private typeOf(node: ts.TypeNode): Ty<SymbolRef> | null {
    if (ts.isParenthesizedTypeNode(node)) return this.typeOf(node.type);
    if (ts.isTypeLiteralNode(node)) return this.structType(node.members);
    if (ts.isTupleTypeNode(node)) return this.tupleType(node);
    if (ts.isUnionTypeNode(node)) return this.unionType(node);
    if (ts.isArrayTypeNode(node)) {
      const item = this.refOf(node.elementType);
      return item ? Ty.list(item, Sizing.U16) : null;
    }
    if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
      return this.typeOf(node.type);
    }
    if (ts.isTypeReferenceNode(node) && node.typeArguments && node.typeArguments.length > 0) {
      return this.genericType(node, node.typeArguments);
    }
    if (ts.isTypeReferenceNode(node) || STD_KEYWORDS.has(node.kind)) {
      return this.unsupported(node, "alias of another named type");
    }
    return this.unsupported(node, ts.SyntaxKind[node.kind]);
  }

  private structType(members: ts.NodeArray<ts.TypeElement>): Ty<SymbolRef> | null {
    const fields: NamedField<SymbolRef>[] = [];
    let complete = true;
    for (const member of members) {
      if (!ts.isPropertySignature(member) || !member.type) {
        this.unsupported(member, "member other than a typed property");
        complete = false;
        continue;
      }
      const key = propertyName(member.name);
      if (key === null) {
        this.unsupported(member.name, "computed property name");
        complete = false;
        continue;
      }
      const keyError = checkIdent(key);
      if (keyError) {
        this.invalid(`field '${key}': ${keyError.message}`);
        complete = false;
        continue;
      }
      const inner = this.refOf(member.type);
      if (!inner) {
        complete = false;
        continue;
      }
      fields.push({ name: fieldName(key), ty: member.questionToken ? SymbolRef.inline(Ty.option(inner)) : inner });
    }
    return complete ? Ty.struct(fields) : null;
  }

  private tupleType(node: ts.TupleTypeNode): Ty<SymbolRef> | null {
    const fields: SymbolRef[] = [];
    let complete = true;
    for (const element of node.elements) {
      const inner = ts.isNamedTupleMember(element)
        ? element.questionToken || element.dotDotDotToken
          ? this.unsupported(element, "optional or rest tuple element")
          : this.refOf(element.type)
        : ts.isOptionalTypeNode(element) || ts.isRestTypeNode(element)
          ? this.unsupported(element, "optional or rest tuple element")
          : this.refOf(element);
      if (inner) fields.push(inner);
      else complete = false;
    }
    return complete ? Ty.tuple(fields) : null;
  }

  private unionType(node: ts.UnionTypeNode): Ty<SymbolRef> | null {
    const members = node.types.map(unparenthesize);

    const nullish = members.filter(isNullish);
    if (nullish.length > 0) {
      const rest = members.filter((m) => !isNullish(m));
      const [some] = rest;
      if (rest.length !== 1 || !some) return this.unsupported(node, "nullable union of several types");
      const inner = this.refOf(some);
      return inner ? Ty.option(inner) : null;
    }

    if (members.every((m) => ts.isLiteralTypeNode(m) && ts.isStringLiteral(m.literal))) {
      const variants: EnumVariant[] = [];
      for (const [tag, member] of members.entries()) {
        const text = ts.isLiteralTypeNode(member) && ts.isStringLiteral(member.literal) ? member.literal.text : "";
        const error = checkIdent(text);
        if (error) return this.invalid(`variant '${text}': ${error.message}`);
        variants.push({ name: fieldName(text), tag });
      }
      return Ty.enumerate(variants);
    }

    if (members.every((m) => ts.isTypeLiteralNode(m) && m.members.length === 1)) {
      const variants: UnionVariant<SymbolRef>[] = [];
      for (const [tag, member] of members.entries()) {
        const prop = ts.isTypeLiteralNode(member) ? member.members[0] : undefined;
        if (!prop || !ts.isPropertySignature(prop) || !prop.type || prop.questionToken) {
          return this.unsupported(member, "union member other than `{ name: Type }`");
        }
        const key = propertyName(prop.name);
        if (key === null) return this.unsupported(prop.name, "computed property name");
        const error = checkIdent(key);
        if (error) return this.invalid(`variant '${key}': ${error.message}`);
        const inner = this.refOf(prop.type);
        if (!inner) return null;
        variants.push({ name: fieldName(key), tag, ty: inner });
      }
      return Ty.union(variants);
    }

    return this.unsupported(node, "union that is neither string literals nor single-key objects");
  }

  private enumType(node: ts.EnumDeclaration): Ty<SymbolRef> | null {
    const variants: EnumVariant[] = [];
    let next = 0;
    for (const member of node.members) {
      const key = propertyName(member.name);
      if (key === null) return this.unsupported(member.name, "computed enum member name");
      const error = checkIdent(key);
      if (error) return this.invalid(`variant '${key}': ${error.message}`);
      let tag = next;
      if (member.initializer) {
        if (!ts.isNumericLiteral(member.initializer)) {
          return this.unsupported(member.initializer, "enum member initializer other than a number");
        }
        tag = Number(member.initializer.text);
      }
      variants.push({ name: fieldName(key), tag });
      next = tag + 1;
    }
    return Ty.enumerate(variants);
  }

  /** `Array<T>`, `Set<T>`, `Map<K, V>`, `Ref<T>`, `FixedArray<T, N>`, `List<T, Min, Max>`. */
  private genericType(node: ts.TypeReferenceNode, args: ts.NodeArray<ts.TypeNode>): Ty<SymbolRef> | null {
    const name = ts.isIdentifier(node.typeName) ? node.typeName.text : "";
    const [first, second, third] = args;
    if (!first) return this.unsupported(node, "empty type argument list");

    if (LIST_NAMES.has(name) && args.length === 1) {
      const item = this.refOf(first);
      return item ? Ty.list(item, Sizing.U16) : null;
    }
    if (SET_NAMES.has(name) && args.length === 1) {
      const item = this.refOf(first);
      return item ? Ty.set(item, Sizing.U16) : null;
    }
    if (MAP_NAMES.has(name) && second && args.length === 2) {
      const key = this.refOf(first);
      const value = this.refOf(second);
      return key && value ? Ty.map(key, value, Sizing.U16) : null;
    }
    if (name === "Ref" && args.length === 1) {
      const target = this.refOf(first);
      return target ? Ty.ref(target) : null;
    }
    if (name === "FixedArray" && second && args.length === 2) {
      const item = this.refOf(first);
      const len = this.numberArg(second);
      return item && len !== null ? Ty.array(item, len) : null;
    }
    if (name === "List" && second && third && args.length === 3) {
      const item = this.refOf(first);
      const min = this.numberArg(second);
      const max = this.numberArg(third);
      return item && min !== null && max !== null ? Ty.list(item, Sizing.new(min, max)) : null;
    }
    return this.unsupported(node, `generic type '${name || node.typeName.getText(this.sourceFile)}'`);
  }

  private numberArg(node: ts.TypeNode): number | null {
    if (ts.isLiteralTypeNode(node) && ts.isNumericLiteral(node.literal)) return Number(node.literal.text);
    return this.unsupported(node, "type argument other than a number literal");
  }

  // ---------------------------------------------------------------------------
  // References
  // ---------------------------------------------------------------------------

  private refOf(node: ts.TypeNode): SymbolRef | null {
    if (ts.isParenthesizedTypeNode(node)) return this.refOf(node.type);

    if (ts.isTypeReferenceNode(node) && !node.typeArguments) {
      const typeName = node.typeName;
      if (ts.isQualifiedName(typeName) && ts.isIdentifier(typeName.left)) {
        return this.externRef(node, typeName.left.text, typeName.right.text);
      }
      if (ts.isIdentifier(typeName)) return this.nameRef(node, typeName.text);
    }

    const std = STD_KEYWORDS.get(node.kind);
    if (std !== undefined) {
      if (this.dependencies.some((d) => d.name === "Std")) return this.externRef(node, "Std", std);
      return this.unsupported(node, `'${node.getText(this.sourceFile)}' without a Std dependency`);
    }

    const ty = this.typeOf(node);
    return ty ? SymbolRef.inline(ty) : null;
  }

  /** Local declarations win; otherwise the first dependency exporting the name. */
  private nameRef(node: ts.Node, name: string): SymbolRef | null {
    const error = checkIdent(name);
    if (error) return this.unsupported(node, `type name '${name}'`);
    if (this.localNames.has(name)) return SymbolRef.named(name);
    for (const dep of this.dependencies) {
      for (const exported of dep.types.keys()) {
        if (exported === name) return SymbolRef.extern(dep.name, name);
      }
    }
    return SymbolRef.named(name);
  }

  private externRef(node: ts.Node, lib: string, name: string): SymbolRef | null {
    if (checkIdent(lib) || checkIdent(name)) return this.unsupported(node, `type name '${lib}.${name}'`);
    return SymbolRef.extern(lib, name);
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  private unsupported(node: ts.Node, syntax: string): null {
    const { line } = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));
    this.diagnostics.push(
      this.emitter.emit("tessera/transpile/unsupported-syntax", {
        message: `${this.sourceFile.fileName}:${line + 1}: '${this.current}' uses unsupported syntax: ${syntax}`,
        data: { name: this.current, syntax, line: line + 1 },
      }),
    );
    return null;
  }

  private invalid(detail: string): null {
    this.diagnostics.push(
      this.emitter.emit("tessera/transpile/invalid-declaration", {
        message: `type '${this.current}' is malformed: ${detail}`,
        data: { name: this.current, detail },
      }),
    );
    return null;
  }
}

function unparenthesize(node: ts.TypeNode): ts.TypeNode {
  return ts.isParenthesizedTypeNode(node) ? unparenthesize(node.type) : node;
}

function isNullish(node: ts.TypeNode): boolean {
  if (node.kind === ts.SyntaxKind.UndefinedKeyword) return true;
  return ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword;
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  return null;
}
