import { defineDiagnostic, type DiagnosticsCatalog } from "./types.js";

export type UnknownTypeData = { name: string; lib: string };
export type DuplicateTypeData = { name: string; lib: string };
export type UnknownDependencyData = { lib: string; name: string };
export type InvalidDeclarationData = { name: string; detail: string };
export type UnsupportedSyntaxData = { name: string; syntax: string; line: number };
export type UnresolvedReferenceData = { name: string; from: string };
export type RecursiveCompositionData = { cycle: readonly string[] };
export type LimitExceededData = { limit: string; detail: string };
export type MissingTypeData = { id: string; referencedBy: string };

export const transpileDiagnostics = {
  "tessera/transpile/unknown-type": defineDiagnostic<UnknownTypeData>({
    category: "reference",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["transpile"],
    description: "Declared type references a name that is neither declared in the library nor exported by a dependency.",
    data: { required: ["name", "lib"] },
  }),
  "tessera/transpile/duplicate-type": defineDiagnostic<DuplicateTypeData>({
    category: "declaration",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["transpile"],
    description: "Two declarations in one library share a type name.",
    data: { required: ["name", "lib"] },
  }),
  "tessera/transpile/unknown-dependency": defineDiagnostic<UnknownDependencyData>({
    category: "reference",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["transpile"],
    description: "External reference names a library the builder was not given as a dependency.",
    data: { required: ["lib", "name"] },
  }),
  "tessera/transpile/invalid-declaration": defineDiagnostic<InvalidDeclarationData>({
    category: "declaration",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["transpile"],
    description: "Declared shape is malformed: duplicate field or variant, empty composition, bad sizing.",
    data: { required: ["name", "detail"] },
  }),
  "tessera/transpile/unsupported-syntax": defineDiagnostic<UnsupportedSyntaxData>({
    category: "declaration",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["transpile"],
    description: "Source declaration uses a construct that has no strict-type counterpart.",
    data: { required: ["name", "syntax", "line"] },
  }),
} as const satisfies DiagnosticsCatalog;

export const compileDiagnostics = {
  "tessera/compile/unresolved-reference": defineDiagnostic<UnresolvedReferenceData>({
    category: "reference",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["compile"],
    description: "Symbolic reference names a type the library does not define.",
    data: { required: ["name", "from"] },
  }),
  "tessera/compile/recursive-composition": defineDiagnostic<RecursiveCompositionData>({
    category: "composition",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["compile"],
    description: "Named types compose each other in a cycle that no reference node breaks.",
    data: { required: ["cycle"] },
  }),
  "tessera/compile/limit-exceeded": defineDiagnostic<LimitExceededData>({
    category: "bounds",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["compile"],
    description: "A bounded collection overflowed while assembling the compiled library.",
    data: { required: ["limit", "detail"] },
  }),
} as const satisfies DiagnosticsCatalog;

export const finalizeDiagnostics = {
  "tessera/finalize/missing-type": defineDiagnostic<MissingTypeData>({
    category: "completeness",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["finalize"],
    description: "A member type references a semantic id that no imported library provides.",
    data: { required: ["id", "referencedBy"] },
  }),
  "tessera/finalize/limit-exceeded": defineDiagnostic<LimitExceededData>({
    category: "bounds",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["finalize"],
    description: "The merged type system exceeds its count or size ceiling.",
    data: { required: ["limit", "detail"] },
  }),
} as const satisfies DiagnosticsCatalog;

export const diagnosticsCatalog = {
  ...transpileDiagnostics,
  ...compileDiagnostics,
  ...finalizeDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type TesseraDiagnosticCode = keyof typeof diagnosticsCatalog;
