// Compiler package public API
//
// This barrel exports the identity engine, the type model, the library
// compiler, the type-system container and the layout reconstructor.
// Import from here rather than deep paths for stability.

// === Naming ===
export {
  checkIdent,
  compareStrings,
  fieldName,
  formatTypeFqn,
  ident,
  isFieldName,
  isIdent,
  isTypeName,
  libName,
  parseTypeFqn,
  typeFqn,
  typeName,
} from "./model/ident.js";
export type { FieldName, Ident, LibName, TypeFqn, TypeName } from "./model/ident.js";

// === Type model ===
export * from "./model/primitive.js";
export { formatSizing, mapTyRefs, Sizing, Ty, TY_KINDS, tyChildren, tyKindLabel, tyRefs } from "./model/ty.js";
export type { EnumVariant, NamedField, TyChild, TyKind, UnionVariant } from "./model/ty.js";
export { checkTy } from "./model/ty-check.js";

// === Canonical encoding ===
export { StrictReader } from "./encoding/reader.js";
export { StrictWriter } from "./encoding/writer.js";
export { decodeTy, encodeTy, readTy, tyEquals, writeTy } from "./encoding/ty-codec.js";

// === Identity ===
export { ID_TAGS, sha256, tagHash, taggedHash } from "./identity/hash.js";
export type { IdTag } from "./identity/hash.js";
export { decodeIdText, encodeIdText, idChecksum, idMnemonic, ID_LENGTH, URN_PREFIX } from "./identity/baid.js";
export type { IdFormat } from "./identity/baid.js";
export { autoTypeName, compareIds, Id32, LibId, SemId, TypeSysId } from "./identity/id.js";
export { computeLibId, computeSemId, computeSysId } from "./identity/commit.js";
export type { LibCommitment, SystemCommitment } from "./identity/commit.js";

// === Type system ===
export { DEFAULT_SYSTEM_BOUNDS, TypeSystem } from "./typesys/type-system.js";
export type { AssembledSystem, MissingReference, SystemBounds } from "./typesys/type-system.js";
export { SymbolicSys, SystemBuilder } from "./typesys/system-builder.js";
export type { SystemBuilderOptions } from "./typesys/system-builder.js";
export { mergeSymTy, symTy } from "./typesys/sym-ty.js";
export type { SymTy } from "./typesys/sym-ty.js";
export { formatTyExpr, formatTyParams } from "./typesys/display.js";

// === Library compiler ===
export {
  declareType,
  formatSymbolRef,
  LibBuilder,
  SymbolicLib,
  SymbolRef,
  walkSymbolRefs,
} from "./library/symbolic.js";
export type { LibDependency, SymbolicEntry, TypeDeclaration } from "./library/symbolic.js";
export { compileLibrary } from "./library/compile.js";
export { TypeLib } from "./library/type-lib.js";
export type { TypeLibInit } from "./library/type-lib.js";

// === Standard library ===
export { STD_LIB_NAME, stdLib, stdSymbolic } from "./stl.js";

// === Layout ===
export { TypeTree } from "./layout/type-tree.js";
export type { TypeInfo, TypeNamer } from "./layout/type-tree.js";
export { TypeLayout } from "./layout/layout.js";
export { flattenVesper, formatVesperExpr, renderVesper } from "./layout/vesper.js";
export type { LayoutItem, TypeVesper, VesperExpr } from "./layout/vesper.js";

// === Diagnostics ===
export { defineDiagnostic } from "./diagnostics/types.js";
export type {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticImpact,
  DiagnosticSpec,
  DiagnosticsCatalog,
} from "./diagnostics/types.js";
export { createDiagnosticEmitter } from "./diagnostics/emitter.js";
export type { DiagnosticEmitter, EmitDiagnosticInput } from "./diagnostics/emitter.js";
export {
  compileDiagnostics,
  diagnosticsCatalog,
  finalizeDiagnostics,
  transpileDiagnostics,
} from "./diagnostics/catalog.js";
export type { TesseraDiagnosticCode } from "./diagnostics/catalog.js";
export { buildDiagnostic, formatDiagnostic } from "./shared/diagnostics.js";
export type { DiagnosticSeverity, DiagnosticStage, TesseraDiagnostic } from "./shared/diagnostics.js";

// === Results, errors, limits ===
export { DiagnosticAccumulator, fail, flatMapResult, ok } from "./shared/result.js";
export type { Result } from "./shared/result.js";
export {
  CollisionError,
  ConfinementError,
  DecodeError,
  IdParseError,
  InconsistencyError,
  InvalidIdentError,
  LayoutError,
  TesseraError,
  TesseraErrorCode,
} from "./shared/errors.js";
export type { IdParseReason, InvalidIdentReason, LayoutErrorReason, TesseraErrorCodeType } from "./shared/errors.js";
export { ConfinedMap, ensureUint, ensureWithin, LIMITS } from "./shared/confined.js";
export type { ConfinedMapOptions, LimitName } from "./shared/confined.js";

// === Debug ===
export { configureDebug, debug, getDebugChannel, isDebugEnabled, refreshDebugChannels } from "./shared/debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";
