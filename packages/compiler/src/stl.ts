/* =============================================================================
 * STANDARD LIBRARY
 * -----------------------------------------------------------------------------
 * Built-in primitive declarations every other library may depend on. Built
 * on first use, then shared as one frozen value for the life of the process.
 * ============================================================================= */

import { declareType, LibBuilder, SymbolRef, type SymbolicLib, type TypeDeclaration } from "./library/symbolic.js";
import type { TypeLib } from "./library/type-lib.js";
import { fieldName } from "./model/ident.js";
import * as prim from "./model/primitive.js";
import { Sizing, Ty } from "./model/ty.js";
import { InconsistencyError } from "./shared/errors.js";
import { formatDiagnostic } from "./shared/diagnostics.js";
import type { Result } from "./shared/result.js";

export const STD_LIB_NAME = "Std";

function stdDeclarations(): TypeDeclaration[] {
  const primitive = (name: string, code: prim.Primitive): TypeDeclaration =>
    declareType(name, Ty.prim(code));

  return [
    primitive("Unit", prim.UNIT),
    primitive("Byte", prim.BYTE),
    primitive("U8", prim.U8),
    primitive("U16", prim.U16),
    primitive("U24", prim.U24),
    primitive("U32", prim.U32),
    primitive("U64", prim.U64),
    primitive("U128", prim.U128),
    primitive("I8", prim.I8),
    primitive("I16", prim.I16),
    primitive("I32", prim.I32),
    primitive("I64", prim.I64),
    primitive("I128", prim.I128),
    primitive("F32", prim.F32),
    primitive("F64", prim.F64),
    declareType(
      "Bool",
      Ty.enumerate([
        { name: fieldName("false"), tag: 0 },
        { name: fieldName("true"), tag: 1 },
      ]),
    ),
    declareType("Char", Ty.unicode()),
    declareType("AsciiString", Ty.list(SymbolRef.named("Byte"), Sizing.U8)),
    declareType("String", Ty.list(SymbolRef.named("Char"), Sizing.U16)),
  ];
}

function expect<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw new InconsistencyError(`standard library does not compile: ${result.errors.map(formatDiagnostic).join("; ")}`);
}

let symbolic: SymbolicLib | null = null;
let compiled: TypeLib | null = null;

/** Symbolic form of the standard library. */
export function stdSymbolic(): SymbolicLib {
  symbolic ??= expect(new LibBuilder(STD_LIB_NAME).transpileAll(stdDeclarations()).compileSymbols());
  return symbolic;
}

/** The compiled standard library; the same instance on every call. */
export function stdLib(): TypeLib {
  compiled ??= expect(stdSymbolic().compile());
  return compiled;
}
