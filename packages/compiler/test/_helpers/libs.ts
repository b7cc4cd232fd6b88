import {
  formatDiagnostic,
  LibBuilder,
  type LibDependency,
  type Result,
  type TesseraDiagnostic,
  type TypeDeclaration,
  type TypeLib,
} from "../../src/index.js";

/** The value of a successful result; a failure throws with every diagnostic. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(result.errors.map(formatDiagnostic).join("\n"));
  return result.value;
}

/** The diagnostics of a failed result; a success throws. */
export function errorsOf<T>(result: Result<T>): readonly TesseraDiagnostic[] {
  if (result.ok) throw new Error("expected the result to fail");
  return result.errors;
}

export function buildLib(
  name: string,
  declarations: readonly TypeDeclaration[],
  dependencies: readonly LibDependency[] = [],
): Result<TypeLib> {
  return new LibBuilder(name, dependencies).transpileAll(declarations).compile();
}

export function compileLib(
  name: string,
  declarations: readonly TypeDeclaration[],
  dependencies: readonly LibDependency[] = [],
): TypeLib {
  return unwrap(buildLib(name, declarations, dependencies));
}
