/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Stage tags where the diagnostic was produced to support routing and grouping. */
export type DiagnosticStage =
  | "transpile"
  | "compile"
  | "import"
  | "finalize"
  | "layout"
  | "identity";

/** Unified diagnostic envelope for every pipeline stage. */
export interface TesseraDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  data?: Readonly<TData>;
}
