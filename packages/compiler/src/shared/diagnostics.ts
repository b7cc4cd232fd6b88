import type { DiagnosticSeverity, DiagnosticStage, TesseraDiagnostic } from "../model/diagnostics.js";

export type { DiagnosticSeverity, DiagnosticStage, TesseraDiagnostic } from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder; severity defaults to "error". */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): TesseraDiagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    ...(input.data ? { data: input.data } : {}),
  };
}

/** `stage error code: message` */
export function formatDiagnostic(diag: TesseraDiagnostic): string {
  return `${diag.stage} ${diag.severity} ${diag.code}: ${diag.message}`;
}
