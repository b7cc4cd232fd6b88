import type { DiagnosticStage, TesseraDiagnostic } from "../model/diagnostics.js";
import type { DiagnosticDataBase, DiagnosticDataByCode, DiagnosticsCatalog } from "./types.js";
import { buildDiagnostic } from "../shared/diagnostics.js";

export type EmitDiagnosticInput<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  message: string;
  data: Readonly<TData>;
};

export type DiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
> = {
  emit<Code extends AllowedCodes>(
    code: Code,
    input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
  ): TesseraDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>;
};

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(
  catalog: Catalog,
  options: { stage: DiagnosticStage },
): DiagnosticEmitter<Catalog, AllowedCodes> {
  const stage = options.stage;

  return {
    emit(code, input) {
      const spec = catalog[code];
      if (!spec) {
        throw new Error(`Diagnostic code '${code}' is not in the catalog.`);
      }
      if (!spec.stages.includes(stage)) {
        throw new Error(`Diagnostic code '${code}' cannot be emitted from the '${stage}' stage.`);
      }
      for (const field of spec.data?.required ?? []) {
        if (!(field in input.data)) {
          throw new Error(`Diagnostic code '${code}' requires data field '${field}'.`);
        }
      }
      return buildDiagnostic({
        code,
        message: input.message,
        stage,
        severity: spec.defaultSeverity,
        data: input.data,
      });
    },
  };
}
