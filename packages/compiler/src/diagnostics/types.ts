import type { DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";

/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // The artifact (library, system) cannot be produced.
  | "degraded" // Output is produced but incomplete.
  | "informational"; // No behavioral impact; context only.
/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "declaration"
  | "reference"
  | "composition"
  | "bounds"
  | "completeness";

export type DiagnosticDataBase = Record<string, unknown>;

/** Required/optional data fields are validated to catch emitter mistakes. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity and presentation metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  readonly category: DiagnosticCategory;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  /** Stage is the canonical origin for code classification. */
  readonly stages: readonly DiagnosticStage[];
  /** Human-readable explanation for docs and tooling. */
  readonly description: string;
  /** Declarative data contract for emitters. */
  readonly data?: DiagnosticDataRequirement;
  /** Phantom marker carrying the data shape; never set at runtime. */
  readonly __data?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataBase>>;
/** Code key type used for emitter typing. */
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;
/** Maps code -> data shape for strongly-typed emission. */
export type DiagnosticDataByCode<Catalog extends DiagnosticsCatalog> = {
  [K in keyof Catalog]: Catalog[K] extends DiagnosticSpec<infer D extends DiagnosticDataBase> ? D : never;
};
