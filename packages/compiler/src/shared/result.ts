import type { TesseraDiagnostic } from "../model/diagnostics.js";

/**
 * Outcome of a builder stage. Failures carry every diagnostic found, so a
 * caller can fix all declarations in one pass.
 */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly TesseraDiagnostic[] };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T>(errors: readonly TesseraDiagnostic[]): Result<T> => ({ ok: false, errors });

export const flatMapResult = <T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> =>
  result.ok ? fn(result.value) : result;

/**
 * Imperative collector for stages that walk many declarations and keep going
 * after the first problem.
 */
export class DiagnosticAccumulator {
  private readonly items: TesseraDiagnostic[] = [];

  get diagnostics(): readonly TesseraDiagnostic[] {
    return this.items;
  }

  get hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  push(diagnostic: TesseraDiagnostic): void {
    this.items.push(diagnostic);
  }

  pushAll(diagnostics: readonly TesseraDiagnostic[]): void {
    this.items.push(...diagnostics);
  }

  /** Unwraps a nested result, keeping its diagnostics; null on failure. */
  merge<T>(result: Result<T>): T | null {
    if (result.ok) return result.value;
    this.pushAll(result.errors);
    return null;
  }

  /** `ok(value)` unless an error was collected. */
  finish<T>(value: () => T): Result<T> {
    return this.hasErrors ? fail(this.items) : ok(value());
  }
}
