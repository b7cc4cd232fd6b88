import { finalizeDiagnostics } from "../diagnostics/catalog.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { compareIds, type LibId, type SemId } from "../identity/id.js";
import { compareStrings, formatTypeFqn, typeFqn, type TypeFqn } from "../model/ident.js";
import type { TypeLib } from "../library/type-lib.js";
import { debug } from "../shared/debug.js";
import { ConfinementError } from "../shared/errors.js";
import { DiagnosticAccumulator, fail, ok, type Result } from "../shared/result.js";
import { formatTyExpr } from "./display.js";
import { mergeSymTy, type SymTy } from "./sym-ty.js";
import { DEFAULT_SYSTEM_BOUNDS, TypeSystem, type AssembledSystem, type SystemBounds } from "./type-system.js";

// =============================================================================
// SymbolicSys
// =============================================================================

/** Provenance view of a merged system: which `lib.Name`s each id came from. */
export class SymbolicSys {
  private readonly byId: ReadonlyMap<string, readonly [SemId, SymTy]>;
  private readonly byFqn: ReadonlyMap<string, SemId>;
  private readonly fqnsById: ReadonlyMap<string, readonly TypeFqn[]>;

  constructor(entries: readonly (readonly [SemId, SymTy])[], exports: readonly (readonly [TypeFqn, SemId])[]) {
    this.byId = new Map([...entries].sort(([a], [b]) => compareIds(a, b)).map((e) => [e[0].hex, e]));
    this.byFqn = new Map(exports.map(([fqn, id]) => [formatTypeFqn(fqn), id]));
    const fqns = new Map<string, TypeFqn[]>();
    const sorted = [...exports].sort(([a], [b]) => compareStrings(formatTypeFqn(a), formatTypeFqn(b)));
    for (const [fqn, id] of sorted) {
      const list = fqns.get(id.hex) ?? [];
      list.push(fqn);
      fqns.set(id.hex, list);
    }
    this.fqnsById = fqns;
    Object.freeze(this);
  }

  get(id: SemId): SymTy | undefined {
    return this.byId.get(id.hex)?.[1];
  }

  entries(): (readonly [SemId, SymTy])[] {
    return [...this.byId.values()];
  }

  /** Every `lib.Name` exported under `id`, ascending. */
  fqns(id: SemId): readonly TypeFqn[] {
    return this.fqnsById.get(id.hex) ?? [];
  }

  /** First `lib.Name` of `id`, if any library exported it under a name. */
  nameOf(id: SemId): string | undefined {
    const first = this.fqns(id)[0];
    return first ? formatTypeFqn(first) : undefined;
  }

  resolve(fqn: TypeFqn | string): SemId | undefined {
    return this.byFqn.get(typeof fqn === "string" ? fqn : formatTypeFqn(fqn));
  }

  toString(): string {
    const nameOf = (id: SemId): string => this.nameOf(id) ?? id.format("bare");
    return (
      this.entries()
        .map(([id, entry]) => `data ${nameOf(id)} : ${id.format("bare")} :: ${formatTyExpr(entry.ty, nameOf)}`)
        .join("\n") + "\n"
    );
  }
}

// =============================================================================
// SystemBuilder
// =============================================================================

export interface SystemBuilderOptions {
  /** Tighter ceilings for the finalized system; values above `LIMITS` are ignored. */
  readonly bounds?: Partial<SystemBounds>;
}

/**
 * Merges compiled libraries into one type system. Imports are checked and
 * applied as a unit: a colliding library leaves the builder unchanged.
 */
export class SystemBuilder {
  private readonly bounds: SystemBounds;
  private readonly types = new Map<string, readonly [SemId, SymTy]>();
  private readonly libs = new Map<string, LibId>();
  private readonly declaredDependencies = new Map<string, LibId>();
  private readonly exports = new Map<string, readonly [TypeFqn, SemId]>();

  constructor(options: SystemBuilderOptions = {}) {
    this.bounds = {
      maxTypes: options.bounds?.maxTypes ?? DEFAULT_SYSTEM_BOUNDS.maxTypes,
      maxBytes: options.bounds?.maxBytes ?? DEFAULT_SYSTEM_BOUNDS.maxBytes,
    };
  }

  /** Throws `CollisionError` when an id already present has a different structure. */
  import(lib: TypeLib): this {
    const staged = new Map<string, readonly [SemId, SymTy]>();
    for (const [id, entry] of lib.entries()) {
      const existing = this.types.get(id.hex);
      staged.set(id.hex, [id, existing ? mergeSymTy(id, existing[1], entry) : entry]);
    }

    for (const [key, value] of staged) this.types.set(key, value);
    const libId = lib.id();
    this.libs.set(libId.hex, libId);
    for (const dep of lib.dependencies) this.declaredDependencies.set(dep.id.hex, dep.id);
    for (const [name, id] of lib.exports) {
      const fqn = typeFqn(lib.name, name);
      this.exports.set(formatTypeFqn(fqn), [fqn, id]);
    }
    debug.system("import", {
      lib: lib.name,
      id: libId.format("urn"),
      types: lib.countTypes(),
      merged: this.types.size,
    });
    return this;
  }

  importAll(libs: Iterable<TypeLib>): this {
    for (const lib of libs) this.import(lib);
    return this;
  }

  countTypes(): number {
    return this.types.size;
  }

  /** Dependencies some imported library declared, but which were never imported. */
  unimportedDependencies(): LibId[] {
    return [...this.declaredDependencies.values()].filter((id) => !this.libs.has(id.hex)).sort(compareIds);
  }

  /**
   * Checks completeness over everything imported. Each dangling reference is
   * one `tessera/finalize/missing-type`, ascending by missing id then by
   * referencing id.
   */
  finalize(): Result<TypeSystem> {
    const emitter = createDiagnosticEmitter(finalizeDiagnostics, { stage: "finalize" });
    const acc = new DiagnosticAccumulator();
    const symbols = this.symbols();

    let assembled: AssembledSystem;
    try {
      assembled = TypeSystem.assemble(
        this.libs.values(),
        [...this.types.values()].map(([id, entry]) => [id, entry.ty] as const),
        this.bounds,
      );
    } catch (error) {
      if (!(error instanceof ConfinementError)) throw error;
      acc.push(
        emitter.emit("tessera/finalize/limit-exceeded", {
          message: error.message,
          data: { limit: error.limit, detail: error.message },
        }),
      );
      return fail(acc.diagnostics);
    }

    if (!assembled.complete) {
      for (const { id, referencedBy } of assembled.missing) {
        const owner = symbols.nameOf(referencedBy);
        acc.push(
          emitter.emit("tessera/finalize/missing-type", {
            message: `type ${id.format("urn")} referenced by ${owner ?? referencedBy.format("urn")} is not provided by any imported library`,
            data: { id: id.format("urn"), referencedBy: referencedBy.format("urn") },
          }),
        );
      }
    }

    debug.system("finalize", {
      libs: this.libs.size,
      types: this.types.size,
      missing: assembled.complete ? 0 : assembled.missing.length,
      unimported: this.unimportedDependencies().length,
    });
    return assembled.complete ? ok(assembled.system) : fail(acc.diagnostics);
  }

  /** Merged provenance of everything imported so far. */
  symbols(): SymbolicSys {
    return new SymbolicSys([...this.types.values()], [...this.exports.values()]);
  }
}
