/* =============================================================================
 * SYMBOLIC STAGE
 * -----------------------------------------------------------------------------
 * Declarations → SymbolicLib. Types still reference each other by name here;
 * the compile stage (compile.ts) is the only place names become ids, and it
 * produces a new value instead of filling ids in.
 * ============================================================================= */

import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { transpileDiagnostics } from "../diagnostics/catalog.js";
import type { LibId, SemId } from "../identity/id.js";
import {
  formatTypeFqn,
  isTypeName,
  libName,
  typeFqn,
  typeName,
  type LibName,
  type TypeFqn,
  type TypeName,
} from "../model/ident.js";
import { checkTy } from "../model/ty-check.js";
import { tyChildren, type Ty } from "../model/ty.js";
import { ensureWithin } from "../shared/confined.js";
import { debug } from "../shared/debug.js";
import { DiagnosticAccumulator, flatMapResult, type Result } from "../shared/result.js";
import { formatTyExpr } from "../typesys/display.js";
import { compileLibrary } from "./compile.js";
import type { TypeLib } from "./type-lib.js";

// =============================================================================
// References
// =============================================================================

export type SymbolRef =
  /** Anonymous nested type; compiled into its own unnamed entry. */
  | { readonly kind: "inline"; readonly ty: Ty<SymbolRef> }
  /** Type declared in the same library. */
  | { readonly kind: "named"; readonly name: TypeName }
  /** Type exported by a dependency. */
  | { readonly kind: "extern"; readonly lib: LibName; readonly name: TypeName };

export const SymbolRef = {
  inline(ty: Ty<SymbolRef>): SymbolRef {
    return { kind: "inline", ty };
  },
  named(name: string): SymbolRef {
    return { kind: "named", name: typeName(name) };
  },
  extern(lib: string, name: string): SymbolRef {
    return { kind: "extern", lib: libName(lib), name: typeName(name) };
  },
} as const;

export function formatSymbolRef(ref: SymbolRef): string {
  switch (ref.kind) {
    case "inline":
      return formatTyExpr(ref.ty, formatSymbolRef);
    case "named":
      return ref.name;
    case "extern":
      return `${ref.lib}.${ref.name}`;
  }
}

/** Every reference reachable without leaving the declaration, inline nodes included. */
export function walkSymbolRefs(ty: Ty<SymbolRef>, visit: (ref: SymbolRef, path: string) => void, path = ""): void {
  for (const child of tyChildren(ty)) {
    const childPath = path ? `${path}.${child.label}` : child.label;
    visit(child.ref, childPath);
    if (child.ref.kind === "inline") walkSymbolRefs(child.ref.ty, visit, childPath);
  }
}

// =============================================================================
// Declarations and dependencies
// =============================================================================

/** A producer-declared shape: what a transpiler hands to the builder. */
export interface TypeDeclaration {
  readonly name: TypeName;
  readonly ty: Ty<SymbolRef>;
}

/** Throws `InvalidIdentError` for a bad name; shape problems surface at `transpile`. */
export function declareType(name: string, ty: Ty<SymbolRef>): TypeDeclaration {
  return { name: typeName(name), ty };
}

/** The name → id view of a compiled library that other libraries build on. */
export interface LibDependency {
  readonly name: LibName;
  readonly id: LibId;
  readonly types: ReadonlyMap<TypeName, SemId>;
}

// =============================================================================
// SymbolicLib
// =============================================================================

export interface SymbolicEntry {
  readonly fqn: TypeFqn;
  readonly ty: Ty<SymbolRef>;
}

export class SymbolicLib {
  private readonly byName: ReadonlyMap<TypeName, SymbolicEntry>;

  constructor(
    readonly name: LibName,
    readonly dependencies: readonly LibDependency[],
    readonly entries: readonly SymbolicEntry[],
  ) {
    this.byName = new Map(entries.map((e) => [e.fqn.name, e]));
    Object.freeze(this);
  }

  get(name: string): Ty<SymbolRef> | undefined {
    return isTypeName(name) ? this.byName.get(name)?.ty : undefined;
  }

  fqn(name: string): TypeFqn | undefined {
    return isTypeName(name) ? this.byName.get(name)?.fqn : undefined;
  }

  dependency(lib: string): LibDependency | undefined {
    return this.dependencies.find((d) => d.name === lib);
  }

  compile(): Result<TypeLib> {
    return compileLibrary(this);
  }

  toString(): string {
    const lines = [`typelib ${this.name}`, ""];
    for (const dep of this.dependencies) lines.push(`import ${dep.id.format("urn")} as ${dep.name}`);
    if (this.dependencies.length > 0) lines.push("");
    for (const entry of this.entries) {
      lines.push(`data ${formatTypeFqn(entry.fqn)} :: ${formatTyExpr(entry.ty, formatSymbolRef)}`);
    }
    return lines.join("\n") + "\n";
  }
}

// =============================================================================
// LibBuilder
// =============================================================================

/**
 * Collects declarations for one library. Each `transpile` call checks the
 * declaration on its own; cross-declaration references are checked together
 * by `compileSymbols`, so a type may reference one declared after it.
 */
export class LibBuilder {
  readonly name: LibName;
  readonly dependencies: readonly LibDependency[];
  private readonly declarations: TypeDeclaration[] = [];
  private readonly declared = new Set<TypeName>();
  private readonly diagnostics = new DiagnosticAccumulator();
  private readonly emitter = createDiagnosticEmitter(transpileDiagnostics, { stage: "transpile" });

  constructor(name: string, dependencies: readonly LibDependency[] = []) {
    this.name = libName(name);
    ensureWithin("libDependencies", dependencies.length, `dependencies of ${this.name}`);
    this.dependencies = dependencies;
  }

  transpile(decl: TypeDeclaration): this {
    if (this.declared.has(decl.name)) {
      this.diagnostics.push(
        this.emitter.emit("tessera/transpile/duplicate-type", {
          message: `type '${decl.name}' is declared more than once in library '${this.name}'`,
          data: { name: decl.name, lib: this.name },
        }),
      );
      return this;
    }
    this.declared.add(decl.name);

    const problems = [...checkTy(decl.ty)];
    walkSymbolRefs(decl.ty, (ref, path) => {
      if (ref.kind !== "inline") return;
      for (const problem of checkTy(ref.ty)) problems.push(`${path}: ${problem}`);
    });
    if (problems.length > 0) {
      this.diagnostics.push(
        this.emitter.emit("tessera/transpile/invalid-declaration", {
          message: `type '${this.name}.${decl.name}' is malformed: ${problems.join("; ")}`,
          data: { name: decl.name, detail: problems.join("; ") },
        }),
      );
      return this;
    }

    this.declarations.push(decl);
    debug.transpile("declared", { lib: this.name, name: decl.name, kind: decl.ty.kind });
    return this;
  }

  transpileAll(decls: Iterable<TypeDeclaration>): this {
    for (const decl of decls) this.transpile(decl);
    return this;
  }

  /** Checks every reference and freezes the declarations into a `SymbolicLib`. */
  compileSymbols(): Result<SymbolicLib> {
    const acc = new DiagnosticAccumulator();
    acc.pushAll(this.diagnostics.diagnostics);
    const deps = new Map(this.dependencies.map((d) => [d.name, d]));

    for (const decl of this.declarations) {
      const from = formatTypeFqn(typeFqn(this.name, decl.name));
      walkSymbolRefs(decl.ty, (ref) => {
        switch (ref.kind) {
          case "inline":
            return;
          case "named":
            if (!this.declared.has(ref.name)) {
              acc.push(
                this.emitter.emit("tessera/transpile/unknown-type", {
                  message: `unknown type name '${ref.name}' referenced from '${from}'`,
                  data: { name: ref.name, lib: this.name },
                }),
              );
            }
            return;
          case "extern": {
            const dep = deps.get(ref.lib);
            if (!dep) {
              acc.push(
                this.emitter.emit("tessera/transpile/unknown-dependency", {
                  message: `'${from}' references '${ref.lib}.${ref.name}' but '${ref.lib}' is not a dependency of '${this.name}'`,
                  data: { lib: ref.lib, name: ref.name },
                }),
              );
            } else if (!dep.types.has(ref.name)) {
              acc.push(
                this.emitter.emit("tessera/transpile/unknown-type", {
                  message: `library '${ref.lib}' has no type '${ref.name}' (referenced from '${from}')`,
                  data: { name: ref.name, lib: ref.lib },
                }),
              );
            }
            return;
          }
        }
      });
    }

    debug.transpile("symbols", {
      lib: this.name,
      types: this.declarations.length,
      errors: acc.diagnostics.length,
    });
    return acc.finish(
      () =>
        new SymbolicLib(
          this.name,
          this.dependencies,
          this.declarations.map((d) => ({ fqn: typeFqn(this.name, d.name), ty: d.ty })),
        ),
    );
  }

  compile(): Result<TypeLib> {
    return flatMapResult(this.compileSymbols(), compileLibrary);
  }
}
