import { computeLibId } from "../identity/commit.js";
import { autoTypeName, type LibId, type SemId } from "../identity/id.js";
import { compareStrings, isTypeName, type LibName, type TypeName } from "../model/ident.js";
import { ConfinedMap, LIMITS } from "../shared/confined.js";
import { formatTyExpr } from "../typesys/display.js";
import type { SymTy } from "../typesys/sym-ty.js";
import type { LibDependency } from "./symbolic.js";

export interface TypeLibInit {
  readonly name: LibName;
  readonly dependencies: readonly LibDependency[];
  readonly exports: ReadonlyMap<TypeName, SemId>;
  readonly entries: Iterable<readonly [SemId, SymTy]>;
}

/**
 * A compiled library: every internal reference is a semantic id. Entries
 * include unnamed (inline) types; `exports` names the declared ones.
 */
export class TypeLib {
  readonly name: LibName;
  /** Ascending by library id. */
  readonly dependencies: readonly LibDependency[];
  /** Ascending by name. */
  readonly exports: ReadonlyMap<TypeName, SemId>;
  private readonly entryMap = new ConfinedMap<SemId, SymTy>({
    name: "library entries",
    maxCount: LIMITS.libTypes,
    keyOf: (id) => id.hex,
  });

  /** Throws `ConfinementError` past `LIMITS.libTypes` entries or `LIMITS.libDependencies` dependencies. */
  constructor(init: TypeLibInit) {
    this.name = init.name;
    const deps = new ConfinedMap<LibId, LibDependency>({
      name: `dependencies of ${init.name}`,
      maxCount: LIMITS.libDependencies,
      keyOf: (id) => id.hex,
    });
    for (const dep of init.dependencies) deps.insert(dep.id, dep);
    this.dependencies = deps.values();
    this.exports = new Map([...init.exports].sort(([a], [b]) => compareStrings(a, b)));
    for (const [id, entry] of init.entries) this.entryMap.insert(id, entry);
    Object.freeze(this);
  }

  /** Recomputed on every call; the library is immutable, so it never changes. */
  id(): LibId {
    return computeLibId({
      name: this.name,
      dependencies: this.dependencies.map((d) => d.id),
      exports: this.exports,
      entries: this.entryMap.keys(),
    });
  }

  get(name: string): SemId | undefined {
    return isTypeName(name) ? this.exports.get(name) : undefined;
  }

  entry(id: SemId): SymTy | undefined {
    return this.entryMap.get(id);
  }

  entries(): [SemId, SymTy][] {
    return this.entryMap.entries();
  }

  semIds(): SemId[] {
    return this.entryMap.keys();
  }

  countTypes(): number {
    return this.entryMap.size;
  }

  toDependency(): LibDependency {
    return { name: this.name, id: this.id(), types: this.exports };
  }

  /**
   * ```
   * typelib Name -- urn:tessera:stl:...
   *
   * import urn:tessera:stl:... as Dep
   *
   * data Name : <id> :: <expr>
   * ```
   */
  toString(): string {
    const nameOf = this.namer();
    const lines = [`typelib ${this.name} -- ${this.id().format("urn")}`, ""];
    for (const dep of this.dependencies) lines.push(`import ${dep.id.format("urn")} as ${dep.name}`);
    if (this.dependencies.length > 0) lines.push("");
    for (const [id, entry] of this.entries()) {
      lines.push(`data ${nameOf(id)} : ${id.format("bare")} :: ${formatTyExpr(entry.ty, nameOf)}`);
    }
    return lines.join("\n") + "\n";
  }

  /** Own names first, then `Dep.Name`, then an `Auto` name. */
  private namer(): (id: SemId) => string {
    const names = new Map<string, string>();
    for (const dep of this.dependencies) {
      for (const [name, id] of dep.types) {
        if (!names.has(id.hex)) names.set(id.hex, `${dep.name}.${name}`);
      }
    }
    for (const [id, entry] of this.entryMap.entries()) {
      if (entry.name) names.set(id.hex, entry.name);
    }
    return (id) => names.get(id.hex) ?? autoTypeName(id);
  }
}
