import { tyEquals } from "../encoding/ty-codec.js";
import type { SemId } from "../identity/id.js";
import type { LibName, TypeName } from "../model/ident.js";
import { compareStrings } from "../model/ident.js";
import type { Ty } from "../model/ty.js";
import { ensureWithin } from "../shared/confined.js";
import { CollisionError } from "../shared/errors.js";

/**
 * A compiled type with its provenance. Structurally identical declarations
 * from different libraries share one `SymTy` whose `orig` lists them all.
 */
export interface SymTy {
  /** First name the type was declared under; absent for inline types. */
  readonly name?: TypeName;
  /** Libraries that declared this exact structure, ascending. */
  readonly orig: readonly LibName[];
  readonly ty: Ty<SemId>;
}

export function symTy(ty: Ty<SemId>, lib: LibName, name?: TypeName): SymTy {
  return name === undefined ? { orig: [lib], ty } : { name, orig: [lib], ty };
}

/**
 * Combines two entries filed under the same id. Different structure under
 * one id is a `CollisionError`; more than `LIMITS.origins` origin libraries
 * is a `ConfinementError`.
 */
export function mergeSymTy(id: SemId, a: SymTy, b: SymTy): SymTy {
  if (!tyEquals(a.ty, b.ty)) {
    throw new CollisionError(`id ${id.format("urn")} is shared by two different type structures`, id.format("urn"));
  }
  const orig = [...new Set([...a.orig, ...b.orig])].sort(compareStrings);
  ensureWithin("origins", orig.length, `origins of ${id.format("urn")}`);
  const name = a.name ?? b.name;
  return name === undefined ? { orig, ty: a.ty } : { name, orig, ty: a.ty };
}
