/* =============================================================================
 * TYPE SYSTEM
 * -----------------------------------------------------------------------------
 * A closed, content-addressed arena: every type lives under its semantic id
 * and every reference inside a member is the id of another member. Instances
 * come only from `TypeSystem.assemble()` (behind `SystemBuilder.finalize()`)
 * or `TypeSystem.deserialize()`; both check completeness before handing the
 * system out, and no instance exposes a way to change it.
 * ============================================================================= */

import { StrictReader } from "../encoding/reader.js";
import { encodeTy, readSemId, readTy } from "../encoding/ty-codec.js";
import { StrictWriter } from "../encoding/writer.js";
import { computeSysId } from "../identity/commit.js";
import { compareIds, LibId, SemId, TypeSysId } from "../identity/id.js";
import { tyRefs, type Ty } from "../model/ty.js";
import { ConfinedMap, LIMITS } from "../shared/confined.js";
import { debug } from "../shared/debug.js";
import { DecodeError, InconsistencyError } from "../shared/errors.js";
import { formatTyExpr } from "./display.js";

const ARMOR_BEGIN = "-----BEGIN STRICT TYPE SYSTEM-----";
const ARMOR_END = "-----END STRICT TYPE SYSTEM-----";
const ARMOR_WIDTH = 64;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** A referenced id missing from the arena, and the member that references it. */
export interface MissingReference {
  readonly id: SemId;
  readonly referencedBy: SemId;
}

/** Ceilings on one system; a builder may tighten them, never raise them. */
export interface SystemBounds {
  readonly maxTypes: number;
  readonly maxBytes: number;
}

export const DEFAULT_SYSTEM_BOUNDS: SystemBounds = Object.freeze({
  maxTypes: LIMITS.typeSystemTypes,
  maxBytes: LIMITS.typeSystemBytes,
});

/** Mutable storage behind a system; never leaves this module. */
class Arena {
  readonly types: ConfinedMap<SemId, Ty<SemId>>;
  readonly libs: ConfinedMap<LibId, true>;

  constructor(bounds: SystemBounds) {
    this.types = new ConfinedMap({
      name: "type system",
      maxCount: Math.min(bounds.maxTypes, LIMITS.typeSystemTypes),
      maxBytes: Math.min(bounds.maxBytes, LIMITS.typeSystemBytes),
      sizeOf: (_id, ty) => 32 + encodeTy(ty).length,
      keyOf: (id) => id.hex,
    });
    this.libs = new ConfinedMap({
      name: "type system libraries",
      maxCount: LIMITS.typeSystemTypes,
      keyOf: (id) => id.hex,
    });
  }

  /** Each distinct (target, owner) pair whose target is not a member, ascending by (id, referencedBy). */
  missing(): MissingReference[] {
    const missing: MissingReference[] = [];
    const seen = new Set<string>();
    for (const [owner, ty] of this.types.entries()) {
      for (const ref of tyRefs(ty)) {
        const key = `${ref.hex}:${owner.hex}`;
        if (this.types.has(ref) || seen.has(key)) continue;
        seen.add(key);
        missing.push({ id: ref, referencedBy: owner });
      }
    }
    return missing.sort((a, b) => compareIds(a.id, b.id) || compareIds(a.referencedBy, b.referencedBy));
  }
}

export type AssembledSystem =
  | { readonly complete: true; readonly system: TypeSystem }
  | { readonly complete: false; readonly missing: readonly MissingReference[] };

export class TypeSystem {
  private readonly types: ConfinedMap<SemId, Ty<SemId>>;
  private readonly libs: ConfinedMap<LibId, true>;

  /** Only ever called with an arena whose completeness was checked. */
  private constructor(arena: Arena) {
    this.types = arena.types;
    this.libs = arena.libs;
    Object.freeze(this);
  }

  /**
   * Builds a system, or reports the references it would leave dangling.
   * Throws `ConfinementError` when a bound is exceeded.
   */
  static assemble(
    libs: Iterable<LibId>,
    types: Iterable<readonly [SemId, Ty<SemId>]>,
    bounds: SystemBounds = DEFAULT_SYSTEM_BOUNDS,
  ): AssembledSystem {
    const arena = new Arena(bounds);
    for (const lib of libs) arena.libs.insert(lib, true);
    for (const [id, ty] of types) arena.types.insert(id, ty);
    const missing = arena.missing();
    if (missing.length > 0) return { complete: false, missing };
    return { complete: true, system: new TypeSystem(arena) };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get(id: SemId): Ty<SemId> | undefined {
    return this.types.get(id);
  }

  /**
   * Lookup that cannot fail on a finalized system. A miss means the engine
   * broke its own completeness guarantee.
   */
  index(id: SemId): Ty<SemId> {
    const ty = this.types.get(id);
    if (!ty) throw new InconsistencyError(`type ${id.format("urn")} is absent from a complete type system`);
    return ty;
  }

  has(id: SemId): boolean {
    return this.types.has(id);
  }

  countTypes(): number {
    return this.types.size;
  }

  countLibs(): number {
    return this.libs.size;
  }

  /** Canonical serialized size in bytes of the member types. */
  byteSize(): number {
    return this.types.byteSize;
  }

  semIds(): SemId[] {
    return this.types.keys();
  }

  libIds(): LibId[] {
    return this.libs.keys();
  }

  entries(): [SemId, Ty<SemId>][] {
    return this.types.entries();
  }

  /** Recomputed from the content on every call. */
  id(): TypeSysId {
    return computeSysId(this);
  }

  // ---------------------------------------------------------------------------
  // Canonical form
  // ---------------------------------------------------------------------------

  /** u24 library count and ids, then u24 type count and `(id, type)` pairs, all ascending. */
  serialize(): Uint8Array {
    const writer = new StrictWriter();
    const libs = this.libIds();
    writer.u24(libs.length);
    for (const lib of libs) writer.bytes(lib.toBytes());
    const entries = this.entries();
    writer.u24(entries.length);
    for (const [id, ty] of entries) {
      writer.bytes(id.toBytes()).bytes(encodeTy(ty));
    }
    return writer.finish();
  }

  static deserialize(bytes: Uint8Array): TypeSystem {
    const reader = new StrictReader(bytes);
    const arena = new Arena(DEFAULT_SYSTEM_BOUNDS);

    const libCount = reader.u24();
    let prevLib: LibId | null = null;
    for (let i = 0; i < libCount; i++) {
      const lib = LibId.fromBytes(reader.bytes(32));
      if (prevLib && compareIds(prevLib, lib) >= 0) reader.fail("library ids are not strictly ascending");
      arena.libs.insert(lib, true);
      prevLib = lib;
    }

    const typeCount = reader.u24();
    let prevType: SemId | null = null;
    for (let i = 0; i < typeCount; i++) {
      const id = readSemId(reader);
      if (prevType && compareIds(prevType, id) >= 0) reader.fail("type ids are not strictly ascending");
      arena.types.insert(id, readTy(reader));
      prevType = id;
    }
    reader.end();

    const missing = arena.missing();
    const first = missing[0];
    if (first) {
      throw new DecodeError(
        `incomplete type system: ${missing.length} missing reference(s), first ${first.id.format("urn")} from ${first.referencedBy.format("urn")}`,
      );
    }
    debug.system("deserialized", { libs: libCount, types: typeCount });
    return new TypeSystem(arena);
  }

  // ---------------------------------------------------------------------------
  // Text forms
  // ---------------------------------------------------------------------------

  /**
   * ```
   * typesys -- urn:tessera:sts:...
   *
   * data <id> :: <expr>
   * ```
   */
  toString(): string {
    const lines = [`typesys -- ${this.id().format("urn")}`, ""];
    for (const [id, ty] of this.entries()) {
      lines.push(`data ${id.format("bare")} :: ${formatTyExpr(ty, (ref) => ref.format("bare"))}`);
    }
    return lines.join("\n") + "\n";
  }

  toArmored(): string {
    const base64 = Buffer.from(this.serialize()).toString("base64");
    const lines = [ARMOR_BEGIN, `Id: ${this.id().format("full")}`, ""];
    for (let i = 0; i < base64.length; i += ARMOR_WIDTH) {
      lines.push(base64.slice(i, i + ARMOR_WIDTH));
    }
    lines.push("", ARMOR_END);
    return lines.join("\n") + "\n";
  }

  static fromArmored(text: string): TypeSystem {
    const lines = text.split(/\r?\n/).map((line) => line.trim());
    const begin = lines.indexOf(ARMOR_BEGIN);
    const end = lines.indexOf(ARMOR_END);
    if (begin < 0 || end < begin) throw new DecodeError("armor markers are missing or out of order");

    const body = lines.slice(begin + 1, end);
    let declared: TypeSysId | null = null;
    const data: string[] = [];
    for (const line of body) {
      if (line === "") continue;
      if (line.startsWith("Id:")) {
        declared = TypeSysId.parse(line.slice(3).trim());
      } else if (/^[A-Za-z-]+:/.test(line)) {
        throw new DecodeError(`unknown armor header '${line}'`);
      } else {
        data.push(line);
      }
    }
    if (!declared) throw new DecodeError("armor has no Id header");

    const base64 = data.join("");
    if (!BASE64.test(base64)) throw new DecodeError("armor body is not base64");
    const system = TypeSystem.deserialize(new Uint8Array(Buffer.from(base64, "base64")));
    const actual = system.id();
    if (!actual.equals(declared)) {
      throw new DecodeError(`armor Id ${declared.format("urn")} does not match content id ${actual.format("urn")}`);
    }
    return system;
  }
}
