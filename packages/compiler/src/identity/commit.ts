import { encodeTy } from "../encoding/ty-codec.js";
import { StrictWriter } from "../encoding/writer.js";
import type { TypeName } from "../model/ident.js";
import { compareStrings } from "../model/ident.js";
import type { Ty } from "../model/ty.js";
import { debug } from "../shared/debug.js";
import { ID_TAGS, taggedHash } from "./hash.js";
import { compareIds, LibId, SemId, TypeSysId } from "./id.js";

// =============================================================================
// Semantic ids
// =============================================================================

/** Id of one compiled type: its canonical encoding under the semid tag. */
export function computeSemId(ty: Ty<SemId>): SemId {
  return SemId.fromBytes(taggedHash(ID_TAGS.semId, encodeTy(ty)));
}

// =============================================================================
// System ids
// =============================================================================

/** What a system id commits to; any container exposing both id sets fits. */
export interface SystemCommitment {
  libIds(): readonly LibId[];
  semIds(): readonly SemId[];
}

/**
 * u32 library count, library ids ascending, u32 type count, semantic ids
 * ascending. Insertion order of either set never reaches the hash.
 */
export function computeSysId(system: SystemCommitment): TypeSysId {
  const libs = [...system.libIds()].sort(compareIds);
  const types = [...system.semIds()].sort(compareIds);
  const writer = new StrictWriter();
  writer.u32(libs.length);
  for (const lib of libs) writer.bytes(lib.toBytes());
  writer.u32(types.length);
  for (const id of types) writer.bytes(id.toBytes());
  const id = TypeSysId.fromBytes(taggedHash(ID_TAGS.typeSys, writer.finish()));
  debug.identity("sys.computed", { libs: libs.length, types: types.length, id: id.format("urn") });
  return id;
}

// =============================================================================
// Library ids
// =============================================================================

export interface LibCommitment {
  readonly name: string;
  readonly dependencies: readonly LibId[];
  readonly exports: ReadonlyMap<TypeName, SemId>;
  readonly entries: readonly SemId[];
}

/**
 * Name, u8 dependency count and ids ascending, u16 export count and
 * `(name, id)` pairs by name, u16 entry count and ids ascending.
 */
export function computeLibId(lib: LibCommitment): LibId {
  const deps = [...lib.dependencies].sort(compareIds);
  const exports = [...lib.exports].sort(([a], [b]) => compareStrings(a, b));
  const entries = [...lib.entries].sort(compareIds);
  const writer = new StrictWriter();
  writer.ascii(lib.name);
  writer.u8(deps.length);
  for (const dep of deps) writer.bytes(dep.toBytes());
  writer.u16(exports.length);
  for (const [name, id] of exports) writer.ascii(name).bytes(id.toBytes());
  writer.u16(entries.length);
  for (const id of entries) writer.bytes(id.toBytes());
  return LibId.fromBytes(taggedHash(ID_TAGS.lib, writer.finish()));
}
