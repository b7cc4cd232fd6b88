import { describe, expect, test } from "vitest";

import {
  computeSemId,
  DecodeError,
  declareType,
  encodeTy,
  fieldName,
  InconsistencyError,
  SemId,
  stdLib,
  StrictWriter,
  SymbolRef,
  SystemBuilder,
  Ty,
  TypeSystem,
  U8,
} from "../../src/index.js";
import { compileLib, unwrap } from "../_helpers/libs.js";

const std = stdLib();
const geo = compileLib(
  "Geo",
  [
    declareType(
      "Point",
      Ty.struct([
        { name: fieldName("x"), ty: SymbolRef.extern("Std", "U16") },
        { name: fieldName("y"), ty: SymbolRef.extern("Std", "U16") },
      ]),
    ),
  ],
  [std.toDependency()],
);

function system(): TypeSystem {
  return unwrap(new SystemBuilder().import(std).import(geo).finalize());
}

function decodeError(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error.message;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

describe("TypeSystem queries", () => {
  test("members and libraries", () => {
    const sys = system();
    const point = geo.get("Point");
    expect(point).toBeDefined();
    if (!point) return;

    expect(sys.countTypes()).toBe(std.countTypes() + 1);
    expect(sys.countLibs()).toBe(2);
    expect(sys.has(point)).toBe(true);
    expect(sys.get(point)?.kind).toBe("struct");
    expect(sys.libIds().map((id) => id.hex).sort()).toEqual([std.id().hex, geo.id().hex].sort());
  });

  test("index of an absent id is an inconsistency", () => {
    const absent = SemId.fromBytes(new Uint8Array(32));
    expect(system().get(absent)).toBeUndefined();
    expect(() => system().index(absent)).toThrow(InconsistencyError);
  });

  test("ids are listed ascending", () => {
    const hexes = system()
      .semIds()
      .map((id) => id.hex);
    expect(hexes).toEqual([...hexes].sort());
  });

  test("a finalized system is frozen and offers no mutation", () => {
    const sys = system();
    expect(Object.isFrozen(sys)).toBe(true);
    expect("insert" in sys).toBe(false);
    expect("seal" in sys).toBe(false);
  });
});

describe("TypeSystem.assemble", () => {
  test("members with a dangling reference give no system", () => {
    const u8 = computeSemId(Ty.prim(U8));
    const list = Ty.list(u8);
    const listId = computeSemId(list);

    const assembled = TypeSystem.assemble([], [[listId, list]]);
    expect(assembled.complete).toBe(false);
    if (assembled.complete) return;
    expect(assembled.missing).toHaveLength(1);
    expect(assembled.missing[0]?.id.hex).toBe(u8.hex);
    expect(assembled.missing[0]?.referencedBy.hex).toBe(listId.hex);
  });

  test("complete members give a system", () => {
    const u8 = computeSemId(Ty.prim(U8));
    const list = Ty.list(u8);
    const assembled = TypeSystem.assemble([], [
      [computeSemId(list), list],
      [u8, Ty.prim(U8)],
    ]);
    expect(assembled.complete).toBe(true);
    if (!assembled.complete) return;
    expect(assembled.system.countTypes()).toBe(2);
  });
});

describe("TypeSystem canonical form", () => {
  test("serialize / deserialize keeps the id", () => {
    const sys = system();
    const restored = TypeSystem.deserialize(sys.serialize());
    expect(restored.id().hex).toBe(sys.id().hex);
    expect(restored.serialize()).toEqual(sys.serialize());
  });

  test("byte size counts id and encoding of every member", () => {
    const sys = system();
    const expected = sys.entries().reduce((sum, [, ty]) => sum + 32 + encodeTy(ty).length, 0);
    expect(sys.byteSize()).toBe(expected);
  });

  test("an incomplete system does not deserialize", () => {
    const dangling = computeSemId(Ty.prim(U8));
    const list = Ty.list(dangling);
    const listId = computeSemId(list);
    const bytes = new StrictWriter().u24(0).u24(1).bytes(listId.toBytes()).bytes(encodeTy(list)).finish();

    expect(decodeError(() => TypeSystem.deserialize(bytes))).toBe(
      `incomplete type system: 1 missing reference(s), first ${dangling.format("urn")} from ${listId.format("urn")}`,
    );
  });

  test("members out of order do not deserialize", () => {
    const high = SemId.fromBytes(new Uint8Array(32).fill(2));
    const low = SemId.fromBytes(new Uint8Array(32).fill(1));
    const u8 = encodeTy(Ty.prim(U8));
    const bytes = new StrictWriter()
      .u24(0)
      .u24(2)
      .bytes(high.toBytes())
      .bytes(u8)
      .bytes(low.toBytes())
      .bytes(u8)
      .finish();

    expect(decodeError(() => TypeSystem.deserialize(bytes))).toBe(
      "type ids are not strictly ascending (at byte 72)",
    );
  });
});

describe("TypeSystem text forms", () => {
  test("dump lists every member by id", () => {
    const tiny = compileLib("Tiny", [declareType("Octet", Ty.prim(U8))]);
    const sys = unwrap(new SystemBuilder().import(tiny).finalize());
    const octet = computeSemId(Ty.prim(U8));

    expect(sys.toString()).toBe(`typesys -- ${sys.id().format("urn")}\n\ndata ${octet.format("bare")} :: U8\n`);
  });

  test("armor round trip", () => {
    const sys = system();
    const armored = sys.toArmored();
    const lines = armored.split("\n");

    expect(lines[0]).toBe("-----BEGIN STRICT TYPE SYSTEM-----");
    expect(lines[1]).toBe(`Id: ${sys.id().format("full")}`);
    expect(lines[2]).toBe("");
    expect(lines.at(-2)).toBe("-----END STRICT TYPE SYSTEM-----");
    expect(lines.slice(3, -3).every((line) => line.length <= 64)).toBe(true);
    expect(TypeSystem.fromArmored(armored).id().hex).toBe(sys.id().hex);
  });

  test("armor with a different id is rejected", () => {
    const sys = system();
    const other = unwrap(new SystemBuilder().import(std).finalize());
    const tampered = sys.toArmored().replace(sys.id().format("full"), other.id().format("full"));

    expect(decodeError(() => TypeSystem.fromArmored(tampered))).toBe(
      `armor Id ${other.id().format("urn")} does not match content id ${sys.id().format("urn")}`,
    );
  });

  test("armor without markers or with unknown headers is rejected", () => {
    const armored = system().toArmored();
    expect(decodeError(() => TypeSystem.fromArmored("no armor here"))).toBe(
      "armor markers are missing or out of order",
    );
    expect(decodeError(() => TypeSystem.fromArmored(armored.replace("\n\n", "\nComment: hi\n\n")))).toBe(
      "unknown armor header 'Comment: hi'",
    );
    expect(decodeError(() => TypeSystem.fromArmored(armored.replace(/^Id: .*$/m, "")))).toBe(
      "armor has no Id header",
    );
  });
});
