import { describe, expect, test } from "vitest";

import { computeLibId, computeSemId, computeSysId } from "../../src/identity/commit.js";
import { LibId, SemId } from "../../src/identity/id.js";
import { fieldName, typeName } from "../../src/model/ident.js";
import { U16, U8 } from "../../src/model/primitive.js";
import { Sizing, Ty } from "../../src/model/ty.js";

const u8 = computeSemId(Ty.prim(U8));
const u16 = computeSemId(Ty.prim(U16));

function idFrom(byte: number): SemId {
  return SemId.fromBytes(new Uint8Array(32).fill(byte));
}

function libFrom(byte: number): LibId {
  return LibId.fromBytes(new Uint8Array(32).fill(byte));
}

describe("semantic ids", () => {
  test("same structure, same id", () => {
    const a = Ty.struct([
      { name: fieldName("x"), ty: u8 },
      { name: fieldName("y"), ty: u8 },
    ]);
    const b = Ty.struct([
      { name: fieldName("x"), ty: computeSemId(Ty.prim(U8)) },
      { name: fieldName("y"), ty: computeSemId(Ty.prim(U8)) },
    ]);
    expect(computeSemId(a).hex).toBe(computeSemId(b).hex);
  });

  test("enum variant declaration order does not matter", () => {
    const a = Ty.enumerate<SemId>([
      { name: fieldName("off"), tag: 0 },
      { name: fieldName("on"), tag: 1 },
    ]);
    const b = Ty.enumerate<SemId>([
      { name: fieldName("on"), tag: 1 },
      { name: fieldName("off"), tag: 0 },
    ]);
    expect(computeSemId(a).hex).toBe(computeSemId(b).hex);
  });

  test("field order, field names and sizing all change the id", () => {
    const base = computeSemId(
      Ty.struct([
        { name: fieldName("x"), ty: u8 },
        { name: fieldName("y"), ty: u16 },
      ]),
    );
    const swapped = computeSemId(
      Ty.struct([
        { name: fieldName("y"), ty: u16 },
        { name: fieldName("x"), ty: u8 },
      ]),
    );
    const renamed = computeSemId(
      Ty.struct([
        { name: fieldName("x"), ty: u8 },
        { name: fieldName("z"), ty: u16 },
      ]),
    );
    expect(swapped.hex).not.toBe(base.hex);
    expect(renamed.hex).not.toBe(base.hex);
    expect(computeSemId(Ty.list(u8, Sizing.U8)).hex).not.toBe(computeSemId(Ty.list(u8, Sizing.U16)).hex);
  });

  test("primitives of different width differ", () => {
    expect(u8.hex).not.toBe(u16.hex);
  });
});

describe("system ids", () => {
  test("insertion order of either set does not matter", () => {
    const forward = computeSysId({ libIds: () => [libFrom(1), libFrom(2)], semIds: () => [idFrom(3), idFrom(4)] });
    const backward = computeSysId({ libIds: () => [libFrom(2), libFrom(1)], semIds: () => [idFrom(4), idFrom(3)] });
    expect(forward.hex).toBe(backward.hex);
  });

  test("membership changes the id", () => {
    const a = computeSysId({ libIds: () => [], semIds: () => [idFrom(3)] });
    const b = computeSysId({ libIds: () => [], semIds: () => [idFrom(3), idFrom(4)] });
    const c = computeSysId({ libIds: () => [libFrom(1)], semIds: () => [idFrom(3)] });
    expect(new Set([a.hex, b.hex, c.hex]).size).toBe(3);
  });
});

describe("library ids", () => {
  test("export and entry order do not matter", () => {
    const a = computeLibId({
      name: "Geo",
      dependencies: [libFrom(1)],
      exports: new Map([
        [typeName("Lat"), u8],
        [typeName("Lon"), u16],
      ]),
      entries: [u8, u16],
    });
    const b = computeLibId({
      name: "Geo",
      dependencies: [libFrom(1)],
      exports: new Map([
        [typeName("Lon"), u16],
        [typeName("Lat"), u8],
      ]),
      entries: [u16, u8],
    });
    expect(a.hex).toBe(b.hex);
  });

  test("library name is committed", () => {
    const init = { dependencies: [], exports: new Map([[typeName("Lat"), u8]]), entries: [u8] };
    expect(computeLibId({ name: "Geo", ...init }).hex).not.toBe(computeLibId({ name: "Map", ...init }).hex);
  });
});
