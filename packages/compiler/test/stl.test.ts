import { describe, expect, test } from "vitest";

import { computeSemId } from "../src/identity/commit.js";
import { BYTE, U16, U8 } from "../src/model/primitive.js";
import { Sizing, Ty } from "../src/model/ty.js";
import { STD_LIB_NAME, stdLib, stdSymbolic } from "../src/stl.js";

describe("standard library", () => {
  test("built once per process", () => {
    expect(stdLib()).toBe(stdLib());
    expect(stdSymbolic()).toBe(stdSymbolic());
    expect(stdLib().id().hex).toBe(stdLib().id().hex);
  });

  test("declares every primitive and the text types", () => {
    const std = stdLib();
    expect(std.name).toBe(STD_LIB_NAME);
    expect([...std.exports.keys()]).toEqual([
      "AsciiString",
      "Bool",
      "Byte",
      "Char",
      "F32",
      "F64",
      "I128",
      "I16",
      "I32",
      "I64",
      "I8",
      "String",
      "U128",
      "U16",
      "U24",
      "U32",
      "U64",
      "U8",
      "Unit",
    ]);
    expect(std.countTypes()).toBe(19);
    expect(std.dependencies).toEqual([]);
  });

  test("primitive ids are the ids of the bare primitives", () => {
    expect(stdLib().get("U8")?.hex).toBe(computeSemId(Ty.prim(U8)).hex);
    expect(stdLib().get("U16")?.hex).toBe(computeSemId(Ty.prim(U16)).hex);
  });

  test("strings are sized lists", () => {
    const std = stdLib();
    const byte = computeSemId(Ty.prim(BYTE));
    const char = computeSemId(Ty.unicode());
    expect(std.get("AsciiString")?.hex).toBe(computeSemId(Ty.list(byte, Sizing.U8)).hex);
    expect(std.get("String")?.hex).toBe(computeSemId(Ty.list(char, Sizing.U16)).hex);
  });

  test("symbolic form keeps names", () => {
    const bool = stdSymbolic().get("Bool");
    expect(bool?.kind).toBe("enum");
    expect(stdSymbolic().fqn("String")).toEqual({ lib: "Std", name: "String" });
  });
});
