import { describe, expect, test } from "vitest";

import { StrictReader } from "../../src/encoding/reader.js";
import { decodeTy, encodeTy, tyEquals } from "../../src/encoding/ty-codec.js";
import { StrictWriter } from "../../src/encoding/writer.js";
import { computeSemId } from "../../src/identity/commit.js";
import { fieldName } from "../../src/model/ident.js";
import { U8, U32 } from "../../src/model/primitive.js";
import { checkTy } from "../../src/model/ty-check.js";
import { Sizing, Ty } from "../../src/model/ty.js";
import { ConfinementError, DecodeError } from "../../src/shared/errors.js";

const u8 = computeSemId(Ty.prim(U8));
const u8Bytes = Array.from(u8.toBytes());

function decodeError(bytes: readonly number[]): string {
  try {
    decodeTy(Uint8Array.from(bytes));
  } catch (error) {
    if (error instanceof DecodeError) return error.message;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

describe("StrictWriter / StrictReader", () => {
  test("integers are little-endian with fixed widths", () => {
    const bytes = new StrictWriter().u8(1).u16(0x0302).u24(0x060504).u32(0x0a090807).finish();
    expect(Array.from(bytes)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    const reader = new StrictReader(bytes);
    expect([reader.u8(), reader.u16(), reader.u24(), reader.u32()]).toEqual([1, 0x0302, 0x060504, 0x0a090807]);
    reader.end();
  });

  test("u32 reads values above 2^31 as positive", () => {
    expect(new StrictReader(Uint8Array.of(0xff, 0xff, 0xff, 0xff)).u32()).toBe(0xffff_ffff);
  });

  test("strings carry a u8 length prefix", () => {
    expect(Array.from(new StrictWriter().ascii("Geo").finish())).toEqual([3, 0x47, 0x65, 0x6f]);
  });

  test("out-of-range values are refused", () => {
    expect(() => new StrictWriter().u8(256)).toThrow(new ConfinementError("u8: 256 is outside 0..255", "u8", 255, 256));
    expect(() => new StrictWriter().u16(-1)).toThrow(ConfinementError);
    expect(() => new StrictWriter().ascii("é")).toThrow(ConfinementError);
  });

  test("byteLength tracks written bytes", () => {
    const writer = new StrictWriter().u16(0).bytes(new Uint8Array(5));
    expect(writer.byteLength).toBe(7);
  });
});

describe("canonical type encoding", () => {
  test("primitive is tag then code", () => {
    expect(Array.from(encodeTy(Ty.prim(U32)))).toEqual([0, 0x04]);
    expect(Array.from(encodeTy(Ty.unicode()))).toEqual([1]);
  });

  test("enum variants are written in tag order", () => {
    const ty = Ty.enumerate<never>([
      { name: fieldName("b"), tag: 1 },
      { name: fieldName("a"), tag: 0 },
    ]);
    expect(Array.from(encodeTy(ty))).toEqual([2, 2, 1, 0x61, 0, 1, 0x62, 1]);
  });

  test("collections end with min and max as u16", () => {
    expect(Array.from(encodeTy(Ty.list(u8, Sizing.U8)))).toEqual([7, ...u8Bytes, 0, 0, 0xff, 0]);
    expect(Array.from(encodeTy(Ty.array(u8, 32)))).toEqual([6, ...u8Bytes, 32, 0]);
  });

  test("decode inverts encode", () => {
    const ty = Ty.map(u8, computeSemId(Ty.list(u8)), Sizing.new(1, 10));
    const decoded = decodeTy(encodeTy(ty));
    expect(decoded).toEqual(ty);
    expect(tyEquals(decoded, ty)).toBe(true);
  });

  test("structural equality ignores variant declaration order", () => {
    const a = Ty.union([
      { name: fieldName("none"), tag: 0, ty: u8 },
      { name: fieldName("some"), tag: 1, ty: u8 },
    ]);
    const b = Ty.union([
      { name: fieldName("some"), tag: 1, ty: u8 },
      { name: fieldName("none"), tag: 0, ty: u8 },
    ]);
    expect(tyEquals(a, b)).toBe(true);
    expect(tyEquals(a, Ty.option(u8))).toBe(false);
  });
});

describe("decode errors", () => {
  test("unknown type tag", () => {
    expect(decodeError([12])).toBe("unknown type tag (at byte 1)");
  });

  test("truncated input", () => {
    expect(decodeError([7])).toBe("unexpected end of data reading 32 byte(s) (at byte 1)");
  });

  test("trailing bytes", () => {
    expect(decodeError([0, 1, 0])).toBe("1 trailing byte(s) (at byte 2)");
  });

  test("unknown primitive code", () => {
    expect(decodeError([0, 9])).toBe("unknown primitive code 9 (at byte 2)");
  });

  test("variants out of tag order", () => {
    expect(decodeError([2, 2, 1, 0x62, 1, 1, 0x61, 0])).toBe("variant tags are not in ascending order (at byte 8)");
  });

  test("invalid identifier", () => {
    expect(decodeError([2, 1, 1, 0x31, 0])).toBe("invalid identifier '1' (at byte 4)");
  });

  test("non-ASCII name byte", () => {
    expect(decodeError([2, 1, 1, 0x80, 0])).toBe("non-ASCII byte in string (at byte 4)");
  });

  test("empty enum", () => {
    expect(decodeError([2, 0])).toBe("malformed enum: variants must not be empty (at byte 2)");
  });

  test("zero-length array", () => {
    expect(decodeError([6, ...u8Bytes, 0, 0])).toBe("malformed array: array length 0 is outside 1..65535 (at byte 35)");
  });

  test("inverted sizing", () => {
    expect(decodeError([7, ...u8Bytes, 5, 0, 1, 0])).toBe("malformed list: invalid sizing 5..1 (at byte 37)");
  });
});

describe("checkTy", () => {
  test("well-formed nodes have no problems", () => {
    expect(checkTy(Ty.list(u8, Sizing.U8_NONEMPTY))).toEqual([]);
  });

  test("duplicate names and tags", () => {
    expect(
      checkTy(
        Ty.enumerate([
          { name: fieldName("a"), tag: 1 },
          { name: fieldName("a"), tag: 1 },
        ]),
      ),
    ).toEqual(["duplicate variant name 'a'", "duplicate variant tag 1"]);
  });

  test("tag range", () => {
    expect(checkTy(Ty.enumerate([{ name: fieldName("a"), tag: 256 }]))).toEqual(["variant tag 256 is outside 0..255"]);
  });

  test("empty struct", () => {
    expect(checkTy(Ty.struct([]))).toEqual(["fields must not be empty"]);
  });
});
