import { describe, expect, test } from "vitest";

import { decodeIdText, encodeIdText, idMnemonic, URN_PREFIX } from "../../src/identity/baid.js";
import { ID_TAGS, sha256, tagHash, taggedHash } from "../../src/identity/hash.js";
import { autoTypeName, compareIds, LibId, SemId, TypeSysId } from "../../src/identity/id.js";
import { IdParseError } from "../../src/shared/errors.js";

const payload = Uint8Array.from({ length: 32 }, (_, i) => i * 7);

function parseError(fn: () => unknown): IdParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof IdParseError) return error;
    throw error;
  }
  throw new Error("expected an IdParseError");
}

describe("tagged hashing", () => {
  test("tag hash is SHA-256 of the tag text", () => {
    expect(tagHash(ID_TAGS.semId)).toEqual(sha256(new TextEncoder().encode(ID_TAGS.semId)));
  });

  test("tagged hash prefixes the tag hash twice", () => {
    const content = Uint8Array.of(1, 2, 3);
    const th = tagHash(ID_TAGS.lib);
    expect(taggedHash(ID_TAGS.lib, content)).toEqual(sha256(th, th, content));
  });

  test("equal content under different tags never collides", () => {
    const content = new Uint8Array(32);
    const digests = Object.values(ID_TAGS).map((tag) => Buffer.from(taggedHash(tag, content)).toString("hex"));
    expect(new Set(digests).size).toBe(4);
  });
});

describe("id text forms", () => {
  test("full form is urn, base58 and a three-word mnemonic", () => {
    const id = SemId.fromBytes(payload);
    const full = id.format("full");
    const [urn, mnemonic] = full.split("#");

    expect(urn).toBe(id.format("urn"));
    expect(urn).toBe(`${URN_PREFIX}semid:${id.format("bare")}`);
    expect(mnemonic).toBe(id.format("mnemonic"));
    expect(mnemonic).toMatch(/^[a-z]+-[a-z]+-[a-z]+$/);
    expect(id.toString()).toBe(full);
    expect(id.toJSON()).toBe(urn);
  });

  test.each(["full", "urn", "bare"] as const)("%s form parses back to the same id", (format) => {
    const id = LibId.fromBytes(payload);
    const parsed = LibId.parse(id.format(format));
    expect(parsed.hex).toBe(id.hex);
    expect(parsed.equals(id)).toBe(true);
  });

  test("surrounding whitespace is ignored", () => {
    const id = TypeSysId.fromBytes(payload);
    expect(TypeSysId.parse(`  ${id.format("urn")}\n`).hex).toBe(id.hex);
  });

  test("the kinds share bytes but not text", () => {
    const forms = [SemId.fromBytes(payload), LibId.fromBytes(payload), TypeSysId.fromBytes(payload)].map((id) =>
      id.format("bare"),
    );
    expect(new Set(forms).size).toBe(3);
  });

  test("mnemonic is fixed by hri and payload", () => {
    expect(SemId.fromBytes(payload).format("mnemonic")).toBe(idMnemonic("semid", payload));
    expect(encodeIdText("semid", payload, "mnemonic")).toBe(idMnemonic("semid", payload));
  });
});

describe("id parse errors", () => {
  const semId = SemId.fromBytes(payload);

  test("foreign urn prefix", () => {
    expect(parseError(() => SemId.parse("urn:other:semid:abc")).reason).toBe("prefix");
  });

  test("id of another kind", () => {
    const error = parseError(() => LibId.parse(semId.format("urn")));
    expect(error.reason).toBe("hri");
    expect(error.message).toBe(`id '${semId.format("urn")}' has kind 'semid' where 'stl' was expected`);
  });

  test("bare text of another kind fails the checksum", () => {
    expect(parseError(() => LibId.parse(semId.format("bare"))).reason).toBe("checksum");
  });

  test("characters outside the base58 alphabet", () => {
    expect(parseError(() => SemId.parse("0OIl")).reason).toBe("base58");
  });

  test("wrong decoded length", () => {
    const short = encodeIdText("semid", new Uint8Array(4), "bare");
    expect(() => decodeIdText("semid", short)).toThrow(IdParseError);
    expect(parseError(() => SemId.parse(short)).reason).toBe("length");
  });

  test("mnemonic that does not match", () => {
    const text = `${semId.format("urn")}#not-the-words`;
    expect(parseError(() => SemId.parse(text)).reason).toBe("mnemonic");
  });
});

describe("id values", () => {
  test("hex round trip", () => {
    const hex = "AB".repeat(32);
    const id = SemId.fromHex(hex);
    expect(id.hex).toBe("ab".repeat(32));
    expect(id.toHex()).toBe(id.hex);
    expect(id.toBytes()).toEqual(new Uint8Array(32).fill(0xab));
  });

  test("malformed hex", () => {
    expect(parseError(() => SemId.fromHex("abc")).reason).toBe("length");
  });

  test("wrong byte length", () => {
    expect(() => SemId.fromBytes(new Uint8Array(31))).toThrow(RangeError);
  });

  test("bytes are copied in and out", () => {
    const bytes = new Uint8Array(32);
    const id = SemId.fromBytes(bytes);
    bytes[0] = 9;
    id.toBytes()[1] = 9;
    expect(id.hex).toBe("00".repeat(32));
  });

  test("ordering is bytewise", () => {
    const low = SemId.fromHex("01" + "ff".repeat(31));
    const high = SemId.fromHex("02" + "00".repeat(31));
    expect(compareIds(low, high)).toBe(-1);
    expect(high.compare(low)).toBe(1);
    expect(low.compare(SemId.fromHex("01" + "ff".repeat(31)))).toBe(0);
  });

  test("auto type name uses the first four bytes", () => {
    expect(autoTypeName(SemId.fromHex("0123abcd" + "00".repeat(28)))).toBe("Auto0123ABCD");
  });
});
