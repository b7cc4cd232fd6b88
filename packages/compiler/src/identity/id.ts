import { decodeIdText, encodeIdText, ID_LENGTH, type IdFormat } from "./baid.js";
import { IdParseError } from "../shared/errors.js";

// =============================================================================
// 32-byte ids
// =============================================================================

const HEX = /^[0-9a-f]{64}$/;

function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

function fromHex(hex: string): Uint8Array {
  const bytes = new Uint8Array(ID_LENGTH);
  for (let i = 0; i < ID_LENGTH; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Common base of every content-derived id. Subclasses carry a private brand,
 * so ids of different kinds are not assignable to each other and never
 * compare equal, even over identical bytes.
 */
export abstract class Id32 {
  private readonly bytes: Uint8Array;
  /** Lowercase hex; doubles as the ordering and map key. */
  readonly hex: string;

  protected constructor(bytes: Uint8Array) {
    if (bytes.length !== ID_LENGTH) {
      throw new RangeError(`id must be ${ID_LENGTH} bytes, got ${bytes.length}`);
    }
    this.bytes = Uint8Array.from(bytes);
    this.hex = toHex(this.bytes);
  }

  /** Human-readable part naming the id kind in its text form. */
  abstract get hri(): string;

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): string {
    return this.hex;
  }

  equals(other: this): boolean {
    return other.constructor === this.constructor && other.hex === this.hex;
  }

  /** Bytewise ascending order. */
  compare(other: this): number {
    return compareIds(this, other);
  }

  format(format: IdFormat = "full"): string {
    return encodeIdText(this.hri, this.bytes, format);
  }

  toString(): string {
    return this.format("full");
  }

  toJSON(): string {
    return this.format("urn");
  }
}

export function compareIds(a: Id32, b: Id32): number {
  return a.hex < b.hex ? -1 : a.hex > b.hex ? 1 : 0;
}

function checkHex(hex: string): string {
  const normalized = hex.toLowerCase();
  if (!HEX.test(normalized)) {
    throw new IdParseError(`'${hex}' is not a 64-digit hex id`, "length", hex);
  }
  return normalized;
}

/** Identifies one type by its structure. */
export class SemId extends Id32 {
  static readonly HRI = "semid";
  readonly #kind = "semid";

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  get hri(): string {
    return SemId.HRI;
  }

  get kind(): "semid" {
    return this.#kind;
  }

  static fromBytes(bytes: Uint8Array): SemId {
    return new SemId(bytes);
  }

  static fromHex(hex: string): SemId {
    return new SemId(fromHex(checkHex(hex)));
  }

  static parse(text: string): SemId {
    return new SemId(decodeIdText(SemId.HRI, text));
  }
}

/** Identifies one type-system snapshot. */
export class TypeSysId extends Id32 {
  static readonly HRI = "sts";
  readonly #kind = "sts";

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  get hri(): string {
    return TypeSysId.HRI;
  }

  get kind(): "sts" {
    return this.#kind;
  }

  static fromBytes(bytes: Uint8Array): TypeSysId {
    return new TypeSysId(bytes);
  }

  static fromHex(hex: string): TypeSysId {
    return new TypeSysId(fromHex(checkHex(hex)));
  }

  static parse(text: string): TypeSysId {
    return new TypeSysId(decodeIdText(TypeSysId.HRI, text));
  }
}

/** Identifies one compiled library. */
export class LibId extends Id32 {
  static readonly HRI = "stl";
  readonly #kind = "stl";

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  get hri(): string {
    return LibId.HRI;
  }

  get kind(): "stl" {
    return this.#kind;
  }

  static fromBytes(bytes: Uint8Array): LibId {
    return new LibId(bytes);
  }

  static fromHex(hex: string): LibId {
    return new LibId(fromHex(checkHex(hex)));
  }

  static parse(text: string): LibId {
    return new LibId(decodeIdText(LibId.HRI, text));
  }
}

/** `Auto` + eight hex digits, for naming anonymous types in renderings. */
export function autoTypeName(id: SemId): string {
  return `Auto${id.hex.slice(0, 8).toUpperCase()}`;
}
