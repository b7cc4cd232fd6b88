/* =============================================================================
 * PRIMITIVES
 * -----------------------------------------------------------------------------
 * A primitive is one byte: the two high bits select the numeric class, the
 * six low bits carry the width in bytes. Width 0 is reserved for the two
 * special codes `UNIT` (unsigned, zero bytes) and `BYTE` (signed class,
 * zero width: an uninterpreted octet).
 * ============================================================================= */

export type Primitive = number & { readonly __brand: "Primitive" };

export type NumClass = "unsigned" | "signed" | "non-zero" | "float";

const CLASS_BITS: Record<NumClass, number> = {
  unsigned: 0x00,
  signed: 0x40,
  "non-zero": 0x80,
  float: 0xc0,
};

const WIDTHS = new Set([1, 2, 3, 4, 5, 6, 7, 8, 16, 32]);
const FLOAT_WIDTHS = new Set([2, 4, 8, 10, 16, 32]);

function code(value: number): Primitive {
  return value as Primitive;
}

export function primitive(numClass: NumClass, width: number): Primitive {
  const widths = numClass === "float" ? FLOAT_WIDTHS : WIDTHS;
  if (!widths.has(width)) {
    throw new RangeError(`invalid ${numClass} primitive width ${width}`);
  }
  return code(CLASS_BITS[numClass] | width);
}

export const UNIT = code(0x00);
export const BYTE = code(0x40);

export const U8 = primitive("unsigned", 1);
export const U16 = primitive("unsigned", 2);
export const U24 = primitive("unsigned", 3);
export const U32 = primitive("unsigned", 4);
export const U40 = primitive("unsigned", 5);
export const U48 = primitive("unsigned", 6);
export const U56 = primitive("unsigned", 7);
export const U64 = primitive("unsigned", 8);
export const U128 = primitive("unsigned", 16);
export const U256 = primitive("unsigned", 32);

export const I8 = primitive("signed", 1);
export const I16 = primitive("signed", 2);
export const I24 = primitive("signed", 3);
export const I32 = primitive("signed", 4);
export const I40 = primitive("signed", 5);
export const I48 = primitive("signed", 6);
export const I56 = primitive("signed", 7);
export const I64 = primitive("signed", 8);
export const I128 = primitive("signed", 16);
export const I256 = primitive("signed", 32);

export const N8 = primitive("non-zero", 1);
export const N16 = primitive("non-zero", 2);
export const N24 = primitive("non-zero", 3);
export const N32 = primitive("non-zero", 4);
export const N48 = primitive("non-zero", 6);
export const N64 = primitive("non-zero", 8);
export const N128 = primitive("non-zero", 16);

export const F16 = primitive("float", 2);
export const F32 = primitive("float", 4);
export const F64 = primitive("float", 8);
export const F80 = primitive("float", 10);
export const F128 = primitive("float", 16);
export const F256 = primitive("float", 32);

export function numClassOf(prim: Primitive): NumClass {
  switch (prim & 0xc0) {
    case 0x00:
      return "unsigned";
    case 0x40:
      return "signed";
    case 0x80:
      return "non-zero";
    default:
      return "float";
  }
}

/** Encoded size in bytes. */
export function primitiveWidth(prim: Primitive): number {
  if (prim === BYTE) return 1;
  return prim & 0x3f;
}

/** Accepts only codes produced by `primitive()`, `UNIT` or `BYTE`. */
export function isPrimitiveCode(value: number): value is Primitive {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) return false;
  if (value === UNIT || value === BYTE) return true;
  const width = value & 0x3f;
  const cls = numClassOf(code(value));
  return (cls === "float" ? FLOAT_WIDTHS : WIDTHS).has(width);
}

const CLASS_LETTER: Record<NumClass, string> = {
  unsigned: "U",
  signed: "I",
  "non-zero": "N",
  float: "F",
};

export function formatPrimitive(prim: Primitive): string {
  if (prim === UNIT) return "Unit";
  if (prim === BYTE) return "Byte";
  return `${CLASS_LETTER[numClassOf(prim)]}${primitiveWidth(prim) * 8}`;
}
