import { SemId } from "../identity/id.js";
import type { FieldName } from "../model/ident.js";
import { isFieldName } from "../model/ident.js";
import { isPrimitiveCode } from "../model/primitive.js";
import { checkTy } from "../model/ty-check.js";
import { TY_KINDS, type EnumVariant, type NamedField, type Sizing, type Ty, type TyKind, type UnionVariant } from "../model/ty.js";
import { StrictReader } from "./reader.js";
import { StrictWriter } from "./writer.js";

// =============================================================================
// Encoding
// =============================================================================

/**
 * Writes one node in canonical form. Variants are written in ascending tag
 * order so declaration order of enum and union members never changes bytes;
 * struct and tuple fields keep their order, which is part of the wire shape.
 */
export function writeTy<Ref>(writer: StrictWriter, ty: Ty<Ref>, writeRef: (ref: Ref) => void): void {
  writer.u8(TY_KINDS.indexOf(ty.kind));
  switch (ty.kind) {
    case "primitive":
      writer.u8(ty.prim);
      return;
    case "unicode":
      return;
    case "enum": {
      const variants = [...ty.variants].sort((a, b) => a.tag - b.tag);
      writer.u8(variants.length);
      for (const v of variants) writer.ascii(v.name).u8(v.tag);
      return;
    }
    case "union": {
      const variants = [...ty.variants].sort((a, b) => a.tag - b.tag);
      writer.u8(variants.length);
      for (const v of variants) {
        writer.ascii(v.name).u8(v.tag);
        writeRef(v.ty);
      }
      return;
    }
    case "tuple":
      writer.u8(ty.fields.length);
      for (const f of ty.fields) writeRef(f);
      return;
    case "struct":
      writer.u8(ty.fields.length);
      for (const f of ty.fields) {
        writer.ascii(f.name);
        writeRef(f.ty);
      }
      return;
    case "array":
      writeRef(ty.item);
      writer.u16(ty.len);
      return;
    case "list":
    case "set":
      writeRef(ty.item);
      writeSizing(writer, ty.sizing);
      return;
    case "map":
      writeRef(ty.key);
      writeRef(ty.value);
      writeSizing(writer, ty.sizing);
      return;
    case "option":
      writeRef(ty.some);
      return;
    case "ref":
      writeRef(ty.target);
      return;
  }
}

function writeSizing(writer: StrictWriter, sizing: Sizing): void {
  writer.u16(sizing.min).u16(sizing.max);
}

/** Canonical bytes of a compiled type. */
export function encodeTy(ty: Ty<SemId>): Uint8Array {
  const writer = new StrictWriter();
  writeTy(writer, ty, (id) => writer.bytes(id.toBytes()));
  return writer.finish();
}

// =============================================================================
// Decoding
// =============================================================================

export function readSemId(reader: StrictReader): SemId {
  return SemId.fromBytes(reader.bytes(32));
}

function readName(reader: StrictReader): FieldName {
  const name = reader.ascii();
  if (!isFieldName(name)) reader.fail(`invalid identifier '${name}'`);
  return name;
}

function readSizing(reader: StrictReader): Sizing {
  const min = reader.u16();
  const max = reader.u16();
  return { min, max };
}

function readTags<T extends { tag: number }>(reader: StrictReader, items: readonly T[]): readonly T[] {
  for (let i = 1; i < items.length; i++) {
    const prev = items[i - 1];
    const next = items[i];
    if (prev && next && prev.tag >= next.tag) reader.fail("variant tags are not in ascending order");
  }
  return items;
}

function readNode(reader: StrictReader): Ty<SemId> {
  const kind: TyKind | undefined = TY_KINDS[reader.u8()];
  switch (kind) {
    case "primitive": {
      const prim = reader.u8();
      if (!isPrimitiveCode(prim)) reader.fail(`unknown primitive code ${prim}`);
      return { kind, prim };
    }
    case "unicode":
      return { kind };
    case "enum": {
      const count = reader.u8();
      const variants: EnumVariant[] = [];
      for (let i = 0; i < count; i++) variants.push({ name: readName(reader), tag: reader.u8() });
      return { kind, variants: readTags(reader, variants) };
    }
    case "union": {
      const count = reader.u8();
      const variants: UnionVariant<SemId>[] = [];
      for (let i = 0; i < count; i++) {
        variants.push({ name: readName(reader), tag: reader.u8(), ty: readSemId(reader) });
      }
      return { kind, variants: readTags(reader, variants) };
    }
    case "tuple": {
      const count = reader.u8();
      const fields: SemId[] = [];
      for (let i = 0; i < count; i++) fields.push(readSemId(reader));
      return { kind, fields };
    }
    case "struct": {
      const count = reader.u8();
      const fields: NamedField<SemId>[] = [];
      for (let i = 0; i < count; i++) fields.push({ name: readName(reader), ty: readSemId(reader) });
      return { kind, fields };
    }
    case "array":
      return { kind, item: readSemId(reader), len: reader.u16() };
    case "list":
    case "set":
      return { kind, item: readSemId(reader), sizing: readSizing(reader) };
    case "map":
      return { kind, key: readSemId(reader), value: readSemId(reader), sizing: readSizing(reader) };
    case "option":
      return { kind, some: readSemId(reader) };
    case "ref":
      return { kind, target: readSemId(reader) };
    case undefined:
      return reader.fail("unknown type tag");
  }
}

/** Reads one node, rejecting non-canonical or malformed forms. */
export function readTy(reader: StrictReader): Ty<SemId> {
  const ty = readNode(reader);
  const problems = checkTy(ty);
  if (problems.length > 0) reader.fail(`malformed ${ty.kind}: ${problems.join("; ")}`);
  return ty;
}

export function decodeTy(bytes: Uint8Array): Ty<SemId> {
  const reader = new StrictReader(bytes);
  const ty = readTy(reader);
  reader.end();
  return ty;
}

/** Structural equality through the canonical form. */
export function tyEquals(a: Ty<SemId>, b: Ty<SemId>): boolean {
  const x = encodeTy(a);
  const y = encodeTy(b);
  return x.length === y.length && x.every((byte, i) => byte === y[i]);
}
