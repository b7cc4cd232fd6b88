/* =======================================================================================
 * TYPE MODEL
 * ---------------------------------------------------------------------------------------
 * `Ty<Ref>` is one structural type description. It never embeds another named
 * type: nested types are reached through `Ref`, which is a symbolic reference
 * before compilation and a semantic id after it. The union is closed; every
 * consumer switches over `kind` exhaustively.
 * ======================================================================================= */

import type { FieldName } from "./ident.js";
import type { Primitive } from "./primitive.js";

// =============================================================================
// Sizing
// =============================================================================

export interface Sizing {
  readonly min: number;
  readonly max: number;
}

const SIZING_U8: Sizing = { min: 0, max: 0xff };
const SIZING_U16: Sizing = { min: 0, max: 0xffff };
const SIZING_U8_NONEMPTY: Sizing = { min: 1, max: 0xff };

export const Sizing = {
  U8: SIZING_U8,
  U16: SIZING_U16,
  U8_NONEMPTY: SIZING_U8_NONEMPTY,
  new(min: number, max: number): Sizing {
    return { min, max };
  },
} as const;

export function formatSizing(sizing: Sizing): string {
  if (sizing.min === 0 && sizing.max === 0xffff) return "";
  if (sizing.max === 0xffff) return ` ^ ${sizing.min}..`;
  return ` ^ ${sizing.min}..0x${sizing.max.toString(16).padStart(2, "0")}`;
}

// =============================================================================
// Variants
// =============================================================================

export interface EnumVariant {
  readonly name: FieldName;
  readonly tag: number;
}

export interface UnionVariant<Ref> {
  readonly name: FieldName;
  readonly tag: number;
  readonly ty: Ref;
}

export interface NamedField<Ref> {
  readonly name: FieldName;
  readonly ty: Ref;
}

export type Ty<Ref> =
  | { readonly kind: "primitive"; readonly prim: Primitive }
  | { readonly kind: "unicode" }
  | { readonly kind: "enum"; readonly variants: readonly EnumVariant[] }
  | { readonly kind: "union"; readonly variants: readonly UnionVariant<Ref>[] }
  | { readonly kind: "tuple"; readonly fields: readonly Ref[] }
  | { readonly kind: "struct"; readonly fields: readonly NamedField<Ref>[] }
  | { readonly kind: "array"; readonly item: Ref; readonly len: number }
  | { readonly kind: "list"; readonly item: Ref; readonly sizing: Sizing }
  | { readonly kind: "set"; readonly item: Ref; readonly sizing: Sizing }
  | { readonly kind: "map"; readonly key: Ref; readonly value: Ref; readonly sizing: Sizing }
  | { readonly kind: "option"; readonly some: Ref }
  | { readonly kind: "ref"; readonly target: Ref };

export type TyKind = Ty<unknown>["kind"];

/** Order of variants in the canonical encoding. */
export const TY_KINDS: readonly TyKind[] = [
  "primitive",
  "unicode",
  "enum",
  "union",
  "tuple",
  "struct",
  "array",
  "list",
  "set",
  "map",
  "option",
  "ref",
];

// =============================================================================
// Constructors
// =============================================================================

export const Ty = {
  prim<Ref>(prim: Primitive): Ty<Ref> {
    return { kind: "primitive", prim };
  },
  unicode<Ref>(): Ty<Ref> {
    return { kind: "unicode" };
  },
  enumerate<Ref>(variants: readonly EnumVariant[]): Ty<Ref> {
    return { kind: "enum", variants };
  },
  union<Ref>(variants: readonly UnionVariant<Ref>[]): Ty<Ref> {
    return { kind: "union", variants };
  },
  tuple<Ref>(fields: readonly Ref[]): Ty<Ref> {
    return { kind: "tuple", fields };
  },
  struct<Ref>(fields: readonly NamedField<Ref>[]): Ty<Ref> {
    return { kind: "struct", fields };
  },
  array<Ref>(item: Ref, len: number): Ty<Ref> {
    return { kind: "array", item, len };
  },
  list<Ref>(item: Ref, sizing: Sizing = Sizing.U16): Ty<Ref> {
    return { kind: "list", item, sizing };
  },
  set<Ref>(item: Ref, sizing: Sizing = Sizing.U16): Ty<Ref> {
    return { kind: "set", item, sizing };
  },
  map<Ref>(key: Ref, value: Ref, sizing: Sizing = Sizing.U16): Ty<Ref> {
    return { kind: "map", key, value, sizing };
  },
  option<Ref>(some: Ref): Ty<Ref> {
    return { kind: "option", some };
  },
  ref<Ref>(target: Ref): Ty<Ref> {
    return { kind: "ref", target };
  },
} as const;

// =============================================================================
// Traversal
// =============================================================================

/** One direct child reference, labelled the way layouts and renderings show it. */
export interface TyChild<Ref> {
  readonly ref: Ref;
  /** Field or variant name, positional index, or a role (`item`, `key`, ...). */
  readonly label: string;
  /** True when the edge is the target of a `ref` node. */
  readonly indirect: boolean;
}

/** Direct child references in declaration order. */
export function tyChildren<Ref>(ty: Ty<Ref>): TyChild<Ref>[] {
  switch (ty.kind) {
    case "primitive":
    case "unicode":
    case "enum":
      return [];
    case "union":
      return ty.variants.map((v) => ({ ref: v.ty, label: v.name, indirect: false }));
    case "tuple":
      return ty.fields.map((f, i) => ({ ref: f, label: String(i), indirect: false }));
    case "struct":
      return ty.fields.map((f) => ({ ref: f.ty, label: f.name, indirect: false }));
    case "array":
    case "list":
    case "set":
      return [{ ref: ty.item, label: "item", indirect: false }];
    case "map":
      return [
        { ref: ty.key, label: "key", indirect: false },
        { ref: ty.value, label: "value", indirect: false },
      ];
    case "option":
      return [{ ref: ty.some, label: "some", indirect: false }];
    case "ref":
      return [{ ref: ty.target, label: "target", indirect: true }];
  }
}

export function tyRefs<Ref>(ty: Ty<Ref>): Ref[] {
  return tyChildren(ty).map((c) => c.ref);
}

/**
 * Structure-preserving translation of references. This is the only bridge
 * between the symbolic and the compiled form; neither is mutated in place.
 */
export function mapTyRefs<A, B>(ty: Ty<A>, fn: (ref: A, indirect: boolean) => B): Ty<B> {
  switch (ty.kind) {
    case "primitive":
      return { kind: "primitive", prim: ty.prim };
    case "unicode":
      return { kind: "unicode" };
    case "enum":
      return { kind: "enum", variants: ty.variants };
    case "union":
      return {
        kind: "union",
        variants: ty.variants.map((v) => ({ name: v.name, tag: v.tag, ty: fn(v.ty, false) })),
      };
    case "tuple":
      return { kind: "tuple", fields: ty.fields.map((f) => fn(f, false)) };
    case "struct":
      return { kind: "struct", fields: ty.fields.map((f) => ({ name: f.name, ty: fn(f.ty, false) })) };
    case "array":
      return { kind: "array", item: fn(ty.item, false), len: ty.len };
    case "list":
      return { kind: "list", item: fn(ty.item, false), sizing: ty.sizing };
    case "set":
      return { kind: "set", item: fn(ty.item, false), sizing: ty.sizing };
    case "map":
      return { kind: "map", key: fn(ty.key, false), value: fn(ty.value, false), sizing: ty.sizing };
    case "option":
      return { kind: "option", some: fn(ty.some, false) };
    case "ref":
      return { kind: "ref", target: fn(ty.target, true) };
  }
}

/** Short label of the variant, used by layouts. */
export function tyKindLabel(ty: Ty<unknown>): string {
  switch (ty.kind) {
    case "primitive":
      return "prim";
    case "unicode":
      return "char";
    case "enum":
      return "enum";
    case "union":
      return "union";
    case "tuple":
      return "tuple";
    case "struct":
      return "rec";
    case "array":
      return "array";
    case "list":
      return "list";
    case "set":
      return "set";
    case "map":
      return "map";
    case "option":
      return "option";
    case "ref":
      return "ref";
  }
}
