import { formatPrimitive } from "../model/primitive.js";
import { formatSizing, type Ty } from "../model/ty.js";

/**
 * One-line type expression. References are rendered by `nameOf`, so the same
 * printer serves compiled types (ids or names) and symbolic ones.
 *
 * ```
 * U8                      (A, B)                 [U8 ^ 32]
 * false:0 | true:1        (name String, age U8)  [Item ^ 1..0xff]
 * some:1 (U8) | none:0    {Key -> Value}         Item?   &Node
 * ```
 */
export function formatTyExpr<Ref>(ty: Ty<Ref>, nameOf: (ref: Ref) => string): string {
  switch (ty.kind) {
    case "primitive":
      return formatPrimitive(ty.prim);
    case "unicode":
      return "Unicode";
    case "enum":
      return [...ty.variants]
        .sort((a, b) => a.tag - b.tag)
        .map((v) => `${v.name}:${v.tag}`)
        .join(" | ");
    case "union":
      return [...ty.variants]
        .sort((a, b) => a.tag - b.tag)
        .map((v) => `${v.name}:${v.tag} (${nameOf(v.ty)})`)
        .join(" | ");
    case "tuple":
      return `(${ty.fields.map(nameOf).join(", ")})`;
    case "struct":
      return `(${ty.fields.map((f) => `${f.name} ${nameOf(f.ty)}`).join(", ")})`;
    case "array":
      return `[${nameOf(ty.item)} ^ ${ty.len}]`;
    case "list":
      return `[${nameOf(ty.item)}${formatSizing(ty.sizing)}]`;
    case "set":
      return `{${nameOf(ty.item)}${formatSizing(ty.sizing)}}`;
    case "map":
      return `{${nameOf(ty.key)} -> ${nameOf(ty.value)}${formatSizing(ty.sizing)}}`;
    case "option":
      return `${nameOf(ty.some)}?`;
    case "ref":
      return `&${nameOf(ty.target)}`;
  }
}

/** Parameters shown after the kind label in layouts; empty when there are none. */
export function formatTyParams(ty: Ty<unknown>): string {
  switch (ty.kind) {
    case "primitive":
      return formatPrimitive(ty.prim);
    case "enum":
      return [...ty.variants]
        .sort((a, b) => a.tag - b.tag)
        .map((v) => v.name)
        .join("|");
    case "array":
      return String(ty.len);
    case "list":
    case "set":
    case "map":
      return formatSizing(ty.sizing).replace(/^ \^ /, "");
    case "unicode":
    case "union":
    case "tuple":
    case "struct":
    case "option":
    case "ref":
      return "";
  }
}
