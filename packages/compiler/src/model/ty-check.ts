import { checkIdent } from "./ident.js";
import { isPrimitiveCode } from "./primitive.js";
import type { Sizing, Ty } from "./ty.js";
import { LIMITS } from "../shared/confined.js";

/**
 * Structural well-formedness of one node (children are not visited).
 * Returns one message per problem; an empty list means the node is valid.
 */
export function checkTy(ty: Ty<unknown>): string[] {
  const problems: string[] = [];
  switch (ty.kind) {
    case "primitive":
      if (!isPrimitiveCode(ty.prim)) problems.push(`unknown primitive code ${ty.prim}`);
      break;
    case "unicode":
      break;
    case "enum":
    case "union":
      checkCount(problems, "variants", ty.variants.length, LIMITS.variants);
      checkNames(problems, "variant", ty.variants.map((v) => v.name));
      checkTags(problems, ty.variants.map((v) => v.tag));
      break;
    case "tuple":
      checkCount(problems, "fields", ty.fields.length, LIMITS.fields);
      break;
    case "struct":
      checkCount(problems, "fields", ty.fields.length, LIMITS.fields);
      checkNames(problems, "field", ty.fields.map((f) => f.name));
      break;
    case "array":
      if (!Number.isInteger(ty.len) || ty.len < 1 || ty.len > 0xffff) {
        problems.push(`array length ${ty.len} is outside 1..65535`);
      }
      break;
    case "list":
    case "set":
    case "map":
      checkSizing(problems, ty.sizing);
      break;
    case "option":
    case "ref":
      break;
  }
  return problems;
}

function checkCount(problems: string[], what: string, count: number, max: number): void {
  if (count === 0) problems.push(`${what} must not be empty`);
  if (count > max) problems.push(`${count} ${what} exceed the limit of ${max}`);
}

function checkNames(problems: string[], what: string, names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    const invalid = checkIdent(name);
    if (invalid) problems.push(`${what} name '${name}': ${invalid.message}`);
    if (seen.has(name)) problems.push(`duplicate ${what} name '${name}'`);
    seen.add(name);
  }
}

function checkTags(problems: string[], tags: readonly number[]): void {
  const seen = new Set<number>();
  for (const tag of tags) {
    if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) problems.push(`variant tag ${tag} is outside 0..255`);
    if (seen.has(tag)) problems.push(`duplicate variant tag ${tag}`);
    seen.add(tag);
  }
}

function checkSizing(problems: string[], sizing: Sizing): void {
  const { min, max } = sizing;
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max > 0xffff || min > max) {
    problems.push(`invalid sizing ${min}..${max}`);
  }
}
