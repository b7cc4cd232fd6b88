import { describe, expect, expectTypeOf, test } from "vitest";

import {
  checkIdent,
  fieldName,
  formatTypeFqn,
  ident,
  isIdent,
  isTypeName,
  libName,
  parseTypeFqn,
  typeName,
  type FieldName,
  type Ident,
  type LibName,
  type TypeName,
} from "../../src/model/ident.js";
import { InvalidIdentError } from "../../src/shared/errors.js";

describe("identifiers", () => {
  test.each([
    ["", "empty"],
    ["a".repeat(33), "too-long"],
    ["Größe", "non-ascii"],
    ["1st", "non-alphabetic"],
    ["_x", "non-alphabetic"],
    ["has-dash", "invalid-char"],
  ])("%j is rejected as %s", (value, reason) => {
    expect(checkIdent(value)?.reason).toBe(reason);
    expect(isIdent(value)).toBe(false);
  });

  test.each(["a", "Point3D", "snake_case", "A".repeat(32)])("%s is accepted", (value) => {
    expect(checkIdent(value)).toBeNull();
    expect(ident(value)).toBe(value);
  });

  test("ident throws the reason", () => {
    expect(() => ident("9")).toThrow(
      new InvalidIdentError("identifier name must start with alphabetic character and not '9'", "non-alphabetic", "9"),
    );
  });
});

describe("name kinds", () => {
  test("each kind validates like an identifier", () => {
    expect(typeName("Point")).toBe("Point");
    expect(libName("Geo")).toBe("Geo");
    expect(fieldName("x")).toBe("x");
    expect(() => libName("my-lib")).toThrow(InvalidIdentError);
    expect(isTypeName("Point")).toBe(true);
    expect(isTypeName("no way")).toBe(false);
  });

  test("kinds are not interchangeable", () => {
    expectTypeOf(libName("Geo")).toMatchTypeOf<Ident>();
    expectTypeOf(libName("Geo")).not.toMatchTypeOf<TypeName>();
    expectTypeOf(typeName("Point")).not.toMatchTypeOf<LibName>();
    expectTypeOf(fieldName("x")).not.toMatchTypeOf<TypeName>();
    expectTypeOf(ident("x")).not.toMatchTypeOf<FieldName>();
  });
});

describe("fully qualified names", () => {
  test("parse and format", () => {
    const fqn = parseTypeFqn("Geo.Point");
    expect(fqn).toEqual({ lib: "Geo", name: "Point" });
    expect(formatTypeFqn(fqn)).toBe("Geo.Point");
  });

  test("a name without a library is refused", () => {
    expect(() => parseTypeFqn("Point")).toThrow(InvalidIdentError);
  });
});
