import { InvalidIdentError } from "../shared/errors.js";
import { LIMITS } from "../shared/confined.js";

// =============================================================================
// Identifiers
// =============================================================================

/**
 * ASCII identifier: 1..32 characters, alphabetic first, then alphanumeric
 * or `_`. Shared by type, library, field and variant names.
 */
export type Ident = string & { readonly __brand: "Ident" };

/** Type, library and field names share the rules but not the type. */
export type TypeName = Ident & { readonly __name: "type" };
export type LibName = Ident & { readonly __name: "lib" };
export type FieldName = Ident & { readonly __name: "field" };

const ALPHA = /^[A-Za-z]$/;
const IDENT_CHAR = /^[A-Za-z0-9_]$/;

/** Validates without throwing; returns the reason on failure. */
export function checkIdent(value: string): InvalidIdentError | null {
  if (value.length === 0) {
    return new InvalidIdentError("identifier name must not be empty", "empty", value);
  }
  if (value.length > LIMITS.identLength) {
    return new InvalidIdentError(
      `identifier name '${value}' is longer than ${LIMITS.identLength} characters`,
      "too-long",
      value,
    );
  }
  for (const ch of value) {
    if (ch.charCodeAt(0) > 0x7f) {
      return new InvalidIdentError(`identifier name '${value}' contains non-ASCII character(s)`, "non-ascii", value);
    }
  }
  const first = value.charAt(0);
  if (!ALPHA.test(first)) {
    return new InvalidIdentError(
      `identifier name must start with alphabetic character and not '${first}'`,
      "non-alphabetic",
      value,
    );
  }
  for (const ch of value) {
    if (!IDENT_CHAR.test(ch)) {
      return new InvalidIdentError(`identifier name contains invalid character '${ch}'`, "invalid-char", value);
    }
  }
  return null;
}

export function isIdent(value: string): value is Ident {
  return checkIdent(value) === null;
}

/** Validates and brands an identifier; throws `InvalidIdentError`. */
export function ident(value: string): Ident {
  const error = checkIdent(value);
  if (error) throw error;
  return value as Ident;
}

export function typeName(value: string): TypeName {
  return ident(value) as TypeName;
}

export function libName(value: string): LibName {
  return ident(value) as LibName;
}

/** Field names also name enum and union variants. */
export function fieldName(value: string): FieldName {
  return ident(value) as FieldName;
}

export function isTypeName(value: string): value is TypeName {
  return isIdent(value);
}

export function isFieldName(value: string): value is FieldName {
  return isIdent(value);
}

// =============================================================================
// Fully qualified names
// =============================================================================

/** `lib.name`; provenance only, never part of a compiled identity. */
export interface TypeFqn {
  readonly lib: LibName;
  readonly name: TypeName;
}

export function typeFqn(lib: LibName, name: TypeName): TypeFqn {
  return { lib, name };
}

export function parseTypeFqn(value: string): TypeFqn {
  const dot = value.indexOf(".");
  if (dot < 0) {
    throw new InvalidIdentError(`invalid fully qualified type name '${value}'`, "invalid-char", value);
  }
  return { lib: libName(value.slice(0, dot)), name: typeName(value.slice(dot + 1)) };
}

export function formatTypeFqn(fqn: TypeFqn): string {
  return `${fqn.lib}.${fqn.name}`;
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
