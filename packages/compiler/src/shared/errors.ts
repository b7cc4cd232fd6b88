/* =============================================================================
 * ERRORS
 * -----------------------------------------------------------------------------
 * Thrown errors are reserved for malformed external input (ids, bytes, armor)
 * and for invariant violations inside the engine. Problems in declared
 * libraries are reported as diagnostics instead (see diagnostics/).
 * ============================================================================= */

/** Error codes */
export const TesseraErrorCode = {
  CONFINEMENT: "TESSERA_CONFINEMENT",
  INVALID_IDENT: "TESSERA_INVALID_IDENT",
  DECODE: "TESSERA_DECODE",
  ID_PARSE: "TESSERA_ID_PARSE",
  COLLISION: "TESSERA_COLLISION",
  INCONSISTENCY: "TESSERA_INCONSISTENCY",
  LAYOUT: "TESSERA_LAYOUT",
} as const;

export type TesseraErrorCodeType = (typeof TesseraErrorCode)[keyof typeof TesseraErrorCode];

export class TesseraError extends Error {
  constructor(
    message: string,
    public readonly code: TesseraErrorCodeType,
  ) {
    super(message);
    this.name = "TesseraError";
  }
}

/** A confined collection or value would leave its bounds. */
export class ConfinementError extends TesseraError {
  constructor(
    message: string,
    public readonly limit: string,
    public readonly max: number,
    public readonly actual: number,
  ) {
    super(message, TesseraErrorCode.CONFINEMENT);
    this.name = "ConfinementError";
  }
}

export type InvalidIdentReason = "empty" | "too-long" | "non-ascii" | "non-alphabetic" | "invalid-char";

export class InvalidIdentError extends TesseraError {
  constructor(
    message: string,
    public readonly reason: InvalidIdentReason,
    public readonly value: string,
  ) {
    super(message, TesseraErrorCode.INVALID_IDENT);
    this.name = "InvalidIdentError";
  }
}

export class DecodeError extends TesseraError {
  constructor(
    message: string,
    public readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`, TesseraErrorCode.DECODE);
    this.name = "DecodeError";
  }
}

export type IdParseReason = "prefix" | "hri" | "base58" | "length" | "checksum" | "mnemonic";

export class IdParseError extends TesseraError {
  constructor(
    message: string,
    public readonly reason: IdParseReason,
    public readonly input: string,
  ) {
    super(message, TesseraErrorCode.ID_PARSE);
    this.name = "IdParseError";
  }
}

/** Two imported entries share an id but disagree on structure. */
export class CollisionError extends TesseraError {
  constructor(
    message: string,
    public readonly id: string,
  ) {
    super(message, TesseraErrorCode.COLLISION);
    this.name = "CollisionError";
  }
}

/** An engine invariant does not hold; never caused by user input. */
export class InconsistencyError extends TesseraError {
  constructor(message: string) {
    super(message, TesseraErrorCode.INCONSISTENCY);
    this.name = "InconsistencyError";
  }
}

export type LayoutErrorReason =
  | "layout/zero-items"
  | "layout/invalid-depth"
  | "layout/skipped-level"
  | "layout/too-many-children"
  | "layout/duplicate-root";

export class LayoutError extends TesseraError {
  constructor(
    message: string,
    public readonly reason: LayoutErrorReason,
    public readonly index: number,
  ) {
    super(message, TesseraErrorCode.LAYOUT);
    this.name = "LayoutError";
  }
}
