/* =============================================================================
 * TEXTUAL ID ENCODING
 * -----------------------------------------------------------------------------
 *   urn:tessera:<hri>:<base58(payload || checksum)>#<mnemonic>
 *
 * The checksum is the first four bytes of SHA256(hri || payload), so a string
 * minted for one id kind never parses as another. The mnemonic is three words
 * picked by the first three checksum bytes.
 * ============================================================================= */

import { readFileSync } from "node:fs";
import bs58 from "bs58";
import { IdParseError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { sha256 } from "./hash.js";

export const URN_PREFIX = "urn:tessera:";
export const ID_LENGTH = 32;
const CHECKSUM_LENGTH = 4;

export type IdFormat =
  /** `urn:tessera:<hri>:<base58>#<mnemonic>` */
  | "full"
  /** `urn:tessera:<hri>:<base58>` */
  | "urn"
  /** `<base58>` */
  | "bare"
  /** `<word>-<word>-<word>` */
  | "mnemonic";

let words: readonly string[] | null = null;

function mnemonicWords(): readonly string[] {
  if (words) return words;
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../../data/mnemonic-words.json", import.meta.url), "utf8"),
  );
  if (!Array.isArray(raw) || raw.length !== 256 || !raw.every((w) => typeof w === "string")) {
    throw new Error("mnemonic word list must hold exactly 256 strings");
  }
  words = Object.freeze(raw.map(String));
  return words;
}

export function idChecksum(hri: string, payload: Uint8Array): Uint8Array {
  return sha256(new TextEncoder().encode(hri), payload).slice(0, CHECKSUM_LENGTH);
}

export function idMnemonic(hri: string, payload: Uint8Array): string {
  const checksum = idChecksum(hri, payload);
  const list = mnemonicWords();
  return [checksum[0], checksum[1], checksum[2]].map((b) => list[b ?? 0] ?? "").join("-");
}

export function encodeIdText(hri: string, payload: Uint8Array, format: IdFormat = "full"): string {
  if (format === "mnemonic") return idMnemonic(hri, payload);
  const body = new Uint8Array(payload.length + CHECKSUM_LENGTH);
  body.set(payload, 0);
  body.set(idChecksum(hri, payload), payload.length);
  const b58 = bs58.encode(body);
  switch (format) {
    case "bare":
      return b58;
    case "urn":
      return `${URN_PREFIX}${hri}:${b58}`;
    case "full":
      return `${URN_PREFIX}${hri}:${b58}#${idMnemonic(hri, payload)}`;
  }
}

/** Parses any non-mnemonic format back to the 32-byte payload. */
export function decodeIdText(hri: string, input: string): Uint8Array {
  let text = input.trim();
  if (text.startsWith("urn:")) {
    if (!text.startsWith(URN_PREFIX)) {
      throw new IdParseError(`id '${input}' does not start with '${URN_PREFIX}'`, "prefix", input);
    }
    text = text.slice(URN_PREFIX.length);
    const colon = text.indexOf(":");
    const found = colon < 0 ? "" : text.slice(0, colon);
    if (found !== hri) {
      throw new IdParseError(`id '${input}' has kind '${found}' where '${hri}' was expected`, "hri", input);
    }
    text = text.slice(colon + 1);
  }

  let mnemonic: string | null = null;
  const hash = text.indexOf("#");
  if (hash >= 0) {
    mnemonic = text.slice(hash + 1);
    text = text.slice(0, hash);
  }

  let body: Uint8Array;
  try {
    body = bs58.decode(text);
  } catch (cause) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    throw new IdParseError(`id '${input}' is not valid base58: ${detail}`, "base58", input);
  }
  if (body.length !== ID_LENGTH + CHECKSUM_LENGTH) {
    throw new IdParseError(
      `id '${input}' decodes to ${body.length} bytes, expected ${ID_LENGTH + CHECKSUM_LENGTH}`,
      "length",
      input,
    );
  }
  const payload = body.slice(0, ID_LENGTH);
  const checksum = body.slice(ID_LENGTH);
  const expected = idChecksum(hri, payload);
  if (!expected.every((b, i) => b === checksum[i])) {
    throw new IdParseError(`id '${input}' has an invalid checksum`, "checksum", input);
  }
  if (mnemonic !== null && mnemonic !== idMnemonic(hri, payload)) {
    throw new IdParseError(`id '${input}' has a mnemonic that does not match its payload`, "mnemonic", input);
  }
  debug.identity("parsed", { hri, mnemonic: mnemonic ?? null });
  return payload;
}
