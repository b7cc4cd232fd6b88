import { createHash } from "node:crypto";

/**
 * Domain tags. One per id kind, so equal payloads hashed under different
 * kinds never produce the same id.
 */
export const ID_TAGS = Object.freeze({
  semId: "urn:tessera:strict-types:semid:v01",
  typeSys: "urn:tessera:strict-types:sys:v01",
  lib: "urn:tessera:strict-types:lib:v01",
  cycle: "urn:tessera:strict-types:cycle:v01",
});

export type IdTag = (typeof ID_TAGS)[keyof typeof ID_TAGS];

const tagHashes = new Map<string, Uint8Array>();

/** SHA-256 of the ASCII tag string, memoized per tag. */
export function tagHash(tag: string): Uint8Array {
  let hash = tagHashes.get(tag);
  if (!hash) {
    hash = sha256(new TextEncoder().encode(tag));
    tagHashes.set(tag, hash);
  }
  return hash;
}

export function sha256(...parts: readonly Uint8Array[]): Uint8Array {
  const hasher = createHash("sha256");
  for (const part of parts) hasher.update(part);
  return new Uint8Array(hasher.digest());
}

/** `SHA256(tagHash || tagHash || content)` */
export function taggedHash(tag: IdTag, content: Uint8Array): Uint8Array {
  const th = tagHash(tag);
  return sha256(th, th, content);
}
