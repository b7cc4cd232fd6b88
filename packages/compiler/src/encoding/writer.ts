import { ensureUint } from "../shared/confined.js";

/**
 * Append-only little-endian writer for the canonical encoding. Every value
 * has exactly one byte form; widths are fixed by the caller, never inferred.
 */
export class StrictWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  get byteLength(): number {
    return this.length;
  }

  u8(value: number): this {
    ensureUint(value, 0, 0xff, "u8");
    return this.push(Uint8Array.of(value));
  }

  u16(value: number): this {
    ensureUint(value, 0, 0xffff, "u16");
    return this.push(Uint8Array.of(value & 0xff, value >>> 8));
  }

  u24(value: number): this {
    ensureUint(value, 0, 0xff_ffff, "u24");
    return this.push(Uint8Array.of(value & 0xff, (value >>> 8) & 0xff, value >>> 16));
  }

  u32(value: number): this {
    ensureUint(value, 0, 0xffff_ffff, "u32");
    return this.push(
      Uint8Array.of(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff),
    );
  }

  bytes(value: Uint8Array): this {
    return this.push(Uint8Array.from(value));
  }

  /** u8 length prefix followed by the ASCII bytes. */
  ascii(value: string): this {
    ensureUint(value.length, 0, 0xff, "string length");
    this.u8(value.length);
    const out = new Uint8Array(value.length);
    for (let i = 0; i < value.length; i++) {
      const code = value.charCodeAt(i);
      ensureUint(code, 0, 0x7f, "ASCII character");
      out[i] = code;
    }
    return this.push(out);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    this.chunks = [out];
    return Uint8Array.from(out);
  }

  private push(chunk: Uint8Array): this {
    this.chunks.push(chunk);
    this.length += chunk.length;
    return this;
  }
}
