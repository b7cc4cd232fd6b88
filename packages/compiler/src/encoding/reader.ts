import { DecodeError } from "../shared/errors.js";

/** Cursor over canonical bytes; every read past the end is a `DecodeError`. */
export class StrictReader {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(): number {
    return this.take(1)[0] ?? 0;
  }

  u16(): number {
    const b = this.take(2);
    return (b[0] ?? 0) | ((b[1] ?? 0) << 8);
  }

  u24(): number {
    const b = this.take(3);
    return (b[0] ?? 0) | ((b[1] ?? 0) << 8) | ((b[2] ?? 0) << 16);
  }

  u32(): number {
    const b = this.take(4);
    return ((b[0] ?? 0) | ((b[1] ?? 0) << 8) | ((b[2] ?? 0) << 16)) + (b[3] ?? 0) * 0x100_0000;
  }

  bytes(length: number): Uint8Array {
    return Uint8Array.from(this.take(length));
  }

  ascii(): string {
    const length = this.u8();
    const raw = this.take(length);
    let out = "";
    for (const code of raw) {
      if (code > 0x7f) throw new DecodeError("non-ASCII byte in string", this.offset);
      out += String.fromCharCode(code);
    }
    return out;
  }

  /** Fails unless every byte was consumed. */
  end(): void {
    if (this.remaining !== 0) {
      throw new DecodeError(`${this.remaining} trailing byte(s)`, this.offset);
    }
  }

  fail(message: string): never {
    throw new DecodeError(message, this.offset);
  }

  private take(length: number): Uint8Array {
    if (this.offset + length > this.data.length) {
      throw new DecodeError(`unexpected end of data reading ${length} byte(s)`, this.offset);
    }
    const slice = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }
}
