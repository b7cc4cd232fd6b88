import { ConfinementError } from "./errors.js";

// =============================================================================
// Limits
// =============================================================================

/** Hard ceilings shared by the codec, the compiler and the type system. */
export const LIMITS = Object.freeze({
  /** Members of one type system (u24 count, strictly below 2^24). */
  typeSystemTypes: 0xff_ffff,
  /** Canonical serialized size of one type system, in bytes. */
  typeSystemBytes: 0xff_ffff,
  /** Fields of a struct or tuple. */
  fields: 0xff,
  /** Variants of an enum or union. */
  variants: 0xff,
  /** Dependencies declared by one library. */
  libDependencies: 0xff,
  /** Entries (named and unnamed) of one library. */
  libTypes: 0xffff,
  /** Children of one layout node. */
  vesperChildren: 0xff,
  /** Identifier length. */
  identLength: 32,
  /** Libraries recorded as origin of one semantic type. */
  origins: 256,
});

export type LimitName = keyof typeof LIMITS;

/** Throws when `actual` is above the named limit. */
export function ensureWithin(limit: LimitName, actual: number, what: string): void {
  const max = LIMITS[limit];
  if (actual > max) {
    throw new ConfinementError(`${what}: ${actual} exceeds the limit of ${max}`, limit, max, actual);
  }
}

/** Throws when `value` is not an integer in `[min, max]`. */
export function ensureUint(value: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfinementError(`${what}: ${value} is outside ${min}..${max}`, what, max, value);
  }
}

// =============================================================================
// Confined ordered map
// =============================================================================

export interface ConfinedMapOptions<K, V> {
  /** Name used in error messages. */
  readonly name: string;
  readonly maxCount: number;
  /** Optional ceiling on the summed `sizeOf` of all entries. */
  readonly maxBytes?: number;
  readonly sizeOf?: (key: K, value: V) => number;
  /** Stable string key; iteration follows its ascending code-unit order. */
  readonly keyOf: (key: K) => string;
}

/**
 * Ordered map whose count (and optionally byte size) is bounded on every
 * insert. Iteration is always in ascending key order, independent of the
 * insertion order.
 */
export class ConfinedMap<K, V> {
  private readonly entriesByKey = new Map<string, { key: K; value: V; size: number }>();
  private sortedKeys: string[] | null = null;
  private totalBytes = 0;

  constructor(private readonly options: ConfinedMapOptions<K, V>) {}

  get size(): number {
    return this.entriesByKey.size;
  }

  get byteSize(): number {
    return this.totalBytes;
  }

  has(key: K): boolean {
    return this.entriesByKey.has(this.options.keyOf(key));
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(this.options.keyOf(key))?.value;
  }

  /**
   * Inserts or replaces an entry. Returns true when an existing entry was
   * replaced. Bounds are checked before the map is touched.
   */
  insert(key: K, value: V): boolean {
    const k = this.options.keyOf(key);
    const size = this.options.sizeOf?.(key, value) ?? 0;
    const previous = this.entriesByKey.get(k);
    const count = this.entriesByKey.size + (previous ? 0 : 1);
    if (count > this.options.maxCount) {
      throw new ConfinementError(
        `${this.options.name}: ${count} entries exceed the limit of ${this.options.maxCount}`,
        `${this.options.name}.count`,
        this.options.maxCount,
        count,
      );
    }
    const bytes = this.totalBytes - (previous?.size ?? 0) + size;
    const maxBytes = this.options.maxBytes;
    if (maxBytes !== undefined && bytes > maxBytes) {
      throw new ConfinementError(
        `${this.options.name}: ${bytes} bytes exceed the limit of ${maxBytes}`,
        `${this.options.name}.bytes`,
        maxBytes,
        bytes,
      );
    }
    this.entriesByKey.set(k, { key, value, size });
    this.totalBytes = bytes;
    if (!previous) this.sortedKeys = null;
    return previous !== undefined;
  }

  keys(): K[] {
    return this.ordered().map((e) => e.key);
  }

  values(): V[] {
    return this.ordered().map((e) => e.value);
  }

  entries(): [K, V][] {
    return this.ordered().map((e) => [e.key, e.value]);
  }

  private ordered(): { key: K; value: V }[] {
    if (!this.sortedKeys) {
      this.sortedKeys = [...this.entriesByKey.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
    const out: { key: K; value: V }[] = [];
    for (const k of this.sortedKeys) {
      const entry = this.entriesByKey.get(k);
      if (entry) out.push(entry);
    }
    return out;
  }
}
