/**
 * Case-insensitive, ordered, multi-value header container.
 *
 * Keys are lower-cased on the way in and on lookup. Repeated keys keep every
 * value in insertion order; nothing is overwritten.
 */

/** Attach capability handed to handlers that only ever write headers. */
export interface HeaderSink {
  append(key: string, value: string): void;
}

export function canonicalKey(key: string): string {
  return key.trim().toLowerCase();
}

export class HeaderSet implements HeaderSink {
  private readonly entriesByKey = new Map<string, string[]>();

  static from(record: Record<string, string | string[]>): HeaderSet {
    const set = new HeaderSet();
    for (const [key, value] of Object.entries(record)) {
      for (const v of Array.isArray(value) ? value : [value]) set.append(key, v);
    }
    return set;
  }

  append(key: string, value: string): void {
    const k = canonicalKey(key);
    if (!k) return;
    const values = this.entriesByKey.get(k);
    if (values) values.push(value);
    else this.entriesByKey.set(k, [value]);
  }

  /** Appends every value of `other`, key by key, after the values already held. */
  appendAll(other: HeaderSet): void {
    for (const [key, value] of other.entries()) this.append(key, value);
  }

  get(key: string): string[] {
    return [...(this.entriesByKey.get(canonicalKey(key)) ?? [])];
  }

  has(key: string): boolean {
    return this.entriesByKey.has(canonicalKey(key));
  }

  delete(key: string): boolean {
    return this.entriesByKey.delete(canonicalKey(key));
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  keys(): string[] {
    return [...this.entriesByKey.keys()];
  }

  /** Flattened `[key, value]` pairs, keys in first-insertion order. */
  *entries(): IterableIterator<[string, string]> {
    for (const [key, values] of this.entriesByKey) {
      for (const value of values) yield [key, value];
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  isEmpty(): boolean {
    return this.entriesByKey.size === 0;
  }

  clone(): HeaderSet {
    const copy = new HeaderSet();
    copy.appendAll(this);
    return copy;
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [key, values] of this.entriesByKey) record[key] = [...values];
    return record;
  }
}
