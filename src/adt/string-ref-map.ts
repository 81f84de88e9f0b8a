import { Pattern, StringRef } from './string-ref';

/**
 * Map keyed by view contents rather than identity.
 * Entries are bucketed by `StringRef#hash` and resolved with `equals`.
 * Keys are stored as given: a key view must outlive its entry like any other view.
 * String keys are encoded with `encoding`; give the map the encoding of its
 * view keys so that `map.get(text)` agrees with `key.equals(text)`.
 */
export class StringRefMap<V> implements Iterable<[StringRef, V]> {
  private readonly buckets = new Map<number, Array<[StringRef, V]>>();
  private count = 0;
  readonly encoding: BufferEncoding;

  constructor(entries?: Iterable<readonly [Pattern, V]>, encoding: BufferEncoding = 'utf8') {
    this.encoding = encoding;
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.count;
  }

  get(key: Pattern): V | undefined {
    return this.entry(this.toRef(key))?.[1];
  }

  has(key: Pattern): boolean {
    return this.entry(this.toRef(key)) !== undefined;
  }

  set(key: Pattern, value: V): this {
    const ref = this.toRef(key);
    const existing = this.entry(ref);
    if (existing) {
      existing[1] = value;
      return this;
    }
    const hash = ref.hash();
    const bucket = this.buckets.get(hash);
    if (bucket) {
      bucket.push([ref, value]);
    } else {
      this.buckets.set(hash, [[ref, value]]);
    }
    this.count++;
    return this;
  }

  delete(key: Pattern): boolean {
    const ref = this.toRef(key);
    const hash = ref.hash();
    const bucket = this.buckets.get(hash);
    if (!bucket) {
      return false;
    }
    const index = bucket.findIndex(([k]) => k.equals(ref));
    if (index < 0) {
      return false;
    }
    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(hash);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *entries(): IterableIterator<[StringRef, V]> {
    for (const bucket of this.buckets.values()) {
      for (const [key, value] of bucket) {
        yield [key, value];
      }
    }
  }

  *keys(): IterableIterator<StringRef> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<[StringRef, V]> {
    return this.entries();
  }

  private entry(ref: StringRef): [StringRef, V] | undefined {
    return this.buckets.get(ref.hash())?.find(([k]) => k.equals(ref));
  }

  private toRef(key: Pattern): StringRef {
    return typeof key === 'string' ? new StringRef(key, undefined, this.encoding) : key;
  }
}
