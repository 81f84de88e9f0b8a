import { check, panic } from '../utils/contracts';
import { Char, EMPTY_BYTES, asBuffer, fnv1a, memCompare, toByte } from './bytes';
import { CharPredicate, isWhitespace } from './char-class';
import { levenshtein } from './edit-distance';

/**
 * Sentinel index for "not found" and "unbounded count".
 * The largest integer a number holds exactly.
 */
export const npos = Number.MAX_SAFE_INTEGER;

export type StringRefSource = string | Uint8Array | StringRef;

// [NOTE]: Strings are encoded with the view's encoding before matching
export type Pattern = string | StringRef;

// [NOTE]: Numbers search for one byte, strings and views for a pattern
export type Needle = number | Pattern;

export type StringRefPair = [before: StringRef, after: StringRef];

export type Ordering = -1 | 0 | 1;

function checkIndex(value: number, name: string): void {
  check(Number.isInteger(value) && value >= 0, `${name} must be a non-negative integer, got ${value}`);
}

/**
 * Read-only view over a byte range it does not own.
 *
 * Slicing shares memory with the source, so a view stays valid only while
 * the bytes it points at stay unchanged. Characters are single bytes; no
 * operation reads past `length`.
 *
 * ```ts
 * const [key, value] = new StringRef('name=strref').split('=');
 * ```
 */
export class StringRef implements Iterable<string> {
  static readonly npos = npos;

  private readonly data: Buffer;
  readonly encoding: BufferEncoding;

  /**
   * - no source: empty view
   * - string: encoded once; `length` is clamped to the encoded size
   * - Uint8Array: borrowed as is; `length` must not exceed it
   * - StringRef: shares the other view's bytes
   *
   * null is rejected; use {@link StringRef.withNullAsEmpty} when the source may be missing.
   */
  constructor(source?: StringRefSource, length?: number, encoding?: BufferEncoding) {
    if (source === null) {
      panic('StringRef constructed from null; use StringRef.withNullAsEmpty()');
    }
    if (length !== undefined) {
      checkIndex(length, 'length');
    }

    if (source === undefined) {
      this.encoding = encoding ?? 'utf8';
      this.data = EMPTY_BYTES;
    } else if (source instanceof StringRef) {
      this.encoding = encoding ?? source.encoding;
      this.data = length === undefined ? source.data : source.data.subarray(0, length);
    } else if (typeof source === 'string') {
      this.encoding = encoding ?? 'utf8';
      const bytes = Buffer.from(source, this.encoding);
      this.data = length === undefined ? bytes : bytes.subarray(0, length);
    } else {
      this.encoding = encoding ?? 'utf8';
      const bytes = asBuffer(source);
      if (length !== undefined) {
        check(length <= bytes.length, `length ${length} exceeds the buffer size ${bytes.length}`);
      }
      this.data = length === undefined ? bytes : bytes.subarray(0, length);
    }
  }

  // [NOTE]: Null-tolerant entry point, null and undefined give an empty view
  static withNullAsEmpty(source: StringRefSource | null | undefined, encoding?: BufferEncoding): StringRef {
    return new StringRef(source ?? '', undefined, encoding);
  }

  static hash(ref: StringRef): number {
    return ref.hash();
  }

  get length(): number {
    return this.data.length;
  }

  size(): number {
    return this.data.length;
  }

  empty(): boolean {
    return this.data.length === 0;
  }

  // [NOTE]: The referenced window itself, no copy; read-only like the view
  bytes(): Readonly<Uint8Array> {
    return this.data;
  }

  // [NOTE]: Owned copies
  toString(): string {
    return this.data.toString(this.encoding);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.data);
  }

  toJSON(): string {
    return this.toString();
  }

  // [NOTE]: Writes the referenced bytes verbatim
  writeTo(sink: NodeJS.WritableStream): boolean {
    return sink.write(this.data);
  }

  // Derived from the bytes only, so equal views hash equally
  hash(): number {
    return fnv1a(this.data);
  }

  *[Symbol.iterator](): Iterator<string> {
    for (let i = 0; i < this.data.length; i++) {
      yield String.fromCharCode(this.data[i]);
    }
  }

  charAt(index: number): string {
    return String.fromCharCode(this.codeAt(index));
  }

  codeAt(index: number): number {
    check(Number.isInteger(index) && index >= 0 && index < this.length, 'Out of range: invalid index on the string.');
    return this.data[index];
  }

  front(): string {
    check(!this.empty(), 'front() was called on an empty instance.');
    return this.charAt(0);
  }

  back(): string {
    check(!this.empty(), 'back() was called on an empty instance.');
    return this.charAt(this.length - 1);
  }

  equals(other: Pattern): boolean {
    const rhs = this.toRef(other);
    return this.length === rhs.length && memCompare(this.data, rhs.data, this.length) === 0;
  }

  /**
   * Lexicographic over the shared prefix; on a tie the shorter view is less.
   */
  compare(other: Pattern): Ordering {
    const rhs = this.toRef(other);
    const comp = memCompare(this.data, rhs.data, Math.min(this.length, rhs.length));
    if (comp !== 0) {
      return comp;
    }
    if (this.length === rhs.length) {
      return 0;
    }
    return this.length < rhs.length ? -1 : 1;
  }

  startsWith(prefix: Pattern): boolean {
    const p = this.toRef(prefix);
    return p.length <= this.length && this.matchesAt(p, 0);
  }

  endsWith(suffix: Pattern): boolean {
    const p = this.toRef(suffix);
    return p.length <= this.length && this.matchesAt(p, this.length - p.length);
  }

  contains(needle: Needle): boolean {
    return this.find(needle) !== npos;
  }

  find(needle: Needle, start = 0): number {
    return typeof needle === 'number' ? this.findChar(needle, start) : this.findStr(needle, start);
  }

  rfind(needle: Needle, rstart = npos): number {
    return typeof needle === 'number' ? this.rfindChar(needle, rstart) : this.rfindStr(needle, rstart);
  }

  findChar(c: Char, start = 0): number {
    const code = toByte(c, this.encoding);
    return this.scanForward((b) => b === code, start);
  }

  rfindChar(c: Char, rstart = npos): number {
    const code = toByte(c, this.encoding);
    return this.scanBackward((b) => b === code, rstart);
  }

  // [NOTE]: An empty pattern matches at 0 whatever the start
  findStr(pattern: Pattern, start = 0): number {
    checkIndex(start, 'start');
    const p = this.toRef(pattern);
    if (p.empty()) {
      return 0;
    }
    if (start >= this.length) {
      return npos;
    }
    const pos = this.data.indexOf(p.data, start);
    return pos < 0 ? npos : pos;
  }

  rfindStr(pattern: Pattern, rstart = npos): number {
    checkIndex(rstart, 'rstart');
    const p = this.toRef(pattern);
    if (p.empty()) {
      return 0;
    }
    if (p.length > this.length) {
      return npos;
    }
    const pos = this.data.lastIndexOf(p.data, Math.min(rstart, this.length - p.length));
    return pos < 0 ? npos : pos;
  }

  findIf(pred: CharPredicate, start = 0): number {
    return this.scanForward((b) => pred(String.fromCharCode(b), b), start);
  }

  findIfNot(pred: CharPredicate, start = 0): number {
    return this.findIf((ch, code) => !pred(ch, code), start);
  }

  rfindIf(pred: CharPredicate, rstart = npos): number {
    return this.scanBackward((b) => pred(String.fromCharCode(b), b), rstart);
  }

  rfindIfNot(pred: CharPredicate, rstart = npos): number {
    return this.rfindIf((ch, code) => !pred(ch, code), rstart);
  }

  countChar(c: Char): number {
    const code = toByte(c, this.encoding);
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === code) {
        count++;
      }
    }
    return count;
  }

  // [NOTE]: Overlapping matches count: "aa" occurs twice in "aaa"
  countStr(pattern: Pattern): number {
    const p = this.toRef(pattern);
    if (p.length > this.length) {
      return 0;
    }
    let count = 0;
    for (let i = 0, e = this.length - p.length + 1; i !== e; i++) {
      if (this.matchesAt(p, i)) {
        count++;
      }
    }
    return count;
  }

  /**
   * View over `[start, start + count)` intersected with `[0, length)`.
   */
  substr(start: number, count = npos): StringRef {
    checkIndex(start, 'start');
    checkIndex(count, 'count');
    const from = Math.min(start, this.length);
    return this.window(from, from + Math.min(count, this.length - from));
  }

  /**
   * View over `[start, end)` intersected with `[0, length)`.
   * The bounds are swapped first when `start > end`.
   */
  slice(start: number, end: number): StringRef {
    checkIndex(start, 'start');
    checkIndex(end, 'end');
    if (start > end) {
      [start, end] = [end, start];
    }
    const from = Math.min(start, this.length);
    return this.window(from, Math.min(end, this.length));
  }

  // take* clamp, drop* require the characters to exist

  takeFront(n = 1): StringRef {
    checkIndex(n, 'n');
    return this.window(0, Math.min(n, this.length));
  }

  takeBack(n = 1): StringRef {
    checkIndex(n, 'n');
    return n <= this.length ? this.dropFront(this.length - n) : this;
  }

  takeFrontWhile(pred: CharPredicate): StringRef {
    return this.substr(0, this.findIfNot(pred));
  }

  takeBackWhile(pred: CharPredicate): StringRef {
    const last = this.rfindIfNot(pred);
    return last === npos ? this : this.substr(last + 1);
  }

  dropFront(n = 1): StringRef {
    checkIndex(n, 'n');
    check(n <= this.length, 'Dropping more characters than exist.');
    return this.substr(n);
  }

  dropBack(n = 1): StringRef {
    checkIndex(n, 'n');
    check(n <= this.length, 'Dropping more characters than exist.');
    return this.substr(0, this.length - n);
  }

  dropFrontWhile(pred: CharPredicate): StringRef {
    return this.substr(this.findIfNot(pred));
  }

  dropBackWhile(pred: CharPredicate): StringRef {
    const last = this.rfindIfNot(pred);
    return last === npos ? this.window(0, 0) : this.substr(0, last + 1);
  }

  trim(pred: CharPredicate = isWhitespace): StringRef {
    return this.dropFrontWhile(pred).dropBackWhile(pred);
  }

  /**
   * Splits around the first `sep`, which belongs to neither half.
   * Without a match the result is `[this, empty]`.
   */
  split(sep: Needle): StringRefPair {
    return this.splitAt(this.find(sep), sep);
  }

  // [NOTE]: Same as split() around the last `sep`
  rsplit(sep: Needle): StringRefPair {
    return this.splitAt(this.rfind(sep), sep);
  }

  editDistance(rhs: Pattern, caseSensitive = true): number {
    return levenshtein(this.data, this.toRef(rhs).data, caseSensitive);
  }

  private splitAt(pos: number, sep: Needle): StringRefPair {
    if (pos === npos) {
      return [this, this.window(0, 0)];
    }
    const sepLength = typeof sep === 'number' ? 1 : this.toRef(sep).length;
    return [this.slice(0, pos), this.slice(pos + sepLength, this.length)];
  }

  private matchesAt(p: StringRef, index: number): boolean {
    return memCompare(this.data.subarray(index, index + p.length), p.data, p.length) === 0;
  }

  private scanForward(test: (code: number) => boolean, start: number): number {
    checkIndex(start, 'start');
    for (let i = start; i < this.data.length; i++) {
      if (test(this.data[i])) {
        return i;
      }
    }
    return npos;
  }

  // [NOTE]: Empty views return before `length - 1` is ever taken
  private scanBackward(test: (code: number) => boolean, rstart: number): number {
    checkIndex(rstart, 'rstart');
    if (this.data.length === 0) {
      return npos;
    }
    for (let i = Math.min(rstart, this.data.length - 1); i >= 0; i--) {
      if (test(this.data[i])) {
        return i;
      }
    }
    return npos;
  }

  private window(from: number, to: number): StringRef {
    return new StringRef(this.data.subarray(from, to), undefined, this.encoding);
  }

  private toRef(pattern: Pattern): StringRef {
    return typeof pattern === 'string' ? new StringRef(pattern, undefined, this.encoding) : pattern;
  }
}
