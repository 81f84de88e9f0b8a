import { check } from '../utils/contracts';

// [NOTE]: A character is one byte: either its value or a string encoding to one byte
export type Char = string | number;

export const EMPTY_BYTES: Buffer = Buffer.alloc(0);

// [NOTE]: Shares memory with the input, never copies
export function asBuffer(bytes: Uint8Array): Buffer {
  if (Buffer.isBuffer(bytes)) {
    return bytes;
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Compares the first `length` bytes of both buffers.
 * Zero-length compares touch neither side.
 */
export function memCompare(lhs: Buffer, rhs: Buffer, length: number): -1 | 0 | 1 {
  if (length === 0) {
    return 0;
  }
  const comp = Buffer.compare(lhs.subarray(0, length), rhs.subarray(0, length));
  if (comp === 0) {
    return 0;
  }
  return comp < 0 ? -1 : 1;
}

// [NOTE]: Folds A-Z only, every other byte passes through
export function toLowerAscii(code: number): number {
  return code >= 65 && code <= 90 ? code | 0x20 : code;
}

export function toByte(c: Char, encoding: BufferEncoding = 'utf8'): number {
  if (typeof c === 'number') {
    check(Number.isInteger(c) && c >= 0 && c <= 0xff, `Not a single-byte character: ${c}`);
    return c;
  }
  const encoded = Buffer.from(c, encoding);
  check(encoded.length === 1, `Not a single-byte character: ${JSON.stringify(c)}`);
  return encoded[0];
}

// 32-bit FNV-1a
export function fnv1a(bytes: Uint8Array): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i];
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}
