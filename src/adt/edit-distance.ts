import { toLowerAscii } from './bytes';

/**
 * Levenshtein distance between two byte ranges.
 * Keeps two rows of `rhs.length + 1` cells and swaps them per row of `lhs`.
 * With `caseSensitive` off, ASCII letters are folded while comparing; the
 * inputs are left untouched.
 */
export function levenshtein(lhs: Uint8Array, rhs: Uint8Array, caseSensitive = true): number {
  const len1 = lhs.length;
  const len2 = rhs.length;
  if (len1 === 0 || len2 === 0) {
    return len1 + len2;
  }

  const fold = caseSensitive ? (code: number) => code : toLowerAscii;
  let row = new Uint32Array(len2 + 1);
  let prev = new Uint32Array(len2 + 1);
  for (let j = 1; j <= len2; j++) {
    row[j] = j;
  }

  for (let i = 1; i <= len1; i++) {
    [row, prev] = [prev, row];
    row[0] = i;
    const left = fold(lhs[i - 1]);
    for (let j = 1; j <= len2; j++) {
      if (left === fold(rhs[j - 1])) {
        row[j] = prev[j - 1];
      } else {
        row[j] = Math.min(prev[j - 1], row[j - 1], prev[j]) + 1;
      }
    }
  }
  return row[len2];
}
