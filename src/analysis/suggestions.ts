import * as fs from 'fs';
import { StringRef } from '../adt/string-ref';
import { StringRefMap } from '../adt/string-ref-map';
import { compareRefs } from '../adt/operators';
import { splitLines } from '../utils/string-utils';

export interface SuggestOptions {
  maxDistance: number;
  maxResults: number;
  caseSensitive: boolean;
}

export interface Suggestion {
  candidate: StringRef;
  distance: number;
}

/**
 * Ranks candidates by edit distance to `word` ("did you mean").
 * Candidates are trimmed, blanks and duplicates are skipped, and ties are
 * broken by byte order.
 */
export function suggest(word: StringRef, candidates: Iterable<StringRef>, options: SuggestOptions): Suggestion[] {
  const distances = new StringRefMap<number>(undefined, word.encoding);

  for (const raw of candidates) {
    const candidate = raw.trim();
    if (candidate.empty() || distances.has(candidate)) {
      continue;
    }
    const distance = word.editDistance(candidate, options.caseSensitive);
    if (distance <= options.maxDistance) {
      distances.set(candidate, distance);
    }
  }

  return Array.from(distances, ([candidate, distance]) => ({ candidate, distance }))
    .sort((a, b) => a.distance - b.distance || compareRefs(a.candidate, b.candidate))
    .slice(0, options.maxResults);
}

// [NOTE]: One candidate per line; the lines view the file buffer without copying it
export function readWordList(file: string, encoding: BufferEncoding = 'utf8'): StringRef[] {
  const buffer = fs.readFileSync(file);
  return splitLines(new StringRef(buffer, undefined, encoding));
}
