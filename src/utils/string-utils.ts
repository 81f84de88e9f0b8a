// [NOTE]: Text helpers built on StringRef, used by the CLI commands

import { isWordBoundary } from '../adt/char-class';
import { Pattern, StringRef, npos } from '../adt/string-ref';

const NEWLINE = 0x0a;

export interface LineColumn {
  line: number;    // 1-based
  column: number;  // 1-based, in bytes
}

// [NOTE]: Outside the text counts as a boundary
function isBoundaryAt(text: StringRef, index: number): boolean {
  if (index < 0 || index >= text.length) {
    return true;
  }
  return isWordBoundary(text.charAt(index));
}

export function isWholeWordAt(text: StringRef, index: number, length: number): boolean {
  return isBoundaryAt(text, index - 1) && isBoundaryAt(text, index + length);
}

/**
 * First index ≥ start where `word` appears as a complete word
 * (not as part of another word), npos if none.
 */
export function findWholeWord(text: StringRef, word: Pattern, start = 0): number {
  const needle = typeof word === 'string' ? new StringRef(word, undefined, text.encoding) : word;
  if (needle.empty()) {
    return npos;
  }

  let index = text.find(needle, start);
  while (index !== npos) {
    if (isWholeWordAt(text, index, needle.length)) {
      return index;
    }
    index = text.find(needle, index + 1);
  }
  return npos;
}

export function countWholeWords(text: StringRef, word: Pattern): number {
  let count = 0;
  let index = findWholeWord(text, word);
  while (index !== npos) {
    count++;
    index = findWholeWord(text, word, index + 1);
  }
  return count;
}

/**
 * Lines of `text` as views into it. "\r\n" endings are accepted and a
 * trailing newline does not open an extra empty line.
 */
export function splitLines(text: StringRef): StringRef[] {
  const lines: StringRef[] = [];
  let rest = text;
  while (!rest.empty()) {
    const [line, after] = rest.split(NEWLINE);
    lines.push(line.endsWith('\r') ? line.dropBack() : line);
    rest = after;
  }
  return lines;
}

export function lineColumnAt(text: StringRef, index: number): LineColumn {
  const before = text.takeFront(index);
  const lastBreak = before.rfind(NEWLINE);
  return {
    line: before.countChar(NEWLINE) + 1,
    column: lastBreak === npos ? before.length + 1 : before.length - lastBreak,
  };
}
