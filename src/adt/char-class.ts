// [NOTE]: Byte classifiers shaped for findIf/takeFrontWhile and friends.
// Character codes are compared directly so no regex runs per byte.

// [NOTE]: `code` is the byte value; callers may pass just the character
export type CharPredicate = (ch: string, code: number) => boolean;

// 0-9: 48-57
export function isDigit(ch: string, code = ch.charCodeAt(0)): boolean {
  return code >= 48 && code <= 57;
}

// A-Z: 65-90, a-z: 97-122
export function isAlpha(ch: string, code = ch.charCodeAt(0)): boolean {
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}

export function isAlphanumeric(ch: string, code = ch.charCodeAt(0)): boolean {
  return isDigit(ch, code) || isAlpha(ch, code);
}

// space, \t, \n, \v, \f, \r
export function isWhitespace(ch: string, code = ch.charCodeAt(0)): boolean {
  return code === 32 || (code >= 9 && code <= 13);
}

export function isWordBoundary(ch: string, code = ch.charCodeAt(0)): boolean {
  return !isAlphanumeric(ch, code);
}
