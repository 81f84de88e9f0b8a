import { Pattern, StringRef } from './string-ref';

// [NOTE]: Free comparison helpers, all derived from equals()/compare()

// [!IMPORTANT]: A string operand is encoded with the other operand's encoding,
// so eq(a, b) === eq(b, a) and lt(a, b) === gt(b, a) for any views
function toRef(value: Pattern, other: Pattern): StringRef {
  if (typeof value !== 'string') {
    return value;
  }
  return new StringRef(value, undefined, typeof other === 'string' ? undefined : other.encoding);
}

export function eq(lhs: Pattern, rhs: Pattern): boolean {
  return toRef(lhs, rhs).equals(rhs);
}

export function ne(lhs: Pattern, rhs: Pattern): boolean {
  return !eq(lhs, rhs);
}

export function lt(lhs: Pattern, rhs: Pattern): boolean {
  return toRef(lhs, rhs).compare(rhs) < 0;
}

export function le(lhs: Pattern, rhs: Pattern): boolean {
  return toRef(lhs, rhs).compare(rhs) <= 0;
}

export function gt(lhs: Pattern, rhs: Pattern): boolean {
  return toRef(lhs, rhs).compare(rhs) > 0;
}

export function ge(lhs: Pattern, rhs: Pattern): boolean {
  return toRef(lhs, rhs).compare(rhs) >= 0;
}

// Usable as an Array#sort comparator
export function compareRefs(lhs: StringRef, rhs: StringRef): number {
  return lhs.compare(rhs);
}

export function editDistance(lhs: Pattern, rhs: Pattern, caseSensitive = true): number {
  return toRef(lhs, rhs).editDistance(rhs, caseSensitive);
}

// [NOTE]: Appends the view's text to an owned string
export function concat(text: string, ref: StringRef): string {
  return text + ref.toString();
}
