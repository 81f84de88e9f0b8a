// [NOTE]: Library entry point; src/index.ts is the CLI

export { StringRef, npos } from './adt/string-ref';
export type { Needle, Ordering, Pattern, StringRefPair, StringRefSource } from './adt/string-ref';
export type { Char } from './adt/bytes';
export { StringRefMap } from './adt/string-ref-map';
export { compareRefs, concat, editDistance, eq, ge, gt, le, lt, ne } from './adt/operators';
export { isAlpha, isAlphanumeric, isDigit, isWhitespace, isWordBoundary } from './adt/char-class';
export type { CharPredicate } from './adt/char-class';
export { ContractViolationError, getContractPolicy, setContractPolicy } from './utils/contracts';
export type { ContractPolicy } from './utils/config';
