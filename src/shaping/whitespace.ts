const WHITESPACE = /^\s$/u;

/** True for code points that never produce ink */
export function isWhitespace(codePoint: number): boolean {
  return WHITESPACE.test(String.fromCodePoint(codePoint));
}
