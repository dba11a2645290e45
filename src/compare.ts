// String ordering for StringList#sort

/**
 * Compare two strings by Unicode code point, which orders the same way as a
 * byte-wise comparison of their UTF-8 encodings.
 *
 * The default `<` on strings compares UTF-16 code units, which puts astral
 * characters (stored as surrogate pairs starting at 0xD800) before BMP
 * characters in 0xE000-0xFFFF.
 */
export function compareStrings(a: string, b: string): -1 | 0 | 1 {
  if (a === b) return 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) {
      const ca = a.codePointAt(i) ?? 0;
      const cb = b.codePointAt(i) ?? 0;
      return ca < cb ? -1 : 1;
    }
  }

  return a.length < b.length ? -1 : 1;
}
