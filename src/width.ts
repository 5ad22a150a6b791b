/**
 * Terminal column width of Unicode code points.
 *
 * Controls and combining marks take no columns, East Asian wide blocks and
 * the common emoji blocks take two, everything else takes one.
 */

export type CharWidth = 0 | 1 | 2;

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x11ff], // Hangul Jamo
  [0x2600, 0x26ff], // Miscellaneous Symbols
  [0x2700, 0x27bf], // Dingbats
  [0x2e80, 0x2eff], // CJK Radicals Supplement
  [0x2f00, 0x2fdf], // Kangxi Radicals
  [0x2ff0, 0x2fff], // Ideographic Description Characters
  [0x3000, 0x303f], // CJK Symbols and Punctuation
  [0x3040, 0x30ff], // Hiragana, Katakana
  [0x3130, 0x318f], // Hangul Compatibility Jamo
  [0x3200, 0x32ff], // Enclosed CJK Letters and Months
  [0x3300, 0x33ff], // CJK Compatibility
  [0x3400, 0x4dbf], // CJK Extension A
  [0x4e00, 0x9fff], // CJK Unified Ideographs
  [0xa960, 0xa97f], // Hangul Jamo Extended-A
  [0xac00, 0xd7af], // Hangul Syllables
  [0xd7b0, 0xd7ff], // Hangul Jamo Extended-B
  [0xf900, 0xfaff], // CJK Compatibility Ideographs
  [0xfe30, 0xfe4f], // CJK Compatibility Forms
  [0xff01, 0xff60], // Fullwidth Forms
  [0xffe0, 0xffe6], // Fullwidth Signs
  [0x1f300, 0x1f9ff], // Emoji and pictographs
  [0x20000, 0x2a6df], // CJK Extension B
  [0x2a700, 0x2ebef], // CJK Extensions C to F
];

const MARK = /^\p{M}$/u;

export function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export function charWidth(codePoint: number): CharWidth {
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint <= 0x9f)) {
    return 0;
  }
  if (codePoint < 0x300) {
    return 1;
  }
  if (MARK.test(String.fromCodePoint(codePoint))) {
    return 0;
  }
  for (const [from, to] of WIDE_RANGES) {
    if (codePoint < from) {
      break;
    }
    if (codePoint <= to) {
      return 2;
    }
  }
  return 1;
}

/** Sum of column widths, iterating by code point. */
export function stringWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    width += charWidth(ch.codePointAt(0) ?? 0);
  }
  return width;
}

/**
 * Per-unit widths for a UTF-16 string. A surrogate pair stores `0` on its
 * high unit and the pair's width on its low unit, so summing any slice that
 * does not split a pair gives its display width.
 */
export function unitWidths(text: string, target: Uint8Array, offset: number): number {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (isHighSurrogate(code) && i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1))) {
      const width = charWidth(text.codePointAt(i) ?? code);
      target[offset + i] = 0;
      target[offset + i + 1] = width;
      total += width;
      i++;
      continue;
    }
    const width = charWidth(code);
    target[offset + i] = width;
    total += width;
  }
  return total;
}
