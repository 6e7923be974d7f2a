/**
 * Display width of text in terminal cells.
 *
 * Widths are measured per grapheme cluster, so a base character and its
 * combining marks, or an emoji ZWJ sequence, count and cut as one unit.
 */

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Cells taken by a single code point: 0, 1 or 2. */
export function getCharWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0;

  if (code < 32) return 0;
  if (code < 127) return 1;

  // Zero-width: joiners, direction marks, variation selectors, combining marks
  if (
    (code >= 0x0300 && code <= 0x036f) ||
    (code >= 0x0483 && code <= 0x0489) ||
    (code >= 0x0591 && code <= 0x05bd) ||
    (code >= 0x1ab0 && code <= 0x1aff) ||
    (code >= 0x1dc0 && code <= 0x1dff) ||
    (code >= 0x200b && code <= 0x200f) ||
    (code >= 0x2028 && code <= 0x202f) ||
    (code >= 0x2060 && code <= 0x206f) ||
    (code >= 0x20d0 && code <= 0x20ff) ||
    (code >= 0xfe00 && code <= 0xfe0f) ||
    (code >= 0xfe20 && code <= 0xfe2f) ||
    code === 0xfeff ||
    (code >= 0xe0100 && code <= 0xe01ef)
  ) {
    return 0;
  }

  // Emoji with default emoji presentation. Gutter glyphs such as ●, ▲
  // and ⊚ stay narrow.
  if (
    (code >= 0x1f004 && code <= 0x1f0cf) ||
    (code >= 0x1f1e0 && code <= 0x1f1ff) ||
    (code >= 0x1f300 && code <= 0x1f9ff) ||
    (code >= 0x231a && code <= 0x231b) ||
    (code >= 0x23e9 && code <= 0x23f3) ||
    (code >= 0x23f8 && code <= 0x23fa) ||
    (code >= 0x26aa && code <= 0x26ab) ||
    (code >= 0x26bd && code <= 0x26be) ||
    (code >= 0x26c4 && code <= 0x26c5) ||
    code === 0x26ce ||
    code === 0x26d4 ||
    code === 0x26ea ||
    (code >= 0x26f2 && code <= 0x26f3) ||
    code === 0x26f5 ||
    code === 0x26fa ||
    code === 0x26fd ||
    code === 0x2705 ||
    code === 0x274c ||
    code === 0x274e ||
    (code >= 0x2753 && code <= 0x2755) ||
    code === 0x2757 ||
    (code >= 0x2b1b && code <= 0x2b1c) ||
    (code >= 0x2b50 && code <= 0x2b55)
  ) {
    return 2;
  }

  // CJK, Hangul and fullwidth forms
  if (
    (code >= 0x1100 && code <= 0x115f) ||
    (code >= 0x2e80 && code <= 0xa4cf) ||
    (code >= 0xac00 && code <= 0xd7a3) ||
    (code >= 0xf900 && code <= 0xfaff) ||
    (code >= 0xfe10 && code <= 0xfe1f) ||
    (code >= 0xfe30 && code <= 0xfe6f) ||
    (code >= 0xff00 && code <= 0xff60) ||
    (code >= 0xffe0 && code <= 0xffe6) ||
    (code >= 0x20000 && code <= 0x2ffff)
  ) {
    return 2;
  }

  return 1;
}

/** Cells taken by one grapheme cluster: its widest code point. */
export function getGraphemeWidth(grapheme: string): number {
  let width = 0;
  for (const char of grapheme) {
    width = Math.max(width, getCharWidth(char));
  }
  return width;
}

export function getDisplayWidth(text: string): number {
  let width = 0;
  for (const { segment } of segmenter.segment(text)) {
    width += getGraphemeWidth(segment);
  }
  return width;
}

/**
 * Cut `text` to at most `width` cells without splitting a grapheme, then
 * pad with spaces to exactly `width` cells. A wide grapheme that would
 * straddle the edge is dropped and its cell padded.
 */
export function fitToWidth(text: string, width: number): string {
  let result = '';
  let used = 0;
  for (const { segment } of segmenter.segment(text)) {
    const cells = getGraphemeWidth(segment);
    if (used + cells > width) break;
    result += segment;
    used += cells;
  }
  return result + ' '.repeat(width - used);
}
