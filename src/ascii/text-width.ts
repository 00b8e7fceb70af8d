// ============================================================================
// Terminal column widths
//
// Used in two places:
// - Series rejects any glyph whose width is not exactly 1, since every cell of
//   the plot body is one terminal column;
// - axis labels and status lines are padded by columns, not string.length.
//
// Only the blocks a glyph or a unit suffix is likely to come from are listed.
// Everything else counts as one column.
// ============================================================================

type CodePointRange = readonly [first: number, last: number]

/** Combining marks: drawn on top of the previous character. */
const ZERO_WIDTH: readonly CodePointRange[] = [
  [0x0300, 0x036F],
  [0x20D0, 0x20FF],
  [0xFE20, 0xFE2F],
]

/** East Asian wide and fullwidth blocks, plus pictographic emoji. */
const DOUBLE_WIDTH: readonly CodePointRange[] = [
  [0x1100, 0x115F],
  [0x2E80, 0xA4CF],
  [0xAC00, 0xD7A3],
  [0xF900, 0xFAFF],
  [0xFE30, 0xFE6F],
  [0xFF00, 0xFF60],
  [0xFFE0, 0xFFE6],
  [0x1F300, 0x1FAFF],
]

function inRanges(codePoint: number, ranges: readonly CodePointRange[]): boolean {
  return ranges.some(([first, last]) => codePoint >= first && codePoint <= last)
}

/** Columns taken by the first code point of `char`; control characters take none. */
export function charDisplayWidth(char: string): number {
  const codePoint = char.codePointAt(0)
  if (codePoint === undefined) return 0
  if (codePoint < 0x20 || (codePoint >= 0x7F && codePoint < 0xA0)) return 0
  if (inRanges(codePoint, ZERO_WIDTH)) return 0
  return inRanges(codePoint, DOUBLE_WIDTH) ? 2 : 1
}

export function textDisplayWidth(text: string): number {
  let width = 0
  for (const ch of text) width += charDisplayWidth(ch)
  return width
}

/** Left-align `text` in a field of `width` columns. Longer text is kept whole. */
export function padEndDisplay(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - textDisplayWidth(text)))
}

/** Right-align `text` in a field of `width` columns. Longer text is kept whole. */
export function padStartDisplay(text: string, width: number): string {
  return ' '.repeat(Math.max(0, width - textDisplayWidth(text))) + text
}
