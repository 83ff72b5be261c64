/**
 * packages/core/src/layout/textMeasure.ts — Terminal cell width of text.
 *
 * Width rules:
 *   - ASCII printable: 1 cell
 *   - ASCII control: 0 cells
 *   - East Asian Wide/Fullwidth and emoji presentation: 2 cells
 *   - Combining marks, ZWJ and variation selectors: 0 cells (merge with base)
 *
 * Graphemes are split with Intl.Segmenter; a grapheme's width is the width of
 * its first non-zero-width scalar, or 2 when it is an emoji sequence.
 */

/** Inclusive [start, end] ranges of wide (2-cell) scalars. */
const WIDE_RANGES: readonly (readonly [number, number])[] = [
  [0x1100, 0x115f], // Hangul Jamo initials
  [0x231a, 0x231b],
  [0x2329, 0x232a],
  [0x23e9, 0x23ec],
  [0x23f0, 0x23f0],
  [0x23f3, 0x23f3],
  [0x25fd, 0x25fe],
  [0x2614, 0x2615],
  [0x2648, 0x2653],
  [0x267f, 0x267f],
  [0x2693, 0x2693],
  [0x26a1, 0x26a1],
  [0x26aa, 0x26ab],
  [0x26bd, 0x26be],
  [0x26c4, 0x26c5],
  [0x26ce, 0x26ce],
  [0x26d4, 0x26d4],
  [0x26ea, 0x26ea],
  [0x26f2, 0x26f3],
  [0x26f5, 0x26f5],
  [0x26fa, 0x26fa],
  [0x26fd, 0x26fd],
  [0x2705, 0x2705],
  [0x270a, 0x270b],
  [0x2728, 0x2728],
  [0x274c, 0x274c],
  [0x274e, 0x274e],
  [0x2753, 0x2755],
  [0x2757, 0x2757],
  [0x2795, 0x2797],
  [0x27b0, 0x27b0],
  [0x27bf, 0x27bf],
  [0x2b1b, 0x2b1c],
  [0x2b50, 0x2b50],
  [0x2b55, 0x2b55],
  [0x2e80, 0x303e], // CJK radicals, punctuation
  [0x3041, 0x33ff], // Kana, CJK symbols
  [0x3400, 0x4dbf], // CJK Extension A
  [0x4e00, 0x9fff], // CJK Unified Ideographs
  [0xa000, 0xa4cf], // Yi
  [0xa960, 0xa97f],
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility ideographs
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x16fe0, 0x16fe4],
  [0x17000, 0x18cff], // Tangut
  [0x1b000, 0x1b2ff], // Kana supplement
  [0x1f004, 0x1f004],
  [0x1f0cf, 0x1f0cf],
  [0x1f18e, 0x1f18e],
  [0x1f191, 0x1f19a],
  [0x1f200, 0x1f251],
  [0x1f300, 0x1f64f], // Misc symbols and pictographs, emoticons
  [0x1f680, 0x1f6ff], // Transport and map
  [0x1f7e0, 0x1f7eb],
  [0x1f90c, 0x1f9ff], // Supplemental symbols and pictographs
  [0x1fa70, 0x1faff],
  [0x20000, 0x2fffd], // CJK Extension B..F
  [0x30000, 0x3fffd],
];

const ZERO_WIDTH_RE = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const VARIATION_SELECTOR_16 = 0xfe0f;
const ZWJ = 0x200d;

let segmenter: Intl.Segmenter | null = null;

function getSegmenter(): Intl.Segmenter {
  if (segmenter === null) segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });
  return segmenter;
}

function isAsciiControl(scalar: number): boolean {
  return scalar < 0x20 || scalar === 0x7f;
}

/** Whether a scalar falls in a wide range (binary search). */
export function isWideScalar(scalar: number): boolean {
  let lo = 0;
  let hi = WIDE_RANGES.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const range = WIDE_RANGES[mid];
    if (range === undefined) return false;
    if (scalar < range[0]) hi = mid - 1;
    else if (scalar > range[1]) lo = mid + 1;
    else return true;
  }
  return false;
}

function scalarWidth(scalar: number, char: string): 0 | 1 | 2 {
  if (isAsciiControl(scalar)) return 0;
  if (scalar < 0x7f) return 1;
  if (scalar >= 0x80 && scalar < 0xa0) return 0;
  if (ZERO_WIDTH_RE.test(char)) return 0;
  return isWideScalar(scalar) ? 2 : 1;
}

/** Cell width (0, 1 or 2) of a single grapheme cluster. */
export function graphemeWidth(grapheme: string): 0 | 1 | 2 {
  let width: 0 | 1 | 2 = 0;
  let scalars = 0;
  for (const ch of grapheme) {
    const scalar = ch.codePointAt(0) ?? 0;
    scalars++;
    // Emoji presentation selector or ZWJ sequence widens the cluster.
    if (scalars > 1 && (scalar === VARIATION_SELECTOR_16 || scalar === ZWJ)) return 2;
    if (width === 0) width = scalarWidth(scalar, ch);
  }
  return width;
}

/** Split text into grapheme clusters. */
export function splitGraphemes(text: string): string[] {
  if (text.length === 0) return [];
  const out: string[] = [];
  for (const seg of getSegmenter().segment(text)) out.push(seg.segment);
  return out;
}

/* ========== Text Measurement Cache ========== */

/** Maximum number of cached text measurements before eviction. */
const TEXT_CACHE_MAX_SIZE = 4096;
/** Maximum string length eligible for caching. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();

function evictOldestTextWidthCacheEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}

/** Total cell width of a string. */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  let total = 0;
  for (const g of splitGraphemes(text)) total += graphemeWidth(g);

  if (cacheable) {
    if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) evictOldestTextWidthCacheEntry();
    textWidthCache.set(text, total);
  }
  return total;
}

/**
 * Truncate text to at most maxWidth cells, ending with "…" when cut.
 */
export function truncateWithEllipsis(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth === 1) return "…";

  let out = "";
  let used = 0;
  for (const g of splitGraphemes(text)) {
    const w = graphemeWidth(g);
    if (used + w > maxWidth - 1) break;
    out += g;
    used += w;
  }
  return `${out}…`;
}
