/**
 * Clean-Text Filter
 * Charset-ratio heuristic that rejects text made mostly of characters outside
 * English and Japanese scripts (mojibake, binary payloads, other alphabets).
 */

export const DEFAULT_MAX_INVALID_RATIO = 0.1;

// Printable ASCII, common whitespace, Hiragana, Katakana, CJK ideographs,
// half-width and full-width forms
const VALID_CHAR = /[ -~\n\r\t\u3040-\u309F\u30A0-\u30FF\u4E00-\u9FFF\uFF00-\uFFEF]/gu;

/**
 * Fraction of characters (code points) outside the allowed set
 */
export function invalidCharRatio(text: string): number {
  const total = Array.from(text).length;
  if (total === 0) {
    return 1;
  }
  const valid = text.match(VALID_CHAR)?.length ?? 0;
  return (total - valid) / total;
}

export function isCleanText(text: string, maxInvalidRatio: number = DEFAULT_MAX_INVALID_RATIO): boolean {
  if (!text) {
    return false;
  }
  return invalidCharRatio(text) <= maxInvalidRatio;
}

/**
 * Collapse whitespace runs to single spaces and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
