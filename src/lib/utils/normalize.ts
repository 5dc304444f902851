/**
 * TEXT NORMALIZATION UTILITIES
 *
 * Single source of truth for how extracted text is made comparable.
 * Segment equality is exact string equality, so this must stay deterministic.
 */

/**
 * Whitespace-free normalization used for segment comparison.
 * Removes every whitespace character, not just runs of them:
 * spaces, tabs, newlines, vertical tabs, no-break and ideographic spaces.
 *
 * @example normalizeSegment("Revenue grew　 10%") => "Revenuegrew10%"
 */
export function normalizeSegment(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(/[\s\u001c-\u001f\u0085]+/gu, "");
}

/**
 * Line-ending normalization for extracted text blocks.
 * Keeps content intact, only unifies CRLF / CR into LF.
 */
export function normalizeLineEndings(text: string): string {
  return (text ?? "").replace(/\r\n?/g, "\n");
}
