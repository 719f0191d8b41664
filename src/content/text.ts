/**
 * Plain-text helpers shared by analyzers and correctors.
 *
 * All heuristics operate on tag-stripped text. Tags are replaced by a
 * space so adjacent block elements do not glue their words together.
 */

const WORD_PATTERN = /[A-Za-z]+(?:['’-][A-Za-z]+)*/g;

/**
 * Remove markup, script and style blocks; collapse whitespace.
 */
export function stripTags(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, " ")
    .replace(/<[^>]*>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Alphabetic word tokens. Apostrophes and hyphens inside a word are kept.
 */
export function extractWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

export function countWords(text: string): number {
  return extractWords(text).length;
}

/**
 * Split on runs of sentence terminators. Fragments are trimmed and
 * empty fragments dropped.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Case-insensitive, non-overlapping substring count.
 */
export function countOccurrences(haystack: string, needle: string): number {
  const target = needle.trim().toLowerCase();
  if (target.length === 0) return 0;

  const source = haystack.toLowerCase();
  let count = 0;
  let from = 0;
  for (;;) {
    const index = source.indexOf(target, from);
    if (index === -1) return count;
    count++;
    from = index + target.length;
  }
}

export function containsIgnoreCase(haystack: string, needle: string): boolean {
  const target = needle.trim().toLowerCase();
  return target.length > 0 && haystack.toLowerCase().includes(target);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Cut at the last space before `limit`, or hard-cut when there is none.
 */
export function truncateAtWord(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const slice = text.slice(0, limit);
  const lastSpace = slice.lastIndexOf(" ");
  return (lastSpace > 0 ? slice.slice(0, lastSpace) : slice).trimEnd();
}

export function capitalize(text: string): string {
  return text.length > 0 ? text[0].toUpperCase() + text.slice(1) : text;
}

/**
 * Lower-case the first letter unless the word looks like an acronym or "I".
 */
export function lowercaseFirst(text: string): string {
  if (text.length === 0 || /^I\b/.test(text) || /^[A-Z]{2}/.test(text)) return text;
  return text[0].toLowerCase() + text.slice(1);
}

export function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map(capitalize)
    .join(" ");
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
