/**
 * Keyword density corrector.
 *
 * Raising density appends short keyword sentences to the end of long
 * paragraphs, one at a time, until the minimum is met. Lowering it swaps
 * keyword occurrences in text nodes for generic references. Subheadings
 * that overuse the keyword are rewritten afterwards.
 */

import type { Content } from "../content/schema.js";
import { containsIgnoreCase, escapeRegExp, stripTags } from "../content/text.js";
import { calculateDensity, keywordList } from "../analysis/keyword-density.js";
import type { KeywordSet } from "../analysis/types.js";
import { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";

/** Below this many words an added keyword swings density too far */
export const MIN_WORDS_FOR_ADDITION = 50;

/** Paragraphs whose text is at most this long are left alone */
const MIN_PARAGRAPH_TEXT = 50;

const MAX_EDITS = 100;

const REPLACEMENTS = ["this solution", "this approach", "this method", "it", "this"];

const PARAGRAPH_PATTERN = /<p\b[^>]*>([\s\S]*?)<\/p>/gi;

function additionFor(keyword: string, index: number): string {
  const additions = [
    ` ${keyword}.`,
    ` More ${keyword}.`,
    ` ${keyword} info.`,
    ` About ${keyword}.`,
    ` ${keyword} tips.`,
  ];
  return additions[index % additions.length] ?? additions[0];
}

/**
 * End offsets (just before `</p>`) of paragraphs long enough to extend.
 */
function paragraphInsertionPoints(html: string): number[] {
  return [...html.matchAll(PARAGRAPH_PATTERN)]
    .filter((match) => stripTags(match[1] ?? "").length > MIN_PARAGRAPH_TEXT)
    .map((match) => (match.index ?? 0) + match[0].length - "</p>".length);
}

export function increaseDensity(
  html: string,
  keywords: KeywordSet,
  minDensity: number,
  maxDensity: number
): { body: string; added: number } {
  const terms = keywordList(keywords);
  let body = html;
  let added = 0;

  while (added < MAX_EDITS && calculateDensity(body, keywords).density < minDensity) {
    const points = paragraphInsertionPoints(body);
    if (points.length === 0) break;

    const point = points[added % points.length] ?? points[0];
    const term = terms[added % terms.length] ?? keywords.focusKeyword;
    const candidate = body.slice(0, point) + additionFor(term, added) + body.slice(point);
    if (calculateDensity(candidate, keywords).density > maxDensity) break;

    body = candidate;
    added++;
  }

  return { body, added };
}

/**
 * Replace the first occurrence of `keyword` that sits in a text node.
 */
function replaceInText(html: string, keyword: string, replacement: string): string | undefined {
  const pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i");
  const segments = html.split(/(<[^>]*>)/);
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i] ?? "";
    if (segment.startsWith("<")) continue;
    if (pattern.test(segment)) {
      segments[i] = segment.replace(pattern, replacement);
      return segments.join("");
    }
  }
  return undefined;
}

export function reduceDensity(
  html: string,
  keywords: KeywordSet,
  maxDensity: number
): { body: string; removed: number } {
  let body = html;
  let removed = 0;

  while (removed < MAX_EDITS && calculateDensity(body, keywords).density > maxDensity) {
    const replacement = REPLACEMENTS[removed % REPLACEMENTS.length] ?? "this";
    let next: string | undefined;
    for (const term of keywordList(keywords)) {
      next = replaceInText(body, term, replacement);
      if (next !== undefined) break;
    }
    if (next === undefined) break;

    body = next;
    removed++;
  }

  return { body, removed };
}

/**
 * Swap the keyword out of headings, in order, until the share of
 * headings that carry it is at most `maxPercentage`.
 */
export function rewriteSubheadings(
  html: string,
  focusKeyword: string,
  maxPercentage: number
): { body: string; rewritten: number } {
  const hasKeyword = (inner: string) => containsIgnoreCase(stripTags(inner), focusKeyword);
  const headings = [...html.matchAll(/<h([2-6])([^>]*)>([\s\S]*?)<\/h\1>/gi)];
  const total = headings.length;
  let withKeyword = headings.filter((match) => hasKeyword(match[3] ?? "")).length;

  let body = html;
  let rewritten = 0;
  for (const match of headings) {
    if (total === 0 || (withKeyword / total) * 100 <= maxPercentage) break;
    const inner = match[3] ?? "";
    if (!hasKeyword(inner)) continue;

    const generic = inner.replace(new RegExp(escapeRegExp(focusKeyword.trim()), "gi"), "this topic");
    const replaced = `<h${match[1]}${match[2]}>${generic}</h${match[1]}>`;
    body = body.replace(match[0], () => replaced);
    withKeyword--;
    rewritten++;
  }

  return { body, rewritten };
}

export class KeywordDensityCorrector implements Corrector {
  readonly aspect = "keyword_density" as const;

  correct(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[],
    options: CorrectorOptions
  ): CorrectionResult {
    const keywords: KeywordSet = { focusKeyword, secondaryKeywords };
    const { minKeywordDensity, maxKeywordDensity, maxSubheadingKeywordUsage } = options.thresholds;
    const initial = calculateDensity(content.body, keywords);
    const changes: string[] = [];
    let body = content.body;

    if (initial.density < minKeywordDensity) {
      if (initial.wordCount < MIN_WORDS_FOR_ADDITION) {
        return unchanged(
          `Content too short (${initial.wordCount} words) to add keywords without exceeding maximum density`
        );
      }
      const result = increaseDensity(body, keywords, minKeywordDensity, maxKeywordDensity);
      body = result.body;
      if (result.added > 0) {
        changes.push(`Added ${result.added} keyword variations to improve density`);
      }
    } else if (initial.density > maxKeywordDensity) {
      const result = reduceDensity(body, keywords, maxKeywordDensity);
      body = result.body;
      if (result.removed > 0) {
        changes.push(`Reduced ${result.removed} keyword instances to avoid over-optimization`);
      }
    }

    const headings = rewriteSubheadings(body, focusKeyword, maxSubheadingKeywordUsage);
    body = headings.body;
    if (headings.rewritten > 0) {
      changes.push(`Rewrote ${headings.rewritten} subheadings to reduce keyword over-optimization`);
    }

    if (body === content.body) {
      return unchanged("Keyword density could not be adjusted");
    }
    return { ok: true, content: { ...content, body }, changes };
  }
}
