/**
 * Title corrector.
 *
 * A title without the focus keyword gets it as a prefix when that fits,
 * otherwise a templated title. An overlong title loses filler words, then
 * long stock phrases, then is cut around the keyword.
 */

import type { Content } from "../content/schema.js";
import { containsIgnoreCase, escapeRegExp, titleCase } from "../content/text.js";
import { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";

export const TITLE_TEMPLATES: readonly [string, ...string[]] = [
  "How to {keyword} in {year}",
  "The Complete Guide to {keyword}",
  "{keyword}: A Step-by-Step Guide",
  "Master {keyword} with These Tips",
  "{keyword} for Beginners: Start Here",
  "Getting Started with {keyword}",
  "{keyword} Basics: What You Need to Know",
  "Why {keyword} Matters in {year}",
];

const FILLER_WORDS = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for",
  "of", "with", "by", "very", "really", "quite", "rather", "pretty",
]);

function phraseReplacements(year: number): Array<[string, string]> {
  return [
    ["Step-by-Step Guide", "Guide"],
    ["Complete Guide", "Guide"],
    ["Ultimate Guide", "Guide"],
    ["Comprehensive Guide", "Guide"],
    ["Everything You Need to Know", "Complete Guide"],
    ["A Beginner's Guide", "Beginner Guide"],
    ["for Beginners", "Basics"],
    [`in ${year}`, ""],
    ["Tips and Tricks", "Tips"],
    ["Best Practices", "Best Tips"],
  ];
}

function tidy(title: string): string {
  return title.replace(/\s+/g, " ").replace(/\s+([:,!?.])/g, "$1").trim();
}

export function fillTemplate(template: string, keyword: string, year: number): string {
  return template.replace(/\{keyword\}/g, titleCase(keyword)).replace(/\{year\}/g, String(year));
}

export function removeFillerWords(title: string, focusKeyword: string): string {
  const keywordWords = new Set(focusKeyword.toLowerCase().split(/\s+/));
  return title
    .split(" ")
    .filter((word) => {
      const bare = word.toLowerCase().replace(/^[.,!?:;]+|[.,!?:;]+$/g, "");
      return keywordWords.has(bare) || !FILLER_WORDS.has(bare);
    })
    .join(" ");
}

export function shortenPhrases(title: string, year: number): string {
  return tidy(
    phraseReplacements(year).reduce(
      (current, [long, short]) => current.replace(new RegExp(escapeRegExp(long), "gi"), short),
      title
    )
  );
}

/**
 * Cut to `max` characters keeping the keyword and up to 40% of the spare
 * room before it.
 */
export function truncatePreservingKeyword(title: string, focusKeyword: string, max: number): string {
  const position = title.toLowerCase().indexOf(focusKeyword.toLowerCase());
  if (position === -1) return title.slice(0, max).trim();

  const keyword = title.slice(position, position + focusKeyword.length);
  const available = Math.max(0, max - keyword.length);
  const before = title.slice(0, position);
  const after = title.slice(position + keyword.length);

  const beforeLength = Math.min(before.length, Math.floor(available * 0.4));
  const afterLength = Math.min(after.length, available - beforeLength);
  const keptBefore = beforeLength < before.length ? before.slice(before.length - beforeLength) : before;
  const keptAfter = afterLength < after.length ? after.slice(0, afterLength) : after;

  return (keptBefore + keyword + keptAfter).trim();
}

export function shortenTitle(title: string, focusKeyword: string, max: number, year: number): string {
  if (title.length <= max) return title;

  const withoutFiller = removeFillerWords(title, focusKeyword);
  if (withoutFiller.length <= max) return withoutFiller;

  const shorter = shortenPhrases(withoutFiller, year);
  if (shorter.length <= max) return shorter;

  return truncatePreservingKeyword(shorter, focusKeyword, max);
}

export class TitleCorrector implements Corrector {
  readonly aspect = "title" as const;

  correct(
    content: Content,
    focusKeyword: string,
    _secondaryKeywords: readonly string[],
    options: CorrectorOptions
  ): CorrectionResult {
    const max = options.thresholds.maxTitleLength;
    const year = new Date(options.now()).getUTCFullYear();
    const changes: string[] = [];
    let title = content.title.trim();

    if (!containsIgnoreCase(title, focusKeyword)) {
      const prefixed = title ? `${titleCase(focusKeyword)}: ${title}` : "";
      if (prefixed && prefixed.length <= max) {
        title = prefixed;
        changes.push("Prefixed title with focus keyword");
      } else {
        const start = options.random.int(TITLE_TEMPLATES.length);
        const rotated = [...TITLE_TEMPLATES.slice(start), ...TITLE_TEMPLATES.slice(0, start)];
        const candidates = rotated.map((template) => fillTemplate(template, focusKeyword, year));
        title = candidates.find((candidate) => candidate.length <= max) ?? candidates[0] ?? title;
        changes.push("Generated title containing focus keyword");
      }
    }

    if (title.length > max) {
      const before = title.length;
      title = shortenTitle(title, focusKeyword, max, year);
      changes.push(`Shortened title from ${before} to ${title.length} characters`);
    }

    if (title === content.title) {
      return unchanged("Title needs no correction");
    }
    return { ok: true, content: { ...content, title }, changes };
  }
}
