/**
 * Meta description corrector.
 *
 * Order of operations: make sure the focus keyword is present, then fix
 * the length. Trimming can leave the text short again, in which case it
 * is expanded once more.
 */

import type { Content } from "../content/schema.js";
import { capitalize, containsIgnoreCase } from "../content/text.js";
import { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";

const ARTICLE_PATTERN = /^(The|A|An)\s+/i;

const FILLERS = [" Get the information you need to make informed decisions.", " Learn more here."];

function expansionPhrases(keyword: string): string[] {
  return [
    ` Learn more about ${keyword} and how it can benefit you.`,
    ` Discover everything you need to know about ${keyword}.`,
    " Get expert insights and practical tips.",
    " Find comprehensive information and guidance.",
    " Explore detailed explanations and examples.",
    " Access valuable resources and recommendations.",
  ];
}

/**
 * Sentences with their closing punctuation kept.
 */
export function splitMetaSentences(text: string): string[] {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence.length > 0);
}

export function insertKeyword(meta: string, keyword: string): string {
  if (meta.trim().length === 0) {
    return `${capitalize(keyword)} - comprehensive guide and information.`;
  }

  const [first, ...rest] = splitMetaSentences(meta);
  const article = ARTICLE_PATTERN.exec(first);
  const lead = article
    ? `${article[1]} ${keyword} ${first.slice(article[0].length)}`
    : `${capitalize(keyword)}: ${first}`;
  return [lead, ...rest].join(" ");
}

export function expandDescription(meta: string, keyword: string, min: number, max: number): string {
  let result = meta;
  const needed = min - result.length;
  if (needed <= 0) return result;
  if (needed <= 5) return result + ".".repeat(needed);

  for (const phrase of expansionPhrases(keyword)) {
    if (result.length >= min) break;
    if ((result + phrase).length <= max) result += phrase;
  }

  while (result.length < min) {
    const remaining = min - result.length;
    const filler = FILLERS.find((candidate) => (result + candidate).length <= max);
    if (remaining <= 5 || filler === undefined) {
      result += ".".repeat(remaining);
      break;
    }
    result += filler;
  }

  return result;
}

function wordsWithin(text: string, limit: number): string {
  let kept = "";
  for (const word of text.split(" ")) {
    const candidate = kept ? `${kept} ${word}` : word;
    if (candidate.length > limit) break;
    kept = candidate;
  }
  return kept;
}

export function trimDescription(meta: string, keyword: string, max: number): string {
  if (meta.length <= max) return meta;

  let bySentence = "";
  for (const sentence of splitMetaSentences(meta)) {
    const candidate = bySentence ? `${bySentence} ${sentence}` : sentence;
    if (candidate.length > max) break;
    bySentence = candidate;
  }
  if (bySentence && containsIgnoreCase(bySentence, keyword)) return bySentence;

  let cut = wordsWithin(meta, max - 3);
  if (!containsIgnoreCase(cut, keyword)) {
    const position = meta.toLowerCase().indexOf(keyword.trim().toLowerCase());
    if (position !== -1) {
      const start = Math.max(0, position - 50);
      let window = meta.slice(start);
      if (start > 0) {
        const firstSpace = window.indexOf(" ");
        if (firstSpace !== -1) window = window.slice(firstSpace + 1);
      }
      cut = wordsWithin(window, max - 3);
    }
  }

  const result = `${cut.replace(/[ .,;:]+$/, "")}...`;
  return result.length <= max ? result : `${meta.slice(0, max - 3)}...`;
}

export class MetaDescriptionCorrector implements Corrector {
  readonly aspect = "meta_description" as const;

  correct(
    content: Content,
    focusKeyword: string,
    _secondaryKeywords: readonly string[],
    options: CorrectorOptions
  ): CorrectionResult {
    const { minMetaDescLength: min, maxMetaDescLength: max } = options.thresholds;
    const changes: string[] = [];
    let meta = content.metaDescription;

    if (!containsIgnoreCase(meta, focusKeyword)) {
      meta = insertKeyword(meta, focusKeyword);
      changes.push("Added focus keyword to meta description");
    }

    if (meta.length < min) {
      const before = meta.length;
      meta = expandDescription(meta, focusKeyword, min, max);
      changes.push(`Extended meta description from ${before} to ${meta.length} characters`);
    } else if (meta.length > max) {
      const before = meta.length;
      meta = trimDescription(meta, focusKeyword, max);
      changes.push(`Trimmed meta description from ${before} to ${meta.length} characters`);

      if (meta.length < min) {
        const trimmed = meta.length;
        meta = expandDescription(meta, focusKeyword, min, max);
        changes.push(`Re-extended meta description after trimming from ${trimmed} to ${meta.length} characters`);
      }
    }

    if (meta === content.metaDescription) {
      return unchanged("Meta description needs no correction");
    }
    return { ok: true, content: { ...content, metaDescription: meta }, changes };
  }
}
