/**
 * Known titles and similarity scoring.
 *
 * A title is not unique when it scores at or above the threshold against
 * any registered title. Similarity is a weighted blend of edit distance,
 * shared words and shared character bigrams over normalized titles.
 */

import { hashValue } from "../content/hash.js";
import { roundTo } from "../content/text.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

const STOP_WORDS = new Set(["the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with", "by"]);

const WEIGHTS = { edit: 0.3, words: 0.4, bigrams: 0.3 } as const;

export interface KnownTitle {
  id: string;
  title: string;
}

export interface SimilarTitle extends KnownTitle {
  similarity: number;
}

/**
 * Lower-cased, stop words and punctuation removed, single-spaced.
 */
export function normalizeTitle(title: string): string {
  const words = title
    .toLowerCase()
    .split(" ")
    .map((word) => word.trim())
    .filter((word) => word.length > 0 && !STOP_WORDS.has(word));
  return words
    .join(" ")
    .replace(/[^\w\s]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

function jaccard(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 && right.size === 0) return 1;
  if (left.size === 0 || right.size === 0) return 0;
  const shared = [...left].filter((item) => right.has(item)).length;
  return shared / new Set([...left, ...right]).size;
}

function bigrams(text: string): Set<string> {
  const grams = new Set<string>();
  for (let i = 0; i + 2 <= text.length; i++) {
    grams.add(text.slice(i, i + 2));
  }
  return grams;
}

function words(text: string): Set<string> {
  return new Set(text.split(" ").filter((word) => word.length > 0));
}

/**
 * Similarity in [0, 1], three decimals. Titles equal after
 * normalization score 1.
 */
export function titleSimilarity(first: string, second: string): number {
  const a = normalizeTitle(first);
  const b = normalizeTitle(second);
  if (a === b) return 1;

  const longest = Math.max(a.length, b.length);
  const edit = longest === 0 ? 1 : 1 - levenshtein(a, b) / longest;

  return roundTo(
    edit * WEIGHTS.edit + jaccard(words(a), words(b)) * WEIGHTS.words + jaccard(bigrams(a), bigrams(b)) * WEIGHTS.bigrams,
    3
  );
}

export interface TitleRegistryOptions {
  titles?: readonly KnownTitle[];
  threshold?: number;
}

export class TitleRegistry {
  private readonly titles = new Map<string, string>();
  readonly threshold: number;

  constructor(options: TitleRegistryOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    for (const { id, title } of options.titles ?? []) {
      this.titles.set(id, title);
    }
  }

  register(id: string, title: string): void {
    this.titles.set(id, title);
  }

  remove(id: string): boolean {
    return this.titles.delete(id);
  }

  list(): KnownTitle[] {
    return [...this.titles].map(([id, title]) => ({ id, title }));
  }

  /**
   * Changes whenever the registered titles change. Part of every cache
   * key that depends on uniqueness.
   */
  fingerprint(): string {
    return hashValue({ threshold: this.threshold, titles: this.list() });
  }

  /**
   * Registered titles at or above the threshold, most similar first.
   */
  findSimilar(title: string, excludeId?: string): SimilarTitle[] {
    return this.list()
      .filter((known) => known.id !== excludeId)
      .map((known) => ({ ...known, similarity: titleSimilarity(title, known.title) }))
      .filter((known) => known.similarity >= this.threshold)
      .sort((a, b) => b.similarity - a.similarity);
  }

  isUnique(title: string, excludeId?: string): boolean {
    return this.findSimilar(title, excludeId).length === 0;
  }
}
