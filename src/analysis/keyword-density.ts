/**
 * Keyword density: occurrences of the focus keyword and every secondary
 * keyword, as a percentage of the word count of the stripped body.
 */

import { countOccurrences, countWords, roundTo, stripTags } from "../content/text.js";
import type { Analyzer, KeywordDensityMetrics, KeywordSet } from "./types.js";

export function keywordList(keywords: KeywordSet): string[] {
  return [keywords.focusKeyword, ...keywords.secondaryKeywords]
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}

export function calculateDensity(html: string, keywords: KeywordSet): KeywordDensityMetrics {
  const text = stripTags(html);
  const wordCount = countWords(text);

  const perKeyword: Record<string, number> = {};
  let occurrences = 0;
  for (const keyword of keywordList(keywords)) {
    const count = countOccurrences(text, keyword);
    perKeyword[keyword] = (perKeyword[keyword] ?? 0) + count;
    occurrences += count;
  }

  return {
    density: wordCount > 0 ? roundTo((occurrences / wordCount) * 100, 2) : 0,
    wordCount,
    occurrences,
    perKeyword,
  };
}

export class KeywordDensityAnalyzer implements Analyzer<string, KeywordDensityMetrics> {
  readonly name = "keyword_density";

  analyze(html: string, keywords: KeywordSet): KeywordDensityMetrics {
    return calculateDensity(html, keywords);
  }
}
