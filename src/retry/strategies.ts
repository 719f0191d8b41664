/**
 * Correction strategies applied between retry attempts.
 *
 * A strategy is a small tagged record. Failure messages are matched
 * against a pattern table to choose one; each later attempt makes its
 * parameters more aggressive. Application reuses the corrector helpers
 * so a strategy edits content exactly the way the pipeline would.
 */

import { z } from "zod";
import type { Aspect } from "../config/engine/enums.js";
import type { Content } from "../content/schema.js";
import { clamp } from "../content/text.js";
import { calculateDensity } from "../analysis/keyword-density.js";
import type { KeywordSet } from "../analysis/types.js";
import { expandDescription, trimDescription } from "../correction/meta-description.js";
import { increaseDensity, reduceDensity } from "../correction/keyword-density.js";
import { addTransitions, fixPassiveVoice, splitLongSentences } from "../correction/readability.js";
import { shortenTitle } from "../correction/title.js";
import { defaultImagePrompt } from "../correction/images.js";
import type { CorrectorOptions } from "../correction/types.js";

export const CorrectionStrategySchema = z.discriminatedUnion("name", [
  z
    .object({
      name: z.literal("adjust_meta_length"),
      targetLength: z.number().int().min(1),
      /** Appended once before any generic expansion */
      extensionText: z.string().optional(),
    })
    .strict(),
  z
    .object({
      name: z.literal("reduce_keyword_density"),
      /** Share of the current density to remove, 0-1 */
      reductionPercentage: z.number().min(0).max(1),
    })
    .strict(),
  z
    .object({
      name: z.literal("increase_keyword_density"),
      increaseCount: z.number().int().min(1),
    })
    .strict(),
  z
    .object({
      name: z.literal("improve_readability"),
      reducePassiveVoice: z.boolean(),
      splitLongSentences: z.boolean(),
      addTransitions: z.boolean(),
    })
    .strict(),
  z
    .object({
      name: z.literal("shorten_title"),
      maxLength: z.number().int().min(1),
    })
    .strict(),
  z
    .object({
      name: z.literal("add_images"),
      count: z.number().int().min(1),
    })
    .strict(),
]);

export type CorrectionStrategy = z.infer<typeof CorrectionStrategySchema>;
export type StrategyName = CorrectionStrategy["name"];

/** What a failure message is about */
export type FailureClass = Aspect | "unknown";

// ═══════════════════════════════════════════════════════════════════════════
// SELECTION
// ═══════════════════════════════════════════════════════════════════════════

export interface FailurePattern {
  pattern: RegExp;
  strategy: CorrectionStrategy;
}

/**
 * Checked in order; the first match wins.
 */
export const FAILURE_PATTERNS: readonly FailurePattern[] = [
  {
    pattern: /meta description.*too short/i,
    strategy: { name: "adjust_meta_length", targetLength: 140, extensionText: " Learn more." },
  },
  { pattern: /meta description.*too long/i, strategy: { name: "adjust_meta_length", targetLength: 150 } },
  { pattern: /keyword density.*too high/i, strategy: { name: "reduce_keyword_density", reductionPercentage: 0.3 } },
  { pattern: /keyword density.*too low/i, strategy: { name: "increase_keyword_density", increaseCount: 2 } },
  {
    pattern: /passive voice/i,
    strategy: { name: "improve_readability", reducePassiveVoice: true, splitLongSentences: false, addTransitions: false },
  },
  {
    pattern: /long sentences/i,
    strategy: { name: "improve_readability", reducePassiveVoice: false, splitLongSentences: true, addTransitions: false },
  },
  {
    pattern: /transition words/i,
    strategy: { name: "improve_readability", reducePassiveVoice: false, splitLongSentences: false, addTransitions: true },
  },
  { pattern: /title.*too long/i, strategy: { name: "shorten_title", maxLength: 60 } },
  { pattern: /image/i, strategy: { name: "add_images", count: 1 } },
];

const FALLBACKS: Readonly<Record<Aspect, CorrectionStrategy>> = {
  meta_description: { name: "adjust_meta_length", targetLength: 140 },
  keyword_density: { name: "reduce_keyword_density", reductionPercentage: 0.2 },
  readability: {
    name: "improve_readability",
    reducePassiveVoice: false,
    splitLongSentences: true,
    addTransitions: true,
  },
  title: { name: "shorten_title", maxLength: 60 },
  images: { name: "add_images", count: 1 },
};

export function classifyFailure(message: string): FailureClass {
  const lower = message.toLowerCase();
  if (lower.includes("meta description")) return "meta_description";
  if (lower.includes("keyword density")) return "keyword_density";
  if (/readability|passive voice|long sentences|transition words/.test(lower)) return "readability";
  if (lower.includes("title")) return "title";
  if (lower.includes("image")) return "images";
  return "unknown";
}

/**
 * More aggressive parameters for later attempts (attempt is 1-based).
 */
export function adaptStrategy(strategy: CorrectionStrategy, attempt: number): CorrectionStrategy {
  const step = attempt - 1;
  switch (strategy.name) {
    case "adjust_meta_length":
      return { ...strategy, targetLength: strategy.targetLength + step * 5 };
    case "reduce_keyword_density":
      return { ...strategy, reductionPercentage: Math.min(0.8, strategy.reductionPercentage + step * 0.1) };
    case "increase_keyword_density":
      return { ...strategy, increaseCount: strategy.increaseCount + step };
    default:
      return strategy;
  }
}

export function matchFailurePattern(message: string, attempt: number): CorrectionStrategy | undefined {
  const match = FAILURE_PATTERNS.find(({ pattern }) => pattern.test(message));
  return match ? adaptStrategy(match.strategy, attempt) : undefined;
}

export function fallbackStrategy(failure: FailureClass, attempt: number): CorrectionStrategy | undefined {
  return failure === "unknown" ? undefined : adaptStrategy(FALLBACKS[failure], attempt);
}

// ═══════════════════════════════════════════════════════════════════════════
// APPLICATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Apply a strategy to a content value. Always returns a new value, which
 * equals the input when the strategy had nothing to do.
 */
export function applyStrategy(
  content: Content,
  strategy: CorrectionStrategy,
  keywords: KeywordSet,
  options: CorrectorOptions
): Content {
  const { thresholds } = options;
  const keyword = keywords.focusKeyword;

  switch (strategy.name) {
    case "adjust_meta_length": {
      const target = clamp(strategy.targetLength, thresholds.minMetaDescLength, thresholds.maxMetaDescLength);
      let meta = content.metaDescription;
      if (meta.length < target) {
        if (strategy.extensionText && (meta + strategy.extensionText).length <= thresholds.maxMetaDescLength) {
          meta += strategy.extensionText;
        }
        meta = expandDescription(meta, keyword, target, thresholds.maxMetaDescLength);
      } else if (meta.length > thresholds.maxMetaDescLength) {
        meta = trimDescription(meta, keyword, target);
      }
      return { ...content, metaDescription: meta };
    }

    case "reduce_keyword_density": {
      const { density } = calculateDensity(content.body, keywords);
      const target = density * (1 - strategy.reductionPercentage);
      return { ...content, body: reduceDensity(content.body, keywords, target).body };
    }

    case "increase_keyword_density": {
      const { wordCount, occurrences } = calculateDensity(content.body, keywords);
      if (wordCount === 0) return { ...content };
      const target = ((occurrences + strategy.increaseCount) / wordCount) * 100;
      const { body } = increaseDensity(content.body, keywords, target, thresholds.maxKeywordDensity);
      return { ...content, body };
    }

    case "improve_readability": {
      let body = content.body;
      if (strategy.reducePassiveVoice) body = fixPassiveVoice(body).body;
      if (strategy.splitLongSentences) body = splitLongSentences(body).body;
      if (strategy.addTransitions) {
        body = addTransitions(body, thresholds.minTransitionWords, options.random).body;
      }
      return { ...content, body };
    }

    case "shorten_title": {
      const max = Math.min(strategy.maxLength, thresholds.maxTitleLength);
      const year = new Date(options.now()).getUTCFullYear();
      return { ...content, title: shortenTitle(content.title, keyword, max, year) };
    }

    case "add_images": {
      const added = Array.from({ length: strategy.count }, () => defaultImagePrompt(content.title, keyword));
      return { ...content, imagePrompts: [...content.imagePrompts, ...added] };
    }
  }
}

export function describeStrategy(strategy: CorrectionStrategy): string {
  switch (strategy.name) {
    case "adjust_meta_length":
      return `adjust_meta_length(target ${strategy.targetLength})`;
    case "reduce_keyword_density":
      return `reduce_keyword_density(${strategy.reductionPercentage.toFixed(1)})`;
    case "increase_keyword_density":
      return `increase_keyword_density(+${strategy.increaseCount})`;
    case "improve_readability": {
      const parts = [
        strategy.reducePassiveVoice ? "passive" : "",
        strategy.splitLongSentences ? "split" : "",
        strategy.addTransitions ? "transitions" : "",
      ].filter((part) => part.length > 0);
      return `improve_readability(${parts.join(", ")})`;
    }
    case "shorten_title":
      return `shorten_title(${strategy.maxLength})`;
    case "add_images":
      return `add_images(${strategy.count})`;
  }
}
