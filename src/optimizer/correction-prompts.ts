/**
 * Correction prompts.
 *
 * Turns the errors of a validation result into structured instructions,
 * one per error, grouped by aspect in the configured priority order. The
 * optimizer records them with each pass; whatever rewrites content from
 * instructions can consume them as they are.
 */

import type { Aspect } from "../config/engine/enums.js";
import type { PipelineConfig } from "../config/engine/schema.js";
import type { ValidationResult } from "../pipeline/result.js";

export type CorrectionType = `${Aspect}_correction`;

export interface CorrectionPrompt {
  type: CorrectionType;
  instruction: string;
  /** 1 is addressed first */
  priority: number;
  error: string;
  component: Aspect;
  focusKeyword: string;
  timestamp: string;
}

export type PromptThresholds = Pick<
  PipelineConfig,
  | "minMetaDescLength"
  | "maxMetaDescLength"
  | "minKeywordDensity"
  | "maxKeywordDensity"
  | "maxPassiveVoice"
  | "maxLongSentences"
  | "minTransitionWords"
  | "maxTitleLength"
>;

export interface PromptOptions {
  focusKeyword: string;
  priorityOrder: readonly Aspect[];
  thresholds: PromptThresholds;
  timestamp: string;
}

export function instructionFor(aspect: Aspect, focusKeyword: string, thresholds: PromptThresholds): string {
  switch (aspect) {
    case "meta_description":
      return `Fix meta description to be ${thresholds.minMetaDescLength}-${thresholds.maxMetaDescLength} characters and include '${focusKeyword}'`;
    case "keyword_density":
      return `Adjust keyword density for '${focusKeyword}' to be between ${thresholds.minKeywordDensity}-${thresholds.maxKeywordDensity}%`;
    case "readability":
      return (
        `Improve readability: reduce passive voice (<${thresholds.maxPassiveVoice}%), ` +
        `shorten long sentences (<${thresholds.maxLongSentences}%), ` +
        `add transition words (>${thresholds.minTransitionWords}%)`
      );
    case "title":
      return `Optimize title to include '${focusKeyword}' and be under ${thresholds.maxTitleLength} characters`;
    case "images":
      return `Add images with alt text containing '${focusKeyword}'`;
  }
}

/**
 * One prompt per error whose component is in the priority order. Errors
 * from other components (pipeline faults) get none.
 */
export function generateCorrectionPrompts(result: ValidationResult, options: PromptOptions): CorrectionPrompt[] {
  return options.priorityOrder.flatMap((component, index) =>
    result.errors
      .filter((error) => error.component === component)
      .map((error) => ({
        type: `${component}_correction` as const,
        instruction: instructionFor(component, options.focusKeyword, options.thresholds),
        priority: index + 1,
        error: error.message,
        component,
        focusKeyword: options.focusKeyword,
        timestamp: options.timestamp,
      }))
  );
}
