/**
 * Validation result schema.
 *
 * Results are cached, so the shape is a zod schema and the cache decodes
 * every hit through it. Messages carry the component that raised them:
 * one of the five aspects, or `pipeline` for a run-level fault.
 */

import { z } from "zod";
import { Aspect } from "../config/engine/enums.js";
import { ContentSchema, type Content } from "../content/schema.js";

export const ContentMetricsSchema = z
  .object({
    wordCount: z.number(),
    sentenceCount: z.number(),
    keywordDensity: z.number(),
    keywordOccurrences: z.number(),
    metaDescriptionLength: z.number(),
    metaHasKeyword: z.boolean(),
    passiveVoicePercentage: z.number(),
    longSentencePercentage: z.number(),
    transitionWordPercentage: z.number(),
    titleLength: z.number(),
    titleHasKeyword: z.boolean(),
    subheadingCount: z.number(),
    subheadingKeywordPercentage: z.number(),
    imageCount: z.number(),
    properAltCount: z.number(),
  })
  .strict();

export type ContentMetricsRecord = z.infer<typeof ContentMetricsSchema>;

export const ValidationMessageSchema = z
  .object({
    message: z.string(),
    component: z.string(),
  })
  .strict();

export type ValidationMessage = z.infer<typeof ValidationMessageSchema>;

/**
 * Outcome of one aspect check: the verdict before any correction, and
 * the verdict after it when a correction changed the content.
 */
export const StepReportSchema = z
  .object({
    aspect: Aspect,
    isValid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    /** True when a corrector changed the content for this step */
    corrected: z.boolean(),
    changes: z.array(z.string()),
    /** Why the corrector left the content alone */
    note: z.string().optional(),
  })
  .strict();

export type StepReport = z.infer<typeof StepReportSchema>;

export const ValidationResultSchema = z
  .object({
    isValid: z.boolean(),
    errors: z.array(ValidationMessageSchema),
    warnings: z.array(ValidationMessageSchema),
    suggestions: z.array(ValidationMessageSchema),
    /** 0-100 */
    overallScore: z.number().min(0).max(100),
    correctedContent: ContentSchema,
    /** Aspects whose correction changed the content, in step order */
    correctionsMade: z.array(Aspect),
    metrics: ContentMetricsSchema,
    steps: z.array(StepReportSchema),
  })
  .strict();

export type ValidationResult = z.infer<typeof ValidationResultSchema>;

/** Penalty per remaining error */
export const ERROR_PENALTY = 20;

/** Penalty per remaining warning */
export const WARNING_PENALTY = 5;

export function scoreResult(errorCount: number, warningCount: number): number {
  return Math.max(0, 100 - ERROR_PENALTY * errorCount - WARNING_PENALTY * warningCount);
}

export function messagesFor(result: ValidationResult, component: string): ValidationMessage[] {
  return [...result.errors, ...result.warnings].filter((entry) => entry.component === component);
}

export function emptyMetrics(): ContentMetricsRecord {
  return {
    wordCount: 0,
    sentenceCount: 0,
    keywordDensity: 0,
    keywordOccurrences: 0,
    metaDescriptionLength: 0,
    metaHasKeyword: false,
    passiveVoicePercentage: 0,
    longSentencePercentage: 0,
    transitionWordPercentage: 0,
    titleLength: 0,
    titleHasKeyword: false,
    subheadingCount: 0,
    subheadingKeywordPercentage: 0,
    imageCount: 0,
    properAltCount: 0,
  };
}

/**
 * Result standing in for a run that faulted: a single error and the
 * content as it was.
 */
export function faultResult(
  content: Content,
  message: string,
  component: string,
  overallScore: number
): ValidationResult {
  return {
    isValid: false,
    errors: [{ message, component }],
    warnings: [],
    suggestions: [],
    overallScore,
    correctedContent: content,
    correctionsMade: [],
    metrics: emptyMetrics(),
    steps: [],
  };
}
