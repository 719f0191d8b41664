/**
 * Domain enumerations for the optimization engine.
 *
 * These are the closed vocabularies shared by detection, the pipeline,
 * retry strategies and reporting. Each is a zod enum so configuration
 * files and content records are validated against the same definitions
 * the code narrows on.
 */

import { z } from "zod";

/**
 * Issue severity. Scales the penalty an issue contributes to the
 * compliance score (critical 3, major 2, minor 1).
 */
export const Severity = z.enum(["critical", "major", "minor"]);
export type Severity = z.infer<typeof Severity>;

/**
 * Every issue the detector can emit.
 */
export const IssueType = z.enum([
  "keyword_density_low",
  "keyword_density_high",
  "meta_description_short",
  "meta_description_long",
  "meta_description_no_keyword",
  "passive_voice_high",
  "sentence_length_high",
  "transition_words_low",
  "title_too_long",
  "title_no_keyword",
  "subheading_keyword_overuse",
  "no_images",
  "alt_text_no_keyword",
]);
export type IssueType = z.infer<typeof IssueType>;

/**
 * Aspects validated and corrected by the pipeline, in default order.
 * Also the component tag carried by pipeline errors and warnings.
 */
export const Aspect = z.enum([
  "meta_description",
  "keyword_density",
  "readability",
  "title",
  "images",
]);
export type Aspect = z.infer<typeof Aspect>;

/**
 * Why an optimization session stopped.
 */
export const TerminationReason = z.enum([
  "initial_compliance",
  "compliance_achieved",
  "max_iterations_reached",
  "stagnation_detected",
  "insufficient_improvement",
  "critical_error",
]);
export type TerminationReason = z.infer<typeof TerminationReason>;

/**
 * Validation cache tiers. Each has its own default TTL.
 */
export const CacheTier = z.enum([
  "validation",
  "metrics",
  "keywords",
  "readability",
  "title_unique",
]);
export type CacheTier = z.infer<typeof CacheTier>;

/**
 * Error taxonomy used by the error handler.
 */
export const ErrorCategory = z.enum([
  "critical",
  "recoverable",
  "degraded",
  "informational",
]);
export type ErrorCategory = z.infer<typeof ErrorCategory>;

/**
 * Graceful degradation levels, by sub-operation success ratio.
 */
export const DegradationLevel = z.enum(["minor", "moderate", "severe"]);
export type DegradationLevel = z.infer<typeof DegradationLevel>;
