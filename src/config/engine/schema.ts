/**
 * Engine configuration schema definition.
 *
 * One strict section per component. A section is validated as a whole
 * after overrides are merged over the defaults, so cross-field rules
 * (min <= max) see the effective values rather than the partial input.
 *
 * Thresholds are percentages (0-100) unless the field name says length,
 * in which case they are character counts. Delays are in seconds.
 */

import { z } from "zod";
import { Aspect } from "./enums.js";

const percentage = () => z.number().min(0).max(100);
const characters = () => z.number().int().min(0);
const seconds = () => z.number().int().min(1);

/**
 * Threshold fields shared by the issue detector and the pipeline.
 */
const thresholdShape = {
  /** Lower bound for keyword density, as a percentage of words */
  minKeywordDensity: percentage().describe("Minimum keyword density (%)"),

  /** Upper bound for keyword density */
  maxKeywordDensity: percentage().describe("Maximum keyword density (%)"),

  minMetaDescLength: characters().describe("Minimum meta description length"),
  maxMetaDescLength: characters().describe("Maximum meta description length"),

  /** Share of sentences in passive voice */
  maxPassiveVoice: percentage().describe("Maximum passive voice sentences (%)"),

  /** Share of sentences longer than 20 words */
  maxLongSentences: percentage().describe("Maximum long sentences (%)"),

  /** Share of sentences that contain a transition word */
  minTransitionWords: percentage().describe("Minimum transition word sentences (%)"),

  maxTitleLength: z.number().int().min(1).describe("Maximum title length"),

  /** Share of h2-h6 headings containing the focus keyword */
  maxSubheadingKeywordUsage: percentage().describe(
    "Maximum subheadings containing the keyword (%)"
  ),

  requireImages: z.boolean().describe("Whether at least one image is required"),
  requireKeywordInAltText: z
    .boolean()
    .describe("Whether image alt text must include the focus keyword"),
};

type ThresholdRanges = {
  minKeywordDensity: number;
  maxKeywordDensity: number;
  minMetaDescLength: number;
  maxMetaDescLength: number;
};

function checkThresholdRanges(value: ThresholdRanges, ctx: z.RefinementCtx): void {
  if (value.minKeywordDensity > value.maxKeywordDensity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["minKeywordDensity"],
      message: "minKeywordDensity must be less than or equal to maxKeywordDensity",
    });
  }
  if (value.minMetaDescLength > value.maxMetaDescLength) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["minMetaDescLength"],
      message: "minMetaDescLength must be less than or equal to maxMetaDescLength",
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════════════════

export const DetectorThresholdsObject = z.object(thresholdShape).strict();

/**
 * Issue detector thresholds.
 */
export const DetectorThresholdsSchema = DetectorThresholdsObject.superRefine(checkThresholdRanges);
export type DetectorThresholds = z.infer<typeof DetectorThresholdsSchema>;

export const PipelineConfigObject = z
  .object({
    ...thresholdShape,

    /** Run correctors when a step fails validation */
    autoCorrection: z.boolean().describe("Apply correctors to invalid aspects"),

    /** Attempts allowed when a run is wrapped in the retry manager */
    maxRetryAttempts: z
      .number()
      .int()
      .min(1)
      .describe("Maximum attempts for retried pipeline runs"),
  })
  .strict();

/**
 * Validation pipeline configuration.
 */
export const PipelineConfigSchema = PipelineConfigObject.superRefine(checkThresholdRanges);
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const RetryConfigObject = z
  .object({
    maxRetries: z.number().int().min(1).describe("Attempts before giving up"),
    baseDelay: z.number().min(0).describe("Delay after the first failure (s)"),
    maxDelay: z.number().min(0).describe("Upper bound for any delay (s)"),
    backoffMultiplier: z.number().min(1).describe("Growth factor between delays"),
    enableSmartCorrection: z
      .boolean()
      .describe("Apply a correction strategy between attempts"),
    enablePatternLearning: z
      .boolean()
      .describe("Record outcomes per content signature"),
    minSuccessRate: z
      .number()
      .min(0)
      .max(1)
      .describe("Overall success ratio below which retry statistics are flagged unhealthy"),
    strategyCacheTtl: seconds().describe("Lifetime of a cached successful strategy (s)"),
  })
  .strict();

/**
 * Retry manager configuration.
 */
export const RetryConfigSchema = RetryConfigObject.refine(
  (value) => value.baseDelay <= value.maxDelay,
  { message: "baseDelay must be less than or equal to maxDelay", path: ["baseDelay"] }
);
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const CacheTtlSchema = z
  .object({
    validation: seconds(),
    metrics: seconds(),
    keywords: seconds(),
    readability: seconds(),
    title_unique: seconds(),
  })
  .strict();
export type CacheTtl = z.infer<typeof CacheTtlSchema>;

export const CacheConfigObject = z
  .object({
    /** Prepended to every key written to the persistent store */
    prefix: z.string().describe("Key prefix for stored entries"),
    ttl: CacheTtlSchema.describe("Default TTL per tier (s)"),
    /** Memory tier size; expired entries go first, then the oldest */
    maxMemoryEntries: z.number().int().min(1).describe("Entries kept in the memory tier"),
  })
  .strict();

/**
 * Validation cache configuration.
 */
export const CacheConfigSchema = CacheConfigObject;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const ImprovementConfigObject = z
  .object({
    enableCaching: z.boolean(),
    cacheExpiration: seconds().describe("Lifetime of a cached detection report (s)"),
    trackTrends: z.boolean(),
    detailedMetrics: z.boolean().describe("Include per-metric deltas"),
  })
  .strict();

/**
 * Improvement tracker configuration.
 */
export const ImprovementConfigSchema = ImprovementConfigObject;
export type ImprovementConfig = z.infer<typeof ImprovementConfigSchema>;

export const ProgressConfigObject = z
  .object({
    /** Snapshot ring capacity, baseline included */
    maxHistoryEntries: z.number().int().min(1),
    trackStrategyEffectiveness: z.boolean(),
    detailedReporting: z.boolean(),
    enableRollback: z.boolean(),
    enableContentHistory: z.boolean(),
  })
  .strict();

/**
 * Progress tracker configuration.
 */
export const ProgressConfigSchema = ProgressConfigObject;
export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;

export const StructureConfigObject = z
  .object({
    enableRollback: z.boolean(),
    maxSnapshots: z.number().int().min(1),
    enableChecksums: z.boolean(),
    preserveStructure: z.boolean().describe("Check tag, heading and image counts"),
    preserveFormatting: z.boolean().describe("Check paragraph and list counts"),
    preserveIntent: z.boolean().describe("Warn on large length or title changes"),
  })
  .strict();

/**
 * Structure preserver configuration.
 */
export const StructureConfigSchema = StructureConfigObject;
export type StructureConfig = z.infer<typeof StructureConfigSchema>;

export const OptimizerConfigObject = z
  .object({
    maxIterations: z.number().int().min(1).describe("Upper bound on correction passes"),
    targetComplianceScore: percentage().describe("Score that ends the session"),
    enableEarlyTermination: z
      .boolean()
      .describe("Stop once stagnation reaches the threshold"),
    priorityOrder: z
      .array(Aspect)
      .min(1)
      .describe("Order in which correction prompts are generated"),
    minImprovementThreshold: z
      .number()
      .min(0)
      .describe("Smallest score gain that counts as progress"),
    stagnationThreshold: z
      .number()
      .int()
      .min(1)
      .describe("Consecutive passes without progress before stopping"),
    autoCorrection: z.boolean(),
    /** Run each pass through the retry manager */
    retryPasses: z.boolean(),
  })
  .strict();

/**
 * Multi-pass optimizer configuration.
 */
export const OptimizerConfigSchema = OptimizerConfigObject.refine(
  (value) => new Set(value.priorityOrder).size === value.priorityOrder.length,
  { message: "priorityOrder must not repeat an aspect", path: ["priorityOrder"] }
);
export type OptimizerConfig = z.infer<typeof OptimizerConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COMPLETE CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Complete engine configuration.
 */
export const EngineConfigSchema = z
  .object({
    detector: DetectorThresholdsSchema,
    pipeline: PipelineConfigSchema,
    retry: RetryConfigSchema,
    cache: CacheConfigSchema,
    improvement: ImprovementConfigSchema,
    progress: ProgressConfigSchema,
    structure: StructureConfigSchema,
    optimizer: OptimizerConfigSchema,
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Overrides accepted from configuration files: every section and field
 * optional, unknown keys still rejected.
 */
export const EngineConfigOverridesSchema = z
  .object({
    detector: DetectorThresholdsObject.partial().optional(),
    pipeline: PipelineConfigObject.partial().optional(),
    retry: RetryConfigObject.partial().optional(),
    cache: CacheConfigObject.extend({ ttl: CacheTtlSchema.partial() })
      .partial()
      .optional(),
    improvement: ImprovementConfigObject.partial().optional(),
    progress: ProgressConfigObject.partial().optional(),
    structure: StructureConfigObject.partial().optional(),
    optimizer: OptimizerConfigObject.partial().optional(),
  })
  .strict();

export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;
