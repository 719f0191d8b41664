/**
 * Default engine configuration.
 *
 * Detector thresholds define the compliance score. Pipeline thresholds
 * decide when a correction is attempted and are looser in places.
 */

import type { EngineConfig } from "./schema.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  detector: {
    minKeywordDensity: 0.5,
    maxKeywordDensity: 2.5,
    minMetaDescLength: 120,
    maxMetaDescLength: 156,
    maxPassiveVoice: 10,
    maxLongSentences: 25,
    minTransitionWords: 30,
    maxTitleLength: 66,
    maxSubheadingKeywordUsage: 75,
    requireImages: true,
    requireKeywordInAltText: true,
  },

  pipeline: {
    minKeywordDensity: 0.5,
    maxKeywordDensity: 3.0,
    minMetaDescLength: 110,
    maxMetaDescLength: 156,
    maxPassiveVoice: 15,
    maxLongSentences: 25,
    minTransitionWords: 30,
    maxTitleLength: 66,
    maxSubheadingKeywordUsage: 75,
    requireImages: false,
    requireKeywordInAltText: true,
    autoCorrection: true,
    maxRetryAttempts: 3,
  },

  retry: {
    maxRetries: 3,
    baseDelay: 1,
    maxDelay: 30,
    backoffMultiplier: 2,
    enableSmartCorrection: true,
    enablePatternLearning: true,
    minSuccessRate: 0.7,
    strategyCacheTtl: 3600,
  },

  cache: {
    prefix: "seo_cache_",
    ttl: {
      validation: 3600,
      metrics: 3600,
      keywords: 7200,
      readability: 7200,
      title_unique: 1800,
    },
    maxMemoryEntries: 500,
  },

  improvement: {
    enableCaching: true,
    cacheExpiration: 3600,
    trackTrends: true,
    detailedMetrics: true,
  },

  progress: {
    maxHistoryEntries: 10,
    trackStrategyEffectiveness: true,
    detailedReporting: true,
    enableRollback: true,
    enableContentHistory: true,
  },

  structure: {
    enableRollback: true,
    maxSnapshots: 10,
    enableChecksums: true,
    preserveStructure: true,
    preserveFormatting: true,
    preserveIntent: true,
  },

  optimizer: {
    maxIterations: 5,
    targetComplianceScore: 100,
    enableEarlyTermination: true,
    priorityOrder: ["meta_description", "keyword_density", "readability", "title", "images"],
    minImprovementThreshold: 1.0,
    stagnationThreshold: 2,
    autoCorrection: true,
    retryPasses: false,
  },
};
