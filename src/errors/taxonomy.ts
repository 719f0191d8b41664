/**
 * Error taxonomy, recovery tables and message simplification.
 *
 * Everything here is pure. The ErrorHandler combines these tables with
 * logging and persisted statistics.
 */

import { DegradationLevel, ErrorCategory } from "../config/engine/enums.js";
import type { PipelineConfig } from "../config/engine/schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════

export interface CategoryDefinition {
  description: string;
  /** Lower-case substrings; the first category with a match wins */
  patterns: readonly string[];
  requiresImmediateAction: boolean;
  enableFallback: boolean;
}

export const ERROR_CATEGORIES: Readonly<Record<ErrorCategory, CategoryDefinition>> = {
  critical: {
    description: "Errors that prevent optimization from continuing",
    patterns: ["fatal", "exception", "crash", "cannot continue"],
    requiresImmediateAction: true,
    enableFallback: true,
  },
  recoverable: {
    description: "Errors that can be recovered through retry or an alternative approach",
    patterns: ["timeout", "rate limit", "temporary", "retry"],
    requiresImmediateAction: false,
    enableFallback: true,
  },
  degraded: {
    description: "Errors that allow partial functionality",
    patterns: ["partial", "incomplete", "degraded"],
    requiresImmediateAction: false,
    enableFallback: true,
  },
  informational: {
    description: "Non-critical issues kept for monitoring",
    patterns: ["warning", "notice", "info"],
    requiresImmediateAction: false,
    enableFallback: false,
  },
};

/**
 * Classify a message by substring. Unmatched messages are recoverable.
 */
export function categorizeError(message: string): ErrorCategory {
  const lower = message.toLowerCase();
  for (const category of ErrorCategory.options) {
    if (ERROR_CATEGORIES[category].patterns.some((pattern) => lower.includes(pattern))) {
      return category;
    }
  }
  return "recoverable";
}

/**
 * Level for a success ratio in [0, 1].
 */
export function degradationLevel(successRatio: number): DegradationLevel {
  if (successRatio >= 0.7) return DegradationLevel.enum.minor;
  if (successRatio >= 0.4) return DegradationLevel.enum.moderate;
  return DegradationLevel.enum.severe;
}

// ═══════════════════════════════════════════════════════════════════════════
// RECOVERY
// ═══════════════════════════════════════════════════════════════════════════

export interface RecoveryStrategy {
  strategy: string;
  /** One step per attempt; the last step repeats */
  steps: readonly [string, ...string[]];
  maxAttempts: number;
  backoffMultiplier: number;
}

export const RECOVERY_STRATEGIES: ReadonlyMap<string, RecoveryStrategy> = new Map<string, RecoveryStrategy>([
  [
    "provider_failure",
    {
      strategy: "provider_failover",
      steps: ["switch_provider", "retry_request", "use_cached_result"],
      maxAttempts: 3,
      backoffMultiplier: 2,
    },
  ],
  [
    "validation_timeout",
    {
      strategy: "simplified_validation",
      steps: ["reduce_validation_scope", "use_cached_validation", "skip_non_critical"],
      maxAttempts: 2,
      backoffMultiplier: 1.5,
    },
  ],
  [
    "correction_failure",
    {
      strategy: "alternative_correction",
      steps: ["simplify_correction", "use_template", "manual_fallback"],
      maxAttempts: 3,
      backoffMultiplier: 1,
    },
  ],
  [
    "rate_limit_exceeded",
    {
      strategy: "exponential_backoff",
      steps: ["wait_and_retry", "switch_provider", "queue_for_later"],
      maxAttempts: 5,
      backoffMultiplier: 2,
    },
  ],
  [
    "network_error",
    {
      strategy: "retry_with_backoff",
      steps: ["retry_immediately", "retry_with_delay", "use_cached_result"],
      maxAttempts: 3,
      backoffMultiplier: 2,
    },
  ],
]);

export interface FallbackStrategy {
  primary: string;
  /** Tried in order once the primary operation fails */
  fallbacks: readonly string[];
  gracefulDegradation: boolean;
}

export const FALLBACK_STRATEGIES: ReadonlyMap<string, FallbackStrategy> = new Map<string, FallbackStrategy>([
  [
    "correction",
    {
      primary: "apply_corrector",
      fallbacks: ["use_alternative_strategy", "use_template_based_correction", "return_original_content"],
      gracefulDegradation: true,
    },
  ],
  [
    "validation",
    {
      primary: "full_validation",
      fallbacks: ["critical_validation_only", "cached_validation", "skip_validation"],
      gracefulDegradation: true,
    },
  ],
  [
    "optimization",
    {
      primary: "continue_optimization",
      fallbacks: ["reduce_iteration_count", "return_best_result", "return_original_content"],
      gracefulDegradation: true,
    },
  ],
]);

export const GENERIC_FALLBACK: FallbackStrategy = {
  primary: "default_operation",
  fallbacks: ["return_original", "skip_operation", "log_and_continue"],
  gracefulDegradation: false,
};

export function fallbackFor(component: string): FallbackStrategy {
  return FALLBACK_STRATEGIES.get(component) ?? GENERIC_FALLBACK;
}

const RECOVERY_BASE_DELAY = 1;
const RECOVERY_MAX_DELAY = 30;

/**
 * Seconds to wait before recovery attempt `attemptNumber` (1-based).
 */
export function recoveryBackoff(attemptNumber: number, multiplier: number): number {
  return Math.min(RECOVERY_BASE_DELAY * multiplier ** (attemptNumber - 1), RECOVERY_MAX_DELAY);
}

// ═══════════════════════════════════════════════════════════════════════════
// USER-FACING TEXT
// ═══════════════════════════════════════════════════════════════════════════

const SIMPLIFICATIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/timeout/i, "The operation took too long to complete"],
  [/rate limit/i, "Too many requests - please wait a moment"],
  [/connection/i, "Unable to connect to the service"],
  [/authentication/i, "Authentication failed - please check your credentials"],
  [/not found/i, "The requested resource was not found"],
  [/permission/i, "You do not have permission to perform this action"],
  [/invalid/i, "The provided data is invalid"],
  [/exception/i, "An unexpected error occurred"],
];

export function simplifyErrorMessage(message: string): string {
  for (const [pattern, simplified] of SIMPLIFICATIONS) {
    if (pattern.test(message)) return simplified;
  }
  return message;
}

export function recommendationsFor(categories: ReadonlySet<ErrorCategory>): string[] {
  const recommendations: string[] = [];
  if (categories.has("critical")) {
    recommendations.push(
      "Critical errors detected - immediate action required",
      "Check the engine log for detailed error information"
    );
  }
  if (categories.has("recoverable")) {
    recommendations.push(
      "Some operations failed but can be retried",
      "Consider relaxing thresholds if the same errors persist"
    );
  }
  if (categories.has("degraded")) {
    recommendations.push(
      "The engine is operating with reduced functionality",
      "Some corrections may not have been applied"
    );
  }
  return recommendations;
}

// ═══════════════════════════════════════════════════════════════════════════
// THRESHOLD SUGGESTIONS
// ═══════════════════════════════════════════════════════════════════════════

export type ThresholdSuggestion = Partial<
  Pick<
    PipelineConfig,
    | "minMetaDescLength"
    | "maxMetaDescLength"
    | "minKeywordDensity"
    | "maxKeywordDensity"
    | "maxPassiveVoice"
    | "maxLongSentences"
    | "minTransitionWords"
  >
>;

/**
 * Relaxed thresholds for an error that keeps recurring. Empty when the
 * component or message has no matching rule.
 */
export function suggestThresholdAdjustments(
  component: string,
  message: string,
  thresholds: PipelineConfig
): ThresholdSuggestion {
  const lower = message.toLowerCase();

  switch (component) {
    case "meta_description":
      if (lower.includes("too short")) {
        return { minMetaDescLength: Math.max(100, thresholds.minMetaDescLength - 10) };
      }
      if (lower.includes("too long")) {
        return { maxMetaDescLength: Math.min(200, thresholds.maxMetaDescLength + 10) };
      }
      return {};
    case "keyword_density":
      if (lower.includes("too low")) {
        return { minKeywordDensity: Math.max(0.1, thresholds.minKeywordDensity - 0.1) };
      }
      if (lower.includes("too high")) {
        return { maxKeywordDensity: Math.min(5, thresholds.maxKeywordDensity + 0.5) };
      }
      return {};
    case "readability":
      if (lower.includes("passive voice")) {
        return { maxPassiveVoice: Math.min(20, thresholds.maxPassiveVoice + 2) };
      }
      if (lower.includes("long sentences")) {
        return { maxLongSentences: Math.min(40, thresholds.maxLongSentences + 5) };
      }
      if (lower.includes("transition words")) {
        return { minTransitionWords: Math.max(10, thresholds.minTransitionWords - 5) };
      }
      return {};
    default:
      return {};
  }
}
