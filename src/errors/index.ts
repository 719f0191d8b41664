/**
 * Error taxonomy, recovery planning and the persistent error handler.
 */

export {
  ERROR_CATEGORIES,
  RECOVERY_STRATEGIES,
  FALLBACK_STRATEGIES,
  GENERIC_FALLBACK,
  categorizeError,
  degradationLevel,
  fallbackFor,
  recoveryBackoff,
  simplifyErrorMessage,
  recommendationsFor,
  suggestThresholdAdjustments,
  type CategoryDefinition,
  type RecoveryStrategy,
  type FallbackStrategy,
  type ThresholdSuggestion,
} from "./taxonomy.js";
export {
  ErrorHandler,
  ErrorSeverity,
  MAX_LOG_ENTRIES,
  SUGGESTION_INTERVAL,
  type ErrorStat,
  type ErrorLogEntry,
  type ManualOverride,
  type RecoveryPlan,
  type DegradationReport,
  type ReportableError,
  type UserFriendlyReport,
  type ErrorHandlerOptions,
} from "./error-handler.js";
