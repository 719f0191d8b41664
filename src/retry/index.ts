/**
 * Bounded retries with correction strategies between attempts.
 */

export {
  RetryManager,
  contentSignature,
  defaultSleep,
  type RetryContext,
  type RetryAttempt,
  type AttemptOutcome,
  type RetryOperation,
  type RetryOutcome,
  type RetryHistoryEntry,
  type RetryStats,
  type RetryManagerOptions,
  type Sleep,
} from "./retry-manager.js";
export {
  CorrectionStrategySchema,
  FAILURE_PATTERNS,
  adaptStrategy,
  applyStrategy,
  classifyFailure,
  describeStrategy,
  fallbackStrategy,
  matchFailurePattern,
  type CorrectionStrategy,
  type StrategyName,
  type FailureClass,
  type FailurePattern,
} from "./strategies.js";
