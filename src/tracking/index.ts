/**
 * Per-pass improvement measurement and session progress tracking.
 */

export {
  ImprovementTracker,
  type ComparedMetric,
  type MetricChange,
  type ValidationSummary,
  type Improvements,
  type ImprovementSummary,
  type TrendDirection,
  type TrendAnalysis,
  type ImprovementMeasurement,
  type PassHistoryEntry,
  type ImprovementCacheStats,
  type ImprovementTrackerOptions,
} from "./improvement-tracker.js";
export {
  ProgressTracker,
  ProgressTrackingError,
  type TrackedIssue,
  type TrackedCorrection,
  type StrategyDescriptor,
  type PassInput,
  type PassImprovements,
  type PassRecord,
  type Snapshot,
  type StrategyMetrics,
  type SessionData,
  type SessionSummary,
  type PassHighlight,
  type ProgressAnalysis,
  type ContentHistorySummary,
  type DetailedMetrics,
  type BeforeAfterComparison,
  type ComprehensiveReport,
  type ProgressTrackerOptions,
} from "./progress-tracker.js";
