/**
 * Improvement tracker.
 *
 * Re-runs issue detection on the content before and after a pass and
 * measures what changed: compliance score, issue counts per severity,
 * issue types resolved, introduced and left standing, and the movement of
 * the headline metrics. Across passes it keeps a history and a trend
 * model that predicts how many more passes convergence would take.
 *
 * DESIGN: Detection reports are cached in memory by content and keyword
 * hash only, so the content a pass starts from (the previous pass's
 * result) is a cache hit.
 */

import type { ImprovementConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { IssueType } from "../config/engine/enums.js";
import type { Content } from "../content/schema.js";
import { fullContentHash, keywordHash } from "../content/hash.js";
import type { ContentMetrics } from "../analysis/types.js";
import { IssueDetector, type DetectionReport } from "../issues/detector.js";
import { issueTypes } from "../issues/issue.js";
import { systemClock, type Clock } from "../cache/store.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";

/** Score gain that counts as significant */
const SIGNIFICANT_IMPROVEMENT = 10;

/** Passes the trend direction is read from */
const TREND_WINDOW = 3;

const COMPARED_METRICS = [
  "keywordDensity",
  "metaDescriptionLength",
  "passiveVoicePercentage",
  "longSentencePercentage",
  "transitionWordPercentage",
] as const;

export type ComparedMetric = (typeof COMPARED_METRICS)[number];

export interface MetricChange {
  original: number;
  corrected: number;
  change: number;
  /** Relative to the original value; 0 when the original is 0 */
  percentChange: number;
}

export interface ValidationSummary {
  complianceScore: number;
  totalIssues: number;
  criticalIssues: number;
  majorIssues: number;
  minorIssues: number;
  isCompliant: boolean;
  metrics: ContentMetrics;
}

export interface Improvements {
  scoreImprovement: number;
  issuesResolved: number;
  criticalIssuesResolved: number;
  majorIssuesResolved: number;
  minorIssuesResolved: number;
  /** Share of the gap to 100 that was closed, percent */
  percentageImprovement: number;
  resolvedIssueTypes: IssueType[];
  newIssues: IssueType[];
  persistentIssues: IssueType[];
  metricImprovements?: Record<ComparedMetric, MetricChange>;
}

export interface ImprovementSummary {
  improved: boolean;
  complianceAchieved: boolean;
  significantImprovement: boolean;
  allIssuesResolved: boolean;
}

export type TrendDirection = "improving" | "stable" | "stagnating" | "declining";

export type TrendAnalysis =
  | { status: "insufficient_data"; message: string }
  | {
      status: "available";
      trendDirection: TrendDirection;
      averageImprovement: number;
      /** Mean score gain per pass */
      velocity: number;
      currentScore: number;
      /** Undefined when already at 100 or not improving */
      passesNeeded?: number;
      consistentImprovement: boolean;
      scoreProgression: number[];
    };

export interface ImprovementMeasurement {
  original: ValidationSummary;
  corrected: ValidationSummary;
  improvements: Improvements;
  summary: ImprovementSummary;
  trends?: TrendAnalysis;
}

export interface PassHistoryEntry {
  passNumber: number;
  timestamp: string;
  originalScore: number;
  correctedScore: number;
  scoreImprovement: number;
  issuesResolved: number;
  resolvedIssueTypes: IssueType[];
  newIssues: IssueType[];
  persistentIssues: IssueType[];
}

export interface ImprovementCacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  cacheEnabled: boolean;
  hits: number;
  misses: number;
}

export interface ImprovementTrackerOptions {
  config?: ImprovementConfig;
  detector?: IssueDetector;
  now?: Clock;
  logger?: Logger;
}

interface CachedReport {
  report: DetectionReport;
  storedAt: number;
}

function summarize(report: DetectionReport): ValidationSummary {
  return {
    complianceScore: report.complianceScore,
    totalIssues: report.totalIssues,
    criticalIssues: report.criticalIssues,
    majorIssues: report.majorIssues,
    minorIssues: report.minorIssues,
    isCompliant: report.isCompliant,
    metrics: report.metrics,
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class ImprovementTracker {
  private readonly config: ImprovementConfig;
  private readonly detector: IssueDetector;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CachedReport>();
  private readonly history = new Map<number, PassHistoryEntry>();
  private hits = 0;
  private misses = 0;

  constructor(options: ImprovementTrackerOptions = {}) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.improvement;
    this.detector = options.detector ?? new IssueDetector();
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  getConfig(): ImprovementConfig {
    return { ...this.config };
  }

  validateAndMeasureImprovement(
    before: Content,
    after: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[] = [],
    passNumber = 1
  ): ImprovementMeasurement {
    const original = this.detect(before, focusKeyword, secondaryKeywords);
    const corrected = this.detect(after, focusKeyword, secondaryKeywords);
    const improvements = this.calculateImprovements(original, corrected);

    this.history.set(passNumber, {
      passNumber,
      timestamp: new Date(this.now()).toISOString(),
      originalScore: original.complianceScore,
      correctedScore: corrected.complianceScore,
      scoreImprovement: improvements.scoreImprovement,
      issuesResolved: improvements.issuesResolved,
      resolvedIssueTypes: improvements.resolvedIssueTypes,
      newIssues: improvements.newIssues,
      persistentIssues: improvements.persistentIssues,
    });

    const measurement: ImprovementMeasurement = {
      original: summarize(original),
      corrected: summarize(corrected),
      improvements,
      summary: {
        improved: improvements.scoreImprovement > 0,
        complianceAchieved: corrected.isCompliant,
        significantImprovement: improvements.scoreImprovement >= SIGNIFICANT_IMPROVEMENT,
        allIssuesResolved: corrected.totalIssues === 0,
      },
    };
    if (this.config.trackTrends) {
      measurement.trends = this.analyzeTrends();
    }

    this.logger.debug("Measured pass improvement", {
      passNumber,
      scoreImprovement: improvements.scoreImprovement,
      issuesResolved: improvements.issuesResolved,
    });
    return measurement;
  }

  /**
   * Issue detection, served from the cache while fresh.
   */
  detect(content: Content, focusKeyword: string, secondaryKeywords: readonly string[] = []): DetectionReport {
    const key = `${fullContentHash(content)}_${keywordHash(focusKeyword, secondaryKeywords)}`;

    if (this.config.enableCaching) {
      const cached = this.cache.get(key);
      if (cached && this.isFresh(cached)) {
        this.hits++;
        return cached.report;
      }
      this.misses++;
    }

    const report = this.detector.detectAllIssues(content, focusKeyword, secondaryKeywords);
    if (this.config.enableCaching) {
      this.cache.set(key, { report, storedAt: this.now() });
    }
    return report;
  }

  analyzeTrends(): TrendAnalysis {
    const passes = [...this.history.values()];
    if (passes.length < 2) {
      return { status: "insufficient_data", message: "Need at least 2 passes for trend analysis" };
    }

    const scores = passes.map((pass) => pass.correctedScore);
    const deltas = passes.map((pass) => pass.scoreImprovement);
    const recent = mean(deltas.slice(-TREND_WINDOW));

    let trendDirection: TrendDirection = "stable";
    if (recent > 5) trendDirection = "improving";
    else if (recent < -2) trendDirection = "declining";
    else if (recent < 1) trendDirection = "stagnating";

    const velocity = mean(deltas);
    const currentScore = scores[scores.length - 1];
    const trend: TrendAnalysis = {
      status: "available",
      trendDirection,
      averageImprovement: velocity,
      velocity,
      currentScore,
      consistentImprovement: Math.min(...deltas) > 0,
      scoreProgression: scores,
    };
    if (currentScore < 100 && velocity > 0) {
      trend.passesNeeded = Math.ceil((100 - currentScore) / velocity);
    }
    return trend;
  }

  getPassHistory(): PassHistoryEntry[] {
    return [...this.history.values()];
  }

  clearCache(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  clearHistory(): void {
    this.history.clear();
  }

  getCacheStats(): ImprovementCacheStats {
    const entries = [...this.cache.values()];
    const expiredEntries = entries.filter((entry) => !this.isFresh(entry)).length;
    return {
      totalEntries: entries.length,
      activeEntries: entries.length - expiredEntries,
      expiredEntries,
      cacheEnabled: this.config.enableCaching,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private isFresh(entry: CachedReport): boolean {
    return this.now() - entry.storedAt < this.config.cacheExpiration * 1000;
  }

  private calculateImprovements(original: DetectionReport, corrected: DetectionReport): Improvements {
    const scoreImprovement = corrected.complianceScore - original.complianceScore;
    const beforeTypes = issueTypes(original.issues);
    const afterTypes = issueTypes(corrected.issues);

    const improvements: Improvements = {
      scoreImprovement,
      issuesResolved: original.totalIssues - corrected.totalIssues,
      criticalIssuesResolved: original.criticalIssues - corrected.criticalIssues,
      majorIssuesResolved: original.majorIssues - corrected.majorIssues,
      minorIssuesResolved: original.minorIssues - corrected.minorIssues,
      percentageImprovement:
        original.complianceScore < 100 ? (scoreImprovement / (100 - original.complianceScore)) * 100 : 0,
      resolvedIssueTypes: beforeTypes.filter((type) => !afterTypes.includes(type)),
      newIssues: afterTypes.filter((type) => !beforeTypes.includes(type)),
      persistentIssues: beforeTypes.filter((type) => afterTypes.includes(type)),
    };

    if (this.config.detailedMetrics) {
      improvements.metricImprovements = compareMetrics(original.metrics, corrected.metrics);
    }
    return improvements;
  }
}

function compareMetrics(original: ContentMetrics, corrected: ContentMetrics): Record<ComparedMetric, MetricChange> {
  const change = (metric: ComparedMetric): MetricChange => {
    const before = original[metric];
    const after = corrected[metric];
    return {
      original: before,
      corrected: after,
      change: after - before,
      percentChange: before !== 0 ? ((after - before) / before) * 100 : 0,
    };
  };

  return {
    keywordDensity: change("keywordDensity"),
    metaDescriptionLength: change("metaDescriptionLength"),
    passiveVoicePercentage: change("passiveVoicePercentage"),
    longSentencePercentage: change("longSentencePercentage"),
    transitionWordPercentage: change("transitionWordPercentage"),
  };
}
