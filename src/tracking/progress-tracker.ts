/**
 * Progress tracker.
 *
 * Owns one optimization session: an append-only log of frozen pass
 * records, a bounded ring of content snapshots for rollback, running
 * per-strategy effectiveness figures and the final report.
 *
 * DESIGN: Pass numbers start at 1 and must arrive in order. The snapshot
 * ring always keeps the baseline (pass 0); when full it evicts the oldest
 * later snapshot.
 */

import type { ProgressConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Content } from "../content/schema.js";
import { contentHash } from "../content/hash.js";
import { cloneContent } from "../content/record.js";
import { systemClock, type Clock } from "../cache/store.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { generateSessionId } from "../logging/run-id.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Anything with a type: detector issues, pipeline messages keyed by
 * component.
 */
export interface TrackedIssue {
  readonly type: string;
  readonly description?: string;
}

export interface TrackedCorrection {
  readonly type: string;
}

export interface StrategyDescriptor {
  readonly name: string;
  readonly type?: string;
  readonly priorityOrder?: readonly string[];
}

export interface PassInput {
  passNumber: number;
  before: Content;
  after: Content;
  beforeScore: number;
  afterScore: number;
  issuesBefore?: readonly TrackedIssue[];
  issuesAfter?: readonly TrackedIssue[];
  corrections?: readonly TrackedCorrection[];
  strategy?: StrategyDescriptor;
}

export interface PassImprovements {
  readonly resolvedIssueTypes: readonly string[];
  readonly newIssueTypes: readonly string[];
  readonly persistentIssueTypes: readonly string[];
  readonly correctionsByType: Readonly<Record<string, number>>;
  /** Resolved issue types per correction */
  readonly effectivenessRate: number;
}

export interface PassRecord {
  readonly passNumber: number;
  readonly timestamp: string;
  /** Milliseconds since the previous pass (or the session start) */
  readonly duration: number;
  readonly beforeScore: number;
  readonly afterScore: number;
  readonly scoreImprovement: number;
  readonly issuesBefore: readonly TrackedIssue[];
  readonly issuesAfter: readonly TrackedIssue[];
  readonly issuesBeforeCount: number;
  readonly issuesAfterCount: number;
  readonly issuesResolved: number;
  readonly corrections: readonly TrackedCorrection[];
  readonly correctionsCount: number;
  readonly strategyUsed: StrategyDescriptor | null;
  readonly improvements: PassImprovements;
}

export interface Snapshot {
  passNumber: number;
  label: string;
  timestamp: string;
  score: number;
  content: Content;
  contentHash: string;
}

export interface StrategyMetrics {
  name: string;
  timesUsed: number;
  cumulativeScoreImprovement: number;
  cumulativeIssuesResolved: number;
  averageScoreImprovement: number;
  averageIssuesResolved: number;
  /** Uses that raised the score or resolved an issue */
  successfulApplications: number;
  /** Percent */
  successRate: number;
}

export interface SessionData {
  sessionId: string;
  startTime: string;
  endTime: string | null;
  initialScore: number;
  initialIssueCount: number;
  finalScore: number;
  totalPasses: number;
  totalImprovement: number;
  totalCorrections: number;
  totalIssuesResolved: number;
  complianceAchieved: boolean;
  terminationReason: string;
}

export interface SessionSummary {
  sessionId: string;
  /** Milliseconds */
  duration: number;
  totalPasses: number;
  initialScore: number;
  finalScore: number;
  totalImprovement: number;
  complianceAchieved: boolean;
  terminationReason: string;
  totalCorrections: number;
  totalIssuesResolved: number;
  averagePassDuration: number;
  improvementRate: number;
}

export interface PassHighlight {
  passNumber: number;
  scoreImprovement: number;
  issuesResolved: number;
  correctionsCount: number;
}

export type ProgressAnalysis =
  | { status: "no_data" }
  | {
      status: "available";
      scoreProgression: number[];
      improvementProgression: number[];
      issuesResolvedProgression: number[];
      averageImprovement: number;
      totalIssuesResolved: number;
      /** No pass lowered the score */
      consistentImprovement: boolean;
      bestPass: PassHighlight;
      worstPass: PassHighlight;
    };

export type ContentHistorySummary =
  | { status: "disabled" }
  | {
      status: "available";
      totalEntries: number;
      entries: Omit<Snapshot, "content">[];
    };

export interface DetailedMetrics {
  totalPasses: number;
  totalDuration: number;
  averagePassDuration: number;
  totalCorrections: number;
  averageCorrectionsPerPass: number;
  totalIssuesResolved: number;
  averageIssuesResolvedPerPass: number;
  /** Score gained per pass */
  efficiencyScore: number;
}

export type BeforeAfterComparison =
  | { status: "no_data" }
  | {
      status: "available";
      before: Omit<Snapshot, "content" | "label" | "passNumber">;
      after: Omit<Snapshot, "content" | "label" | "passNumber">;
      improvement: number;
      improvementPercentage: number;
    };

export interface ComprehensiveReport {
  session: SessionData;
  summary: SessionSummary;
  passRecords: PassRecord[];
  strategyEffectiveness: StrategyMetrics[];
  progressAnalysis: ProgressAnalysis;
  contentHistory: ContentHistorySummary;
  detailedMetrics?: DetailedMetrics;
  beforeAfterComparison?: BeforeAfterComparison;
}

export interface ProgressTrackerOptions {
  config?: ProgressConfig;
  now?: Clock;
  logger?: Logger;
  /** Session id source */
  sessionIds?: () => string;
}

/**
 * Misuse of the pass log: recording before a session starts, or out of
 * order.
 */
export class ProgressTrackingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProgressTrackingError";
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// TRACKER
// ═══════════════════════════════════════════════════════════════════════════

function distinct(types: readonly string[]): string[] {
  return [...new Set(types)];
}

function highlight(record: PassRecord): PassHighlight {
  return {
    passNumber: record.passNumber,
    scoreImprovement: record.scoreImprovement,
    issuesResolved: record.issuesResolved,
    correctionsCount: record.correctionsCount,
  };
}

export class ProgressTracker {
  private readonly config: ProgressConfig;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly sessionIds: () => string;

  private session: SessionData | null = null;
  private sessionStart = 0;
  private sessionEnd: number | null = null;
  private lastMark = 0;
  private initialContent: Content | null = null;
  private passRecords: PassRecord[] = [];
  private history: Snapshot[] = [];
  private strategies = new Map<string, StrategyMetrics>();

  constructor(options: ProgressTrackerOptions = {}) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.progress;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
    this.sessionIds = options.sessionIds ?? (() => generateSessionId("opt"));
  }

  getConfig(): ProgressConfig {
    return { ...this.config };
  }

  /**
   * Reset all state and open a session at pass 0.
   */
  startSession(initialContent: Content, initialScore: number, initialIssues: readonly TrackedIssue[] = []): string {
    this.sessionStart = this.now();
    this.sessionEnd = null;
    this.lastMark = this.sessionStart;
    this.initialContent = cloneContent(initialContent);
    this.passRecords = [];
    this.history = [];
    this.strategies = new Map();

    this.session = {
      sessionId: this.sessionIds(),
      startTime: this.timestamp(this.sessionStart),
      endTime: null,
      initialScore,
      initialIssueCount: initialIssues.length,
      finalScore: initialScore,
      totalPasses: 0,
      totalImprovement: 0,
      totalCorrections: 0,
      totalIssuesResolved: 0,
      complianceAchieved: false,
      terminationReason: "",
    };

    if (this.config.enableContentHistory) {
      this.addSnapshot(initialContent, 0, initialScore, "initial");
    }

    this.logger.debug("Started optimization session", {
      sessionId: this.session.sessionId,
      initialScore,
    });
    return this.session.sessionId;
  }

  recordPass(input: PassInput): PassRecord {
    const session = this.requireSession();
    const expected = this.passRecords.length + 1;
    if (input.passNumber !== expected) {
      throw new ProgressTrackingError(`Expected pass ${expected}, got pass ${input.passNumber}`);
    }

    const issuesBefore = input.issuesBefore ?? [];
    const issuesAfter = input.issuesAfter ?? [];
    const corrections = input.corrections ?? [];
    const now = this.now();

    const record: PassRecord = Object.freeze({
      passNumber: input.passNumber,
      timestamp: this.timestamp(now),
      duration: now - this.lastMark,
      beforeScore: input.beforeScore,
      afterScore: input.afterScore,
      scoreImprovement: input.afterScore - input.beforeScore,
      issuesBefore: Object.freeze(issuesBefore.map((issue) => Object.freeze({ ...issue }))),
      issuesAfter: Object.freeze(issuesAfter.map((issue) => Object.freeze({ ...issue }))),
      issuesBeforeCount: issuesBefore.length,
      issuesAfterCount: issuesAfter.length,
      issuesResolved: issuesBefore.length - issuesAfter.length,
      corrections: Object.freeze(corrections.map((correction) => Object.freeze({ ...correction }))),
      correctionsCount: corrections.length,
      strategyUsed: input.strategy ? Object.freeze({ ...input.strategy }) : null,
      improvements: passImprovements(issuesBefore, issuesAfter, corrections),
    });
    this.lastMark = now;

    if (this.config.trackStrategyEffectiveness && input.strategy) {
      this.trackStrategy(input.strategy.name, record.scoreImprovement, record.issuesResolved);
    }
    if (this.config.enableContentHistory) {
      this.addSnapshot(input.after, input.passNumber, input.afterScore, "pass_complete");
    }

    this.passRecords.push(record);
    session.totalPasses = record.passNumber;
    session.finalScore = record.afterScore;
    session.totalCorrections += record.correctionsCount;
    session.totalIssuesResolved += record.issuesResolved;
    session.totalImprovement = session.finalScore - session.initialScore;

    this.logger.debug("Recorded pass", {
      passNumber: record.passNumber,
      scoreImprovement: record.scoreImprovement,
    });
    return record;
  }

  endSession(complianceAchieved: boolean, terminationReason: string): SessionSummary {
    const session = this.requireSession();
    this.sessionEnd = this.now();
    session.endTime = this.timestamp(this.sessionEnd);
    session.complianceAchieved = complianceAchieved;
    session.terminationReason = terminationReason;
    session.totalImprovement = session.finalScore - session.initialScore;

    this.logger.info("Optimization session ended", {
      sessionId: session.sessionId,
      passes: session.totalPasses,
      terminationReason,
    });
    return this.summary(session);
  }

  generateComprehensiveReport(): ComprehensiveReport {
    const session = this.requireSession();
    const report: ComprehensiveReport = {
      session: { ...session },
      summary: this.summary(session),
      passRecords: this.getPassRecords(),
      strategyEffectiveness: this.getStrategyMetrics(),
      progressAnalysis: this.analyzeProgress(),
      contentHistory: this.historySummary(),
    };

    if (this.config.detailedReporting) {
      report.detailedMetrics = this.detailedMetrics(session);
      report.beforeAfterComparison = this.beforeAfterComparison();
    }
    return report;
  }

  /**
   * A copy of the content as it stood after the given pass. Pass 0 is
   * the session's initial content.
   */
  rollbackToPass(passNumber: number): Content | null {
    if (!this.config.enableRollback) {
      this.logger.warn("Rollback disabled in configuration", { passNumber });
      return null;
    }
    if (passNumber === 0) {
      return this.initialContent ? cloneContent(this.initialContent) : null;
    }

    const snapshot = this.history.find((entry) => entry.passNumber === passNumber);
    if (!snapshot) {
      this.logger.warn("No snapshot for pass", { passNumber });
      return null;
    }
    return cloneContent(snapshot.content);
  }

  getPassRecords(): PassRecord[] {
    return [...this.passRecords];
  }

  getPassRecord(passNumber: number): PassRecord | null {
    return this.passRecords[passNumber - 1] ?? null;
  }

  getStrategyMetrics(): StrategyMetrics[] {
    return [...this.strategies.values()].map((metrics) => ({ ...metrics }));
  }

  getContentHistory(): Snapshot[] {
    return this.history.map((entry) => ({ ...entry, content: cloneContent(entry.content) }));
  }

  getSessionData(): SessionData | null {
    return this.session ? { ...this.session } : null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private requireSession(): SessionData {
    if (!this.session) {
      throw new ProgressTrackingError("No optimization session started");
    }
    return this.session;
  }

  private timestamp(ms: number): string {
    return new Date(ms).toISOString();
  }

  private addSnapshot(content: Content, passNumber: number, score: number, label: string): void {
    this.history.push({
      passNumber,
      label,
      timestamp: this.timestamp(this.now()),
      score,
      content: cloneContent(content),
      contentHash: contentHash(content),
    });

    while (this.history.length > this.config.maxHistoryEntries) {
      const evictAt = this.history[0]?.passNumber === 0 ? 1 : 0;
      this.history.splice(evictAt, 1);
    }
  }

  private trackStrategy(name: string, scoreImprovement: number, issuesResolved: number): void {
    const metrics = this.strategies.get(name) ?? {
      name,
      timesUsed: 0,
      cumulativeScoreImprovement: 0,
      cumulativeIssuesResolved: 0,
      averageScoreImprovement: 0,
      averageIssuesResolved: 0,
      successfulApplications: 0,
      successRate: 0,
    };

    metrics.timesUsed++;
    metrics.cumulativeScoreImprovement += scoreImprovement;
    metrics.cumulativeIssuesResolved += issuesResolved;
    if (scoreImprovement > 0 || issuesResolved > 0) {
      metrics.successfulApplications++;
    }
    metrics.averageScoreImprovement = metrics.cumulativeScoreImprovement / metrics.timesUsed;
    metrics.averageIssuesResolved = metrics.cumulativeIssuesResolved / metrics.timesUsed;
    metrics.successRate = (metrics.successfulApplications / metrics.timesUsed) * 100;

    this.strategies.set(name, metrics);
  }

  private duration(): number {
    return (this.sessionEnd ?? this.now()) - this.sessionStart;
  }

  private summary(session: SessionData): SessionSummary {
    const duration = this.duration();
    const passes = session.totalPasses;
    return {
      sessionId: session.sessionId,
      duration,
      totalPasses: passes,
      initialScore: session.initialScore,
      finalScore: session.finalScore,
      totalImprovement: session.totalImprovement,
      complianceAchieved: session.complianceAchieved,
      terminationReason: session.terminationReason,
      totalCorrections: session.totalCorrections,
      totalIssuesResolved: session.totalIssuesResolved,
      averagePassDuration: passes > 0 ? duration / passes : 0,
      improvementRate: passes > 0 ? session.totalImprovement / passes : 0,
    };
  }

  private analyzeProgress(): ProgressAnalysis {
    const [first, ...rest] = this.passRecords;
    if (!first) return { status: "no_data" };

    let best = first;
    let worst = first;
    for (const record of rest) {
      if (record.scoreImprovement > best.scoreImprovement) best = record;
      if (record.scoreImprovement < worst.scoreImprovement) worst = record;
    }

    const improvements = this.passRecords.map((record) => record.scoreImprovement);
    const resolved = this.passRecords.map((record) => record.issuesResolved);
    return {
      status: "available",
      scoreProgression: this.passRecords.map((record) => record.afterScore),
      improvementProgression: improvements,
      issuesResolvedProgression: resolved,
      averageImprovement: improvements.reduce((sum, value) => sum + value, 0) / improvements.length,
      totalIssuesResolved: resolved.reduce((sum, value) => sum + value, 0),
      consistentImprovement: Math.min(...improvements) >= 0,
      bestPass: highlight(best),
      worstPass: highlight(worst),
    };
  }

  private historySummary(): ContentHistorySummary {
    if (!this.config.enableContentHistory) return { status: "disabled" };
    return {
      status: "available",
      totalEntries: this.history.length,
      entries: this.history.map(({ content: _content, ...entry }) => entry),
    };
  }

  private detailedMetrics(session: SessionData): DetailedMetrics {
    const passes = session.totalPasses;
    const duration = this.duration();
    const perPass = (value: number): number => (passes > 0 ? value / passes : 0);
    return {
      totalPasses: passes,
      totalDuration: duration,
      averagePassDuration: perPass(duration),
      totalCorrections: session.totalCorrections,
      averageCorrectionsPerPass: perPass(session.totalCorrections),
      totalIssuesResolved: session.totalIssuesResolved,
      averageIssuesResolvedPerPass: perPass(session.totalIssuesResolved),
      efficiencyScore: perPass(session.totalImprovement),
    };
  }

  private beforeAfterComparison(): BeforeAfterComparison {
    const first = this.history[0];
    const last = this.history[this.history.length - 1];
    if (!first || !last) return { status: "no_data" };

    const point = (entry: Snapshot) => ({
      score: entry.score,
      timestamp: entry.timestamp,
      contentHash: entry.contentHash,
    });
    return {
      status: "available",
      before: point(first),
      after: point(last),
      improvement: last.score - first.score,
      improvementPercentage: first.score > 0 ? ((last.score - first.score) / first.score) * 100 : 0,
    };
  }
}

function passImprovements(
  issuesBefore: readonly TrackedIssue[],
  issuesAfter: readonly TrackedIssue[],
  corrections: readonly TrackedCorrection[]
): PassImprovements {
  const beforeTypes = distinct(issuesBefore.map((issue) => issue.type));
  const afterTypes = distinct(issuesAfter.map((issue) => issue.type));
  const resolvedIssueTypes = beforeTypes.filter((type) => !afterTypes.includes(type));

  const correctionsByType: Record<string, number> = {};
  for (const correction of corrections) {
    correctionsByType[correction.type] = (correctionsByType[correction.type] ?? 0) + 1;
  }

  return Object.freeze({
    resolvedIssueTypes: Object.freeze(resolvedIssueTypes),
    newIssueTypes: Object.freeze(afterTypes.filter((type) => !beforeTypes.includes(type))),
    persistentIssueTypes: Object.freeze(beforeTypes.filter((type) => afterTypes.includes(type))),
    correctionsByType: Object.freeze(correctionsByType),
    effectivenessRate: corrections.length > 0 ? resolvedIssueTypes.length / corrections.length : 0,
  });
}
