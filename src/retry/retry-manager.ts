/**
 * Retry manager.
 *
 * Runs an operation under bounded retries with exponential backoff.
 * Between attempts it picks a correction strategy for the failure
 * (learned for similar content, else the pattern table, else a fallback
 * for the failure class), applies it to the content and waits.
 *
 * DESIGN:
 * - Operations return AttemptOutcome values; a thrown error is treated as
 *   a failed attempt carrying the error message.
 * - A strategy that made a retried run succeed is cached for that exact
 *   content and context, and applied before the first attempt next time.
 * - Outcomes are also learned per content signature (lengths and whether
 *   there are image prompts), so similar content reuses what worked.
 * - The wait is injected. Once started it cannot be cancelled.
 */

import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import type { PipelineConfig, RetryConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Content } from "../content/schema.js";
import { fullContentHash, hashValue } from "../content/hash.js";
import { roundTo } from "../content/text.js";
import type { KeywordSet } from "../analysis/types.js";
import { systemRandom, type RandomSource } from "../correction/random.js";
import type { CorrectorOptions } from "../correction/types.js";
import { systemClock, type Clock, type KeyValueStore } from "../cache/store.js";
import { ErrorHandler, type DegradationReport } from "../errors/error-handler.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import {
  CorrectionStrategySchema,
  FAILURE_PATTERNS,
  applyStrategy,
  classifyFailure,
  describeStrategy,
  fallbackStrategy,
  matchFailurePattern,
  type CorrectionStrategy,
} from "./strategies.js";

export interface RetryContext {
  focusKeyword: string;
  secondaryKeywords: readonly string[];
  /** Names the fallback chain used when the run degrades */
  operationName: string;
}

export interface RetryAttempt {
  /** 1-based */
  number: number;
  content: Content;
}

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type RetryOperation<T> = (
  attempt: RetryAttempt,
  context: RetryContext
) => AttemptOutcome<T> | Promise<AttemptOutcome<T>>;

/** Waits the given number of seconds */
export type Sleep = (seconds: number) => Promise<void>;

export const defaultSleep: Sleep = (seconds) => delay(seconds * 1000);

export interface RetryHistoryEntry {
  attempt: number;
  success: boolean;
  error?: string;
  /** Milliseconds */
  time: number;
  /** Strategy in effect for this attempt */
  strategy: CorrectionStrategy | null;
}

interface RetryOutcomeBase {
  /** Content as seen by the last attempt */
  content: Content;
  attempts: number;
  /** Milliseconds */
  totalTime: number;
  retryHistory: RetryHistoryEntry[];
  strategy: CorrectionStrategy | null;
}

export type RetryOutcome<T> =
  | (RetryOutcomeBase & { success: true; result: T })
  | (RetryOutcomeBase & { success: false; error: string; degradation: DegradationReport });

export interface RetryStats {
  totalRuns: number;
  successfulRuns: number;
  averageAttempts: number;
  /** Milliseconds */
  averageTime: number;
  /** Percentage, two decimals */
  successRate: number;
  /** False once the success rate falls below minSuccessRate */
  healthy: boolean;
  patternCount: number;
  learnedPatterns: number;
}

const PatternStatsSchema = z
  .object({
    failures: z.number().int(),
    successes: z.number().int(),
    successfulStrategies: z.array(CorrectionStrategySchema),
  })
  .strict();

type PatternStats = z.infer<typeof PatternStatsSchema>;

const PatternFileSchema = z.record(PatternStatsSchema);

const GlobalStatsSchema = z
  .object({
    totalRuns: z.number().int(),
    successfulRuns: z.number().int(),
    averageAttempts: z.number(),
    averageTime: z.number(),
  })
  .strict();

type GlobalStats = z.infer<typeof GlobalStatsSchema>;

const EMPTY_GLOBAL_STATS: GlobalStats = {
  totalRuns: 0,
  successfulRuns: 0,
  averageAttempts: 0,
  averageTime: 0,
};

/** Successful strategies remembered per signature */
const MAX_LEARNED_STRATEGIES = 10;

export interface RetryManagerOptions {
  store: KeyValueStore;
  config?: RetryConfig;
  /** Thresholds strategies correct toward */
  thresholds?: PipelineConfig;
  errorHandler?: ErrorHandler;
  logger?: Logger;
  now?: Clock;
  sleep?: Sleep;
  random?: RandomSource;
  /** Prefix for the manager's store keys */
  prefix?: string;
}

export class RetryManager {
  private readonly store: KeyValueStore;
  private readonly config: RetryConfig;
  private readonly correctorOptions: CorrectorOptions;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly prefix: string;

  constructor(options: RetryManagerOptions) {
    this.store = options.store;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.retry;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.prefix = options.prefix ?? "seo_";
    this.errorHandler =
      options.errorHandler ??
      new ErrorHandler({ store: this.store, logger: this.logger, now: this.now, prefix: this.prefix });
    this.correctorOptions = {
      thresholds: options.thresholds ?? DEFAULT_ENGINE_CONFIG.pipeline,
      random: options.random ?? systemRandom,
      now: this.now,
    };
  }

  /**
   * Seconds to wait after failed attempt `attempt` (1-based).
   */
  computeDelay(attempt: number): number {
    const { baseDelay, backoffMultiplier, maxDelay } = this.config;
    return Math.min(baseDelay * backoffMultiplier ** (attempt - 1), maxDelay);
  }

  async executeWithRetry<T>(
    operation: RetryOperation<T>,
    content: Content,
    context: RetryContext
  ): Promise<RetryOutcome<T>> {
    const start = this.now();
    const retryKey = this.retryKey(content, context);
    const signature = contentSignature(content);
    const keywords: KeywordSet = {
      focusKeyword: context.focusKeyword,
      secondaryKeywords: context.secondaryKeywords,
    };

    let current = content;
    let strategy: CorrectionStrategy | null = null;
    // Attempts that ran on content a strategy had just changed
    let correctedAttempts = 0;
    let changed = false;

    const cached = this.getCachedStrategy(retryKey);
    if (cached) {
      const corrected = applyStrategy(current, cached, keywords, this.correctorOptions);
      changed = fullContentHash(corrected) !== fullContentHash(current);
      current = corrected;
      strategy = cached;
      this.logger.debug("Applied cached retry strategy", {
        operation: context.operationName,
        strategy: describeStrategy(cached),
      });
    }

    const history: RetryHistoryEntry[] = [];
    let lastError = "Unknown error";
    const maxRetries = this.config.maxRetries;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (changed) correctedAttempts++;
      changed = false;

      const attemptStart = this.now();
      const outcome = await runAttempt(operation, { number: attempt, content: current }, context);
      const time = this.now() - attemptStart;

      if (outcome.ok) {
        history.push({ attempt, success: true, time, strategy });
        if (attempt > 1 && strategy) {
          this.cacheStrategy(retryKey, strategy);
        }
        if (strategy) {
          this.learnFromSuccess(signature, strategy);
        }
        const totalTime = this.now() - start;
        this.updateGlobalStats(true, attempt, totalTime);

        this.logger.debug("Operation succeeded", { operation: context.operationName, attempts: attempt });
        return {
          success: true,
          result: outcome.value,
          content: current,
          attempts: attempt,
          totalTime,
          retryHistory: history,
          strategy,
        };
      }

      lastError = outcome.error;
      history.push({ attempt, success: false, error: outcome.error, time, strategy });
      this.learnFromFailure(signature, outcome.error);
      this.logger.warn("Attempt failed", {
        operation: context.operationName,
        attempt,
        error: outcome.error,
      });

      if (attempt < maxRetries) {
        if (this.config.enableSmartCorrection) {
          const next = this.chooseStrategy(outcome.error, signature, attempt);
          if (next) {
            const corrected = applyStrategy(current, next, keywords, this.correctorOptions);
            changed = fullContentHash(corrected) !== fullContentHash(current);
            current = corrected;
            strategy = next;
          }
        }
        await this.sleep(this.computeDelay(attempt));
      }
    }

    const totalTime = this.now() - start;
    this.updateGlobalStats(false, maxRetries, totalTime);
    const degradation = this.errorHandler.applyGracefulDegradation(
      context.operationName,
      correctedAttempts,
      maxRetries - correctedAttempts
    );

    return {
      success: false,
      error: lastError,
      content: current,
      attempts: maxRetries,
      totalTime,
      retryHistory: history,
      strategy,
      degradation,
    };
  }

  getRetryStats(): RetryStats {
    const stats = this.readGlobalStats();
    const successRate = stats.totalRuns > 0 ? (stats.successfulRuns / stats.totalRuns) * 100 : 0;
    return {
      ...stats,
      successRate: roundTo(successRate, 2),
      healthy: stats.totalRuns === 0 || successRate / 100 >= this.config.minSuccessRate,
      patternCount: FAILURE_PATTERNS.length,
      learnedPatterns: Object.keys(this.readPatterns()).length,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STRATEGY SELECTION
  // ═══════════════════════════════════════════════════════════════════════

  private chooseStrategy(error: string, signature: string, attempt: number): CorrectionStrategy | undefined {
    const learned = this.getLearnedStrategy(signature);
    if (learned) return learned;

    return matchFailurePattern(error, attempt) ?? fallbackStrategy(classifyFailure(error), attempt);
  }

  private getLearnedStrategy(signature: string): CorrectionStrategy | undefined {
    if (!this.config.enablePatternLearning) return undefined;
    const learned = this.readPatterns()[`success_${signature}`]?.successfulStrategies ?? [];
    return learned[learned.length - 1];
  }

  private getCachedStrategy(retryKey: string): CorrectionStrategy | undefined {
    const key = this.strategyKey(retryKey);
    const raw = this.store.get(key);
    if (raw === undefined) return undefined;

    const parsed = CorrectionStrategySchema.safeParse(raw);
    if (parsed.success) return parsed.data;

    this.store.delete(key);
    return undefined;
  }

  private cacheStrategy(retryKey: string, strategy: CorrectionStrategy): void {
    this.store.set(this.strategyKey(retryKey), strategy, this.config.strategyCacheTtl);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // LEARNING
  // ═══════════════════════════════════════════════════════════════════════

  private learnFromFailure(signature: string, error: string): void {
    if (!this.config.enablePatternLearning) return;
    this.updatePattern(`${classifyFailure(error)}_${signature}`, (stats) => ({
      ...stats,
      failures: stats.failures + 1,
    }));
  }

  private learnFromSuccess(signature: string, strategy: CorrectionStrategy): void {
    if (!this.config.enablePatternLearning) return;
    this.updatePattern(`success_${signature}`, (stats) => ({
      ...stats,
      successes: stats.successes + 1,
      successfulStrategies: [...stats.successfulStrategies, strategy].slice(-MAX_LEARNED_STRATEGIES),
    }));
  }

  private updatePattern(key: string, update: (stats: PatternStats) => PatternStats): void {
    const patterns = this.readPatterns();
    patterns[key] = update(patterns[key] ?? { failures: 0, successes: 0, successfulStrategies: [] });
    this.store.set(this.patternsKey(), patterns);
  }

  private updateGlobalStats(success: boolean, attempts: number, totalTime: number): void {
    const stats = this.readGlobalStats();
    const totalRuns = stats.totalRuns + 1;
    this.store.set(this.globalStatsKey(), {
      totalRuns,
      successfulRuns: stats.successfulRuns + (success ? 1 : 0),
      averageAttempts: (stats.averageAttempts * stats.totalRuns + attempts) / totalRuns,
      averageTime: (stats.averageTime * stats.totalRuns + totalTime) / totalRuns,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STORAGE
  // ═══════════════════════════════════════════════════════════════════════

  private readPatterns(): Record<string, PatternStats> {
    const parsed = PatternFileSchema.safeParse(this.store.get(this.patternsKey(), {}));
    return parsed.success ? parsed.data : {};
  }

  private readGlobalStats(): GlobalStats {
    const parsed = GlobalStatsSchema.safeParse(this.store.get(this.globalStatsKey(), EMPTY_GLOBAL_STATS));
    return parsed.success ? parsed.data : { ...EMPTY_GLOBAL_STATS };
  }

  private retryKey(content: Content, context: RetryContext): string {
    return hashValue({
      content: fullContentHash(content),
      context: {
        focusKeyword: context.focusKeyword,
        secondaryKeywords: context.secondaryKeywords,
        operationName: context.operationName,
      },
    });
  }

  private strategyKey(retryKey: string): string {
    return `${this.prefix}retry_strategy_${retryKey}`;
  }

  private patternsKey(): string {
    return `${this.prefix}retry_patterns`;
  }

  private globalStatsKey(): string {
    return `${this.prefix}retry_stats`;
  }
}

/**
 * Lengths and image presence; content with the same signature shares
 * learned strategies.
 */
export function contentSignature(content: Content): string {
  return hashValue({
    titleLength: content.title.length,
    bodyLength: content.body.length,
    metaLength: content.metaDescription.length,
    hasImages: content.imagePrompts.length > 0,
  });
}

async function runAttempt<T>(
  operation: RetryOperation<T>,
  attempt: RetryAttempt,
  context: RetryContext
): Promise<AttemptOutcome<T>> {
  try {
    return await operation(attempt, context);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
