/**
 * Multi-pass optimizer.
 *
 * Drives content toward compliance one pass at a time:
 *
 *   Baseline ──compliant──▶ Terminated(initial_compliance)
 *      │
 *      ▼
 *   Iterating ──▶ Terminated(compliance_achieved | max_iterations_reached
 *                            | stagnation_detected | insufficient_improvement)
 *
 * Each pass derives correction prompts from the previous result, runs the
 * pipeline, measures the improvement, checks the markup against the
 * content the pass started from (rolling back on major violations) and
 * records the pass. The session returns the best content it visited,
 * never simply the last.
 *
 * DESIGN: Faults inside the pipeline come back as pipeline errors. A
 * fault anywhere else ends the session with critical_error and the best
 * content seen so far.
 */

import type { Aspect, TerminationReason } from "../config/engine/enums.js";
import type { EngineConfig, OptimizerConfig, PipelineConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Content } from "../content/schema.js";
import { systemClock, type Clock, type KeyValueStore } from "../cache/store.js";
import { ValidationCache } from "../cache/validation-cache.js";
import type { CorrectorSet } from "../correction/index.js";
import { systemRandom, type RandomSource } from "../correction/random.js";
import { ErrorHandler, type UserFriendlyReport } from "../errors/error-handler.js";
import { IssueDetector } from "../issues/detector.js";
import { RetryManager, type Sleep } from "../retry/retry-manager.js";
import { faultResult, type ValidationResult } from "../pipeline/result.js";
import type { TitleRegistry } from "../pipeline/title-registry.js";
import { ValidationPipeline, type ContentValidator } from "../pipeline/validation-pipeline.js";
import { StructurePreserver } from "../structure/structure-preserver.js";
import { ImprovementTracker, type Improvements } from "../tracking/improvement-tracker.js";
import {
  ProgressTracker,
  type ComprehensiveReport,
  type StrategyDescriptor,
  type TrackedIssue,
} from "../tracking/progress-tracker.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { generateCorrectionPrompts, type CorrectionPrompt } from "./correction-prompts.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface IterationRecord {
  iteration: number;
  type: "baseline" | "optimization";
  score: number;
  isValid: boolean;
  errorCount: number;
  warningCount: number;
  timestamp: string;
  /** The pass broke the markup and was undone */
  rolledBack: boolean;
  /** Against the previous iteration */
  scoreImprovement: number;
  errorReduction: number;
  warningReduction: number;
  improvementDetails?: Improvements;
}

export interface OptimizerLogEntry {
  level: "warn" | "error";
  type?: "critical_error";
  message: string;
  iteration: number;
  timestamp: string;
}

export interface OptimizationSummary {
  initialScore: number;
  finalScore: number;
  improvement: number;
  iterationsUsed: number;
  complianceAchieved: boolean;
  terminationReason: TerminationReason;
  /** Aspects corrected, per pass in step order */
  correctionsMade: Aspect[];
  /** Distinct aspects corrected over the session */
  issuesResolved: Aspect[];
  correctionPrompts: CorrectionPrompt[];
}

export interface OptimizationReport {
  success: boolean;
  content: Content;
  validationResult: ValidationResult;
  summary: OptimizationSummary;
  iterations: IterationRecord[];
  progressReport: ComprehensiveReport | null;
  errorLog: OptimizerLogEntry[];
  userReport: UserFriendlyReport;
  /** Null when the session faulted before the baseline */
  sessionId: string | null;
  /** Milliseconds */
  duration: number;
}

export type OptimizerStats =
  | { status: "no_data" }
  | {
      status: "available";
      totalIterations: number;
      scoreProgression: number[];
      averageScore: number;
      maxScore: number;
      minScore: number;
      finalImprovement: number;
      terminationReason: TerminationReason | null;
    };

export interface MultiPassOptimizerOptions {
  store: KeyValueStore;
  config?: EngineConfig;
  /** Replaces the pipeline built from config */
  pipeline?: ContentValidator;
  correctors?: CorrectorSet;
  titles?: TitleRegistry;
  errorHandler?: ErrorHandler;
  improvementTracker?: ImprovementTracker;
  progressTracker?: ProgressTracker;
  structurePreserver?: StructurePreserver;
  random?: RandomSource;
  sleep?: Sleep;
  now?: Clock;
  logger?: Logger;
}

const STRATEGY_NAME = "multi_pass_correction";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Pipeline messages as tracked issues, typed by component.
 */
function trackedIssues(result: ValidationResult): TrackedIssue[] {
  return [...result.errors, ...result.warnings].map((entry) => ({
    type: entry.component,
    description: entry.message,
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// OPTIMIZER
// ═══════════════════════════════════════════════════════════════════════════

export class MultiPassOptimizer {
  private readonly config: OptimizerConfig;
  private readonly pipelineConfig: PipelineConfig;
  private readonly pipeline: ContentValidator;
  private readonly errorHandler: ErrorHandler;
  private readonly improvementTracker: ImprovementTracker;
  private readonly progressTracker: ProgressTracker;
  private readonly structurePreserver: StructurePreserver;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly strategy: StrategyDescriptor;

  private iterations: IterationRecord[] = [];
  private errorLog: OptimizerLogEntry[] = [];
  private correctionsMade: Aspect[] = [];
  private correctionPrompts: CorrectionPrompt[] = [];
  private currentIteration = 0;
  private terminationReason: TerminationReason | null = null;
  private sessionId: string | null = null;

  constructor(options: MultiPassOptimizerOptions) {
    const engine = options.config ?? DEFAULT_ENGINE_CONFIG;
    const store = options.store;
    const now = options.now ?? systemClock;
    const random = options.random ?? systemRandom;
    const logger = options.logger ?? createSilentLogger();

    this.config = engine.optimizer;
    this.pipelineConfig = { ...engine.pipeline, autoCorrection: engine.optimizer.autoCorrection };
    this.now = now;
    this.logger = logger;
    this.strategy = {
      name: STRATEGY_NAME,
      type: "targeted_correction",
      priorityOrder: this.config.priorityOrder,
    };

    this.errorHandler =
      options.errorHandler ?? new ErrorHandler({ store, logger, now, thresholds: this.pipelineConfig });
    this.pipeline = options.pipeline ?? this.createPipeline(engine, options, random);
    this.improvementTracker =
      options.improvementTracker ??
      new ImprovementTracker({
        config: engine.improvement,
        detector: new IssueDetector({ thresholds: engine.detector, logger }),
        now,
        logger,
      });
    this.progressTracker =
      options.progressTracker ?? new ProgressTracker({ config: engine.progress, now, logger });
    this.structurePreserver =
      options.structurePreserver ?? new StructurePreserver({ config: engine.structure, now, logger });
  }

  private createPipeline(engine: EngineConfig, options: MultiPassOptimizerOptions, random: RandomSource): ValidationPipeline {
    const { store } = options;
    return new ValidationPipeline({
      store,
      config: this.pipelineConfig,
      cache: new ValidationCache({ store, config: engine.cache, now: this.now, logger: this.logger }),
      errorHandler: this.errorHandler,
      retryManager: new RetryManager({
        store,
        config: engine.retry,
        thresholds: this.pipelineConfig,
        errorHandler: this.errorHandler,
        logger: this.logger,
        now: this.now,
        sleep: options.sleep,
        random,
      }),
      correctors: options.correctors,
      titles: options.titles,
      random,
      now: this.now,
      logger: this.logger,
    });
  }

  getConfig(): OptimizerConfig {
    return { ...this.config };
  }

  getProgressTracker(): ProgressTracker {
    return this.progressTracker;
  }

  getImprovementTracker(): ImprovementTracker {
    return this.improvementTracker;
  }

  getStructurePreserver(): StructurePreserver {
    return this.structurePreserver;
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  rollbackToPass(passNumber: number): Content | null {
    return this.progressTracker.rollbackToPass(passNumber);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SESSION
  // ═══════════════════════════════════════════════════════════════════════

  async optimize(content: Content): Promise<OptimizationReport> {
    const started = this.now();
    const { focusKeyword, secondaryKeywords } = content;
    this.reset();
    this.logger.info("Starting multi-pass optimization", { title: content.title, focusKeyword });

    let bestContent = content;
    let sessionStarted = false;

    try {
      const baseline = this.pipeline.validate(content, focusKeyword, secondaryKeywords);
      this.trackIteration(0, "baseline", baseline, false);
      this.logger.info("Baseline score", { score: baseline.overallScore });

      this.sessionId = this.progressTracker.startSession(content, baseline.overallScore, trackedIssues(baseline));
      sessionStarted = true;
      this.structurePreserver.createSnapshot(content, "initial_content");

      if (baseline.overallScore >= this.config.targetComplianceScore) {
        return this.finish(content, baseline, "initial_compliance", started);
      }

      let current = content;
      let previous = baseline;
      let bestScore = baseline.overallScore;
      let stagnation = 0;
      let reason: TerminationReason = "max_iterations_reached";

      for (let iteration = 1; iteration <= this.config.maxIterations; iteration++) {
        this.currentIteration = iteration;
        this.logger.info("Starting optimization pass", { iteration });

        const before = current;
        const prompts = generateCorrectionPrompts(previous, {
          focusKeyword,
          priorityOrder: this.config.priorityOrder,
          thresholds: this.pipelineConfig,
          timestamp: this.timestamp(),
        });
        this.correctionPrompts.push(...prompts);

        const corrected = await this.runPass(before, focusKeyword, secondaryKeywords);
        const preservation = this.structurePreserver.preserveContent(before, corrected.correctedContent);
        let result = corrected;
        if (preservation.rolledBack) {
          this.note("warn", "Content structure check failed, rolled back to the content before the pass");
          current = preservation.content;
          result = this.pipeline.validate(current, focusKeyword, secondaryKeywords);
        } else {
          current = preservation.content;
          this.correctionsMade.push(...result.correctionsMade);
          this.structurePreserver.createSnapshot(current, `iteration_${iteration}`);
        }

        const measurement = this.improvementTracker.validateAndMeasureImprovement(
          before,
          current,
          focusKeyword,
          secondaryKeywords,
          iteration
        );

        const score = result.overallScore;
        this.trackIteration(iteration, "optimization", result, preservation.rolledBack, measurement.improvements);
        this.progressTracker.recordPass({
          passNumber: iteration,
          before,
          after: current,
          beforeScore: previous.overallScore,
          afterScore: score,
          issuesBefore: trackedIssues(previous),
          issuesAfter: trackedIssues(result),
          corrections: prompts,
          strategy: this.strategy,
        });
        this.logger.info("Pass complete", { iteration, score });

        const delta = score - previous.overallScore;
        const wasStagnating = stagnation > 0;
        stagnation = score >= bestScore + this.config.minImprovementThreshold ? 0 : stagnation + 1;
        if (score > bestScore) {
          bestContent = current;
          bestScore = score;
        }

        previous = result;
        const stop = this.checkTermination(score, iteration, stagnation, delta, wasStagnating);
        if (stop) {
          reason = stop;
          break;
        }
      }

      this.logger.info("Optimization terminated", { reason, iterations: this.currentIteration });
      const final = this.pipeline.validate(bestContent, focusKeyword, secondaryKeywords);
      return this.finish(bestContent, final, reason, started);
    } catch (err) {
      const message = errorMessage(err);
      this.note("error", `Critical optimization error: ${message}`, "critical_error");
      const fallback = faultResult(bestContent, `Optimization failed: ${message}`, "optimizer", 0);
      return this.finish(bestContent, fallback, "critical_error", started, sessionStarted);
    }
  }

  /**
   * Null while the pass may continue.
   */
  private checkTermination(
    score: number,
    iteration: number,
    stagnation: number,
    delta: number,
    wasStagnating: boolean
  ): TerminationReason | null {
    if (score >= this.config.targetComplianceScore) return "compliance_achieved";
    if (iteration >= this.config.maxIterations) return "max_iterations_reached";
    if (this.config.enableEarlyTermination && stagnation >= this.config.stagnationThreshold) {
      return "stagnation_detected";
    }
    if (delta < this.config.minImprovementThreshold && wasStagnating) return "insufficient_improvement";
    return null;
  }

  private async runPass(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[]
  ): Promise<ValidationResult> {
    if (!this.config.retryPasses) {
      return this.pipeline.validateAndCorrect(content, focusKeyword, secondaryKeywords);
    }

    const retried = await this.pipeline.validateAndCorrectWithRetry(
      content,
      focusKeyword,
      secondaryKeywords,
      "optimization"
    );
    if (!retried.success) {
      this.note("warn", `Pass did not clear every error after ${retried.attempts} attempts`);
    }
    return retried.result;
  }

  private finish(
    content: Content,
    result: ValidationResult,
    reason: TerminationReason,
    started: number,
    sessionStarted = true
  ): OptimizationReport {
    this.terminationReason = reason;
    const complianceAchieved = result.overallScore >= this.config.targetComplianceScore;

    let progressReport: ComprehensiveReport | null = null;
    if (sessionStarted) {
      this.progressTracker.endSession(complianceAchieved, reason);
      progressReport = this.progressTracker.generateComprehensiveReport();
    }

    const initialScore = this.iterations[0]?.score ?? 0;
    const duration = this.now() - started;
    this.logger.info("Optimization complete", {
      reason,
      initialScore,
      finalScore: result.overallScore,
      duration,
    });

    return {
      success: complianceAchieved,
      content,
      validationResult: result,
      summary: {
        initialScore,
        finalScore: result.overallScore,
        improvement: result.overallScore - initialScore,
        iterationsUsed: this.progressTracker.getPassRecords().length,
        complianceAchieved,
        terminationReason: reason,
        correctionsMade: [...this.correctionsMade],
        issuesResolved: [...new Set(this.correctionsMade)],
        correctionPrompts: [...this.correctionPrompts],
      },
      iterations: [...this.iterations],
      progressReport,
      errorLog: [...this.errorLog],
      userReport: this.errorHandler.generateUserFriendlyReport(result.errors),
      sessionId: this.sessionId,
      duration,
    };
  }

  getStats(): OptimizerStats {
    if (this.iterations.length === 0) return { status: "no_data" };

    const scores = this.iterations.map((iteration) => iteration.score);
    return {
      status: "available",
      totalIterations: this.iterations.length,
      scoreProgression: scores,
      averageScore: scores.reduce((sum, score) => sum + score, 0) / scores.length,
      maxScore: Math.max(...scores),
      minScore: Math.min(...scores),
      finalImprovement: scores[scores.length - 1] - scores[0],
      terminationReason: this.terminationReason,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private reset(): void {
    this.iterations = [];
    this.errorLog = [];
    this.correctionsMade = [];
    this.correctionPrompts = [];
    this.currentIteration = 0;
    this.terminationReason = null;
    this.sessionId = null;
    this.improvementTracker.clearHistory();
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  private note(level: OptimizerLogEntry["level"], message: string, type?: OptimizerLogEntry["type"]): void {
    this.logger.log(level, message, { iteration: this.currentIteration });
    this.errorLog.push({
      level,
      ...(type ? { type } : {}),
      message,
      iteration: this.currentIteration,
      timestamp: this.timestamp(),
    });
  }

  private trackIteration(
    iteration: number,
    type: IterationRecord["type"],
    result: ValidationResult,
    rolledBack: boolean,
    improvementDetails?: Improvements
  ): void {
    const previous = this.iterations[this.iterations.length - 1];
    const record: IterationRecord = {
      iteration,
      type,
      score: result.overallScore,
      isValid: result.isValid,
      errorCount: result.errors.length,
      warningCount: result.warnings.length,
      timestamp: this.timestamp(),
      rolledBack,
      scoreImprovement: previous ? result.overallScore - previous.score : 0,
      errorReduction: previous ? previous.errorCount - result.errors.length : 0,
      warningReduction: previous ? previous.warningCount - result.warnings.length : 0,
    };
    if (improvementDetails) {
      record.improvementDetails = improvementDetails;
    }
    this.iterations.push(record);
  }
}
