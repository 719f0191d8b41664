/**
 * Validation pipeline.
 *
 * Five steps in fixed order: meta description, keyword density,
 * readability, title, images. Each step validates one aspect, corrects it
 * when it reports an error or a warning, and re-validates the corrected
 * content. A final pass re-checks every aspect against the fully
 * corrected content; those are the errors and warnings the result
 * reports, and the score is derived from them.
 *
 * DESIGN:
 * - Results are cached per content, configuration, keywords, known titles
 *   and mode. Per-aspect measurements are cached in their own tiers.
 * - A step that throws becomes an error for its aspect. Anything else
 *   that throws becomes a single `pipeline` error and the input content
 *   comes back unchanged.
 * - An active manual override with `skipValidation: true` suppresses the
 *   matching message.
 */

import { z } from "zod";
import { Aspect } from "../config/engine/enums.js";
import type { PipelineConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Content } from "../content/schema.js";
import { configHash, contentHash, fullContentHash, keywordHash, md5 } from "../content/hash.js";
import { calculateDensity } from "../analysis/keyword-density.js";
import { createDefaultAnalyzers, measureContent, type AnalyzerSet } from "../analysis/metrics.js";
import type { ContentMetrics, KeywordSet } from "../analysis/types.js";
import { createDefaultCorrectors, type CorrectorSet } from "../correction/index.js";
import { systemRandom, type RandomSource } from "../correction/random.js";
import type { CorrectorOptions } from "../correction/types.js";
import { systemClock, type Clock, type KeyValueStore } from "../cache/store.js";
import { ValidationCache } from "../cache/validation-cache.js";
import { ErrorHandler, type DegradationReport } from "../errors/error-handler.js";
import { RetryManager } from "../retry/retry-manager.js";
import type { CorrectionStrategy } from "../retry/strategies.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import {
  ContentMetricsSchema,
  ValidationResultSchema,
  faultResult,
  scoreResult,
  type StepReport,
  type ValidationMessage,
  type ValidationResult,
} from "./result.js";
import { TitleRegistry } from "./title-registry.js";

export const STEP_ORDER: readonly Aspect[] = Aspect.options;

/** Density changes at or below this are not recorded as corrections */
const DENSITY_CHANGE_EPSILON = 0.1;

const KeywordAnalysisSchema = z
  .object({
    density: z.number(),
    subheadingUsage: z.number(),
  })
  .strict();

type KeywordAnalysis = z.infer<typeof KeywordAnalysisSchema>;

const ReadabilityAnalysisSchema = z
  .object({
    passiveVoice: z.number(),
    longSentences: z.number(),
    transitionWords: z.number(),
  })
  .strict();

type ReadabilityAnalysis = z.infer<typeof ReadabilityAnalysisSchema>;

interface Verdict {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

interface StepOutcome {
  content: Content;
  report: StepReport;
  /** Counts toward correctionsMade */
  recorded: boolean;
  fault?: string;
}

export interface RetriedValidation {
  result: ValidationResult;
  success: boolean;
  attempts: number;
  strategy: CorrectionStrategy | null;
  degradation?: DegradationReport;
}

/**
 * What the optimizer needs from a pipeline.
 */
export interface ContentValidator {
  validate(content: Content, focusKeyword: string, secondaryKeywords?: readonly string[]): ValidationResult;
  validateAndCorrect(content: Content, focusKeyword: string, secondaryKeywords?: readonly string[]): ValidationResult;
  validateAndCorrectWithRetry(
    content: Content,
    focusKeyword: string,
    secondaryKeywords?: readonly string[],
    operationName?: string
  ): Promise<RetriedValidation>;
}

export interface ValidationPipelineOptions {
  store: KeyValueStore;
  config?: PipelineConfig;
  cache?: ValidationCache;
  errorHandler?: ErrorHandler;
  retryManager?: RetryManager;
  correctors?: CorrectorSet;
  analyzers?: AnalyzerSet;
  titles?: TitleRegistry;
  random?: RandomSource;
  now?: Clock;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ValidationPipeline implements ContentValidator {
  private readonly config: PipelineConfig;
  private readonly cache: ValidationCache;
  private readonly errorHandler: ErrorHandler;
  private readonly retryManager: RetryManager;
  private readonly correctors: CorrectorSet;
  private readonly analyzers: AnalyzerSet;
  private readonly titles: TitleRegistry;
  private readonly correctorOptions: CorrectorOptions;
  private readonly configKey: string;
  private readonly logger: Logger;

  constructor(options: ValidationPipelineOptions) {
    const now = options.now ?? systemClock;
    const random = options.random ?? systemRandom;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.pipeline;
    this.logger = options.logger ?? createSilentLogger();
    this.cache = options.cache ?? new ValidationCache({ store: options.store, now, logger: this.logger });
    this.errorHandler =
      options.errorHandler ??
      new ErrorHandler({ store: options.store, logger: this.logger, now, thresholds: this.config });
    this.retryManager =
      options.retryManager ??
      new RetryManager({
        store: options.store,
        config: { ...DEFAULT_ENGINE_CONFIG.retry, maxRetries: this.config.maxRetryAttempts },
        thresholds: this.config,
        errorHandler: this.errorHandler,
        logger: this.logger,
        now,
        random,
      });
    this.correctors = options.correctors ?? createDefaultCorrectors();
    this.analyzers = options.analyzers ?? createDefaultAnalyzers();
    this.titles = options.titles ?? new TitleRegistry();
    this.correctorOptions = { thresholds: this.config, random, now };

    // Retry budget and the correction switch do not change what a check reports
    const { autoCorrection: _autoCorrection, maxRetryAttempts: _maxRetryAttempts, ...thresholds } = this.config;
    this.configKey = configHash(thresholds);
  }

  getConfig(): PipelineConfig {
    return { ...this.config };
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  getCache(): ValidationCache {
    return this.cache;
  }

  getTitleRegistry(): TitleRegistry {
    return this.titles;
  }

  /**
   * Validate, correcting each failing aspect when autoCorrection is on.
   */
  validateAndCorrect(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[] = []
  ): ValidationResult {
    return this.run(content, { focusKeyword, secondaryKeywords }, this.config.autoCorrection);
  }

  /**
   * Same checks, no correction.
   */
  validate(content: Content, focusKeyword: string, secondaryKeywords: readonly string[] = []): ValidationResult {
    return this.run(content, { focusKeyword, secondaryKeywords }, false);
  }

  /**
   * Repeat validateAndCorrect under the retry manager until a run leaves
   * no errors. Failed attempts carry the first remaining error.
   */
  async validateAndCorrectWithRetry(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[] = [],
    operationName = "validation"
  ): Promise<RetriedValidation> {
    const results: ValidationResult[] = [];
    const outcome = await this.retryManager.executeWithRetry<ValidationResult>(
      (attempt) => {
        const result = this.validateAndCorrect(attempt.content, focusKeyword, secondaryKeywords);
        results.push(result);
        const [first] = result.errors;
        return first ? { ok: false, error: first.message } : { ok: true, value: result };
      },
      content,
      { focusKeyword, secondaryKeywords, operationName }
    );

    if (outcome.success) {
      return { result: outcome.result, success: true, attempts: outcome.attempts, strategy: outcome.strategy };
    }
    return {
      result: results.at(-1) ?? this.validate(outcome.content, focusKeyword, secondaryKeywords),
      success: false,
      attempts: outcome.attempts,
      strategy: outcome.strategy,
      degradation: outcome.degradation,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RUN
  // ═══════════════════════════════════════════════════════════════════════

  private run(content: Content, keywords: KeywordSet, correct: boolean): ValidationResult {
    try {
      const key = [
        contentHash(content),
        this.configKey,
        keywordHash(keywords.focusKeyword, keywords.secondaryKeywords),
        fullContentHash(content),
        this.titles.fingerprint(),
        correct ? "corrected" : "checked",
      ];

      const cached = this.cache.get("validation", key, ValidationResultSchema);
      if (cached) {
        this.logger.debug("Validation result served from cache", { score: cached.overallScore });
        return cached;
      }

      let current = content;
      const steps: StepReport[] = [];
      const correctionsMade: Aspect[] = [];
      const suggestions: ValidationMessage[] = [];
      const faults: ValidationMessage[] = [];

      for (const aspect of STEP_ORDER) {
        const step = this.runStep(aspect, current, keywords, correct);
        current = step.content;
        steps.push(step.report);
        if (step.recorded) correctionsMade.push(aspect);
        if (step.report.note) suggestions.push({ message: step.report.note, component: aspect });
        if (step.fault) faults.push({ message: step.fault, component: aspect });
        this.logStep(step.report);
      }

      const final = this.finalValidation(current, keywords);
      const errors = [...final.errors, ...faults];
      const result: ValidationResult = {
        isValid: final.isValid && faults.length === 0,
        errors,
        warnings: final.warnings,
        suggestions,
        overallScore: scoreResult(errors.length, final.warnings.length),
        correctedContent: current,
        correctionsMade,
        metrics: this.measure(current, keywords),
        steps,
      };

      this.cache.set("validation", key, result);
      this.logger.info("Validation complete", {
        score: result.overallScore,
        errors: result.errors.length,
        warnings: result.warnings.length,
        corrections: correctionsMade.length,
      });
      return result;
    } catch (err) {
      const message = errorMessage(err);
      this.reportPipelineFault(content, keywords, message);
      return faultResult(content, `Validation pipeline error: ${message}`, "pipeline", scoreResult(1, 0));
    }
  }

  private runStep(aspect: Aspect, content: Content, keywords: KeywordSet, correct: boolean): StepOutcome {
    try {
      const verdict = this.check(aspect, content, keywords);
      const report: StepReport = { aspect, ...verdict, corrected: false, changes: [] };
      if (!correct || (verdict.errors.length === 0 && verdict.warnings.length === 0)) {
        return { content, report, recorded: false };
      }

      const outcome = this.correctors[aspect].correct(
        content,
        keywords.focusKeyword,
        keywords.secondaryKeywords,
        this.correctorOptions
      );
      if (!outcome.ok) {
        return { content, report: { ...report, note: outcome.reason }, recorded: false };
      }

      const recorded = this.isRecordedChange(aspect, content, outcome.content, keywords);
      if (recorded) {
        this.logger.debug("Correction applied", { aspect, changes: outcome.changes });
      }
      const after = this.check(aspect, outcome.content, keywords);
      return {
        content: outcome.content,
        report: { aspect, ...after, corrected: true, changes: outcome.changes },
        recorded,
      };
    } catch (err) {
      const fault = `Validation step failed: ${errorMessage(err)}`;
      return {
        content,
        report: { aspect, isValid: false, errors: [fault], warnings: [], corrected: false, changes: [] },
        recorded: false,
        fault,
      };
    }
  }

  private finalValidation(
    content: Content,
    keywords: KeywordSet
  ): { isValid: boolean; errors: ValidationMessage[]; warnings: ValidationMessage[] } {
    const errors: ValidationMessage[] = [];
    const warnings: ValidationMessage[] = [];
    let isValid = true;

    for (const aspect of STEP_ORDER) {
      let verdict: Verdict;
      try {
        verdict = this.check(aspect, content, keywords);
      } catch (err) {
        verdict = { isValid: false, errors: [`Validation step failed: ${errorMessage(err)}`], warnings: [] };
      }
      isValid = isValid && verdict.isValid;
      errors.push(...verdict.errors.map((message) => ({ message, component: aspect })));
      warnings.push(...verdict.warnings.map((message) => ({ message, component: aspect })));
    }

    return { isValid, errors, warnings };
  }

  private isRecordedChange(aspect: Aspect, before: Content, after: Content, keywords: KeywordSet): boolean {
    if (aspect === "keyword_density") {
      const delta = calculateDensity(after.body, keywords).density - calculateDensity(before.body, keywords).density;
      return Math.abs(delta) > DENSITY_CHANGE_EPSILON;
    }
    return fullContentHash(before) !== fullContentHash(after);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ASPECT CHECKS
  // ═══════════════════════════════════════════════════════════════════════

  private check(aspect: Aspect, content: Content, keywords: KeywordSet): Verdict {
    switch (aspect) {
      case "meta_description":
        return this.checkMetaDescription(content, keywords);
      case "keyword_density":
        return this.checkKeywordDensity(content, keywords);
      case "readability":
        return this.checkReadability(content);
      case "title":
        return this.checkTitle(content, keywords);
      case "images":
        return this.checkImages(content, keywords);
    }
  }

  private checkMetaDescription(content: Content, keywords: KeywordSet): Verdict {
    const { minMetaDescLength: min, maxMetaDescLength: max } = this.config;
    const { length, hasKeyword } = this.analyzers.metaDescription.analyze(content.metaDescription, keywords);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (length < min) {
      errors.push(`Meta description too short (${length} chars, minimum ${min})`);
    } else if (length > max) {
      errors.push(`Meta description too long (${length} chars, maximum ${max})`);
    }

    const keywordWarning = `Meta description should include focus keyword: ${keywords.focusKeyword}`;
    if (!hasKeyword) warnings.push(keywordWarning);

    // A missing keyword is only a warning, but the step is not valid without it
    return this.verdict("meta_description", errors, warnings, [keywordWarning]);
  }

  private checkKeywordDensity(content: Content, keywords: KeywordSet): Verdict {
    const { minKeywordDensity: min, maxKeywordDensity: max, maxSubheadingKeywordUsage } = this.config;
    const { density, subheadingUsage } = this.keywordAnalysis(content, keywords);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (density < min) {
      errors.push(`Keyword density too low (${density}%, minimum ${min}%)`);
    } else if (density > max) {
      errors.push(`Keyword density too high (${density}%, maximum ${max}%)`);
    }
    if (subheadingUsage > maxSubheadingKeywordUsage) {
      warnings.push(
        `Too many subheadings contain keyword (${subheadingUsage}%, maximum ${maxSubheadingKeywordUsage}%)`
      );
    }

    return this.verdict("keyword_density", errors, warnings);
  }

  private checkReadability(content: Content): Verdict {
    const { maxPassiveVoice, maxLongSentences, minTransitionWords } = this.config;
    const { passiveVoice, longSentences, transitionWords } = this.readabilityAnalysis(content);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (passiveVoice > maxPassiveVoice) {
      errors.push(`Too much passive voice (${passiveVoice}%, maximum ${maxPassiveVoice}%)`);
    }
    if (longSentences > maxLongSentences) {
      errors.push(`Too many long sentences (${longSentences}%, maximum ${maxLongSentences}%)`);
    }
    if (transitionWords < minTransitionWords) {
      warnings.push(`Not enough transition words (${transitionWords}%, minimum ${minTransitionWords}%)`);
    }

    return this.verdict("readability", errors, warnings);
  }

  private checkTitle(content: Content, keywords: KeywordSet): Verdict {
    const { maxTitleLength } = this.config;
    const { length, hasKeyword } = this.analyzers.title.analyze(content.title, keywords);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (length > maxTitleLength) {
      errors.push(`Title too long (${length} chars, maximum ${maxTitleLength})`);
    }
    if (!hasKeyword) {
      errors.push(`Title should contain focus keyword: ${keywords.focusKeyword}`);
    }
    if (!this.isTitleUnique(content)) {
      warnings.push("Title may not be unique");
    }

    return this.verdict("title", errors, warnings);
  }

  private checkImages(content: Content, keywords: KeywordSet): Verdict {
    const { hasImages, hasProperAltText } = this.analyzers.images.analyze(content, keywords);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.config.requireImages && !hasImages) {
      errors.push("Content should include at least one image");
    }
    if (this.config.requireKeywordInAltText && hasImages && !hasProperAltText) {
      warnings.push("Image alt text should include focus keyword");
    }

    return this.verdict("images", errors, warnings);
  }

  /**
   * Drop overridden messages, then decide validity. `blocking` lists
   * warnings that still make the step invalid.
   */
  private verdict(aspect: Aspect, errors: string[], warnings: string[], blocking: string[] = []): Verdict {
    const kept = (message: string) => !this.isOverridden(aspect, message);
    const remainingErrors = errors.filter(kept);
    const remainingWarnings = warnings.filter(kept);
    return {
      isValid: remainingErrors.length === 0 && !remainingWarnings.some((warning) => blocking.includes(warning)),
      errors: remainingErrors,
      warnings: remainingWarnings,
    };
  }

  private isOverridden(aspect: Aspect, message: string): boolean {
    const override = this.errorHandler.getManualOverride(aspect, message);
    return override?.override["skipValidation"] === true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CACHED MEASUREMENTS
  // ═══════════════════════════════════════════════════════════════════════

  private keywordAnalysis(content: Content, keywords: KeywordSet): KeywordAnalysis {
    return this.cache.remember(
      "keywords",
      [contentHash(content), keywordHash(keywords.focusKeyword, keywords.secondaryKeywords)],
      KeywordAnalysisSchema,
      () => ({
        density: this.analyzers.keywordDensity.analyze(content.body, keywords).density,
        subheadingUsage: this.analyzers.subheadings.analyze(content.body, keywords).percentage,
      })
    );
  }

  private readabilityAnalysis(content: Content): ReadabilityAnalysis {
    const keywords: KeywordSet = { focusKeyword: content.focusKeyword, secondaryKeywords: [] };
    return this.cache.remember("readability", [contentHash(content)], ReadabilityAnalysisSchema, () => ({
      passiveVoice: this.analyzers.passiveVoice.analyze(content.body, keywords).percentage,
      longSentences: this.analyzers.sentenceLength.analyze(content.body, keywords).percentage,
      transitionWords: this.analyzers.transitionWords.analyze(content.body, keywords).percentage,
    }));
  }

  private isTitleUnique(content: Content): boolean {
    return this.cache.remember(
      "title_unique",
      [contentHash(content), md5(content.title), this.titles.fingerprint()],
      z.boolean(),
      () => this.titles.isUnique(content.title)
    );
  }

  private measure(content: Content, keywords: KeywordSet): ContentMetrics {
    return this.cache.remember(
      "metrics",
      [
        contentHash(content),
        keywordHash(keywords.focusKeyword, keywords.secondaryKeywords),
        fullContentHash(content),
      ],
      ContentMetricsSchema,
      () => measureContent(content, keywords, this.analyzers)
    );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPORTING
  // ═══════════════════════════════════════════════════════════════════════

  private logStep(report: StepReport): void {
    const context = { validationStep: "component_validation", autoCorrection: this.config.autoCorrection };
    for (const error of report.errors) {
      this.errorHandler.logValidationFailure(report.aspect, error, context, "error");
    }
    for (const warning of report.warnings) {
      this.errorHandler.logValidationFailure(report.aspect, warning, context, "warning");
    }
  }

  private reportPipelineFault(content: Content, keywords: KeywordSet, message: string): void {
    try {
      this.errorHandler.logValidationFailure(
        "pipeline",
        message,
        { contentTitle: content.title, focusKeyword: keywords.focusKeyword },
        "error"
      );
    } catch (err) {
      this.logger.error("Validation pipeline error", { error: message, loggingError: errorMessage(err) });
    }
  }
}
