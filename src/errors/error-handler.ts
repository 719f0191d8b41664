/**
 * Error handler.
 *
 * Logs validation and correction failures through the engine logger and
 * keeps per-(component, message) statistics, a bounded recent-error log
 * and manual overrides in the injected key-value store, so the history
 * survives across sessions when the store is durable.
 *
 * Also plans recoveries from the tables in taxonomy.ts and reports
 * graceful degradation for partially successful runs.
 */

import { z } from "zod";
import { DegradationLevel, ErrorCategory } from "../config/engine/enums.js";
import type { PipelineConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { md5 } from "../content/hash.js";
import { roundTo } from "../content/text.js";
import { createSilentLogger, type LogContext, type Logger } from "../logging/logger.js";
import { getRunId } from "../logging/run-id.js";
import { systemClock, type Clock, type KeyValueStore } from "../cache/store.js";
import {
  RECOVERY_STRATEGIES,
  categorizeError,
  degradationLevel,
  fallbackFor,
  recommendationsFor,
  recoveryBackoff,
  simplifyErrorMessage,
  suggestThresholdAdjustments,
  type FallbackStrategy,
  type ThresholdSuggestion,
} from "./taxonomy.js";

export const ErrorSeverity = z.enum(["error", "warning", "info"]);
export type ErrorSeverity = z.infer<typeof ErrorSeverity>;

const ErrorStatSchema = z
  .object({
    component: z.string(),
    message: z.string(),
    severity: ErrorSeverity,
    count: z.number().int(),
    /** ISO timestamps */
    firstOccurrence: z.string(),
    lastOccurrence: z.string(),
  })
  .strict();

export type ErrorStat = z.infer<typeof ErrorStatSchema>;

const ManualOverrideSchema = z
  .object({
    component: z.string(),
    message: z.string(),
    override: z.record(z.unknown()),
    createdAt: z.string(),
    removedAt: z.string().optional(),
    active: z.boolean(),
  })
  .strict();

export type ManualOverride = z.infer<typeof ManualOverrideSchema>;

const ErrorLogEntrySchema = z
  .object({
    timestamp: z.string(),
    component: z.string(),
    message: z.string(),
    severity: ErrorSeverity,
    category: ErrorCategory,
    context: z.record(z.unknown()),
    runId: z.string().nullable(),
    manualOverride: z.record(z.unknown()).optional(),
  })
  .strict();

export type ErrorLogEntry = z.infer<typeof ErrorLogEntrySchema>;

const StatsFileSchema = z.record(ErrorStatSchema);
const OverridesFileSchema = z.record(ManualOverrideSchema);
const LogFileSchema = z.array(ErrorLogEntrySchema);

/** Recent-error log capacity */
export const MAX_LOG_ENTRIES = 200;

/** Occurrences between threshold suggestions for the same error */
export const SUGGESTION_INTERVAL = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

export type RecoveryPlan =
  | {
      action: "retry";
      strategy: string;
      nextStep: string;
      /** Seconds */
      backoffDelay: number;
      attemptNumber: number;
      message: string;
    }
  | { action: "max_attempts_reached"; fallback: FallbackStrategy; message: string }
  | { action: "fallback"; fallback: FallbackStrategy; message: string };

export interface DegradationReport {
  degraded: boolean;
  level?: DegradationLevel;
  succeeded: number;
  failed: number;
  /** Percentage, one decimal */
  successRate: number;
  fallback: FallbackStrategy;
  message: string;
}

export interface ReportableError {
  component: string;
  message: string;
  timestamp?: string;
}

export interface UserFriendlyReport {
  summary: string;
  severity: "critical" | "warning" | "info";
  details: Partial<
    Record<ErrorCategory, { count: number; errors: Required<ReportableError>[] }>
  >;
  recommendations: string[];
}

export interface ErrorHandlerOptions {
  store: KeyValueStore;
  logger?: Logger;
  now?: Clock;
  /** Prefix for the handler's store keys */
  prefix?: string;
  /** Thresholds that recurring errors are measured against */
  thresholds?: PipelineConfig;
}

export class ErrorHandler {
  private readonly store: KeyValueStore;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly thresholds: PipelineConfig;
  private readonly statsKey: string;
  private readonly logKey: string;
  private readonly overridesKey: string;

  constructor(options: ErrorHandlerOptions) {
    const prefix = options.prefix ?? "seo_";
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? systemClock;
    this.thresholds = options.thresholds ?? DEFAULT_ENGINE_CONFIG.pipeline;
    this.statsKey = `${prefix}error_stats`;
    this.logKey = `${prefix}error_log`;
    this.overridesKey = `${prefix}manual_overrides`;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════════

  logValidationFailure(
    component: string,
    message: string,
    context: LogContext = {},
    severity: ErrorSeverity = "error"
  ): ErrorLogEntry {
    const timestamp = this.timestamp();
    const override = this.getManualOverride(component, message);
    const entry: ErrorLogEntry = {
      timestamp,
      component,
      message,
      severity,
      category: categorizeError(message),
      context,
      runId: getRunId(),
      ...(override ? { manualOverride: override.override } : {}),
    };

    const log = this.readLog();
    log.push(entry);
    this.store.set(this.logKey, log.slice(-MAX_LOG_ENTRIES));

    const stat = this.updateStats(component, message, severity, timestamp);

    const logLevel = severity === "warning" ? "warn" : severity;
    this.logger.log(logLevel, `[${component}] ${message}`, context);

    if (stat.count % SUGGESTION_INTERVAL === 0) {
      this.suggestAdjustments(component, message, stat.count);
    }

    return entry;
  }

  /**
   * Statistics seen within the last `days` days, most frequent first.
   */
  getErrorStats(component?: string, days = 30): ErrorStat[] {
    const cutoff = this.now() - days * DAY_MS;
    return Object.values(this.readStats())
      .filter((stat) => Date.parse(stat.lastOccurrence) >= cutoff)
      .filter((stat) => component === undefined || stat.component === component)
      .sort((a, b) => b.count - a.count);
  }

  /**
   * Newest first.
   */
  getRecentErrors(limit = 50, component?: string): ErrorLogEntry[] {
    return this.readLog()
      .reverse()
      .filter((entry) => component === undefined || entry.component === component)
      .slice(0, limit);
  }

  /**
   * Drop log entries older than `days` days. Returns how many were dropped.
   */
  clearOldLogs(days = 90): number {
    const cutoff = this.now() - days * DAY_MS;
    const log = this.readLog();
    const kept = log.filter((entry) => Date.parse(entry.timestamp) >= cutoff);
    this.store.set(this.logKey, kept);
    return log.length - kept.length;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MANUAL OVERRIDES
  // ═══════════════════════════════════════════════════════════════════════

  addManualOverride(component: string, message: string, override: Record<string, unknown>): void {
    const overrides = this.readOverrides();
    const key = overrideKey(component, message);
    overrides[key] = {
      component,
      message,
      override,
      createdAt: this.timestamp(),
      active: true,
    };
    this.store.set(this.overridesKey, overrides);

    this.logValidationFailure(
      "manual_override",
      `Override created for: ${message}`,
      { component, overrideKey: key },
      "info"
    );
  }

  /**
   * The active override for this error, if any.
   */
  getManualOverride(component: string, message: string): ManualOverride | undefined {
    const override = this.readOverrides()[overrideKey(component, message)];
    return override?.active ? override : undefined;
  }

  /**
   * Deactivate an override. False when none was active.
   */
  removeManualOverride(component: string, message: string): boolean {
    const overrides = this.readOverrides();
    const key = overrideKey(component, message);
    const existing = overrides[key];
    if (!existing?.active) return false;

    overrides[key] = { ...existing, active: false, removedAt: this.timestamp() };
    this.store.set(this.overridesKey, overrides);
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RECOVERY AND DEGRADATION
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Next recovery step for a failure of `errorType`. Error types without a
   * recovery strategy fall back to the component's fallback chain.
   */
  planRecovery(
    errorType: string,
    component: string,
    message: string,
    attemptNumber = 1
  ): RecoveryPlan {
    const category = categorizeError(message);
    this.logValidationFailure(
      component,
      message,
      { errorType, category, attemptNumber },
      category === "critical" ? "error" : "warning"
    );

    const strategy = RECOVERY_STRATEGIES.get(errorType);
    if (!strategy) {
      return {
        action: "fallback",
        fallback: fallbackFor(component),
        message: `Applied generic fallback for ${component}: ${message}`,
      };
    }

    if (attemptNumber >= strategy.maxAttempts) {
      return {
        action: "max_attempts_reached",
        fallback: fallbackFor(component),
        message: `Maximum recovery attempts (${strategy.maxAttempts}) reached for ${errorType}`,
      };
    }

    const nextStep = strategy.steps[Math.min(attemptNumber - 1, strategy.steps.length - 1)];
    return {
      action: "retry",
      strategy: strategy.strategy,
      nextStep,
      backoffDelay: recoveryBackoff(attemptNumber, strategy.backoffMultiplier),
      attemptNumber: attemptNumber + 1,
      message: `Applying recovery strategy: ${strategy.strategy}, step: ${nextStep}`,
    };
  }

  /**
   * Classify a partially successful run by its success ratio.
   */
  applyGracefulDegradation(component: string, succeeded: number, failed: number): DegradationReport {
    const fallback = fallbackFor(component);
    const total = succeeded + failed;
    const ratio = total > 0 ? succeeded / total : 0;
    const successRate = roundTo(ratio * 100, 1);

    if (!fallback.gracefulDegradation) {
      return {
        degraded: false,
        succeeded,
        failed,
        successRate,
        fallback,
        message: `Graceful degradation not available for ${component}`,
      };
    }

    const level = degradationLevel(ratio);
    this.logValidationFailure(
      component,
      "Applying graceful degradation",
      { succeeded, failed, level },
      "warning"
    );

    return {
      degraded: true,
      level,
      succeeded,
      failed,
      successRate,
      fallback,
      message: `Operating in degraded mode (${level}) with ${successRate}% success rate`,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPORTING
  // ═══════════════════════════════════════════════════════════════════════

  generateUserFriendlyReport(errors: readonly ReportableError[]): UserFriendlyReport {
    if (errors.length === 0) {
      return { summary: "No errors detected", severity: "info", details: {}, recommendations: [] };
    }

    const details: UserFriendlyReport["details"] = {};
    for (const error of errors) {
      const category = categorizeError(error.message);
      const bucket = details[category] ?? { count: 0, errors: [] };
      bucket.count++;
      bucket.errors.push({
        component: error.component,
        message: simplifyErrorMessage(error.message),
        timestamp: error.timestamp ?? this.timestamp(),
      });
      details[category] = bucket;
    }

    let summary: string;
    let severity: UserFriendlyReport["severity"];
    if (details.critical) {
      severity = "critical";
      summary = `${details.critical.count} critical error(s) detected`;
    } else if (details.recoverable) {
      severity = "warning";
      summary = `${details.recoverable.count} recoverable error(s) detected`;
    } else if (details.degraded) {
      severity = "warning";
      summary = "Engine operating in degraded mode";
    } else {
      severity = "info";
      summary = "Minor issues detected";
    }

    const categories = new Set(ErrorCategory.options.filter((category) => details[category]));
    return { summary, severity, details, recommendations: recommendationsFor(categories) };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STORAGE
  // ═══════════════════════════════════════════════════════════════════════

  private updateStats(
    component: string,
    message: string,
    severity: ErrorSeverity,
    timestamp: string
  ): ErrorStat {
    const stats = this.readStats();
    const key = overrideKey(component, message);
    const previous = stats[key];
    const stat: ErrorStat = previous
      ? { ...previous, count: previous.count + 1, lastOccurrence: timestamp }
      : {
          component,
          message,
          severity,
          count: 1,
          firstOccurrence: timestamp,
          lastOccurrence: timestamp,
        };
    stats[key] = stat;
    this.store.set(this.statsKey, stats);
    return stat;
  }

  private suggestAdjustments(component: string, message: string, count: number): ThresholdSuggestion {
    const suggestion = suggestThresholdAdjustments(component, message, this.thresholds);
    if (Object.keys(suggestion).length > 0) {
      this.logValidationFailure(
        "adaptive_suggestion",
        "Threshold adjustment suggested",
        { component, error: message, occurrences: count, suggestion },
        "info"
      );
    }
    return suggestion;
  }

  private readStats(): Record<string, ErrorStat> {
    return this.readKey(this.statsKey, StatsFileSchema, {});
  }

  private readOverrides(): Record<string, ManualOverride> {
    return this.readKey(this.overridesKey, OverridesFileSchema, {});
  }

  private readLog(): ErrorLogEntry[] {
    return this.readKey(this.logKey, LogFileSchema, []);
  }

  private readKey<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, empty: T): T {
    const raw = this.store.get(key);
    if (raw === undefined) return empty;

    const parsed = schema.safeParse(raw);
    if (parsed.success) return parsed.data;

    this.logger.warn("Discarding stored error data with unexpected shape", { key });
    this.store.delete(key);
    return empty;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function overrideKey(component: string, message: string): string {
  return md5(`${component}|${message}`);
}
