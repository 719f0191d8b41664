/**
 * Error taxonomy and error handler tests.
 *
 * Run: node --import tsx src/errors/error-handler.test.ts
 */

import { strict as assert } from "node:assert";

import { MemoryKeyValueStore } from "../cache/store.js";
import { createMemoryLogger } from "../logging/logger.js";
import { fixedClock } from "../testing/fixtures.js";
import { ErrorHandler, MAX_LOG_ENTRIES } from "./error-handler.js";
import {
  GENERIC_FALLBACK,
  categorizeError,
  degradationLevel,
  recoveryBackoff,
  simplifyErrorMessage,
  suggestThresholdAdjustments,
} from "./taxonomy.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const DAY_MS = 24 * 60 * 60 * 1000;

function setup() {
  const clock = fixedClock();
  const store = new MemoryKeyValueStore(clock.now);
  const logger = createMemoryLogger();
  const handler = new ErrorHandler({ store, logger, now: clock.now });
  return { clock, store, logger, handler };
}

// ═══════════════════════════════════════════════════════════════════════════
// TAXONOMY
// ═══════════════════════════════════════════════════════════════════════════

section("Taxonomy");

test("categorizes by substring, first category wins", () => {
  assert.equal(categorizeError("Fatal exception in corrector"), "critical");
  assert.equal(categorizeError("Request TIMEOUT"), "recoverable");
  assert.equal(categorizeError("Partial results only"), "degraded");
  assert.equal(categorizeError("Notice: cache warmed"), "informational");
  assert.equal(categorizeError("Crash during partial write"), "critical");
});

test("unmatched messages are recoverable", () => {
  assert.equal(categorizeError("Keyword density too low (0.1%, minimum 0.5%)"), "recoverable");
});

test("degradation levels by success ratio", () => {
  assert.equal(degradationLevel(1), "minor");
  assert.equal(degradationLevel(0.7), "minor");
  assert.equal(degradationLevel(0.69), "moderate");
  assert.equal(degradationLevel(0.4), "moderate");
  assert.equal(degradationLevel(0.39), "severe");
  assert.equal(degradationLevel(0), "severe");
});

test("recovery backoff grows and caps at 30 seconds", () => {
  assert.deepEqual(
    [1, 2, 3, 4].map((attempt) => recoveryBackoff(attempt, 2)),
    [1, 2, 4, 8]
  );
  assert.equal(recoveryBackoff(10, 2), 30);
  assert.equal(recoveryBackoff(3, 1.5), 2.25);
});

test("simplifies technical messages", () => {
  assert.equal(simplifyErrorMessage("Socket timeout after 30s"), "The operation took too long to complete");
  assert.equal(simplifyErrorMessage("Invalid JSON"), "The provided data is invalid");
  assert.equal(simplifyErrorMessage("Title may not be unique"), "Title may not be unique");
});

test("suggests relaxed thresholds for recurring errors", () => {
  const thresholds = DEFAULT_ENGINE_CONFIG.pipeline;
  assert.deepEqual(
    suggestThresholdAdjustments("meta_description", "Meta description too short (80 chars, minimum 110)", thresholds),
    { minMetaDescLength: 100 }
  );
  assert.deepEqual(
    suggestThresholdAdjustments("keyword_density", "Keyword density too high (4%, maximum 3%)", thresholds),
    { maxKeywordDensity: 3.5 }
  );
  assert.deepEqual(
    suggestThresholdAdjustments("readability", "Not enough transition words (10%, minimum 30%)", thresholds),
    { minTransitionWords: 25 }
  );
  assert.deepEqual(suggestThresholdAdjustments("title", "Title too long (80 chars, maximum 66)", thresholds), {});
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING AND STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

section("Logging and statistics");

test("counts repeated errors per component and message", () => {
  const { clock, handler } = setup();
  handler.logValidationFailure("title", "Title too long (80 chars, maximum 66)");
  clock.advance(60_000);
  handler.logValidationFailure("title", "Title too long (80 chars, maximum 66)");
  handler.logValidationFailure("meta_description", "Meta description too short (80 chars, minimum 110)");

  const stats = handler.getErrorStats();
  assert.equal(stats.length, 2);
  assert.equal(stats[0].component, "title");
  assert.equal(stats[0].count, 2);
  assert.equal(stats[0].firstOccurrence, "2026-01-15T00:00:00.000Z");
  assert.equal(stats[0].lastOccurrence, "2026-01-15T00:01:00.000Z");
  assert.equal(handler.getErrorStats("meta_description").length, 1);
});

test("stats outside the window are filtered out", () => {
  const { clock, handler } = setup();
  handler.logValidationFailure("title", "Old error");
  clock.advance(40 * DAY_MS);
  handler.logValidationFailure("images", "Recent error");

  assert.deepEqual(
    handler.getErrorStats().map((stat) => stat.message),
    ["Recent error"]
  );
  assert.equal(handler.getErrorStats(undefined, 60).length, 2);
});

test("writes to the logger at the severity's level", () => {
  const { handler, logger } = setup();
  handler.logValidationFailure("title", "Title may not be unique", { passNumber: 1 }, "warning");

  assert.equal(logger.records.length, 1);
  assert.equal(logger.records[0].level, "warn");
  assert.equal(logger.records[0].message, "[title] Title may not be unique");
  assert.deepEqual(logger.records[0].context, { passNumber: 1 });
});

test("recent errors are newest first and filterable", () => {
  const { handler } = setup();
  handler.logValidationFailure("title", "first");
  handler.logValidationFailure("images", "second");
  handler.logValidationFailure("title", "third");

  assert.deepEqual(
    handler.getRecentErrors().map((entry) => entry.message),
    ["third", "second", "first"]
  );
  assert.deepEqual(
    handler.getRecentErrors(1, "title").map((entry) => entry.message),
    ["third"]
  );
});

test("recent-error log is bounded", () => {
  const { handler } = setup();
  for (let i = 0; i < MAX_LOG_ENTRIES + 5; i++) {
    handler.logValidationFailure("images", `error ${i}`);
  }
  const recent = handler.getRecentErrors(1000);
  assert.equal(recent.length, MAX_LOG_ENTRIES);
  assert.equal(recent[0].message, `error ${MAX_LOG_ENTRIES + 4}`);
});

test("clearOldLogs drops entries past the cutoff", () => {
  const { clock, handler } = setup();
  handler.logValidationFailure("title", "old");
  clock.advance(100 * DAY_MS);
  handler.logValidationFailure("title", "new");

  assert.equal(handler.clearOldLogs(90), 1);
  assert.deepEqual(
    handler.getRecentErrors().map((entry) => entry.message),
    ["new"]
  );
});

test("every tenth occurrence logs a threshold suggestion", () => {
  const { handler } = setup();
  const message = "Meta description too short (80 chars, minimum 110)";
  for (let i = 0; i < 10; i++) {
    handler.logValidationFailure("meta_description", message);
  }

  const [latest] = handler.getRecentErrors(1);
  assert.equal(latest.component, "adaptive_suggestion");
  assert.equal(latest.severity, "info");
  assert.deepEqual(latest.context.suggestion, { minMetaDescLength: 100 });
  assert.equal(latest.context.occurrences, 10);
});

test("statistics persist in the store across handlers", () => {
  const { clock, store, handler } = setup();
  handler.logValidationFailure("readability", "Too much passive voice (20%, maximum 15%)");

  const second = new ErrorHandler({ store, now: clock.now });
  second.logValidationFailure("readability", "Too much passive voice (20%, maximum 15%)");
  assert.equal(second.getErrorStats()[0].count, 2);
});

test("stored data with an unexpected shape is discarded", () => {
  const { store, handler } = setup();
  store.set("seo_error_stats", "not a record");
  assert.deepEqual(handler.getErrorStats(), []);
  assert.equal(store.get("seo_error_stats"), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// MANUAL OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════

section("Manual overrides");

test("override is attached to later failures until removed", () => {
  const { handler } = setup();
  handler.addManualOverride("title", "Title may not be unique", { ignore: true });

  assert.deepEqual(handler.getManualOverride("title", "Title may not be unique")?.override, { ignore: true });
  const entry = handler.logValidationFailure("title", "Title may not be unique", {}, "warning");
  assert.deepEqual(entry.manualOverride, { ignore: true });

  assert.equal(handler.removeManualOverride("title", "Title may not be unique"), true);
  assert.equal(handler.getManualOverride("title", "Title may not be unique"), undefined);
  assert.equal(handler.removeManualOverride("title", "Title may not be unique"), false);

  const after = handler.logValidationFailure("title", "Title may not be unique", {}, "warning");
  assert.equal(after.manualOverride, undefined);
});

test("creating an override is itself logged", () => {
  const { handler } = setup();
  handler.addManualOverride("images", "Image alt text should include focus keyword", { skip: true });
  const [entry] = handler.getRecentErrors(1);
  assert.equal(entry.component, "manual_override");
  assert.equal(entry.message, "Override created for: Image alt text should include focus keyword");
});

// ═══════════════════════════════════════════════════════════════════════════
// RECOVERY AND DEGRADATION
// ═══════════════════════════════════════════════════════════════════════════

section("Recovery and degradation");

test("walks the recovery steps of a known error type", () => {
  const { handler } = setup();
  const first = handler.planRecovery("network_error", "validation", "Connection reset", 1);
  assert.equal(first.action, "retry");
  if (first.action === "retry") {
    assert.equal(first.strategy, "retry_with_backoff");
    assert.equal(first.nextStep, "retry_immediately");
    assert.equal(first.backoffDelay, 1);
    assert.equal(first.attemptNumber, 2);
  }

  const second = handler.planRecovery("network_error", "validation", "Connection reset", 2);
  assert.equal(second.action === "retry" ? second.nextStep : "", "retry_with_delay");
  assert.equal(second.action === "retry" ? second.backoffDelay : 0, 2);
});

test("last step repeats past the end of the list", () => {
  const { handler } = setup();
  const plan = handler.planRecovery("rate_limit_exceeded", "correction", "Rate limit hit", 4);
  assert.equal(plan.action, "retry");
  if (plan.action === "retry") {
    assert.equal(plan.nextStep, "queue_for_later");
    assert.equal(plan.backoffDelay, 8);
  }
});

test("exhausted recovery returns the component fallback", () => {
  const { handler } = setup();
  const plan = handler.planRecovery("network_error", "validation", "Connection reset", 3);
  assert.equal(plan.action, "max_attempts_reached");
  if (plan.action === "max_attempts_reached") {
    assert.equal(plan.fallback.primary, "full_validation");
    assert.equal(plan.message, "Maximum recovery attempts (3) reached for network_error");
  }
});

test("unknown error types use the generic fallback", () => {
  const { handler } = setup();
  const plan = handler.planRecovery("disk_full", "images", "No space left", 1);
  assert.equal(plan.action, "fallback");
  if (plan.action === "fallback") {
    assert.deepEqual(plan.fallback, GENERIC_FALLBACK);
  }
});

test("planning a recovery logs the failure with its category", () => {
  const { handler } = setup();
  handler.planRecovery("network_error", "validation", "Fatal exception", 1);
  const [entry] = handler.getRecentErrors(1);
  assert.equal(entry.severity, "error");
  assert.equal(entry.context.category, "critical");
});

test("graceful degradation reports level and rate", () => {
  const { handler } = setup();
  const report = handler.applyGracefulDegradation("correction", 1, 2);
  assert.equal(report.degraded, true);
  assert.equal(report.level, "severe");
  assert.equal(report.successRate, 33.3);
  assert.equal(report.message, "Operating in degraded mode (severe) with 33.3% success rate");
});

test("components without graceful degradation are not degraded", () => {
  const { handler } = setup();
  const report = handler.applyGracefulDegradation("images", 1, 1);
  assert.equal(report.degraded, false);
  assert.equal(report.level, undefined);
  assert.equal(report.message, "Graceful degradation not available for images");
});

// ═══════════════════════════════════════════════════════════════════════════
// USER REPORT
// ═══════════════════════════════════════════════════════════════════════════

section("User-friendly report");

test("empty error list", () => {
  const { handler } = setup();
  const report = handler.generateUserFriendlyReport([]);
  assert.equal(report.summary, "No errors detected");
  assert.equal(report.severity, "info");
  assert.deepEqual(report.recommendations, []);
});

test("groups by category with simplified messages", () => {
  const { handler } = setup();
  const report = handler.generateUserFriendlyReport([
    { component: "optimizer", message: "Fatal exception while correcting" },
    { component: "pipeline", message: "Request timeout after 30s" },
    { component: "title", message: "Title may not be unique", timestamp: "2026-01-01T00:00:00.000Z" },
  ]);

  assert.equal(report.severity, "critical");
  assert.equal(report.summary, "1 critical error(s) detected");
  assert.deepEqual(report.details.critical?.errors, [
    {
      component: "optimizer",
      message: "An unexpected error occurred",
      timestamp: "2026-01-15T00:00:00.000Z",
    },
  ]);
  assert.equal(report.details.recoverable?.count, 2);
  assert.equal(report.details.recoverable?.errors[0].message, "The operation took too long to complete");
  assert.equal(report.details.recoverable?.errors[1].timestamp, "2026-01-01T00:00:00.000Z");
  assert.equal(report.recommendations.length, 4);
  assert.equal(report.recommendations[0], "Critical errors detected - immediate action required");
});

test("informational errors only", () => {
  const { handler } = setup();
  const report = handler.generateUserFriendlyReport([{ component: "cache", message: "Notice: cold start" }]);
  assert.equal(report.severity, "info");
  assert.equal(report.summary, "Minor issues detected");
  assert.deepEqual(report.recommendations, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
