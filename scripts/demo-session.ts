#!/usr/bin/env node
/**
 * Demo script for a full optimization session.
 * Runs the sample post through the optimizer with an in-memory store and
 * prints the pass-by-pass progression.
 */

import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

import { DEFAULT_ENGINE_CONFIG } from "../src/config/index.js";
import { loadContentFromFile } from "../src/content/index.js";
import { MemoryKeyValueStore } from "../src/cache/index.js";
import { createSeededRandom } from "../src/correction/index.js";
import { MultiPassOptimizer } from "../src/optimizer/index.js";
import { createLogger, initRunId } from "../src/logging/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SAMPLE_POST = join(__dirname, "../fixtures/sample-post.json");

console.log("=== Optimization Session Demo ===\n");

const runId = initRunId();
const logger = createLogger({ level: "warn", file: false });

console.log("1. Loading sample post...");
const content = loadContentFromFile(SAMPLE_POST);
console.log(`   ✓ "${content.title}" (focus keyword: ${content.focusKeyword})`);

console.log("\n2. Optimizing...");
const optimizer = new MultiPassOptimizer({
  store: new MemoryKeyValueStore(),
  config: DEFAULT_ENGINE_CONFIG,
  random: createSeededRandom(42),
  logger,
});
const report = await optimizer.optimize(content);
console.log(`   ✓ Session ${report.sessionId ?? "(none)"} in run ${runId}`);

console.log("\n3. Pass progression:");
for (const iteration of report.iterations) {
  const marker = iteration.rolledBack ? " (rolled back)" : "";
  console.log(
    `   - ${iteration.type} ${iteration.iteration}: score ${iteration.score}, ` +
      `${iteration.errorCount} errors, ${iteration.warningCount} warnings${marker}`
  );
}

console.log("\n4. Correction prompts:");
for (const prompt of report.summary.correctionPrompts) {
  console.log(`   - [${prompt.priority}] ${prompt.instruction}`);
}

console.log("\n5. Outcome:");
console.log(`   - Termination: ${report.summary.terminationReason}`);
console.log(`   - Score: ${report.summary.initialScore} -> ${report.summary.finalScore}`);
console.log(`   - Compliant: ${report.success ? "yes" : "no"}`);
console.log(`   - Title: ${report.content.title}`);
console.log(`   - Meta: ${report.content.metaDescription}`);

const trends = optimizer.getImprovementTracker().analyzeTrends();
if (trends.status === "available") {
  console.log(`   - Trend: ${trends.trendDirection} (velocity ${trends.velocity})`);
}

console.log("\n=== Demo complete ===");
