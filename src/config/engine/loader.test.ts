/**
 * Engine configuration loader tests.
 *
 * Run: node --import tsx src/config/engine/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadEngineConfig,
  loadEngineConfigFromFile,
  validateEngineConfig,
  EngineConfigError,
} from "./loader.js";
import { DEFAULT_ENGINE_CONFIG } from "./defaults.js";

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

function expectConfigError(fn: () => unknown): EngineConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineConfigError) return err;
    throw err;
  }
  throw new Error("Expected EngineConfigError");
}

const workDir = mkdtempSync(join(tmpdir(), "engine-config-"));

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

section("Defaults");

test("no input loads the defaults", () => {
  const config = loadEngineConfig();
  assert.deepEqual(config, DEFAULT_ENGINE_CONFIG);
});

test("loaded config is deeply frozen", () => {
  const config = loadEngineConfig();
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.optimizer));
  assert.ok(Object.isFrozen(config.optimizer.priorityOrder));
  assert.ok(Object.isFrozen(config.cache.ttl));
});

test("defaults object is not frozen by loading", () => {
  loadEngineConfig();
  assert.equal(Object.isFrozen(DEFAULT_ENGINE_CONFIG.optimizer), false);
});

test("detector and pipeline carry distinct thresholds", () => {
  const config = loadEngineConfig();
  assert.equal(config.detector.minMetaDescLength, 120);
  assert.equal(config.pipeline.minMetaDescLength, 110);
  assert.equal(config.detector.maxKeywordDensity, 2.5);
  assert.equal(config.pipeline.maxKeywordDensity, 3.0);
  assert.equal(config.detector.requireImages, true);
  assert.equal(config.pipeline.requireImages, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════

section("Overrides");

test("a partial section keeps the remaining defaults", () => {
  const config = loadEngineConfig({ optimizer: { maxIterations: 3 } });
  assert.equal(config.optimizer.maxIterations, 3);
  assert.equal(config.optimizer.stagnationThreshold, 2);
  assert.equal(config.retry.maxRetries, 3);
});

test("cache ttl merges per tier", () => {
  const config = loadEngineConfig({ cache: { ttl: { validation: 60 } } });
  assert.equal(config.cache.ttl.validation, 60);
  assert.equal(config.cache.ttl.keywords, 7200);
  assert.equal(config.cache.prefix, "seo_cache_");
  assert.equal(config.cache.maxMemoryEntries, 500);
});

test("priorityOrder replaces the default order", () => {
  const config = loadEngineConfig({ optimizer: { priorityOrder: ["title", "images"] } });
  assert.deepEqual(config.optimizer.priorityOrder, ["title", "images"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Validation failures");

test("unknown section is rejected", () => {
  const err = expectConfigError(() => loadEngineConfig({ telemetry: {} }));
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
});

test("unknown field inside a section is rejected", () => {
  const err = expectConfigError(() => loadEngineConfig({ retry: { jitter: true } }));
  assert.deepEqual(err.issues[0]?.path, ["retry"]);
});

test("min above max is rejected after merging", () => {
  const err = expectConfigError(() =>
    loadEngineConfig({ pipeline: { minMetaDescLength: 200 } })
  );
  assert.deepEqual(err.issues[0]?.path, ["pipeline", "minMetaDescLength"]);
  assert.equal(
    err.issues[0]?.message,
    "minMetaDescLength must be less than or equal to maxMetaDescLength"
  );
});

test("baseDelay above maxDelay is rejected", () => {
  const err = expectConfigError(() => loadEngineConfig({ retry: { baseDelay: 60 } }));
  assert.deepEqual(err.issues[0]?.path, ["retry", "baseDelay"]);
});

test("repeated aspect in priorityOrder is rejected", () => {
  const err = expectConfigError(() =>
    loadEngineConfig({ optimizer: { priorityOrder: ["title", "title"] } })
  );
  assert.deepEqual(err.issues[0]?.path, ["optimizer", "priorityOrder"]);
});

test("unknown aspect is rejected", () => {
  const err = expectConfigError(() =>
    loadEngineConfig({ optimizer: { priorityOrder: ["links"] } })
  );
  assert.deepEqual(err.issues[0]?.path, ["optimizer", "priorityOrder", 0]);
});

test("format lists every issue with its path", () => {
  const err = expectConfigError(() =>
    loadEngineConfig({ optimizer: { maxIterations: 0 }, retry: { backoffMultiplier: 0.5 } })
  );
  const text = err.format();
  assert.ok(text.startsWith("Engine configuration validation failed:"));
  assert.ok(text.includes("  - optimizer.maxIterations:"));
  assert.ok(text.includes("  - retry.backoffMultiplier:"));
});

test("validateEngineConfig reports without throwing", () => {
  const bad = validateEngineConfig({ optimizer: { targetComplianceScore: 120 } });
  assert.equal(bad.success, false);
  assert.equal(bad.errors?.length, 1);

  const good = validateEngineConfig({});
  assert.equal(good.success, true);
  assert.equal(good.config?.optimizer.targetComplianceScore, 100);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Files");

test("loads overrides from a JSON file", () => {
  const path = join(workDir, "engine.json");
  writeFileSync(path, JSON.stringify({ pipeline: { requireImages: true } }));
  const config = loadEngineConfigFromFile(path);
  assert.equal(config.pipeline.requireImages, true);
});

test("missing file is an io error", () => {
  const err = expectConfigError(() => loadEngineConfigFromFile(join(workDir, "absent.json")));
  assert.equal(err.issues[0]?.code, "io");
});

test("malformed JSON is a parse error", () => {
  const path = join(workDir, "broken.json");
  writeFileSync(path, "{ not json");
  const err = expectConfigError(() => loadEngineConfigFromFile(path));
  assert.equal(err.issues[0]?.code, "parse");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(workDir, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
