/**
 * Tests for the optimize CLI tool.
 *
 * Run: node --import tsx src/cli/optimize.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { config as appConfig } from "../config/index.js";
import type { ContentRecord } from "../content/index.js";
import { createMemoryLogger } from "../logging/index.js";
import type { OptimizationReport } from "../optimizer/index.js";
import { COMPLIANT_BODY, COMPLIANT_TITLE, KEYWORD } from "../testing/fixtures.js";
import { CliUsageError, USAGE, parseOptimizeArgs, runOptimize, type CliIo } from "./optimize.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

const SHORT_META = "Simple steps for growing fresh basil, mint and thyme on any sunny kitchen ledge.";

const workDir = mkdtempSync(join(tmpdir(), "seo-optimize-test-"));

function writeJson(name: string, value: unknown): string {
  const path = join(workDir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

function captureIo(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
    logger: createMemoryLogger(),
  };
}

const inputPath = writeJson("post.json", {
  title: COMPLIANT_TITLE,
  content: COMPLIANT_BODY,
  meta_description: SHORT_META,
  focus_keyword: KEYWORD,
});
const defaultsPath = writeJson("engine.json", {});

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Argument parsing");

await test("options and defaults", () => {
  assert.deepEqual(parseOptimizeArgs(["--input", "post.json", "--seed", "7", "--json"]), {
    input: "post.json",
    config: undefined,
    store: appConfig.storePath,
    output: undefined,
    json: true,
    seed: 7,
    help: false,
  });
});

await test("seed must be an integer", () => {
  assert.throws(() => parseOptimizeArgs(["--input", "post.json", "--seed", "abc"]), {
    name: "CliUsageError",
    message: "--seed must be an integer, got: abc",
  });
});

await test("unknown options are usage errors", () => {
  assert.throws(() => parseOptimizeArgs(["--verbose"]), CliUsageError);
});

// ═══════════════════════════════════════════════════════════════════════════
// ERROR PATHS
// ═══════════════════════════════════════════════════════════════════════════

section("Error paths");

await test("help exits 0", async () => {
  const io = captureIo();
  assert.equal(await runOptimize(["--help"], io), 0);
  assert.deepEqual(io.stdout, [USAGE]);
});

await test("missing --input exits 1", async () => {
  const io = captureIo();
  assert.equal(await runOptimize([], io), 1);
  assert.deepEqual(io.stderr, ["Error: Missing required option: --input"]);
});

await test("unreadable content record exits 1", async () => {
  const io = captureIo();
  const missing = join(workDir, "missing.json");
  assert.equal(await runOptimize(["--input", missing, "--config", defaultsPath], io), 1);
  const lines = io.stderr[0].split("\n");
  assert.equal(lines[0], `Cannot read content record: ${missing}`);
  assert.equal(lines[1], "Content record validation failed:");
});

await test("invalid engine configuration exits 1", async () => {
  const io = captureIo();
  const badConfig = writeJson("bad-engine.json", { optimizer: { maxIterations: 0 } });
  assert.equal(await runOptimize(["--input", inputPath, "--config", badConfig], io), 1);
  const lines = io.stderr[0].split("\n");
  assert.equal(lines[1], "Engine configuration validation failed:");
  assert.ok(lines.some((line) => line.startsWith("  - optimizer.maxIterations:")));
});

// ═══════════════════════════════════════════════════════════════════════════
// OPTIMIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Optimization");

await test("compliant result exits 0 and writes the record", async () => {
  const io = captureIo();
  const outputPath = join(workDir, "out", "post.json");
  const storePath = join(workDir, "store.json");
  const code = await runOptimize(
    ["--input", inputPath, "--config", defaultsPath, "--store", storePath, "--output", outputPath, "--json"],
    io
  );

  assert.equal(code, 0);
  const report: OptimizationReport = JSON.parse(io.stdout[0]);
  assert.equal(report.summary.terminationReason, "compliance_achieved");
  assert.equal(report.summary.initialScore, 75);
  assert.equal(report.summary.finalScore, 100);

  const written: ContentRecord = JSON.parse(readFileSync(outputPath, "utf-8"));
  assert.equal(
    written.meta_description,
    "Herb garden: Simple steps for growing fresh basil, mint and thyme on any sunny kitchen ledge. Learn more about herb garden and how it can benefit you."
  );
  assert.equal(written.focus_keyword, KEYWORD);
  assert.equal(existsSync(storePath), true);
});

await test("no compliance exits 2 with a text report", async () => {
  const io = captureIo();
  const noCorrection = writeJson("no-correction.json", { optimizer: { autoCorrection: false } });
  const code = await runOptimize(
    ["--input", inputPath, "--config", noCorrection, "--store", join(workDir, "store-2.json")],
    io
  );

  assert.equal(code, 2);
  const lines = io.stdout[0].split("\n");
  assert.equal(lines[0], "Optimization report");
  assert.ok(lines.includes("  Termination:    stagnation_detected"));
  assert.ok(lines.includes("  Score:          75 -> 75 (0)"));
  assert.ok(lines.includes("  Compliant:      no"));
  assert.ok(lines.includes("  Corrections:    none"));
  assert.ok(lines.includes("  - meta_description: Meta description too short (80 chars, minimum 110)"));
  assert.ok(lines.includes("  - meta_description: Meta description should include focus keyword: herb garden"));
});

rmSync(workDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
