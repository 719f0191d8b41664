/**
 * Structure preserver tests.
 *
 * Run: node --import tsx src/structure/structure-preserver.test.ts
 */

import { strict as assert } from "node:assert";

import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { StructureConfig } from "../config/engine/schema.js";
import { createMemoryLogger } from "../logging/logger.js";
import { COMPLIANT_BODY, COMPLIANT_TITLE, compliantPost, fixedClock } from "../testing/fixtures.js";
import { StructurePreserver, analyzeStructure, generateChecksum, textSimilarity } from "./structure-preserver.js";

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

function preserver(config: Partial<StructureConfig> = {}): StructurePreserver {
  return new StructurePreserver({
    config: { ...DEFAULT_ENGINE_CONFIG.structure, ...config },
    now: fixedClock().now,
  });
}

const SECOND_PARAGRAPH_START = COMPLIANT_BODY.indexOf("<p>Start with");
const SECOND_PARAGRAPH_END = COMPLIANT_BODY.indexOf("</p>", SECOND_PARAGRAPH_START) + "</p>".length;

/** Compliant body without its second paragraph */
const ONE_PARAGRAPH_BODY =
  COMPLIANT_BODY.slice(0, SECOND_PARAGRAPH_START) + COMPLIANT_BODY.slice(SECOND_PARAGRAPH_END);

/** Compliant body without its second heading */
const ONE_HEADING_BODY = COMPLIANT_BODY.replace("<h2>Choosing plants</h2>", "");

// ═══════════════════════════════════════════════════════════════════════════
// ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

section("Analysis");

test("counts tags, headings and images", () => {
  const structure = analyzeStructure(compliantPost());
  assert.deepEqual(structure.tags, { h2: 2, p: 2, img: 1 });
  assert.deepEqual(structure.headings, [
    { tag: "h2", text: "Planning a herb garden" },
    { tag: "h2", text: "Choosing plants" },
  ]);
  assert.deepEqual(structure.images, [{ src: "garden.jpg", alt: "Raised herb garden beside a kitchen window" }]);
  assert.equal(structure.paragraphCount, 2);
  assert.equal(structure.headingCounts.h2, 2);
  assert.equal(structure.headingCounts.h3, 0);
  assert.equal(structure.listCount, 0);
  assert.equal(structure.bodyLength, 598);
});

test("checksum ignores whitespace between tags", () => {
  const spaced = compliantPost({ body: COMPLIANT_BODY.replace(/></g, ">\n  <") });
  assert.equal(generateChecksum(spaced), generateChecksum(compliantPost()));
  assert.notEqual(generateChecksum(compliantPost({ title: "Other" })), generateChecksum(compliantPost()));
});

test("text similarity", () => {
  assert.equal(textSimilarity("same", "same"), 100);
  assert.equal(textSimilarity("", ""), 100);
  assert.equal(textSimilarity("abc", "xyz"), 0);
  assert.equal(Math.round(textSimilarity(COMPLIANT_TITLE, "Winter Soup Recipes") * 100) / 100, 23.08);
});

// ═══════════════════════════════════════════════════════════════════════════
// INTEGRITY
// ═══════════════════════════════════════════════════════════════════════════

section("Integrity");

test("unchanged content is valid", () => {
  const report = preserver().validateIntegrity(compliantPost(), compliantPost());
  assert.equal(report.isValid, true);
  assert.deepEqual(report.violations, []);
  assert.deepEqual(report.warnings, []);
  assert.equal(report.intentPreserved, true);
});

test("dropping a paragraph breaks formatting and intent", () => {
  const report = preserver().validateIntegrity(compliantPost(), compliantPost({ body: ONE_PARAGRAPH_BODY }));
  assert.equal(report.isValid, false);
  assert.deepEqual(report.violations, [
    {
      type: "formatting_paragraph_count_changed",
      severity: "minor",
      original: 2,
      modified: 1,
      variation: 50,
    },
  ]);
  assert.equal(report.formattingPreserved, false);
  assert.deepEqual(report.warnings, [
    { type: "intent_content_length_changed", original: 598, modified: 363, percentage: 39.3 },
  ]);
});

test("dropping a heading is a major violation", () => {
  const report = preserver().validateIntegrity(compliantPost(), compliantPost({ body: ONE_HEADING_BODY }));
  assert.deepEqual(report.violations, [
    { type: "structure_heading_count_changed", severity: "major", original: 2, modified: 1 },
  ]);
  assert.equal(report.formattingPreserved, true);
});

test("tag counts tolerate a change of one", () => {
  const extra = compliantPost({ body: `${COMPLIANT_BODY}<p>One more.</p><p>And another.</p>` });
  const report = preserver({ preserveFormatting: false, preserveIntent: false }).validateIntegrity(
    compliantPost(),
    extra
  );
  assert.deepEqual(report.violations, [
    { type: "structure_tag_count_changed", severity: "major", tag: "p", original: 2, modified: 4 },
  ]);
});

test("a rewritten title changes intent", () => {
  const report = preserver().validateIntegrity(compliantPost(), compliantPost({ title: "Winter Soup Recipes" }));
  assert.equal(report.isValid, true);
  assert.deepEqual(report.warnings, [
    {
      type: "intent_title_changed_significantly",
      original: COMPLIANT_TITLE,
      modified: "Winter Soup Recipes",
      percentage: 23.08,
    },
  ]);
});

test("a prefixed title keeps intent", () => {
  const report = preserver().validateIntegrity(
    compliantPost(),
    compliantPost({ title: "Herb Garden: How to Plan a Herb Garden at Home" })
  );
  assert.deepEqual(report.warnings, []);
});

test("disabled checks report nothing", () => {
  const report = preserver({ preserveStructure: false, preserveFormatting: false, preserveIntent: false })
    .validateIntegrity(compliantPost(), compliantPost({ body: "<p>Gone.</p>" }));
  assert.equal(report.isValid, true);
  assert.deepEqual(report.warnings, []);
});

test("checksums are recorded per check", () => {
  const instance = preserver();
  instance.validateIntegrity(compliantPost(), compliantPost({ title: "Other" }));
  const [record] = instance.getChecksums();
  assert.equal(record.original, generateChecksum(compliantPost()));
  assert.equal(record.modified, generateChecksum(compliantPost({ title: "Other" })));
  assert.equal(record.timestamp, "2026-01-15T00:00:00.000Z");

  const unrecorded = preserver({ enableChecksums: false });
  unrecorded.validateIntegrity(compliantPost(), compliantPost());
  assert.equal(unrecorded.getChecksums().length, 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// PRESERVATION AND ROLLBACK
// ═══════════════════════════════════════════════════════════════════════════

section("Preservation and rollback");

test("major violation rolls back to the original", () => {
  const original = compliantPost();
  const result = preserver().preserveContent(original, compliantPost({ body: ONE_HEADING_BODY }));
  assert.equal(result.success, false);
  assert.equal(result.rolledBack, true);
  assert.deepEqual(result.content, original);
  assert.notEqual(result.content, original);
});

test("minor violation keeps the optimized content", () => {
  const optimized = compliantPost({ body: `${COMPLIANT_BODY}<ul><li>Basil</li></ul>` });
  const result = preserver().preserveContent(compliantPost(), optimized);
  assert.equal(result.success, false);
  assert.equal(result.rolledBack, false);
  assert.equal(result.content, optimized);
  assert.deepEqual(
    result.validation.violations.map((violation) => violation.type),
    ["formatting_list_count_changed"]
  );
});

test("clean pass succeeds", () => {
  const optimized = compliantPost({ metaDescription: "A new meta description." });
  const result = preserver().preserveContent(compliantPost(), optimized);
  assert.equal(result.success, true);
  assert.equal(result.rolledBack, false);
  assert.equal(result.content, optimized);
});

test("rollback disabled keeps the optimized content", () => {
  const logger = createMemoryLogger();
  const instance = new StructurePreserver({
    config: { ...DEFAULT_ENGINE_CONFIG.structure, enableRollback: false },
    logger,
  });
  const optimized = compliantPost({ body: ONE_HEADING_BODY });
  const result = instance.preserveContent(compliantPost(), optimized);
  assert.equal(result.rolledBack, false);
  assert.equal(result.content, optimized);
  assert.equal(instance.rollback(result.snapshotId), null);
  assert.equal(logger.records.at(-1)?.message, "Rollback disabled in configuration");
});

test("unknown snapshot returns null", () => {
  const logger = createMemoryLogger();
  const instance = new StructurePreserver({ logger });
  assert.equal(instance.rollback("snapshot_99"), null);
  assert.equal(logger.records.at(-1)?.level, "error");
});

test("rollback returns a copy", () => {
  const instance = preserver();
  const id = instance.createSnapshot(compliantPost(), "baseline");
  const first = instance.rollback(id);
  assert.ok(first);
  first.content.imagePrompts.push({ prompt: "x", alt: "y" });
  const second = instance.rollback(id);
  assert.equal(second?.content.imagePrompts.length, 0);
  assert.equal(second?.label, "baseline");
});

test("oldest snapshots are evicted", () => {
  const instance = preserver({ maxSnapshots: 2 });
  instance.createSnapshot(compliantPost(), "one");
  instance.createSnapshot(compliantPost(), "two");
  instance.createSnapshot(compliantPost(), "three");
  assert.deepEqual(
    instance.getSnapshots().map((snapshot) => snapshot.label),
    ["two", "three"]
  );
  assert.equal(instance.getLatestSnapshot()?.id, "snapshot_3");
  assert.equal(instance.getPreservationStats().totalSnapshots, 2);

  instance.clearSnapshots();
  assert.equal(instance.getLatestSnapshot(), null);
});

test("corruption detection", () => {
  const instance = preserver();
  const checksum = generateChecksum(compliantPost());
  assert.equal(instance.detectCorruption(compliantPost(), checksum).isCorrupted, false);
  const report = instance.detectCorruption(compliantPost({ metaDescription: "changed" }), checksum);
  assert.equal(report.isCorrupted, true);
  assert.equal(report.expectedChecksum, checksum);
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
