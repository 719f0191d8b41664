/**
 * Content model tests: text helpers, hashing and record conversion.
 *
 * Run: node --import tsx src/content/content.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  capitalize,
  countOccurrences,
  countWords,
  lowercaseFirst,
  splitSentences,
  stripTags,
  titleCase,
  truncateAtWord,
} from "./text.js";
import { contentHash, hashValue, keywordHash, md5, stableStringify } from "./hash.js";
import {
  cloneContent,
  loadContentFromFile,
  makeContent,
  parseContentRecord,
  toContentRecord,
} from "./record.js";
import { ContentValidationError } from "./errors.js";

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

function expectContentError(fn: () => unknown): ContentValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ContentValidationError) return err;
    throw err;
  }
  throw new Error("Expected ContentValidationError");
}

const workDir = mkdtempSync(join(tmpdir(), "content-record-"));

// ═══════════════════════════════════════════════════════════════════════════
// TEXT
// ═══════════════════════════════════════════════════════════════════════════

section("Text helpers");

test("stripTags drops markup and scripts", () => {
  assert.equal(stripTags("<p>Hello <b>world</b></p><script>track()</script>"), "Hello world");
});

test("block tags do not glue words together", () => {
  assert.equal(stripTags("<h2>Title</h2><p>Body</p>"), "Title Body");
});

test("words keep inner apostrophes and hyphens", () => {
  assert.equal(countWords("It's a well-known fact, isn't it?"), 6);
});

test("sentences split on runs of terminators", () => {
  assert.deepEqual(splitSentences("One. Two!! Three? "), ["One", "Two", "Three"]);
});

test("occurrences are case-insensitive and non-overlapping", () => {
  assert.equal(countOccurrences("Herb garden and HERB GARDEN", "herb garden"), 2);
  assert.equal(countOccurrences("aaa", "aa"), 1);
  assert.equal(countOccurrences("anything", "  "), 0);
});

test("truncateAtWord cuts at the last space", () => {
  assert.equal(truncateAtWord("hello brave new world", 12), "hello brave");
  assert.equal(truncateAtWord("short", 12), "short");
});

test("case helpers", () => {
  assert.equal(capitalize("herb"), "Herb");
  assert.equal(lowercaseFirst("Pick leaves"), "pick leaves");
  assert.equal(lowercaseFirst("NASA grows herbs"), "NASA grows herbs");
  assert.equal(lowercaseFirst("I water daily"), "I water daily");
  assert.equal(titleCase("herb  garden"), "Herb Garden");
});

// ═══════════════════════════════════════════════════════════════════════════
// HASHING
// ═══════════════════════════════════════════════════════════════════════════

section("Hashing");

test("stable serialization sorts keys and skips undefined", () => {
  assert.equal(
    stableStringify({ b: 1, a: [1, { d: 2, c: 3 }], e: undefined }),
    '{"a":[1,{"c":3,"d":2}],"b":1}'
  );
});

test("hash is independent of key order", () => {
  assert.equal(hashValue({ a: 1, b: 2 }), hashValue({ b: 2, a: 1 }));
  assert.notEqual(hashValue({ a: 1 }), hashValue({ a: 2 }));
});

test("md5 of the empty string", () => {
  assert.equal(md5(""), "d41d8cd98f00b204e9800998ecf8427e");
});

test("content hash covers title, body and meta description only", () => {
  const base = makeContent({ focusKeyword: "herb garden", title: "T", body: "<p>B</p>", metaDescription: "M" });
  const changedExcerpt = { ...base, excerpt: "changed" };
  assert.equal(contentHash(base), contentHash(changedExcerpt));
  assert.notEqual(contentHash(base), contentHash({ ...base, title: "Other" }));
});

test("keyword hash normalizes case, whitespace and order", () => {
  assert.equal(keywordHash(" Herb Garden ", ["B", "a"]), keywordHash("herb garden", ["a", "b"]));
});

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

section("Content records");

test("minimal record takes defaults", () => {
  const content = parseContentRecord({ title: "T", content: "<p>B</p>", focus_keyword: " herb garden " });
  assert.deepEqual(content, {
    title: "T",
    body: "<p>B</p>",
    metaDescription: "",
    excerpt: "",
    focusKeyword: "herb garden",
    secondaryKeywords: [],
    imagePrompts: [],
    internalLinks: [],
    outboundLinks: [],
  });
});

test("record converts back to snake_case", () => {
  const content = makeContent({
    focusKeyword: "herb garden",
    title: "T",
    body: "<p>B</p>",
    imagePrompts: [{ prompt: "p", alt: "a" }],
    internalLinks: [{ url: "/guides/soil", anchor: "soil" }],
  });
  const record = toContentRecord(content);
  assert.equal(record.content, "<p>B</p>");
  assert.equal(record.focus_keyword, "herb garden");
  assert.deepEqual(parseContentRecord(record), content);
});

test("missing focus keyword is rejected", () => {
  const err = expectContentError(() => parseContentRecord({ title: "T", content: "" }));
  assert.deepEqual(err.issues[0]?.path, ["focus_keyword"]);
});

test("blank focus keyword is rejected", () => {
  const err = expectContentError(() => parseContentRecord({ title: "T", content: "", focus_keyword: "   " }));
  assert.equal(err.issues[0]?.code, "too_small");
});

test("unknown fields are rejected", () => {
  const err = expectContentError(() =>
    parseContentRecord({ title: "T", content: "", focus_keyword: "k", author: "someone" })
  );
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
  assert.ok(err.format().startsWith("Content record validation failed:"));
});

test("file loading reports io errors", () => {
  const err = expectContentError(() => loadContentFromFile(join(workDir, "missing.json")));
  assert.equal(err.issues[0]?.code, "io");
});

test("file loading parses a record", () => {
  const path = join(workDir, "post.json");
  writeFileSync(path, JSON.stringify({ title: "T", content: "<p>B</p>", focus_keyword: "herb garden" }));
  assert.equal(loadContentFromFile(path).body, "<p>B</p>");
});

test("clone shares no nested arrays", () => {
  const original = makeContent({ focusKeyword: "k", imagePrompts: [{ prompt: "p", alt: "a" }] });
  const copy = cloneContent(original);
  assert.deepEqual(copy, original);
  assert.notEqual(copy.imagePrompts, original.imagePrompts);
  assert.notEqual(copy.imagePrompts[0], original.imagePrompts[0]);
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
