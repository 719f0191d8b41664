/**
 * Corrector tests.
 *
 * Run: node --import tsx src/correction/correctors.test.ts
 */

import { strict as assert } from "node:assert";

import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { makeContent } from "../content/record.js";
import { calculateDensity } from "../analysis/keyword-density.js";
import { TransitionWordAnalyzer } from "../analysis/readability.js";
import {
  KEYWORD,
  FIXED_NOW,
  compliantPost,
  firstChoiceRandom,
  lowDensityBody,
} from "../testing/fixtures.js";
import { createSeededRandom } from "./random.js";
import type { CorrectionResult, CorrectorOptions } from "./types.js";
import type { Content } from "../content/schema.js";
import {
  MetaDescriptionCorrector,
  expandDescription,
  insertKeyword,
  trimDescription,
} from "./meta-description.js";
import { KeywordDensityCorrector, reduceDensity, rewriteSubheadings } from "./keyword-density.js";
import {
  ReadabilityCorrector,
  addTransitions,
  splitSentence,
  toActive,
} from "./readability.js";
import {
  TitleCorrector,
  removeFillerWords,
  truncatePreservingKeyword,
} from "./title.js";
import { ImageCorrector, optimizeAltText } from "./images.js";
import { createDefaultCorrectors } from "./index.js";

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

const options: CorrectorOptions = {
  thresholds: DEFAULT_ENGINE_CONFIG.pipeline,
  random: firstChoiceRandom,
  now: () => FIXED_NOW,
};

function corrected(result: CorrectionResult): Content {
  if (!result.ok) throw new Error(`Expected a correction, got: ${result.reason}`);
  return result.content;
}

// ═══════════════════════════════════════════════════════════════════════════
// RANDOM SOURCE
// ═══════════════════════════════════════════════════════════════════════════

section("Random source");

test("same seed gives the same sequence", () => {
  const a = createSeededRandom(42);
  const b = createSeededRandom(42);
  const first = [a.next(), a.next(), a.next()];
  assert.deepEqual([b.next(), b.next(), b.next()], first);
});

test("values stay in range", () => {
  const random = createSeededRandom(7);
  for (let i = 0; i < 200; i++) {
    const value = random.next();
    assert.ok(value >= 0 && value < 1);
    const index = random.int(5);
    assert.ok(Number.isInteger(index) && index >= 0 && index < 5);
  }
});

test("pick returns a member", () => {
  const random = createSeededRandom(3);
  const items: [string, ...string[]] = ["a", "b", "c"];
  assert.ok(items.includes(random.pick(items)));
});

// ═══════════════════════════════════════════════════════════════════════════
// META DESCRIPTION
// ═══════════════════════════════════════════════════════════════════════════

section("Meta description");

test("80-character description without keyword is fixed", () => {
  const meta = "Simple steps for growing fresh basil, mint and thyme on any sunny kitchen ledge.";
  assert.equal(meta.length, 80);

  const content = corrected(
    new MetaDescriptionCorrector().correct(makeContent({ focusKeyword: KEYWORD, metaDescription: meta }), KEYWORD, [], options)
  );
  assert.equal(
    content.metaDescription,
    "Herb garden: Simple steps for growing fresh basil, mint and thyme on any sunny kitchen ledge. " +
      "Learn more about herb garden and how it can benefit you."
  );
  assert.equal(content.metaDescription.length, 150);
  assert.ok(content.metaDescription.toLowerCase().includes(KEYWORD));
});

test("keyword goes after a leading article", () => {
  assert.equal(
    insertKeyword("The simple steps for growing basil. Start today.", KEYWORD),
    "The herb garden simple steps for growing basil. Start today."
  );
});

test("empty description gets a stock sentence", () => {
  assert.equal(insertKeyword("  ", KEYWORD), "Herb garden - comprehensive guide and information.");
});

test("a few missing characters are padded with dots", () => {
  const meta = "x".repeat(106);
  assert.equal(expandDescription(meta, KEYWORD, 110, 156), meta + "....");
});

test("expansion appends phrases until the minimum is reached", () => {
  assert.equal(
    expandDescription("Short one here.", KEYWORD, 110, 156),
    "Short one here. Learn more about herb garden and how it can benefit you. " +
      "Discover everything you need to know about herb garden."
  );
});

test("long description is trimmed to whole sentences, then re-expanded", () => {
  const first = "A herb garden on a windowsill gives you fresh leaves all year with very little effort.";
  const meta =
    first + " It also saves money on the small plastic packs sold at the shop, and it makes every meal taste better than before.";
  assert.equal(trimDescription(meta, KEYWORD, 156), first);

  const content = corrected(
    new MetaDescriptionCorrector().correct(makeContent({ focusKeyword: KEYWORD, metaDescription: meta }), KEYWORD, [], options)
  );
  assert.equal(content.metaDescription, first + " Learn more about herb garden and how it can benefit you.");
  assert.equal(content.metaDescription.length, 143);
});

test("trim without sentence break ends in an ellipsis within the limit", () => {
  const meta = `${KEYWORD} ` + "word ".repeat(60);
  const trimmed = trimDescription(meta.trim(), KEYWORD, 156);
  assert.ok(trimmed.endsWith("..."));
  assert.ok(trimmed.length <= 156);
  assert.ok(trimmed.startsWith(KEYWORD));
});

test("a valid description is left alone", () => {
  const result = new MetaDescriptionCorrector().correct(compliantPost(), KEYWORD, [], options);
  assert.equal(result.ok, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// KEYWORD DENSITY
// ═══════════════════════════════════════════════════════════════════════════

section("Keyword density");

test("0.1% density on 1000 words rises into range", () => {
  const body = lowDensityBody();
  assert.equal(calculateDensity(body, { focusKeyword: KEYWORD, secondaryKeywords: [] }).density, 0.1);

  const result = new KeywordDensityCorrector().correct(
    makeContent({ focusKeyword: KEYWORD, body }),
    KEYWORD,
    [],
    options
  );
  const content = corrected(result);
  const density = calculateDensity(content.body, { focusKeyword: KEYWORD, secondaryKeywords: [] });
  assert.equal(density.density, 0.59);
  assert.equal(density.occurrences, 6);
  assert.ok(density.density >= 0.5 && density.density <= 3.0);
  assert.ok(result.ok && result.changes.includes("Added 5 keyword variations to improve density"));
});

test("first paragraph gets the first addition", () => {
  const content = corrected(
    new KeywordDensityCorrector().correct(makeContent({ focusKeyword: KEYWORD, body: lowDensityBody() }), KEYWORD, [], options)
  );
  assert.ok(content.body.includes("summer months ahead of us all. herb garden.</p>"));
  assert.ok(content.body.includes("summer months ahead of us all. More herb garden.</p>"));
});

test("short content is not padded", () => {
  const result = new KeywordDensityCorrector().correct(
    makeContent({ focusKeyword: KEYWORD, body: "<p>Basil likes sun and warm soil.</p>" }),
    KEYWORD,
    [],
    options
  );
  assert.equal(result.ok, false);
  assert.ok(!result.ok && result.reason.startsWith("Content too short (6 words)"));
});

test("excess keywords in text are replaced, attributes untouched", () => {
  const body = '<p>herb garden herb garden tips for herb garden care.</p><img alt="herb garden bed">';
  const { body: reduced, removed } = reduceDensity(body, { focusKeyword: KEYWORD, secondaryKeywords: [] }, 3.0);
  assert.equal(removed, 3);
  assert.equal(reduced, '<p>this solution this approach tips for this method care.</p><img alt="herb garden bed">');
});

test("subheadings are rewritten until usage is within the limit", () => {
  const { body, rewritten } = rewriteSubheadings(
    "<h2>Herb garden basics</h2><h2>Herb garden tools</h2><p>Text.</p>",
    KEYWORD,
    75
  );
  assert.equal(rewritten, 1);
  assert.equal(body, "<h2>this topic basics</h2><h2>Herb garden tools</h2><p>Text.</p>");
});

// ═══════════════════════════════════════════════════════════════════════════
// READABILITY
// ═══════════════════════════════════════════════════════════════════════════

section("Readability");

test("passive with an agent swaps subject and agent", () => {
  assert.equal(toActive("The beds were watered by the gardener"), "The gardener watered the beds");
});

test("passive without an agent gets a generic subject", () => {
  assert.equal(toActive("The soil is covered with mulch"), "People covered the soil with mulch");
});

test("passive with no subject is not rewritten", () => {
  assert.equal(toActive("Was finished"), undefined);
});

test("long sentence splits at a conjunction", () => {
  assert.equal(
    splitSentence(
      "Basil grows best in warm soil with plenty of light and it needs water every morning during the hot summer months"
    ),
    "Basil grows best in warm soil with plenty of light. It needs water every morning during the hot summer months"
  );
});

test("sentence without a split point is kept", () => {
  assert.equal(splitSentence("Basil grows best in warm soil"), undefined);
});

test("transitions go to every third and fourth sentence first", () => {
  const { body, changes } = addTransitions(
    "<p>Basil likes sun. Mint spreads fast. Water the beds daily. Pick leaves often. Label each row.</p>",
    30,
    firstChoiceRandom
  );
  assert.equal(
    body,
    "<p>Basil likes sun. Mint spreads fast. Water the beds daily. Furthermore, pick leaves often. Furthermore, label each row.</p>"
  );
  assert.equal(changes.length, 2);
  assert.equal(new TransitionWordAnalyzer().analyze(body).percentage, 40);
});

test("corrector fixes passive voice and then transitions", () => {
  const result = new ReadabilityCorrector().correct(
    makeContent({ focusKeyword: KEYWORD, body: "<p>The beds are watered by the gardener. Basil likes sun.</p>" }),
    KEYWORD,
    [],
    options
  );
  const content = corrected(result);
  assert.equal(content.body, "<p>The gardener watered the beds. Furthermore, basil likes sun.</p>");
  assert.ok(result.ok);
  assert.deepEqual(result.changes, [
    'Rewrote passive sentence: "The beds are watered by the gardener"',
    'Added transition "Furthermore"',
  ]);
});

test("readable content is left alone", () => {
  assert.equal(new ReadabilityCorrector().correct(compliantPost(), KEYWORD, [], options).ok, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// TITLE
// ═══════════════════════════════════════════════════════════════════════════

section("Title");

test("keyword is prefixed when it fits", () => {
  const content = corrected(
    new TitleCorrector().correct(makeContent({ focusKeyword: KEYWORD, title: "Growing Fresh Herbs at Home" }), KEYWORD, [], options)
  );
  assert.equal(content.title, "Herb Garden: Growing Fresh Herbs at Home");
});

test("empty title comes from a template with the current year", () => {
  const content = corrected(new TitleCorrector().correct(makeContent({ focusKeyword: KEYWORD }), KEYWORD, [], options));
  assert.equal(content.title, "How to Herb Garden in 2026");
});

test("long title loses filler words first", () => {
  const title = "The Complete and Ultimate Guide to Planning a Really Beautiful Herb Garden for Your Home";
  assert.equal(removeFillerWords(title, KEYWORD), "Complete Ultimate Guide Planning Beautiful Herb Garden Your Home");

  const content = corrected(new TitleCorrector().correct(makeContent({ focusKeyword: KEYWORD, title }), KEYWORD, [], options));
  assert.equal(content.title, "Complete Ultimate Guide Planning Beautiful Herb Garden Your Home");
  assert.ok(content.title.length <= 66);
});

test("truncation keeps the keyword", () => {
  assert.equal(
    truncatePreservingKeyword("Everything about growing a herb garden on a tiny city balcony with limited light", KEYWORD, 30),
    "wing a herb garden on a tiny c"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// IMAGES
// ═══════════════════════════════════════════════════════════════════════════

section("Images");

test("post without images gets an image prompt", () => {
  const content = corrected(
    new ImageCorrector().correct(makeContent({ focusKeyword: KEYWORD, title: "Kitchen Herbs" }), KEYWORD, [], options)
  );
  assert.deepEqual(content.imagePrompts, [
    { prompt: "Image related to Kitchen Herbs", alt: "Image showing herb garden concept" },
  ]);
});

test("alt text loses stock lead-ins and gains the keyword", () => {
  assert.equal(optimizeAltText("A photo of raised beds", KEYWORD), "Herb garden: raised beds");
  assert.equal(optimizeAltText("", KEYWORD), "Image showing herb garden concept");
  assert.equal(optimizeAltText("Raised herb garden beds", KEYWORD), "Raised herb garden beds");
});

test("body image without alt gets one", () => {
  const content = corrected(
    new ImageCorrector().correct(makeContent({ focusKeyword: KEYWORD, body: '<p>Text.</p><img src="a.jpg">' }), KEYWORD, [], options)
  );
  assert.equal(content.body, '<p>Text.</p><img alt="Image showing herb garden concept" src="a.jpg">');
  assert.deepEqual(content.imagePrompts, []);
});

test("proper alt text is left alone", () => {
  assert.equal(new ImageCorrector().correct(compliantPost(), KEYWORD, [], options).ok, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

section("Registry");

test("one corrector per aspect, overridable", () => {
  const title = new TitleCorrector();
  const set = createDefaultCorrectors({ title });
  assert.deepEqual(Object.keys(set).sort(), ["images", "keyword_density", "meta_description", "readability", "title"]);
  assert.equal(set.title, title);
  assert.equal(set.readability.aspect, "readability");
});

test("correctors never mutate their input", () => {
  const input = makeContent({ focusKeyword: KEYWORD, metaDescription: "Too short." });
  const before = JSON.stringify(input);
  for (const corrector of Object.values(createDefaultCorrectors())) {
    corrector.correct(input, KEYWORD, [], options);
  }
  assert.equal(JSON.stringify(input), before);
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
