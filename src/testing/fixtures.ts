/**
 * Shared test fixtures: sample posts, a fixed clock and deterministic
 * random sources.
 */

import type { Content } from "../content/schema.js";
import { makeContent } from "../content/record.js";
import type { RandomSource } from "../correction/random.js";

export const KEYWORD = "herb garden";

/** 2026-01-15T00:00:00Z */
export const FIXED_NOW = Date.UTC(2026, 0, 15);

export function fixedClock(start = FIXED_NOW): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

/**
 * Always the first item and zero.
 */
export const firstChoiceRandom: RandomSource = {
  next: () => 0,
  int: () => 0,
  pick: (items) => items[0],
};

export const COMPLIANT_TITLE = "How to Plan a Herb Garden at Home";

export const COMPLIANT_META =
  "Plan a herb garden that thrives: pick a sunny spot, choose herbs you cook with, and keep every bed watered, mulched and labeled all season.";

export const COMPLIANT_BODY =
  "<h2>Planning a herb garden</h2>" +
  "<p>A herb garden needs six hours of sun each day. First, pick a spot near the kitchen door. " +
  "Basil and thyme like warm soil. Mint spreads fast, so keep it in a pot. " +
  "Water the beds early in the morning. Next, add a thin layer of mulch.</p>" +
  "<h2>Choosing plants</h2>" +
  "<p>Start with herbs you cook with every week. Parsley grows well from seed. " +
  "Chives come back every spring. Also, rosemary handles dry weather well. " +
  "Pick leaves often to keep plants bushy. Finally, label each row with a small stake.</p>" +
  '<img src="garden.jpg" alt="Raised herb garden beside a kitchen window">';

/**
 * Passes every check of the default detector and pipeline thresholds.
 * 92 words, 12 sentences, keyword density 2.17%, transitions 33.3%.
 */
export function compliantPost(overrides: Partial<Content> = {}): Content {
  return makeContent({
    title: COMPLIANT_TITLE,
    body: COMPLIANT_BODY,
    metaDescription: COMPLIANT_META,
    excerpt: "Plan and plant a small kitchen herb bed.",
    focusKeyword: KEYWORD,
    ...overrides,
  });
}

const PLAIN_PARAGRAPH =
  "Fresh basil and thyme grow well in pots on a bright sunny windowsill near the kitchen. " +
  "Water them early each morning and pick the leaves often so the plants stay bushy. " +
  "Good soil with plenty of compost keeps the roots healthy through the long summer months ahead of us all.";

/**
 * Twenty 50-word paragraphs with a single keyword occurrence:
 * 1000 words, density 0.1%.
 */
export function lowDensityBody(): string {
  const first = PLAIN_PARAGRAPH.replace("Fresh basil", "Herb garden");
  return [first, ...Array.from({ length: 19 }, () => PLAIN_PARAGRAPH)]
    .map((paragraph) => `<p>${paragraph}</p>`)
    .join("\n");
}
