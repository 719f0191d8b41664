/**
 * Image corrector: adds an image prompt when the post has no image at all
 * and rewrites alt texts that lack the focus keyword, both on image
 * prompts and on `<img>` tags in the body.
 */

import type { Content, ImagePrompt } from "../content/schema.js";
import { capitalize, containsIgnoreCase, lowercaseFirst } from "../content/text.js";
import { extractImgAlts, isProperAlt, MIN_ALT_LENGTH } from "../analysis/structure.js";
import { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";

const IMG_TAG = /<img\b[^>]*>/gi;
const ALT_ATTRIBUTE = /\balt\s*=\s*(?:"[^"]*"|'[^']*')/i;
const UNFRIENDLY_LEAD = /^(?:an?\s+)?(?:image|picture|photo|photograph)\s+(?:of|showing)\s+/i;

export function defaultImagePrompt(title: string, focusKeyword: string): ImagePrompt {
  return {
    prompt: `Image related to ${title || focusKeyword}`,
    alt: `Image showing ${focusKeyword} concept`,
  };
}

/**
 * Alt text that contains the keyword and is long enough to count.
 */
export function optimizeAltText(alt: string, focusKeyword: string): string {
  if (isProperAlt(alt, focusKeyword)) return alt;

  const cleaned = alt.replace(UNFRIENDLY_LEAD, "").replace(/\s+/g, " ").trim();
  if (cleaned.length === 0) return `Image showing ${focusKeyword} concept`;

  let result = containsIgnoreCase(cleaned, focusKeyword)
    ? capitalize(cleaned)
    : `${capitalize(focusKeyword)}: ${lowercaseFirst(cleaned)}`;
  if (result.length <= MIN_ALT_LENGTH) result = `${result} concept image`;
  return result;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");
}

function fixBodyAlts(body: string, focusKeyword: string): string {
  return body.replace(IMG_TAG, (tag) => {
    const current = extractImgAlts(tag)[0] ?? "";
    if (isProperAlt(current, focusKeyword)) return tag;

    const attribute = `alt="${escapeAttribute(optimizeAltText(current, focusKeyword))}"`;
    return ALT_ATTRIBUTE.test(tag)
      ? tag.replace(ALT_ATTRIBUTE, () => attribute)
      : tag.replace(/^<img\b/i, () => `<img ${attribute}`);
  });
}

export class ImageCorrector implements Corrector {
  readonly aspect = "images" as const;

  correct(
    content: Content,
    focusKeyword: string,
    _secondaryKeywords: readonly string[],
    _options: CorrectorOptions
  ): CorrectionResult {
    const changes: string[] = [];
    let imagePrompts = content.imagePrompts;

    if (imagePrompts.length === 0 && extractImgAlts(content.body).length === 0) {
      imagePrompts = [defaultImagePrompt(content.title, focusKeyword)];
      changes.push("Added image prompt");
    }

    const optimized = imagePrompts.map((image) => ({ ...image, alt: optimizeAltText(image.alt, focusKeyword) }));
    const rewrittenPrompts = optimized.filter((image, index) => image.alt !== imagePrompts[index]?.alt).length;
    if (rewrittenPrompts > 0) {
      changes.push(`Rewrote ${rewrittenPrompts} image prompt alt text(s) to include focus keyword`);
    }

    const body = fixBodyAlts(content.body, focusKeyword);
    if (body !== content.body) {
      changes.push("Rewrote body image alt text to include focus keyword");
    }

    if (changes.length === 0) {
      return unchanged("Images need no correction");
    }
    return { ok: true, content: { ...content, body, imagePrompts: optimized }, changes };
  }
}
