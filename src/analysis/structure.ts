/**
 * Markup-level analyzers: subheadings, images and single text fields.
 */

import type { Content } from "../content/schema.js";
import { containsIgnoreCase, roundTo, stripTags } from "../content/text.js";
import type {
  Analyzer,
  ImageEntry,
  ImageMetrics,
  KeywordSet,
  SubheadingMetrics,
  TextFieldMetrics,
} from "./types.js";

/** Proper alt text is longer than this and contains the focus keyword */
export const MIN_ALT_LENGTH = 10;

const SUBHEADING_PATTERN = /<h([2-6])[^>]*>([\s\S]*?)<\/h\1>/gi;
const IMG_PATTERN = /<img\b[^>]*>/gi;
const ALT_PATTERN = /\balt\s*=\s*(?:"([^"]*)"|'([^']*)')/i;

export function extractSubheadings(html: string): string[] {
  return [...html.matchAll(SUBHEADING_PATTERN)].map((match) => stripTags(match[2] ?? ""));
}

export function extractImgAlts(html: string): string[] {
  return [...html.matchAll(IMG_PATTERN)].map((match) => {
    const alt = ALT_PATTERN.exec(match[0]);
    return alt ? (alt[1] ?? alt[2] ?? "") : "";
  });
}

export function isProperAlt(alt: string, focusKeyword: string): boolean {
  return alt.length > MIN_ALT_LENGTH && containsIgnoreCase(alt, focusKeyword);
}

export class SubheadingAnalyzer implements Analyzer<string, SubheadingMetrics> {
  readonly name = "subheadings";

  analyze(html: string, keywords: KeywordSet): SubheadingMetrics {
    const headings = extractSubheadings(html);
    const headingsWithKeyword = headings.filter((heading) =>
      containsIgnoreCase(heading, keywords.focusKeyword)
    );
    return {
      headings,
      headingsWithKeyword,
      percentage:
        headings.length > 0 ? roundTo((headingsWithKeyword.length / headings.length) * 100, 1) : 0,
    };
  }
}

/**
 * Counts `<img>` tags in the body and image prompts attached to the post.
 */
export class ImageAnalyzer implements Analyzer<Content, ImageMetrics> {
  readonly name = "images";

  analyze(content: Content, keywords: KeywordSet): ImageMetrics {
    const images: ImageEntry[] = [
      ...extractImgAlts(content.body).map((alt) => ({ source: "body" as const, alt })),
      ...content.imagePrompts.map((image) => ({ source: "prompt" as const, alt: image.alt })),
    ].map((image) => ({ ...image, properAlt: isProperAlt(image.alt, keywords.focusKeyword) }));

    const properAltCount = images.filter((image) => image.properAlt).length;
    return {
      images,
      imageCount: images.length,
      properAltCount,
      hasImages: images.length > 0,
      hasProperAltText: properAltCount > 0,
    };
  }
}

/**
 * Length and focus keyword presence of a single field (title, meta).
 */
export class TextFieldAnalyzer implements Analyzer<string, TextFieldMetrics> {
  constructor(readonly name: string) {}

  analyze(text: string, keywords: KeywordSet): TextFieldMetrics {
    return {
      length: text.length,
      hasKeyword: containsIgnoreCase(text, keywords.focusKeyword),
    };
  }
}
