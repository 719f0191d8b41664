/**
 * Conversion between the JSON content record and the Content value.
 */

import { readFileSync } from "node:fs";
import { ContentRecordSchema, type Content, type ContentRecord } from "./schema.js";
import { ContentValidationError } from "./errors.js";
import { formatZodIssues } from "../config/engine/loader.js";

/**
 * Validate a raw record and convert it to a Content value.
 *
 * @throws ContentValidationError if the record does not match the schema
 */
export function parseContentRecord(input: unknown): Content {
  const result = ContentRecordSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ContentValidationError(
      `Invalid content record: ${issues.length} validation error(s)`,
      issues
    );
  }

  const record = result.data;
  return {
    title: record.title,
    body: record.content,
    metaDescription: record.meta_description,
    excerpt: record.excerpt,
    focusKeyword: record.focus_keyword,
    secondaryKeywords: record.secondary_keywords,
    imagePrompts: record.image_prompts,
    internalLinks: record.internal_links,
    outboundLinks: record.outbound_links,
  };
}

export function toContentRecord(content: Content): ContentRecord {
  return {
    title: content.title,
    content: content.body,
    meta_description: content.metaDescription,
    excerpt: content.excerpt,
    focus_keyword: content.focusKeyword,
    secondary_keywords: [...content.secondaryKeywords],
    image_prompts: content.imagePrompts.map((image) => ({ ...image })),
    internal_links: content.internalLinks.map((link) => ({ ...link })),
    outbound_links: content.outboundLinks.map((link) => ({ ...link })),
  };
}

/**
 * Read and parse a content record from a JSON file.
 *
 * @throws ContentValidationError if the file cannot be read or parsed
 */
export function loadContentFromFile(path: string): Content {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ContentValidationError(`Cannot read content record: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io" },
    ]);
  }
  return parseContentRecord(parsed);
}

/**
 * Deep copy. Snapshots and rollbacks hand out copies so callers cannot
 * reach stored history.
 */
export function cloneContent(content: Content): Content {
  return {
    ...content,
    secondaryKeywords: [...content.secondaryKeywords],
    imagePrompts: content.imagePrompts.map((image) => ({ ...image })),
    internalLinks: content.internalLinks.map((link) => ({ ...link })),
    outboundLinks: content.outboundLinks.map((link) => ({ ...link })),
  };
}

/**
 * Build a Content value from a partial one, for tests and scripts.
 */
export function makeContent(fields: Partial<Content> & Pick<Content, "focusKeyword">): Content {
  return {
    title: "",
    body: "",
    metaDescription: "",
    excerpt: "",
    secondaryKeywords: [],
    imagePrompts: [],
    internalLinks: [],
    outboundLinks: [],
    ...fields,
  };
}
