/**
 * Stable hashing for cache keys.
 *
 * Object keys are serialized in sorted order so two structurally equal
 * values always hash the same, whatever order their keys were written in.
 */

import { createHash } from "node:crypto";
import type { Content } from "./schema.js";

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(",")}}`;
}

export function md5(value: string): string {
  return createHash("md5").update(value).digest("hex");
}

export function hashValue(value: unknown): string {
  return md5(stableStringify(value));
}

/**
 * Hash of the fields validation reads: title, body and meta description.
 */
export function contentHash(content: Pick<Content, "title" | "body" | "metaDescription">): string {
  return hashValue({
    title: content.title,
    body: content.body,
    metaDescription: content.metaDescription,
  });
}

/**
 * Hash of every field, used where image prompts and links matter too.
 */
export function fullContentHash(content: Content): string {
  return hashValue(content);
}

/**
 * Hash of a configuration section.
 */
export function configHash(config: object): string {
  return hashValue(config);
}

export function keywordHash(focusKeyword: string, secondaryKeywords: readonly string[]): string {
  return hashValue({
    focus: focusKeyword.trim().toLowerCase(),
    secondary: secondaryKeywords.map((keyword) => keyword.trim().toLowerCase()).sort(),
  });
}
