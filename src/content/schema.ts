/**
 * Content schema definition.
 *
 * Two shapes describe the same post:
 * - Content: the in-memory value every component passes around
 * - ContentRecord: the snake_case JSON record read from and written to disk,
 *   where the marked-up body lives under `content`
 *
 * DESIGN: Content values are never mutated. Correctors and strategies
 * build a new value with spread syntax, so a pass never aliases the
 * content of an earlier pass.
 */

import { z } from "zod";

export const ImagePromptSchema = z
  .object({
    /** Instruction for whatever renders the image */
    prompt: z.string().describe("Image generation prompt"),
    alt: z.string().describe("Alt text for the rendered image"),
  })
  .strict();

export type ImagePrompt = z.infer<typeof ImagePromptSchema>;

export const LinkSchema = z
  .object({
    url: z.string().min(1),
    anchor: z.string(),
  })
  .strict();

export type Link = z.infer<typeof LinkSchema>;

export const ContentSchema = z
  .object({
    title: z.string(),

    /** Marked-up body (HTML fragment) */
    body: z.string(),

    metaDescription: z.string(),
    excerpt: z.string(),

    /** Primary term the content must rank for */
    focusKeyword: z.string().min(1),

    /** Synonyms and variants counted toward keyword density */
    secondaryKeywords: z.array(z.string()),

    imagePrompts: z.array(ImagePromptSchema),
    internalLinks: z.array(LinkSchema),
    outboundLinks: z.array(LinkSchema),
  })
  .strict();

export type Content = z.infer<typeof ContentSchema>;

/**
 * Wire format. Optional collections default to empty.
 */
export const ContentRecordSchema = z
  .object({
    title: z.string().describe("Post title"),
    content: z.string().describe("Marked-up body"),
    meta_description: z.string().default(""),
    excerpt: z.string().default(""),
    focus_keyword: z.string().trim().min(1).describe("Focus keyword"),
    secondary_keywords: z.array(z.string()).default([]),
    image_prompts: z.array(ImagePromptSchema).default([]),
    internal_links: z.array(LinkSchema).default([]),
    outbound_links: z.array(LinkSchema).default([]),
  })
  .strict();

export type ContentRecord = z.infer<typeof ContentRecordSchema>;
export type ContentRecordInput = z.input<typeof ContentRecordSchema>;
