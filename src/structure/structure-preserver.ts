/**
 * Structure preserver.
 *
 * Guards a correction pass against damaging the markup: compares tag,
 * heading and image counts (structure), paragraph and list counts
 * (formatting) and body length and title drift (intent) between the
 * content before and after the pass. Major violations roll the pass back
 * to a snapshot taken before it.
 *
 * Snapshots live in memory, oldest evicted first.
 */

import { createHash } from "node:crypto";
import type { StructureConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Content } from "../content/schema.js";
import { stableStringify } from "../content/hash.js";
import { cloneContent } from "../content/record.js";
import { roundTo, stripTags } from "../content/text.js";
import { systemClock, type Clock } from "../cache/store.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";

const HEADING_LEVELS = ["h1", "h2", "h3", "h4", "h5", "h6"] as const;
type HeadingLevel = (typeof HEADING_LEVELS)[number];

/** Tag count changes up to this are tolerated */
const TAG_COUNT_TOLERANCE = 1;

/** Paragraph count may vary by this share */
const PARAGRAPH_VARIATION = 0.2;

/** Body length may change by this share before intent is in doubt */
const LENGTH_CHANGE = 0.3;

/** Titles less similar than this (percent) changed significantly */
const TITLE_SIMILARITY = 70;

export interface HeadingEntry {
  tag: string;
  text: string;
}

export interface ImageAttributes {
  src?: string;
  alt?: string;
}

export interface ContentStructure {
  titleLength: number;
  metaDescriptionLength: number;
  bodyLength: number;
  /** Opening tag counts by lower-cased name */
  tags: Record<string, number>;
  headings: HeadingEntry[];
  images: ImageAttributes[];
  paragraphCount: number;
  headingCounts: Record<HeadingLevel, number>;
  listCount: number;
  linkCount: number;
  checksum: string;
}

export type ViolationType =
  | "structure_tag_count_changed"
  | "structure_heading_count_changed"
  | "structure_image_count_changed"
  | "formatting_paragraph_count_changed"
  | "formatting_list_count_changed";

export interface Violation {
  type: ViolationType;
  severity: "major" | "minor";
  original: number;
  modified: number;
  tag?: string;
  /** Relative change, percent */
  variation?: number;
}

export type IntentWarningType = "intent_content_length_changed" | "intent_title_changed_significantly";

export interface IntentWarning {
  type: IntentWarningType;
  original: string | number;
  modified: string | number;
  /** Length change or title similarity, percent */
  percentage: number;
}

export interface IntegrityReport {
  isValid: boolean;
  violations: Violation[];
  warnings: IntentWarning[];
  originalStructure: ContentStructure;
  modifiedStructure: ContentStructure;
  structurePreserved: boolean;
  formattingPreserved: boolean;
  intentPreserved: boolean;
}

export interface StructureSnapshot {
  id: string;
  label: string;
  content: Content;
  structure: ContentStructure;
  checksum: string;
  timestamp: string;
}

export interface PreservationResult {
  success: boolean;
  rolledBack: boolean;
  content: Content;
  validation: IntegrityReport;
  snapshotId: string;
}

export interface CorruptionReport {
  isCorrupted: boolean;
  expectedChecksum: string;
  actualChecksum: string;
  timestamp: string;
}

export interface ChecksumRecord {
  original: string;
  modified: string;
  timestamp: string;
}

export interface PreservationStats {
  totalSnapshots: number;
  totalChecksums: number;
  config: StructureConfig;
}

export interface StructurePreserverOptions {
  config?: StructureConfig;
  now?: Clock;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

function countElements(html: string, tag: string): number {
  return html.match(new RegExp(`<${tag}\\b[^>]*>`, "gi"))?.length ?? 0;
}

function countTags(html: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const match of html.matchAll(/<([a-z][a-z0-9]*)\b[^>]*>/gi)) {
    const tag = match[1].toLowerCase();
    counts[tag] = (counts[tag] ?? 0) + 1;
  }
  return counts;
}

function extractHeadings(html: string): HeadingEntry[] {
  return [...html.matchAll(/<(h[1-6])[^>]*>([\s\S]*?)<\/\1>/gi)].map((match) => ({
    tag: match[1].toLowerCase(),
    text: stripTags(match[2]),
  }));
}

function extractImages(html: string): ImageAttributes[] {
  return [...html.matchAll(/<img\s+([^>]+)>/gi)].map((match) => {
    const attributes: ImageAttributes = {};
    const src = /src=["']([^"']+)["']/i.exec(match[1]);
    const alt = /alt=["']([^"']+)["']/i.exec(match[1]);
    if (src) attributes.src = src[1];
    if (alt) attributes.alt = alt[1];
    return attributes;
  });
}

function normalizeHtml(html: string): string {
  return html.replace(/\s+/g, " ").replace(/>\s+</g, "><").trim();
}

/**
 * Shared characters by repeated longest common substring.
 */
function similarChars(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let longest = 0;
  let startA = 0;
  let startB = 0;
  for (let i = 0; i < a.length; i++) {
    for (let j = 0; j < b.length; j++) {
      let k = 0;
      while (i + k < a.length && j + k < b.length && a[i + k] === b[j + k]) k++;
      if (k > longest) {
        longest = k;
        startA = i;
        startB = j;
      }
    }
  }
  if (longest === 0) return 0;

  return (
    longest +
    similarChars(a.slice(0, startA), b.slice(0, startB)) +
    similarChars(a.slice(startA + longest), b.slice(startB + longest))
  );
}

/**
 * Percent of characters two strings share, 0-100.
 */
export function textSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  return total === 0 ? 100 : (similarChars(a, b) * 2 * 100) / total;
}

/**
 * SHA-256 over the trimmed title and meta description and the
 * whitespace-normalized body.
 */
export function generateChecksum(content: Pick<Content, "title" | "metaDescription" | "body">): string {
  const normalized = {
    title: content.title.trim(),
    metaDescription: content.metaDescription.trim(),
    body: normalizeHtml(content.body),
  };
  return createHash("sha256").update(stableStringify(normalized)).digest("hex");
}

export function analyzeStructure(content: Content): ContentStructure {
  const html = content.body;
  const headingCounts: Record<HeadingLevel, number> = { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
  for (const level of HEADING_LEVELS) {
    headingCounts[level] = countElements(html, level);
  }

  return {
    titleLength: content.title.length,
    metaDescriptionLength: content.metaDescription.length,
    bodyLength: html.length,
    tags: countTags(html),
    headings: extractHeadings(html),
    images: extractImages(html),
    paragraphCount: countElements(html, "p"),
    headingCounts,
    listCount: countElements(html, "ul") + countElements(html, "ol"),
    linkCount: countElements(html, "a"),
    checksum: generateChecksum(content),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PRESERVER
// ═══════════════════════════════════════════════════════════════════════════

export class StructurePreserver {
  private readonly config: StructureConfig;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly snapshots = new Map<string, StructureSnapshot>();
  private readonly checksums: ChecksumRecord[] = [];
  private sequence = 0;

  constructor(options: StructurePreserverOptions = {}) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.structure;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  getConfig(): StructureConfig {
    return { ...this.config };
  }

  createSnapshot(content: Content, label = ""): string {
    const id = `snapshot_${++this.sequence}`;
    const structure = analyzeStructure(content);
    this.snapshots.set(id, {
      id,
      label,
      content: cloneContent(content),
      structure,
      checksum: structure.checksum,
      timestamp: this.timestamp(),
    });

    while (this.snapshots.size > this.config.maxSnapshots) {
      const [oldest] = this.snapshots.keys();
      this.snapshots.delete(oldest);
    }

    this.logger.debug("Created structure snapshot", { id, label });
    return id;
  }

  validateIntegrity(original: Content, modified: Content): IntegrityReport {
    const originalStructure = analyzeStructure(original);
    const modifiedStructure = analyzeStructure(modified);

    const violations: Violation[] = [
      ...(this.config.preserveStructure ? checkStructure(originalStructure, modifiedStructure) : []),
      ...(this.config.preserveFormatting ? checkFormatting(originalStructure, modifiedStructure) : []),
    ];
    const warnings = this.config.preserveIntent ? checkIntent(original, modified) : [];

    if (this.config.enableChecksums) {
      this.checksums.push({
        original: originalStructure.checksum,
        modified: modifiedStructure.checksum,
        timestamp: this.timestamp(),
      });
    }

    return {
      isValid: violations.length === 0,
      violations,
      warnings,
      originalStructure,
      modifiedStructure,
      structurePreserved: violations.length === 0,
      formattingPreserved: !violations.some((violation) => violation.type.startsWith("formatting_")),
      intentPreserved: warnings.length === 0,
    };
  }

  /**
   * Snapshot `original`, check `optimized` against it and roll back when
   * a major violation is found and rollback is enabled.
   */
  preserveContent(original: Content, optimized: Content): PreservationResult {
    const snapshotId = this.createSnapshot(original, "pre_optimization");
    const validation = this.validateIntegrity(original, optimized);

    if (!validation.isValid && this.config.enableRollback) {
      const major = validation.violations.filter((violation) => violation.severity === "major");
      if (major.length > 0) {
        const restored = this.rollback(snapshotId);
        if (restored) {
          this.logger.warn("Structure violations detected, rolled back", {
            violations: major.map((violation) => violation.type),
          });
          return { success: false, rolledBack: true, content: restored.content, validation, snapshotId };
        }
      }
    }

    return { success: validation.isValid, rolledBack: false, content: optimized, validation, snapshotId };
  }

  /**
   * A copy of the snapshot, or null when it is unknown or rollback is
   * disabled.
   */
  rollback(snapshotId: string): StructureSnapshot | null {
    if (!this.config.enableRollback) {
      this.logger.warn("Rollback disabled in configuration", { snapshotId });
      return null;
    }

    const snapshot = this.snapshots.get(snapshotId);
    if (!snapshot) {
      this.logger.error("Snapshot not found", { snapshotId });
      return null;
    }

    this.logger.info("Rolling back to snapshot", { snapshotId, label: snapshot.label });
    return structuredClone(snapshot);
  }

  detectCorruption(content: Content, expectedChecksum: string): CorruptionReport {
    const actualChecksum = generateChecksum(content);
    const isCorrupted = actualChecksum !== expectedChecksum;
    if (isCorrupted) {
      this.logger.error("Content corruption detected", { expectedChecksum, actualChecksum });
    }
    return { isCorrupted, expectedChecksum, actualChecksum, timestamp: this.timestamp() };
  }

  getSnapshots(): StructureSnapshot[] {
    return [...this.snapshots.values()].map((snapshot) => structuredClone(snapshot));
  }

  getLatestSnapshot(): StructureSnapshot | null {
    const all = [...this.snapshots.values()];
    const latest = all[all.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  getChecksums(): ChecksumRecord[] {
    return [...this.checksums];
  }

  clearSnapshots(): void {
    this.snapshots.clear();
    this.checksums.length = 0;
  }

  getPreservationStats(): PreservationStats {
    return {
      totalSnapshots: this.snapshots.size,
      totalChecksums: this.checksums.length,
      config: this.getConfig(),
    };
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CHECKS
// ═══════════════════════════════════════════════════════════════════════════

function checkStructure(original: ContentStructure, modified: ContentStructure): Violation[] {
  const violations: Violation[] = [];

  for (const [tag, count] of Object.entries(original.tags)) {
    const modifiedCount = modified.tags[tag] ?? 0;
    if (Math.abs(modifiedCount - count) > TAG_COUNT_TOLERANCE) {
      violations.push({
        type: "structure_tag_count_changed",
        severity: "major",
        tag,
        original: count,
        modified: modifiedCount,
      });
    }
  }

  if (original.headings.length !== modified.headings.length) {
    violations.push({
      type: "structure_heading_count_changed",
      severity: "major",
      original: original.headings.length,
      modified: modified.headings.length,
    });
  }

  if (original.images.length !== modified.images.length) {
    violations.push({
      type: "structure_image_count_changed",
      severity: "major",
      original: original.images.length,
      modified: modified.images.length,
    });
  }

  return violations;
}

function checkFormatting(original: ContentStructure, modified: ContentStructure): Violation[] {
  const violations: Violation[] = [];

  if (original.paragraphCount > 0) {
    const variation = Math.abs(modified.paragraphCount - original.paragraphCount) / original.paragraphCount;
    if (variation > PARAGRAPH_VARIATION) {
      violations.push({
        type: "formatting_paragraph_count_changed",
        severity: "minor",
        original: original.paragraphCount,
        modified: modified.paragraphCount,
        variation: roundTo(variation * 100, 2),
      });
    }
  }

  if (original.listCount !== modified.listCount) {
    violations.push({
      type: "formatting_list_count_changed",
      severity: "minor",
      original: original.listCount,
      modified: modified.listCount,
    });
  }

  return violations;
}

function checkIntent(original: Content, modified: Content): IntentWarning[] {
  const warnings: IntentWarning[] = [];

  const originalLength = original.body.length;
  if (originalLength > 0) {
    const change = Math.abs(modified.body.length - originalLength) / originalLength;
    if (change > LENGTH_CHANGE) {
      warnings.push({
        type: "intent_content_length_changed",
        original: originalLength,
        modified: modified.body.length,
        percentage: roundTo(change * 100, 2),
      });
    }
  }

  if (original.title !== modified.title) {
    const similarity = textSimilarity(original.title, modified.title);
    if (similarity < TITLE_SIMILARITY) {
      warnings.push({
        type: "intent_title_changed_significantly",
        original: original.title,
        modified: modified.title,
        percentage: roundTo(similarity, 2),
      });
    }
  }

  return warnings;
}
