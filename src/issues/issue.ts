/**
 * Issue value objects and the fixed issue catalog.
 *
 * Issues are recomputed on every detection and frozen on creation. The
 * catalog fixes severity, priority and weight per issue type; detectors
 * only supply the measured value, the target and the locations.
 */

import type { IssueType, Severity } from "../config/engine/enums.js";

export interface IssueLocation {
  /** Offending text: a sentence, heading, alt text or excerpt */
  readonly text: string;
  readonly detail?: string;
}

export interface Issue {
  readonly type: IssueType;
  readonly severity: Severity;
  readonly currentValue: number;
  readonly targetValue: number;
  readonly locations: readonly IssueLocation[];
  readonly description: string;
  /** 1-10, higher is fixed first */
  readonly priority: number;
  readonly weight: number;
}

interface CatalogEntry {
  readonly severity: Severity;
  readonly priority: number;
  readonly weight: number;
}

export const ISSUE_CATALOG: Readonly<Record<IssueType, CatalogEntry>> = {
  keyword_density_low: { severity: "major", priority: 8, weight: 2.0 },
  keyword_density_high: { severity: "critical", priority: 9, weight: 3.0 },
  meta_description_short: { severity: "critical", priority: 10, weight: 3.0 },
  meta_description_long: { severity: "major", priority: 7, weight: 2.0 },
  meta_description_no_keyword: { severity: "major", priority: 6, weight: 2.0 },
  passive_voice_high: { severity: "major", priority: 5, weight: 2.0 },
  sentence_length_high: { severity: "minor", priority: 3, weight: 1.0 },
  transition_words_low: { severity: "minor", priority: 2, weight: 1.0 },
  title_too_long: { severity: "major", priority: 7, weight: 2.0 },
  title_no_keyword: { severity: "critical", priority: 9, weight: 3.0 },
  subheading_keyword_overuse: { severity: "minor", priority: 4, weight: 1.0 },
  no_images: { severity: "major", priority: 6, weight: 2.0 },
  alt_text_no_keyword: { severity: "minor", priority: 3, weight: 1.0 },
};

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  critical: 3,
  major: 2,
  minor: 1,
};

export function createIssue(
  type: IssueType,
  currentValue: number,
  targetValue: number,
  description: string,
  locations: IssueLocation[] = []
): Issue {
  const entry = ISSUE_CATALOG[type];
  return Object.freeze({
    type,
    severity: entry.severity,
    currentValue,
    targetValue,
    locations: Object.freeze(locations.map((location) => Object.freeze({ ...location }))),
    description,
    priority: entry.priority,
    weight: entry.weight,
  });
}

/**
 * 100 minus 0.8 times the summed penalties, clamped to [0, 100].
 * Each issue costs weight × severity weight × 10.
 */
export function calculateComplianceScore(issues: readonly Issue[]): number {
  const penalty = issues.reduce(
    (sum, issue) => sum + issue.weight * SEVERITY_WEIGHTS[issue.severity] * 10,
    0
  );
  const score = 100 - penalty * 0.8;
  return Math.max(0, Math.min(100, Math.round(score * 100) / 100));
}

export function sortByPriority(issues: readonly Issue[]): Issue[] {
  return [...issues].sort((a, b) => b.priority - a.priority);
}

export function filterBySeverity(issues: readonly Issue[], severity: Severity): Issue[] {
  return issues.filter((issue) => issue.severity === severity);
}

export function filterByType(issues: readonly Issue[], type: IssueType): Issue[] {
  return issues.filter((issue) => issue.type === type);
}

export function issueTypes(issues: readonly Issue[]): IssueType[] {
  return [...new Set(issues.map((issue) => issue.type))];
}
