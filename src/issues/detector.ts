/**
 * Issue detector.
 *
 * Runs every analyzer over a content value, compares each measurement to
 * its threshold and emits catalogued issues. The compliance score derived
 * from those issues is the score the optimizer converges on.
 */

import type { Content } from "../content/schema.js";
import type { DetectorThresholds } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { stripTags } from "../content/text.js";
import {
  analyzeContent,
  createDefaultAnalyzers,
  summarizeAnalysis,
  type AnalyzerSet,
  type ContentAnalysis,
} from "../analysis/metrics.js";
import type { ContentMetrics, KeywordSet } from "../analysis/types.js";
import {
  calculateComplianceScore,
  createIssue,
  filterBySeverity,
  sortByPriority,
  type Issue,
  type IssueLocation,
} from "./issue.js";

export interface DetectionReport {
  /** Sorted by priority, highest first */
  issues: Issue[];
  totalIssues: number;
  criticalIssues: number;
  majorIssues: number;
  minorIssues: number;
  complianceScore: number;
  isCompliant: boolean;
  metrics: ContentMetrics;
}

export interface IssueDetectorOptions {
  thresholds?: DetectorThresholds;
  analyzers?: AnalyzerSet;
  logger?: Logger;
}

const CONTEXT_RADIUS = 50;

function keywordContexts(text: string, keyword: string): IssueLocation[] {
  const lowerText = text.toLowerCase();
  const lowerKeyword = keyword.toLowerCase();
  const locations: IssueLocation[] = [];
  if (lowerKeyword.length === 0) return locations;

  let index = lowerText.indexOf(lowerKeyword);
  while (index !== -1) {
    const start = Math.max(0, index - CONTEXT_RADIUS);
    locations.push({ text: text.slice(start, start + CONTEXT_RADIUS * 2), detail: `position ${index}` });
    index = lowerText.indexOf(lowerKeyword, index + 1);
  }
  return locations;
}

export class IssueDetector {
  private readonly thresholds: DetectorThresholds;
  private readonly analyzers: AnalyzerSet;
  private readonly logger: Logger;

  constructor(options: IssueDetectorOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_ENGINE_CONFIG.detector;
    this.analyzers = options.analyzers ?? createDefaultAnalyzers();
    this.logger = options.logger ?? createSilentLogger();
  }

  getThresholds(): DetectorThresholds {
    return { ...this.thresholds };
  }

  detectAllIssues(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[] = []
  ): DetectionReport {
    const keywords: KeywordSet = { focusKeyword, secondaryKeywords };
    const analysis = analyzeContent(content, keywords, this.analyzers);

    const detected = [
      ...this.detectKeywordDensityIssues(content, focusKeyword, analysis),
      ...this.detectMetaDescriptionIssues(content, focusKeyword, analysis),
      ...this.detectPassiveVoiceIssues(analysis),
      ...this.detectSentenceLengthIssues(analysis),
      ...this.detectTransitionWordIssues(analysis),
      ...this.detectTitleIssues(content, focusKeyword, analysis),
      ...this.detectSubheadingIssues(analysis),
      ...this.detectImageIssues(analysis),
    ];

    const issues = sortByPriority(detected);
    const complianceScore = calculateComplianceScore(issues);

    this.logger.debug("Issue detection complete", {
      issues: issues.length,
      complianceScore,
    });

    return {
      issues,
      totalIssues: issues.length,
      criticalIssues: filterBySeverity(issues, "critical").length,
      majorIssues: filterBySeverity(issues, "major").length,
      minorIssues: filterBySeverity(issues, "minor").length,
      complianceScore,
      isCompliant: complianceScore >= 100,
      metrics: summarizeAnalysis(analysis),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PER-ASPECT DETECTORS
  // ═══════════════════════════════════════════════════════════════════════

  private detectKeywordDensityIssues(
    content: Content,
    focusKeyword: string,
    analysis: ContentAnalysis
  ): Issue[] {
    const { density } = analysis.keywordDensity;
    const { minKeywordDensity, maxKeywordDensity } = this.thresholds;
    const text = stripTags(content.body);

    if (density < minKeywordDensity) {
      const found = keywordContexts(text, focusKeyword);
      const locations =
        found.length > 0
          ? found
          : [{ text: text.slice(0, 100), detail: "Keyword not found in content" }];
      return [
        createIssue(
          "keyword_density_low",
          density,
          minKeywordDensity,
          `Keyword density too low (${density.toFixed(2)}%, minimum ${minKeywordDensity.toFixed(2)}%)`,
          locations
        ),
      ];
    }

    if (density > maxKeywordDensity) {
      return [
        createIssue(
          "keyword_density_high",
          density,
          maxKeywordDensity,
          `Keyword density too high (${density.toFixed(2)}%, maximum ${maxKeywordDensity.toFixed(2)}%)`,
          keywordContexts(text, focusKeyword)
        ),
      ];
    }

    return [];
  }

  private detectMetaDescriptionIssues(
    content: Content,
    focusKeyword: string,
    analysis: ContentAnalysis
  ): Issue[] {
    const issues: Issue[] = [];
    const meta = content.metaDescription;
    const { length, hasKeyword } = analysis.metaDescription;
    const { minMetaDescLength, maxMetaDescLength } = this.thresholds;

    if (length < minMetaDescLength) {
      issues.push(
        createIssue(
          "meta_description_short",
          length,
          minMetaDescLength,
          `Meta description too short (${length} chars, minimum ${minMetaDescLength})`,
          [{ text: meta }]
        )
      );
    } else if (length > maxMetaDescLength) {
      issues.push(
        createIssue(
          "meta_description_long",
          length,
          maxMetaDescLength,
          `Meta description too long (${length} chars, maximum ${maxMetaDescLength})`,
          [{ text: meta.slice(maxMetaDescLength), detail: "overflow" }]
        )
      );
    }

    if (!hasKeyword) {
      issues.push(
        createIssue(
          "meta_description_no_keyword",
          0,
          1,
          `Meta description missing focus keyword: ${focusKeyword}`,
          [{ text: meta }]
        )
      );
    }

    return issues;
  }

  private detectPassiveVoiceIssues(analysis: ContentAnalysis): Issue[] {
    const { percentage, passiveSentences } = analysis.passiveVoice;
    const max = this.thresholds.maxPassiveVoice;
    if (percentage <= max) return [];

    return [
      createIssue(
        "passive_voice_high",
        percentage,
        max,
        `Too much passive voice (${percentage.toFixed(1)}%, maximum ${max.toFixed(1)}%)`,
        passiveSentences.map((sentence) => ({ text: sentence }))
      ),
    ];
  }

  private detectSentenceLengthIssues(analysis: ContentAnalysis): Issue[] {
    const { percentage, longSentences } = analysis.sentenceLength;
    const max = this.thresholds.maxLongSentences;
    if (percentage <= max) return [];

    return [
      createIssue(
        "sentence_length_high",
        percentage,
        max,
        `Too many long sentences (${percentage.toFixed(1)}%, maximum ${max.toFixed(1)}%)`,
        longSentences.map((long) => ({ text: long.sentence, detail: `${long.wordCount} words` }))
      ),
    ];
  }

  private detectTransitionWordIssues(analysis: ContentAnalysis): Issue[] {
    const { percentage } = analysis.transitionWords;
    const min = this.thresholds.minTransitionWords;
    if (percentage >= min) return [];

    return [
      createIssue(
        "transition_words_low",
        percentage,
        min,
        `Not enough transition words (${percentage.toFixed(1)}%, minimum ${min.toFixed(1)}%)`
      ),
    ];
  }

  private detectTitleIssues(
    content: Content,
    focusKeyword: string,
    analysis: ContentAnalysis
  ): Issue[] {
    const issues: Issue[] = [];
    const { length, hasKeyword } = analysis.title;
    const max = this.thresholds.maxTitleLength;

    if (length > max) {
      issues.push(
        createIssue(
          "title_too_long",
          length,
          max,
          `Title too long (${length} chars, maximum ${max})`,
          [{ text: content.title.slice(max), detail: "overflow" }]
        )
      );
    }

    if (!hasKeyword) {
      issues.push(
        createIssue(
          "title_no_keyword",
          0,
          1,
          `Title missing focus keyword: ${focusKeyword}`,
          [{ text: content.title }]
        )
      );
    }

    return issues;
  }

  private detectSubheadingIssues(analysis: ContentAnalysis): Issue[] {
    const { percentage, headingsWithKeyword } = analysis.subheadings;
    const max = this.thresholds.maxSubheadingKeywordUsage;
    if (percentage <= max) return [];

    return [
      createIssue(
        "subheading_keyword_overuse",
        percentage,
        max,
        `Too many subheadings contain keyword (${percentage.toFixed(1)}%, maximum ${max.toFixed(1)}%)`,
        headingsWithKeyword.map((heading) => ({ text: heading }))
      ),
    ];
  }

  private detectImageIssues(analysis: ContentAnalysis): Issue[] {
    const issues: Issue[] = [];
    const images = analysis.images;

    if (this.thresholds.requireImages && !images.hasImages) {
      issues.push(createIssue("no_images", 0, 1, "Content should include at least one image"));
    }

    if (this.thresholds.requireKeywordInAltText && images.hasImages && !images.hasProperAltText) {
      issues.push(
        createIssue(
          "alt_text_no_keyword",
          images.properAltCount,
          images.imageCount,
          "Image alt text should include focus keyword",
          images.images
            .filter((image) => !image.properAlt)
            .map((image) => ({
              text: image.alt,
              detail: image.alt.length === 0 ? "missing" : image.source,
            }))
        )
      );
    }

    return issues;
  }
}
