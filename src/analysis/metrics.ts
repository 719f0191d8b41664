/**
 * Analyzer registry and the flat metrics summary.
 */

import type { Content } from "../content/schema.js";
import { KeywordDensityAnalyzer } from "./keyword-density.js";
import {
  PassiveVoiceAnalyzer,
  SentenceLengthAnalyzer,
  TransitionWordAnalyzer,
} from "./readability.js";
import { ImageAnalyzer, SubheadingAnalyzer, TextFieldAnalyzer } from "./structure.js";
import type {
  Analyzer,
  ContentMetrics,
  ImageMetrics,
  KeywordDensityMetrics,
  KeywordSet,
  PassiveVoiceMetrics,
  SentenceLengthMetrics,
  SubheadingMetrics,
  TextFieldMetrics,
  TransitionMetrics,
} from "./types.js";

/**
 * One analyzer per aspect. Any of them can be swapped for another
 * implementation of the same contract.
 */
export interface AnalyzerSet {
  keywordDensity: Analyzer<string, KeywordDensityMetrics>;
  passiveVoice: Analyzer<string, PassiveVoiceMetrics>;
  sentenceLength: Analyzer<string, SentenceLengthMetrics>;
  transitionWords: Analyzer<string, TransitionMetrics>;
  subheadings: Analyzer<string, SubheadingMetrics>;
  images: Analyzer<Content, ImageMetrics>;
  metaDescription: Analyzer<string, TextFieldMetrics>;
  title: Analyzer<string, TextFieldMetrics>;
}

export function createDefaultAnalyzers(overrides: Partial<AnalyzerSet> = {}): AnalyzerSet {
  return {
    keywordDensity: new KeywordDensityAnalyzer(),
    passiveVoice: new PassiveVoiceAnalyzer(),
    sentenceLength: new SentenceLengthAnalyzer(),
    transitionWords: new TransitionWordAnalyzer(),
    subheadings: new SubheadingAnalyzer(),
    images: new ImageAnalyzer(),
    metaDescription: new TextFieldAnalyzer("meta_description"),
    title: new TextFieldAnalyzer("title"),
    ...overrides,
  };
}

/**
 * Full analysis of a content value, one result per analyzer.
 */
export interface ContentAnalysis {
  keywordDensity: KeywordDensityMetrics;
  passiveVoice: PassiveVoiceMetrics;
  sentenceLength: SentenceLengthMetrics;
  transitionWords: TransitionMetrics;
  subheadings: SubheadingMetrics;
  images: ImageMetrics;
  metaDescription: TextFieldMetrics;
  title: TextFieldMetrics;
}

export function analyzeContent(
  content: Content,
  keywords: KeywordSet,
  analyzers: AnalyzerSet
): ContentAnalysis {
  return {
    keywordDensity: analyzers.keywordDensity.analyze(content.body, keywords),
    passiveVoice: analyzers.passiveVoice.analyze(content.body, keywords),
    sentenceLength: analyzers.sentenceLength.analyze(content.body, keywords),
    transitionWords: analyzers.transitionWords.analyze(content.body, keywords),
    subheadings: analyzers.subheadings.analyze(content.body, keywords),
    images: analyzers.images.analyze(content, keywords),
    metaDescription: analyzers.metaDescription.analyze(content.metaDescription, keywords),
    title: analyzers.title.analyze(content.title, keywords),
  };
}

export function summarizeAnalysis(analysis: ContentAnalysis): ContentMetrics {
  return {
    wordCount: analysis.keywordDensity.wordCount,
    sentenceCount: analysis.sentenceLength.totalSentences,
    keywordDensity: analysis.keywordDensity.density,
    keywordOccurrences: analysis.keywordDensity.occurrences,
    metaDescriptionLength: analysis.metaDescription.length,
    metaHasKeyword: analysis.metaDescription.hasKeyword,
    passiveVoicePercentage: analysis.passiveVoice.percentage,
    longSentencePercentage: analysis.sentenceLength.percentage,
    transitionWordPercentage: analysis.transitionWords.percentage,
    titleLength: analysis.title.length,
    titleHasKeyword: analysis.title.hasKeyword,
    subheadingCount: analysis.subheadings.headings.length,
    subheadingKeywordPercentage: analysis.subheadings.percentage,
    imageCount: analysis.images.imageCount,
    properAltCount: analysis.images.properAltCount,
  };
}

export function measureContent(
  content: Content,
  keywords: KeywordSet,
  analyzers: AnalyzerSet = createDefaultAnalyzers()
): ContentMetrics {
  return summarizeAnalysis(analyzeContent(content, keywords, analyzers));
}
