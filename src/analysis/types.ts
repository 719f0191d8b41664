/**
 * Analyzer contracts.
 *
 * An analyzer measures one aspect of a piece of content and returns plain
 * data. It never judges the measurement against thresholds; that is the
 * detector's and the pipeline's job.
 */

export interface KeywordSet {
  readonly focusKeyword: string;
  readonly secondaryKeywords: readonly string[];
}

export interface Analyzer<I, M> {
  readonly name: string;
  analyze(input: I, keywords: KeywordSet): M;
}

export interface KeywordDensityMetrics {
  /** Percentage of words, two decimals */
  density: number;
  wordCount: number;
  occurrences: number;
  /** Occurrences per keyword, focus keyword first */
  perKeyword: Record<string, number>;
}

export interface PassiveVoiceMetrics {
  totalSentences: number;
  passiveSentences: string[];
  /** One decimal */
  percentage: number;
}

export interface LongSentence {
  sentence: string;
  wordCount: number;
  index: number;
}

export interface SentenceLengthMetrics {
  totalSentences: number;
  longSentences: LongSentence[];
  percentage: number;
  averageWords: number;
}

export interface TransitionMetrics {
  totalSentences: number;
  sentencesWithTransitions: number;
  percentage: number;
}

export interface SubheadingMetrics {
  headings: string[];
  headingsWithKeyword: string[];
  percentage: number;
}

export interface ImageEntry {
  source: "body" | "prompt";
  alt: string;
  properAlt: boolean;
}

export interface ImageMetrics {
  images: ImageEntry[];
  imageCount: number;
  properAltCount: number;
  hasImages: boolean;
  /** True when at least one image carries a proper alt text */
  hasProperAltText: boolean;
}

export interface TextFieldMetrics {
  length: number;
  hasKeyword: boolean;
}

/**
 * Flat, serializable summary of every measurement. Cached and reported.
 */
export interface ContentMetrics {
  wordCount: number;
  sentenceCount: number;
  keywordDensity: number;
  keywordOccurrences: number;
  metaDescriptionLength: number;
  metaHasKeyword: boolean;
  passiveVoicePercentage: number;
  longSentencePercentage: number;
  transitionWordPercentage: number;
  titleLength: number;
  titleHasKeyword: boolean;
  subheadingCount: number;
  subheadingKeywordPercentage: number;
  imageCount: number;
  properAltCount: number;
}
