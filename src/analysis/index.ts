/**
 * Content analyzers.
 */

export type {
  Analyzer,
  KeywordSet,
  KeywordDensityMetrics,
  PassiveVoiceMetrics,
  SentenceLengthMetrics,
  LongSentence,
  TransitionMetrics,
  SubheadingMetrics,
  ImageEntry,
  ImageMetrics,
  TextFieldMetrics,
  ContentMetrics,
} from "./types.js";
export { KeywordDensityAnalyzer, calculateDensity, keywordList } from "./keyword-density.js";
export {
  PassiveVoiceAnalyzer,
  SentenceLengthAnalyzer,
  TransitionWordAnalyzer,
  TRANSITION_WORDS,
  LONG_SENTENCE_WORDS,
  isPassive,
  hasTransition,
} from "./readability.js";
export {
  SubheadingAnalyzer,
  ImageAnalyzer,
  TextFieldAnalyzer,
  extractSubheadings,
  extractImgAlts,
  isProperAlt,
  MIN_ALT_LENGTH,
} from "./structure.js";
export {
  createDefaultAnalyzers,
  analyzeContent,
  summarizeAnalysis,
  measureContent,
  type AnalyzerSet,
  type ContentAnalysis,
} from "./metrics.js";
