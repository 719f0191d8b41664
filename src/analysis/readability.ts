/**
 * Readability analyzers: passive voice, sentence length and transition
 * words. Each works per sentence of the stripped body.
 */

import { countWords, roundTo, splitSentences, stripTags } from "../content/text.js";
import type {
  Analyzer,
  PassiveVoiceMetrics,
  SentenceLengthMetrics,
  TransitionMetrics,
} from "./types.js";

/** A sentence with more words than this is long */
export const LONG_SENTENCE_WORDS = 20;

const PASSIVE_PATTERN = /\b(was|were|been|being|is|are|am)\s+\w+ed\b/i;

/** Matched as lower-case substrings of a sentence */
export const TRANSITION_WORDS: readonly string[] = [
  "however",
  "therefore",
  "furthermore",
  "moreover",
  "additionally",
  "consequently",
  "meanwhile",
  "nevertheless",
  "nonetheless",
  "thus",
  "hence",
  "accordingly",
  "similarly",
  "likewise",
  "conversely",
  "on the other hand",
  "in contrast",
  "in addition",
  "for example",
  "for instance",
  "in conclusion",
  "finally",
  "first",
  "second",
  "third",
  "next",
  "then",
  "also",
  "besides",
  "indeed",
];

function share(count: number, total: number): number {
  return total > 0 ? roundTo((count / total) * 100, 1) : 0;
}

export function isPassive(sentence: string): boolean {
  return PASSIVE_PATTERN.test(sentence);
}

export function hasTransition(sentence: string): boolean {
  const lower = sentence.toLowerCase();
  return TRANSITION_WORDS.some((word) => lower.includes(word));
}

export class PassiveVoiceAnalyzer implements Analyzer<string, PassiveVoiceMetrics> {
  readonly name = "passive_voice";

  analyze(html: string): PassiveVoiceMetrics {
    const sentences = splitSentences(stripTags(html));
    const passiveSentences = sentences.filter(isPassive);
    return {
      totalSentences: sentences.length,
      passiveSentences,
      percentage: share(passiveSentences.length, sentences.length),
    };
  }
}

export class SentenceLengthAnalyzer implements Analyzer<string, SentenceLengthMetrics> {
  readonly name = "sentence_length";

  analyze(html: string): SentenceLengthMetrics {
    const sentences = splitSentences(stripTags(html));
    let totalWords = 0;
    const longSentences = sentences.flatMap((sentence, index) => {
      const wordCount = countWords(sentence);
      totalWords += wordCount;
      return wordCount > LONG_SENTENCE_WORDS ? [{ sentence, wordCount, index }] : [];
    });

    return {
      totalSentences: sentences.length,
      longSentences,
      percentage: share(longSentences.length, sentences.length),
      averageWords: sentences.length > 0 ? roundTo(totalWords / sentences.length, 1) : 0,
    };
  }
}

export class TransitionWordAnalyzer implements Analyzer<string, TransitionMetrics> {
  readonly name = "transition_words";

  analyze(html: string): TransitionMetrics {
    const sentences = splitSentences(stripTags(html));
    const withTransitions = sentences.filter(hasTransition).length;
    return {
      totalSentences: sentences.length,
      sentencesWithTransitions: withTransitions,
      percentage: share(withTransitions, sentences.length),
    };
  }
}
