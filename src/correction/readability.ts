/**
 * Readability corrector.
 *
 * Up to three rounds of: passive sentences rewritten as active, long
 * sentences split at a conjunction or comma, transition words prepended.
 * Each fix runs only while its metric is out of range, and a round that
 * changes nothing ends the loop.
 *
 * Rewrites work on sentences found in the stripped text and are applied
 * to the marked-up body by exact substring replacement. A sentence that
 * spans inline markup is not found verbatim and is left as it is.
 */

import type { Content } from "../content/schema.js";
import { capitalize, countWords, lowercaseFirst, splitSentences, stripTags } from "../content/text.js";
import {
  LONG_SENTENCE_WORDS,
  PassiveVoiceAnalyzer,
  SentenceLengthAnalyzer,
  TransitionWordAnalyzer,
  hasTransition,
  isPassive,
} from "../analysis/readability.js";
import type { RandomSource } from "./random.js";
import { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";

export const MAX_READABILITY_ROUNDS = 3;

const TRANSITIONS: readonly [string, ...string[]] = [
  "Furthermore",
  "Additionally",
  "Moreover",
  "However",
  "Therefore",
  "Consequently",
];

const PASSIVE_CLAUSE =
  /^(.*?)\s*\b(?:has been|have been|had been|was|were|is|are|am|been|being)\s+(\w+ed)\b(.*)$/i;

const AGENT = /^\s+by\s+(.+)$/i;

/** Split points, tried in order. `lead` opens the second half. */
const CONJUNCTIONS: ReadonlyArray<{ pattern: RegExp; lead: string }> = [
  { pattern: /,?\s+\b(?:and|or)\s+/i, lead: "" },
  { pattern: /,?\s+\bbut\s+/i, lead: "However, " },
  { pattern: /,?\s+\b(?:because|since)\s+/i, lead: "This is because " },
  { pattern: /,?\s+\b(?:while|although)\s+/i, lead: "Still, " },
];

/** Each half of a split keeps at least this many words */
const MIN_SPLIT_WORDS = 3;

function replaceFirst(body: string, from: string, to: string): string {
  const index = body.indexOf(from);
  return index === -1 ? body : body.slice(0, index) + to + body.slice(index + from.length);
}

/**
 * Active rewrite of a passive sentence, or undefined when the sentence has
 * no subject before the auxiliary.
 */
export function toActive(sentence: string): string | undefined {
  const match = PASSIVE_CLAUSE.exec(sentence);
  if (!match) return undefined;

  const subject = (match[1] ?? "").trim();
  const verb = match[2] ?? "";
  const rest = match[3] ?? "";
  if (subject.length === 0) return undefined;

  const agent = AGENT.exec(rest);
  if (agent) {
    return `${capitalize((agent[1] ?? "").trim())} ${verb} ${lowercaseFirst(subject)}`;
  }
  return `People ${verb} ${lowercaseFirst(subject)}${rest}`;
}

/**
 * Two sentences joined by ". ", or undefined when there is no split
 * point leaving both halves long enough.
 */
export function splitSentence(sentence: string): string | undefined {
  for (const { pattern, lead } of CONJUNCTIONS) {
    const match = pattern.exec(sentence);
    if (!match) continue;

    const first = sentence.slice(0, match.index).trim();
    const second = sentence.slice(match.index + match[0].length).trim();
    if (countWords(first) >= MIN_SPLIT_WORDS && countWords(second) >= MIN_SPLIT_WORDS) {
      return `${first}. ${lead ? lead + second : capitalize(second)}`;
    }
  }

  if ((sentence.match(/,/g) ?? []).length >= 2) {
    const comma = sentence.indexOf(",");
    const first = sentence.slice(0, comma).trim();
    const second = sentence.slice(comma + 1).trim();
    if (countWords(first) >= MIN_SPLIT_WORDS && countWords(second) >= MIN_SPLIT_WORDS) {
      return `${first}. ${capitalize(second)}`;
    }
  }

  return undefined;
}

export function fixPassiveVoice(body: string): { body: string; changes: string[] } {
  let result = body;
  const changes: string[] = [];
  for (const sentence of splitSentences(stripTags(body)).filter(isPassive)) {
    const active = toActive(sentence);
    if (active === undefined || !result.includes(sentence)) continue;
    result = replaceFirst(result, sentence, active);
    changes.push(`Rewrote passive sentence: "${sentence}"`);
  }
  return { body: result, changes };
}

export function splitLongSentences(body: string): { body: string; changes: string[] } {
  let result = body;
  const changes: string[] = [];
  for (const sentence of splitSentences(stripTags(body))) {
    if (countWords(sentence) <= LONG_SENTENCE_WORDS) continue;
    const split = splitSentence(sentence);
    if (split === undefined || !result.includes(sentence)) continue;
    result = replaceFirst(result, sentence, split);
    changes.push(`Split long sentence (${countWords(sentence)} words)`);
  }
  return { body: result, changes };
}

/**
 * Prepend transitions until `minPercentage` of sentences carry one.
 * Every third and fourth sentence is tried first, then the rest; the
 * opening sentence never gets one.
 */
export function addTransitions(
  body: string,
  minPercentage: number,
  random: RandomSource
): { body: string; changes: string[] } {
  const sentences = splitSentences(stripTags(body));
  const needed = Math.ceil((minPercentage / 100) * sentences.length) - sentences.filter(hasTransition).length;
  if (needed <= 0) return { body, changes: [] };

  const candidates = sentences
    .map((sentence, index) => ({ sentence, index }))
    .filter(({ sentence, index }) => index > 0 && !hasTransition(sentence));
  const preferred = (index: number) => index % 3 === 0 || index % 4 === 0;
  const ordered = [
    ...candidates.filter(({ index }) => preferred(index)),
    ...candidates.filter(({ index }) => !preferred(index)),
  ];

  let result = body;
  const changes: string[] = [];
  for (const { sentence } of ordered) {
    if (changes.length >= needed) break;
    if (!result.includes(sentence)) continue;
    const transition = random.pick(TRANSITIONS);
    result = replaceFirst(result, sentence, `${transition}, ${lowercaseFirst(sentence)}`);
    changes.push(`Added transition "${transition}"`);
  }
  return { body: result, changes };
}

export class ReadabilityCorrector implements Corrector {
  readonly aspect = "readability" as const;

  private readonly passive = new PassiveVoiceAnalyzer();
  private readonly length = new SentenceLengthAnalyzer();
  private readonly transitions = new TransitionWordAnalyzer();

  correct(
    content: Content,
    _focusKeyword: string,
    _secondaryKeywords: readonly string[],
    options: CorrectorOptions
  ): CorrectionResult {
    const { maxPassiveVoice, maxLongSentences, minTransitionWords } = options.thresholds;
    const changes: string[] = [];
    let body = content.body;

    for (let round = 0; round < MAX_READABILITY_ROUNDS; round++) {
      const start = body;

      if (this.passive.analyze(body).percentage > maxPassiveVoice) {
        const fixed = fixPassiveVoice(body);
        body = fixed.body;
        changes.push(...fixed.changes);
      }
      if (this.length.analyze(body).percentage > maxLongSentences) {
        const fixed = splitLongSentences(body);
        body = fixed.body;
        changes.push(...fixed.changes);
      }
      if (this.transitions.analyze(body).percentage < minTransitionWords) {
        const fixed = addTransitions(body, minTransitionWords, options.random);
        body = fixed.body;
        changes.push(...fixed.changes);
      }

      if (body === start) break;
    }

    if (body === content.body) {
      return unchanged("No readability rewrite applied");
    }
    return { ok: true, content: { ...content, body }, changes };
  }
}
