/**
 * Default correctors, one per aspect.
 */

import type { Aspect } from "../config/engine/enums.js";
import { ImageCorrector } from "./images.js";
import { KeywordDensityCorrector } from "./keyword-density.js";
import { MetaDescriptionCorrector } from "./meta-description.js";
import { ReadabilityCorrector } from "./readability.js";
import { TitleCorrector } from "./title.js";
import type { Corrector } from "./types.js";

export type CorrectorSet = Record<Aspect, Corrector>;

export function createDefaultCorrectors(overrides: Partial<CorrectorSet> = {}): CorrectorSet {
  return {
    meta_description: new MetaDescriptionCorrector(),
    keyword_density: new KeywordDensityCorrector(),
    readability: new ReadabilityCorrector(),
    title: new TitleCorrector(),
    images: new ImageCorrector(),
    ...overrides,
  };
}

export { createSeededRandom, systemRandom, type RandomSource } from "./random.js";
export { unchanged, type CorrectionResult, type Corrector, type CorrectorOptions } from "./types.js";
export {
  MetaDescriptionCorrector,
  insertKeyword,
  expandDescription,
  trimDescription,
  splitMetaSentences,
} from "./meta-description.js";
export {
  KeywordDensityCorrector,
  increaseDensity,
  reduceDensity,
  rewriteSubheadings,
  MIN_WORDS_FOR_ADDITION,
} from "./keyword-density.js";
export {
  ReadabilityCorrector,
  toActive,
  splitSentence,
  fixPassiveVoice,
  splitLongSentences,
  addTransitions,
  MAX_READABILITY_ROUNDS,
} from "./readability.js";
export {
  TitleCorrector,
  TITLE_TEMPLATES,
  fillTemplate,
  removeFillerWords,
  shortenPhrases,
  shortenTitle,
  truncatePreservingKeyword,
} from "./title.js";
export { ImageCorrector, defaultImagePrompt, optimizeAltText } from "./images.js";
