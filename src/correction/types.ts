/**
 * Corrector contract.
 *
 * A corrector rewrites one aspect of a content value. Failing to improve
 * is an expected outcome and comes back as `{ ok: false }`; only faults
 * throw.
 */

import type { Aspect } from "../config/engine/enums.js";
import type { PipelineConfig } from "../config/engine/schema.js";
import type { Content } from "../content/schema.js";
import type { Clock } from "../cache/store.js";
import type { RandomSource } from "./random.js";

export type CorrectionResult =
  | { ok: true; content: Content; changes: string[] }
  | { ok: false; reason: string };

export interface CorrectorOptions {
  thresholds: PipelineConfig;
  random: RandomSource;
  now: Clock;
}

export interface Corrector {
  readonly aspect: Aspect;
  correct(
    content: Content,
    focusKeyword: string,
    secondaryKeywords: readonly string[],
    options: CorrectorOptions
  ): CorrectionResult;
}

export function unchanged(reason: string): CorrectionResult {
  return { ok: false, reason };
}
