/**
 * Validation pipeline, its result shape and the title registry.
 */

export {
  ValidationPipeline,
  STEP_ORDER,
  type ContentValidator,
  type RetriedValidation,
  type ValidationPipelineOptions,
} from "./validation-pipeline.js";
export {
  ContentMetricsSchema,
  ValidationMessageSchema,
  StepReportSchema,
  ValidationResultSchema,
  ERROR_PENALTY,
  WARNING_PENALTY,
  scoreResult,
  messagesFor,
  emptyMetrics,
  faultResult,
  type ContentMetricsRecord,
  type ValidationMessage,
  type StepReport,
  type ValidationResult,
} from "./result.js";
export {
  TitleRegistry,
  DEFAULT_SIMILARITY_THRESHOLD,
  normalizeTitle,
  levenshtein,
  titleSimilarity,
  type KnownTitle,
  type SimilarTitle,
  type TitleRegistryOptions,
} from "./title-registry.js";
