/**
 * Multi-pass optimization and the correction prompts it records.
 */

export {
  MultiPassOptimizer,
  type IterationRecord,
  type OptimizerLogEntry,
  type OptimizationSummary,
  type OptimizationReport,
  type OptimizerStats,
  type MultiPassOptimizerOptions,
} from "./multi-pass-optimizer.js";
export {
  generateCorrectionPrompts,
  instructionFor,
  type CorrectionType,
  type CorrectionPrompt,
  type PromptThresholds,
  type PromptOptions,
} from "./correction-prompts.js";
