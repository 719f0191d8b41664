/**
 * Engine configuration module.
 *
 * Provides schema-validated, immutable configuration for every engine
 * component.
 *
 * Usage:
 *   import { loadEngineConfig } from "./config/engine/index.js";
 *
 *   // Defaults
 *   const config = loadEngineConfig();
 *
 *   // Partial overrides
 *   const strict = loadEngineConfig({ optimizer: { maxIterations: 3 } });
 */

// Domain enums
export {
  Severity,
  IssueType,
  Aspect,
  TerminationReason,
  CacheTier,
  ErrorCategory,
  DegradationLevel,
} from "./enums.js";

// Schema types
export type {
  EngineConfig,
  EngineConfigOverrides,
  DetectorThresholds,
  PipelineConfig,
  RetryConfig,
  CacheConfig,
  CacheTtl,
  ImprovementConfig,
  ProgressConfig,
  StructureConfig,
  OptimizerConfig,
} from "./schema.js";

// Schema objects
export {
  EngineConfigSchema,
  EngineConfigOverridesSchema,
  DetectorThresholdsSchema,
  PipelineConfigSchema,
  RetryConfigSchema,
  CacheConfigSchema,
  ImprovementConfigSchema,
  ProgressConfigSchema,
  StructureConfigSchema,
  OptimizerConfigSchema,
} from "./schema.js";

// Loader and validation
export {
  loadEngineConfig,
  loadEngineConfigFromFile,
  validateEngineConfig,
  mergeEngineConfig,
  deepFreeze,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
