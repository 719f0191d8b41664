/**
 * Engine configuration loader and validator.
 *
 * Responsible for:
 * - Merging partial overrides over the defaults, section by section
 * - Validating the merged result with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
import {
  EngineConfigOverridesSchema,
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./schema.js";

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "parse" for file problems */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Apply overrides over the defaults. Sections merge field by field; the
 * cache TTL table merges one level deeper.
 */
export function mergeEngineConfig(
  base: EngineConfig,
  overrides: EngineConfigOverrides
): EngineConfig {
  return {
    detector: { ...base.detector, ...overrides.detector },
    pipeline: { ...base.pipeline, ...overrides.pipeline },
    retry: { ...base.retry, ...overrides.retry },
    cache: {
      prefix: overrides.cache?.prefix ?? base.cache.prefix,
      maxMemoryEntries: overrides.cache?.maxMemoryEntries ?? base.cache.maxMemoryEntries,
      ttl: { ...base.cache.ttl, ...overrides.cache?.ttl },
    },
    improvement: { ...base.improvement, ...overrides.improvement },
    progress: { ...base.progress, ...overrides.progress },
    structure: { ...base.structure, ...overrides.structure },
    optimizer: {
      ...base.optimizer,
      ...overrides.optimizer,
      priorityOrder: [...(overrides.optimizer?.priorityOrder ?? base.optimizer.priorityOrder)],
    },
  };
}

function parseEngineConfig(
  input: unknown
): { success: true; config: EngineConfig } | { success: false; errors: ConfigValidationIssue[] } {
  const overrides = EngineConfigOverridesSchema.safeParse(input ?? {});
  if (!overrides.success) {
    return { success: false, errors: formatZodIssues(overrides.error.issues) };
  }

  const merged = EngineConfigSchema.safeParse(
    mergeEngineConfig(DEFAULT_ENGINE_CONFIG, overrides.data)
  );
  if (!merged.success) {
    return { success: false, errors: formatZodIssues(merged.error.issues) };
  }

  return { success: true, config: merged.data };
}

/**
 * Validate and load engine configuration.
 *
 * Missing sections and fields take their defaults. Unknown keys and
 * out-of-range values are rejected.
 *
 * @param input - Partial configuration; undefined loads the defaults
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input?: unknown): Readonly<EngineConfig> {
  const result = parseEngineConfig(input);

  if (!result.success) {
    throw new EngineConfigError(
      `Invalid engine configuration: ${result.errors.length} validation error(s)`,
      result.errors
    );
  }

  return deepFreeze(result.config);
}

/**
 * Read a JSON configuration file and load it.
 *
 * @throws EngineConfigError if the file cannot be read, is not JSON, or fails validation
 */
export function loadEngineConfigFromFile(path: string): Readonly<EngineConfig> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new EngineConfigError(`Cannot read engine configuration: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new EngineConfigError(`Engine configuration is not valid JSON: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "parse" },
    ]);
  }

  return loadEngineConfig(parsed);
}

/**
 * Validate engine configuration without loading.
 * Useful for checking config files before a run.
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = parseEngineConfig(input);
  return result.success
    ? { success: true, config: result.config }
    : { success: false, errors: result.errors };
}
