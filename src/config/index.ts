/**
 * Process configuration from the environment, plus the engine
 * configuration module.
 *
 * Environment values are read once at import. validateConfig() checks the
 * ones that have a closed set of values; entry points call it before
 * doing any work.
 */

import { envChoice, optionalEnv, optionalEnvBool, optionalEnvInt } from "./env.js";
import type { LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

export * from "./engine/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** NODE_ENV */
  readonly env: string;
  readonly debug: boolean;
  /** LOG_LEVEL */
  readonly logLevel: string;
  readonly appName: string;
  readonly logDir: string;
  /** JSON file backing the CLI's persistent store */
  readonly storePath: string;
  /** Engine configuration file read by the CLI when present */
  readonly engineConfigPath: string;
  /** OPTIMIZER_SEED: seeds corrections when the CLI gets no --seed */
  readonly seed: number | undefined;
}

export const config: AppConfig = {
  env: optionalEnv("NODE_ENV", "development"),
  debug: optionalEnvBool("DEBUG", false),
  logLevel: optionalEnv("LOG_LEVEL", "info"),
  appName: optionalEnv("APP_NAME", "seo-convergence-engine"),
  logDir: optionalEnv("LOG_DIR", "output/logs"),
  storePath: optionalEnv("STORE_PATH", "output/store.json"),
  engineConfigPath: optionalEnv("ENGINE_CONFIG_PATH", "config/engine.json"),
  seed: optionalEnvInt("OPTIMIZER_SEED"),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * @throws ConfigError naming the first invalid variable
 */
export function validateConfig(): void {
  envChoice("NODE_ENV", config.env, ENVIRONMENTS);
  envChoice("LOG_LEVEL", config.logLevel, LOG_LEVELS);
}
