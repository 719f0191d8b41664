/**
 * Environment variables.
 *
 * `.env` is loaded on import. Readers return typed values and raise
 * ConfigError for values they cannot interpret; an unset or empty
 * variable counts as absent.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Accepts true/false, 1/0 and yes/no in any case.
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) return defaultValue;

  switch (value.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`);
  }
}

/**
 * Undefined when unset.
 */
export function optionalEnvInt(key: string): number | undefined {
  const value = readEnv(key);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Narrow an already-read value to one of `choices`.
 */
export function envChoice<T extends string>(key: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${key}: ${value}. Must be one of: ${choices.join(", ")}`);
  }
  return match;
}
