#!/usr/bin/env node
/**
 * CLI tool to optimize a content record.
 *
 * Loads a content record (JSON, snake_case fields), runs a multi-pass
 * optimization session against it and prints the session report.
 * Validation results, retry history and error statistics persist in a
 * JSON store between runs, so repeated runs reuse cached verdicts and
 * learned retry strategies.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Optimize a post:
 *   npm run optimize -- --input fixtures/sample-post.json
 *
 * Write the optimized record and a JSON report:
 *   npm run optimize -- --input post.json --output out/post.json --json
 *
 * Options:
 *   --input <path>    Content record to optimize (required)
 *   --config <path>   Engine configuration JSON (default: ENGINE_CONFIG_PATH when present)
 *   --store <path>    JSON store file (default: STORE_PATH)
 *   --output <path>   Write the optimized content record here
 *   --json            Print the full report as JSON
 *   --seed <n>        Seed the random source for reproducible corrections (default: OPTIMIZER_SEED)
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Content is compliant
 *   1 - Error (bad arguments, content record or configuration)
 *   2 - Optimization ended without reaching compliance
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config as appConfig,
  validateConfig,
  isLogLevel,
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  loadEngineConfigFromFile,
  type EngineConfig,
} from "../config/index.js";
import { ContentValidationError, loadContentFromFile, toContentRecord, type Content } from "../content/index.js";
import { JsonFileKeyValueStore } from "../cache/index.js";
import { createSeededRandom } from "../correction/index.js";
import { MultiPassOptimizer, type OptimizationReport } from "../optimizer/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface OptimizeCliOptions {
  input?: string;
  config?: string;
  store: string;
  output?: string;
  json: boolean;
  seed?: number;
  help: boolean;
}

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
  /** Defaults to a console and file logger at the configured level */
  logger?: Logger;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `
Usage: seo-optimize --input <file> [options]

Options:
  --input <path>    Content record to optimize (required)
  --config <path>   Engine configuration JSON (default: ${appConfig.engineConfigPath} when present)
  --store <path>    JSON store file (default: ${appConfig.storePath})
  --output <path>   Write the optimized content record here
  --json            Print the full report as JSON
  --seed <n>        Seed the random source for reproducible corrections (default: OPTIMIZER_SEED)
  -h, --help        Show this help message

Exit codes:
  0 - Content is compliant
  1 - Error (bad arguments, content record or configuration)
  2 - Optimization ended without reaching compliance
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseRawArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      input: { type: "string" },
      config: { type: "string" },
      store: { type: "string", default: appConfig.storePath },
      output: { type: "string" },
      json: { type: "boolean", default: false },
      seed: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export function parseOptimizeArgs(argv: string[]): OptimizeCliOptions {
  let values: ReturnType<typeof parseRawArgs>["values"];
  try {
    values = parseRawArgs(argv).values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  let seed: number | undefined;
  if (values.seed !== undefined) {
    seed = Number(values.seed);
    if (!Number.isInteger(seed)) {
      throw new CliUsageError(`--seed must be an integer, got: ${values.seed}`);
    }
  }

  return {
    input: values.input,
    config: values.config,
    store: values.store,
    output: values.output,
    json: values.json,
    seed,
    help: values.help,
  };
}

/**
 * Explicit path, else the configured path when the file exists, else
 * the built-in defaults.
 */
export function resolveEngineConfig(path?: string): Readonly<EngineConfig> {
  if (path !== undefined) {
    return loadEngineConfigFromFile(path);
  }
  if (existsSync(appConfig.engineConfigPath)) {
    return loadEngineConfigFromFile(appConfig.engineConfigPath);
  }
  return DEFAULT_ENGINE_CONFIG;
}

// ============================================================
// Output Formatting
// ============================================================

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

export function formatReport(report: OptimizationReport): string {
  const { summary, validationResult } = report;
  const lines = [
    "Optimization report",
    `  Title:          ${report.content.title}`,
    `  Focus keyword:  ${report.content.focusKeyword}`,
    `  Termination:    ${summary.terminationReason}`,
    `  Score:          ${summary.initialScore} -> ${summary.finalScore} (${signed(summary.improvement)})`,
    `  Passes:         ${summary.iterationsUsed}`,
    `  Compliant:      ${summary.complianceAchieved ? "yes" : "no"}`,
    `  Corrections:    ${summary.issuesResolved.length > 0 ? summary.issuesResolved.join(", ") : "none"}`,
  ];

  if (validationResult.errors.length > 0) {
    lines.push("", "Remaining errors:");
    for (const error of validationResult.errors) {
      lines.push(`  - ${error.component}: ${error.message}`);
    }
  }
  if (validationResult.warnings.length > 0) {
    lines.push("", "Remaining warnings:");
    for (const warning of validationResult.warnings) {
      lines.push(`  - ${warning.component}: ${warning.message}`);
    }
  }
  if (report.userReport.recommendations.length > 0) {
    lines.push("", "Recommendations:");
    for (const recommendation of report.userReport.recommendations) {
      lines.push(`  - ${recommendation}`);
    }
  }

  return lines.join("\n");
}

// ============================================================
// Main
// ============================================================

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Run the tool and return its exit code.
 */
export async function runOptimize(argv: string[], io: CliIo = consoleIo): Promise<number> {
  let options: OptimizeCliOptions;
  try {
    validateConfig();
    options = parseOptimizeArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError || err instanceof ConfigError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }
  if (options.input === undefined) {
    io.err("Error: Missing required option: --input");
    return 1;
  }

  let engineConfig: Readonly<EngineConfig>;
  let content: Content;
  try {
    content = loadContentFromFile(resolve(options.input));
    engineConfig = resolveEngineConfig(options.config);
  } catch (err) {
    if (err instanceof ContentValidationError || err instanceof EngineConfigError) {
      io.err(`${err.message}\n${err.format()}`);
      return 1;
    }
    throw err;
  }

  const logger =
    io.logger ??
    createLogger({
      level: isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info",
      logDir: appConfig.logDir,
    });
  const seed = options.seed ?? appConfig.seed;
  const optimizer = new MultiPassOptimizer({
    store: new JsonFileKeyValueStore(resolve(options.store)),
    config: engineConfig,
    random: seed !== undefined ? createSeededRandom(seed) : undefined,
    logger,
  });

  const report = await optimizer.optimize(content);

  if (options.output !== undefined) {
    const outputPath = resolve(options.output);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(toContentRecord(report.content), null, 2) + "\n");
  }

  io.out(options.json ? JSON.stringify(report, null, 2) : formatReport(report));
  return report.success ? 0 : 2;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("optimize.ts") || process.argv[1].endsWith("optimize.js"));

if (isDirectExecution) {
  initRunId();
  runOptimize(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
