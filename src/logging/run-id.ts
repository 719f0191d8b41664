/**
 * Run and session identifiers.
 *
 * A run is one process invocation (a CLI call, a script). Every log line
 * and error log entry carries the run ID; optimization sessions started
 * during the run get IDs nested under it.
 */

import { randomBytes } from "node:crypto";

let activeRunId: string | null = null;

/**
 * `YYYYMMDD-xxxxxx`: the UTC date and six hex characters.
 */
export function generateRunId(at: Date = new Date()): string {
  const day = at.toISOString().slice(0, 10).split("-").join("");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

/**
 * Start a run. Call once at process startup, before anything logs.
 */
export function initRunId(runId: string = generateRunId()): string {
  activeRunId = runId;
  return activeRunId;
}

/** Null until initRunId has been called */
export function getRunId(): string | null {
  return activeRunId;
}

/**
 * `${prefix}_${runId}_xxxx`. Outside a run a fresh run ID stands in.
 */
export function generateSessionId(prefix = "session"): string {
  const run = activeRunId ?? generateRunId();
  return [prefix, run, randomBytes(2).toString("hex")].join("_");
}
