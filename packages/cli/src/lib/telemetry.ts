/**
 * Timing metrics for CLI commands
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a `metric <key> k=v ...` line to stderr when STUDYLOG_CLI_DEBUG=1
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Time a command, tagging failures with the error name
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();

  try {
    const result = await fn();
    emitMetric(label, { duration_ms: Date.now() - start, success: true });
    return result;
  } catch (err) {
    emitMetric(label, {
      duration_ms: Date.now() - start,
      success: false,
      error: err instanceof Error ? err.name : "unknown",
    });
    throw err;
  }
}
