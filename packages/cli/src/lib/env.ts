/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" is left as is
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Resolve the data directory
 * Priority: --root > STUDYLOG_ROOT > "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const fromEnv = process.env.STUDYLOG_ROOT;
  const root = cliRoot ?? (fromEnv && fromEnv.trim() !== "" ? fromEnv : "./data");
  return path.resolve(expandTilde(root));
}

/**
 * Timing metrics on stderr
 */
export function isVerbose(): boolean {
  return process.env.STUDYLOG_CLI_DEBUG === "1";
}

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}
