/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 20000) */
  timeout?: number;
}

/**
 * Run a TypeScript CLI entry point in a child Node process, loaded through tsx
 *
 * Non-zero exits resolve rather than reject, so tests can assert exit codes.
 * @param entryPath - Path to the CLI source file
 * @param args - Command arguments
 */
export async function runCli(
  entryPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input, timeout = 20000 } = options;

  const result = await execa(process.execPath, ["--import", "tsx", entryPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
