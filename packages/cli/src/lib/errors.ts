/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { SessionNotFoundError } from "@studylog/sdk";

/**
 * Exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: session not found
 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map SDK and commander errors to CLI exit codes
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof SessionNotFoundError) {
    return EXIT_NOT_FOUND;
  }

  // Help and version output also arrive here, with exit code 0
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let message = error.message;

  // Import payloads can end up in decode messages
  if (message.length > 2000) {
    message = message.substring(0, 2000) + "... (truncated)";
  }

  if (verbose && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    message += `\n  Cause: ${cause}`;
  }

  if (verbose && error.stack) {
    message += `\n${error.stack}`;
  }

  return message;
}
