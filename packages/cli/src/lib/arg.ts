/**
 * Argument parsing and validation helpers
 *
 * Each parser is a commander option coercer: it returns the parsed value or
 * throws InvalidArgumentError, which commander reports as a usage error.
 */

import { InvalidArgumentError } from "commander";
import {
  isIsoDate,
  tryParseTimeOfDay,
  MAX_DURATION_MINUTES,
  type ImportConflictPolicy,
  type IsoDate,
  type TimeOfDay,
} from "@studylog/sdk";

const CONFLICT_POLICIES: readonly ImportConflictPolicy[] = ["skip", "replace", "error"];

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse a duration in whole minutes
 */
export function parseMinutes(value: string, name = "--minutes"): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a whole number of minutes`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError(`${name} must be greater than 0`);
  }
  if (parsed > MAX_DURATION_MINUTES) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_DURATION_MINUTES}`);
  }

  return parsed;
}

/**
 * Parse a YYYY-MM-DD calendar date
 */
export function parseDate(value: string, name: string): IsoDate {
  const trimmed = value.trim();
  if (!isIsoDate(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a calendar date in YYYY-MM-DD form`);
  }
  return trimmed;
}

/**
 * Parse a HH:MM or HH:MM:SS time of day
 */
export function parseTime(value: string, name: string): TimeOfDay {
  const parsed = tryParseTimeOfDay(value.trim());
  if (parsed === null) {
    throw new InvalidArgumentError(`${name} must be a time in HH:MM or HH:MM:SS form`);
  }
  return parsed;
}

/**
 * Parse a non-blank text argument
 */
export function parseText(value: string, name: string): string {
  if (value.trim() === "") {
    throw new InvalidArgumentError(`${name} cannot be empty`);
  }
  return value;
}

function isConflictPolicy(value: string): value is ImportConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value);
}

/**
 * Parse an import conflict policy
 */
export function parseConflictPolicy(value: string): ImportConflictPolicy {
  const trimmed = value.trim().toLowerCase();
  if (!isConflictPolicy(trimmed)) {
    throw new InvalidArgumentError(`--on-conflict must be one of: ${CONFLICT_POLICIES.join(", ")}`);
  }
  return trimmed;
}
