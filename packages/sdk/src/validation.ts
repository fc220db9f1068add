/**
 * Validation utilities for session fields
 *
 * Every validator either returns the normalized value or throws
 * InvalidSessionError naming the offending field.
 */

import { InvalidSessionError } from "./errors.js";
import type { IsoDate, TimeOfDay } from "./types.js";

/**
 * Largest duration accepted (signed 32-bit integer range of the file format)
 */
export const MAX_DURATION_MINUTES = 2_147_483_647;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * HH:MM with optional :SS
 */
const TIME_OF_DAY_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Days per month for a given year (month is 1-based)
 */
function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Check whether a string is a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(value: string): value is IsoDate {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Validate a calendar date
 * @param value - Date in YYYY-MM-DD form
 * @param field - Field name for error messages
 * @throws InvalidSessionError if the value is not a real calendar date
 */
export function parseIsoDate(value: string, field = "date"): IsoDate {
  if (typeof value !== "string" || !isIsoDate(value)) {
    throw new InvalidSessionError(
      field,
      `${field} must be a calendar date in YYYY-MM-DD form: "${String(value)}"`
    );
  }
  return value;
}

/**
 * Parse a time of day, normalizing HH:MM to HH:MM:SS
 * @returns Normalized time, or null if the value is not a valid time
 */
export function tryParseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}` as TimeOfDay;
}

/**
 * Validate an optional time of day
 * @throws InvalidSessionError if a non-null value is not a valid time
 */
export function parseTimeOfDay(
  value: string | null | undefined,
  field: "startTime" | "endTime"
): TimeOfDay | null {
  if (value === null || value === undefined) return null;

  const parsed = tryParseTimeOfDay(value);
  if (parsed === null) {
    throw new InvalidSessionError(field, `${field} must be a time in HH:MM or HH:MM:SS form: "${value}"`);
  }
  return parsed;
}

/**
 * Validate a subject, returning it trimmed
 * @throws InvalidSessionError if empty after trimming
 */
export function validateSubject(value: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidSessionError("subject", "Subject cannot be null or empty");
  }
  return value.trim();
}

/**
 * Validate a duration in minutes
 * @throws InvalidSessionError unless a positive integer within range
 */
export function validateDuration(value: number): number {
  if (!Number.isInteger(value)) {
    throw new InvalidSessionError("durationMinutes", `Duration must be a whole number of minutes: ${value}`);
  }
  if (value <= 0) {
    throw new InvalidSessionError("durationMinutes", "Duration must be positive");
  }
  if (value > MAX_DURATION_MINUTES) {
    throw new InvalidSessionError(
      "durationMinutes",
      `Duration must be at most ${MAX_DURATION_MINUTES} minutes`
    );
  }
  return value;
}

/**
 * Validate a session id
 * @throws InvalidSessionError if empty
 */
export function validateSessionId(value: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidSessionError("id", "Session id must be a non-empty string");
  }
  return value;
}

/**
 * Normalize notes: the encoded form has no empty value, so "" becomes null
 */
export function normalizeNotes(value: string | null | undefined): string | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  return value;
}

/**
 * Today's date in the local time zone
 */
export function todayIsoDate(now: Date = new Date()): IsoDate {
  const pad = (n: number) => String(n).padStart(2, "0");
  const text = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  return parseIsoDate(text);
}
