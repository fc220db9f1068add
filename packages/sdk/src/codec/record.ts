/**
 * Record codec: one study session ⇄ one flat object literal
 *
 * Wire shape (fixed key order, no insignificant whitespace):
 *   {"id":"…","subject":"…","durationMinutes":45,"date":"2024-10-04",
 *    "startTime":"09:00:00","endTime":null,"notes":null}
 *
 * Invariants:
 * - Every field is emitted; absent optionals are the `null` literal
 * - decodeRecord(encodeRecord(s)) reproduces s field for field
 * - Decoding ignores key order and unknown keys
 * - Required fields (id, subject, durationMinutes, date) must all be present and valid
 * - Invalid optional times are treated as absent
 */

import { InvalidSessionError, MalformedRecordError } from "../errors.js";
import { StudySession } from "../session.js";
import type { SafeDecodeResult } from "../types.js";
import { isIsoDate, tryParseTimeOfDay, MAX_DURATION_MINUTES } from "../validation.js";
import { escapeText } from "./escape.js";
import { tokenizeObject, type FieldValue } from "./tokenizer.js";

/**
 * Canonical emission order
 */
export const RECORD_FIELDS = [
  "id",
  "subject",
  "durationMinutes",
  "date",
  "startTime",
  "endTime",
  "notes",
] as const;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function quote(value: string): string {
  return `"${escapeText(value)}"`;
}

function quoteOrNull(value: string | null): string {
  return value === null ? "null" : quote(value);
}

/**
 * Encode a session as a flat object literal
 */
export function encodeRecord(session: StudySession): string {
  const pairs = [
    `"id":${quote(session.id)}`,
    `"subject":${quote(session.subject)}`,
    `"durationMinutes":${session.durationMinutes}`,
    `"date":${quote(session.date)}`,
    `"startTime":${quoteOrNull(session.startTime)}`,
    `"endTime":${quoteOrNull(session.endTime)}`,
    `"notes":${quoteOrNull(session.notes)}`,
  ];
  return `{${pairs.join(",")}}`;
}

/**
 * Read a required string field
 */
function requireString(fields: Map<string, FieldValue>, key: string): string {
  const value = fields.get(key);
  if (value === undefined || value.kind === "null") {
    throw new MalformedRecordError(`missing required field "${key}"`);
  }
  if (value.kind !== "string") {
    throw new MalformedRecordError(`field "${key}" must be a string`);
  }
  return value.value;
}

/**
 * Read the duration: bare digits, or digits inside a string
 */
function requireDuration(fields: Map<string, FieldValue>): number {
  const value = fields.get("durationMinutes");
  if (value === undefined || value.kind === "null") {
    throw new MalformedRecordError('missing required field "durationMinutes"');
  }

  const text =
    value.kind === "literal" ? value.raw : value.kind === "string" ? value.value.trim() : null;

  if (text === null || !INTEGER_PATTERN.test(text)) {
    throw new MalformedRecordError(`invalid duration format: ${value.kind === "nested" ? value.raw : String(text)}`);
  }

  const minutes = Number.parseInt(text, 10);
  if (minutes <= 0 || minutes > MAX_DURATION_MINUTES) {
    throw new MalformedRecordError(`duration out of range: ${text}`);
  }
  return minutes;
}

/**
 * Read an optional time; anything but a valid time string is absent
 */
function optionalTime(fields: Map<string, FieldValue>, key: string): string | null {
  const value = fields.get(key);
  if (value === undefined || value.kind !== "string") {
    return null;
  }
  return tryParseTimeOfDay(value.value);
}

/**
 * Read optional notes; non-string literals are absent
 */
function optionalNotes(fields: Map<string, FieldValue>): string | null {
  const value = fields.get("notes");
  return value !== undefined && value.kind === "string" ? value.value : null;
}

/**
 * Decode one flat object literal into a session
 * @param text - Object literal (surrounding whitespace allowed)
 * @returns The restored session, keeping the id found in the text
 * @throws MalformedRecordError if the object is ill-formed or a required field is missing or invalid
 */
export function decodeRecord(text: string): StudySession {
  const fields = tokenizeObject(text);

  const id = requireString(fields, "id");
  const subject = requireString(fields, "subject");
  const durationMinutes = requireDuration(fields);
  const date = requireString(fields, "date");

  if (!isIsoDate(date)) {
    throw new MalformedRecordError(`invalid date format: ${date}`);
  }

  try {
    return StudySession.restore({
      id,
      subject,
      durationMinutes,
      date,
      startTime: optionalTime(fields, "startTime"),
      endTime: optionalTime(fields, "endTime"),
      notes: optionalNotes(fields),
    });
  } catch (err) {
    if (err instanceof InvalidSessionError) {
      throw new MalformedRecordError(err.message, { cause: err });
    }
    throw err;
  }
}

/**
 * Decode a record without throwing
 */
export function safeDecodeRecord(text: string): SafeDecodeResult {
  try {
    return { success: true, data: decodeRecord(text) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
