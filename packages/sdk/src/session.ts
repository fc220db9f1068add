/**
 * Study session model
 *
 * Invariants:
 * - `id` is assigned once (fresh UUID or restored from storage) and never changes
 * - `subject` is trimmed and non-empty
 * - `durationMinutes` is a positive integer
 * - `date` is always a valid calendar date
 * - Setters re-check the same invariants and leave the session untouched on failure
 */

import { randomUUID } from "node:crypto";
import type { IsoDate, NewSessionInput, SessionData, SessionPatch, TimeOfDay } from "./types.js";
import {
  normalizeNotes,
  parseIsoDate,
  parseTimeOfDay,
  validateDuration,
  validateSessionId,
  validateSubject,
} from "./validation.js";

export class StudySession {
  readonly #id: string;
  #subject: string;
  #durationMinutes: number;
  #date: IsoDate;
  #startTime: TimeOfDay | null = null;
  #endTime: TimeOfDay | null = null;
  #notes: string | null = null;

  private constructor(id: string, subject: string, durationMinutes: number, date: string) {
    this.#id = validateSessionId(id);
    this.#subject = validateSubject(subject);
    this.#durationMinutes = validateDuration(durationMinutes);
    this.#date = parseIsoDate(date);
  }

  /**
   * Create a new session with a freshly generated id
   * @throws InvalidSessionError if any field is invalid
   */
  static create(input: NewSessionInput): StudySession {
    const session = new StudySession(randomUUID(), input.subject, input.durationMinutes, input.date);
    session.startTime = input.startTime ?? null;
    session.endTime = input.endTime ?? null;
    session.notes = input.notes ?? null;
    return session;
  }

  /**
   * Rebuild a session from stored data, keeping its id
   * @throws InvalidSessionError if any field is invalid
   */
  static restore(data: {
    id: string;
    subject: string;
    durationMinutes: number;
    date: string;
    startTime?: string | null;
    endTime?: string | null;
    notes?: string | null;
  }): StudySession {
    const session = new StudySession(data.id, data.subject, data.durationMinutes, data.date);
    session.startTime = data.startTime ?? null;
    session.endTime = data.endTime ?? null;
    session.notes = data.notes ?? null;
    return session;
  }

  get id(): string {
    return this.#id;
  }

  get subject(): string {
    return this.#subject;
  }

  set subject(value: string) {
    this.#subject = validateSubject(value);
  }

  get durationMinutes(): number {
    return this.#durationMinutes;
  }

  set durationMinutes(value: number) {
    this.#durationMinutes = validateDuration(value);
  }

  get date(): IsoDate {
    return this.#date;
  }

  set date(value: string) {
    this.#date = parseIsoDate(value);
  }

  get startTime(): TimeOfDay | null {
    return this.#startTime;
  }

  set startTime(value: string | null) {
    this.#startTime = parseTimeOfDay(value, "startTime");
  }

  get endTime(): TimeOfDay | null {
    return this.#endTime;
  }

  set endTime(value: string | null) {
    this.#endTime = parseTimeOfDay(value, "endTime");
  }

  get notes(): string | null {
    return this.#notes;
  }

  set notes(value: string | null) {
    this.#notes = normalizeNotes(value);
  }

  /**
   * Apply a partial update atomically
   *
   * All values are validated before any field changes, so a rejected
   * patch leaves the session as it was.
   */
  apply(patch: SessionPatch): this {
    const next = {
      subject: patch.subject === undefined ? this.#subject : validateSubject(patch.subject),
      durationMinutes:
        patch.durationMinutes === undefined
          ? this.#durationMinutes
          : validateDuration(patch.durationMinutes),
      date: patch.date === undefined ? this.#date : parseIsoDate(patch.date),
      startTime:
        patch.startTime === undefined
          ? this.#startTime
          : parseTimeOfDay(patch.startTime, "startTime"),
      endTime: patch.endTime === undefined ? this.#endTime : parseTimeOfDay(patch.endTime, "endTime"),
      notes: patch.notes === undefined ? this.#notes : normalizeNotes(patch.notes),
    };

    this.#subject = next.subject;
    this.#durationMinutes = next.durationMinutes;
    this.#date = next.date;
    this.#startTime = next.startTime;
    this.#endTime = next.endTime;
    this.#notes = next.notes;
    return this;
  }

  /**
   * Independent copy with the same id
   */
  clone(): StudySession {
    return StudySession.restore(this.toJSON());
  }

  /**
   * Two sessions are equal if they have the same id
   */
  equals(other: StudySession): boolean {
    return this.#id === other.id;
  }

  toJSON(): SessionData {
    return {
      id: this.#id,
      subject: this.#subject,
      durationMinutes: this.#durationMinutes,
      date: this.#date,
      startTime: this.#startTime,
      endTime: this.#endTime,
      notes: this.#notes,
    };
  }

  toString(): string {
    return `StudySession[id=${this.#id}, subject='${this.#subject}', duration=${this.#durationMinutes} min, date=${this.#date}]`;
  }
}
