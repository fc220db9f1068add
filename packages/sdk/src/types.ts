/**
 * Core types for studylog
 */

import type { StudySession } from "./session.js";

/**
 * Calendar date in `YYYY-MM-DD` form
 * @example "2024-10-04"
 */
export type IsoDate = string & { readonly __brand: "IsoDate" };

/**
 * Time of day in `HH:MM:SS` form
 * @example "09:30:00"
 */
export type TimeOfDay = string & { readonly __brand: "TimeOfDay" };

/**
 * Plain, serializable view of a study session
 */
export interface SessionData {
  /** Opaque unique token, never reassigned */
  readonly id: string;
  /** What was studied (trimmed, non-empty) */
  subject: string;
  /** How long, in whole minutes (> 0) */
  durationMinutes: number;
  /** Day the session took place */
  date: IsoDate;
  /** Optional start time */
  startTime: TimeOfDay | null;
  /** Optional end time */
  endTime: TimeOfDay | null;
  /** Optional free text */
  notes: string | null;
}

/**
 * Input for creating a new session
 * Dates and times are validated and normalized on construction
 */
export interface NewSessionInput {
  subject: string;
  durationMinutes: number;
  date: string;
  startTime?: string | null;
  endTime?: string | null;
  notes?: string | null;
}

/**
 * Partial update for an existing session
 *
 * Omitted fields are left untouched; `null` clears an optional field.
 */
export interface SessionPatch {
  subject?: string;
  durationMinutes?: number;
  date?: string;
  startTime?: string | null;
  endTime?: string | null;
  notes?: string | null;
}

/**
 * Whitespace layout of encoded collections
 * - compact: no insignificant whitespace (wire payload)
 * - pretty: one record per line, indented by two spaces (file storage)
 */
export type CollectionLayout = "compact" | "pretty";

/**
 * Options for encoding a collection
 */
export interface EncodeCollectionOptions {
  layout?: CollectionLayout;
}

/**
 * A span dropped while decoding a collection
 */
export interface SkippedSpan {
  /** Zero-based position among the spans found in the payload */
  index: number;
  /** Offset of the span within the array interior */
  offset: number;
  /** Raw span text */
  text: string;
  /** Why the span was dropped */
  reason: string;
}

/**
 * Result of a tolerant collection decode with skip reporting
 */
export interface CollectionDecodeReport {
  sessions: StudySession[];
  skipped: SkippedSpan[];
}

/**
 * Result of a non-throwing record decode
 */
export type SafeDecodeResult =
  | { success: true; data: StudySession }
  | { success: false; error: string };

/**
 * Tracker configuration
 */
export interface TrackerOptions {
  /** Data directory */
  root: string;
  /** Store file name inside root (default: "sessions.json") */
  fileName?: string;
  /** Layout written to disk (default: "pretty") */
  layout?: CollectionLayout;
  /** Maximum time to wait for the store lock (default: 10000ms) */
  lockTimeoutMs?: number;
}

/**
 * Session ordering for list queries
 * - insertion: order in the store file
 * - date-desc: newest date first, ties keep insertion order
 */
export type SessionSort = "insertion" | "date-desc";

/**
 * Filters for listing sessions
 */
export interface ListSessionsOptions {
  /** Case-insensitive substring match on subject */
  subject?: string;
  /** Inclusive lower date bound */
  from?: string;
  /** Inclusive upper date bound */
  to?: string;
  sort?: SessionSort;
}

/**
 * Inclusive date range
 */
export interface DateRange {
  from?: string;
  to?: string;
}

/**
 * Aggregated statistics over a set of sessions
 */
export interface SessionStats {
  totalMinutes: number;
  sessionCount: number;
  /** Mean duration in minutes (0 when there are no sessions) */
  averageMinutes: number;
  /** Subject → total minutes, in order of first appearance */
  bySubject: Record<string, number>;
}

/**
 * What to do with an imported session whose id already exists
 */
export type ImportConflictPolicy = "skip" | "replace" | "error";

export interface ImportOptions {
  onConflict?: ImportConflictPolicy;
}

/**
 * Outcome of an import
 */
export interface ImportSummary {
  added: number;
  replaced: number;
  /** Sessions ignored because their id already existed */
  duplicates: number;
  /** Spans dropped by the collection decoder */
  malformed: SkippedSpan[];
}

/**
 * Session tracker: CRUD, filtering and statistics over the store file
 */
export interface Tracker {
  /** Absolute path of the backing file */
  readonly filePath: string;

  /**
   * (Re)load the collection from disk
   * @returns Number of sessions loaded
   */
  load(): Promise<number>;

  addSession(input: NewSessionInput): Promise<StudySession>;

  /**
   * @throws SessionNotFoundError if no session has this id
   */
  updateSession(id: string, patch: SessionPatch): Promise<StudySession>;

  /**
   * @returns true if a session was removed
   */
  deleteSession(id: string): Promise<boolean>;

  getSession(id: string): StudySession | null;

  listSessions(options?: ListSessionsOptions): StudySession[];

  stats(range?: DateRange): SessionStats;

  importSessions(payload: string, options?: ImportOptions): Promise<ImportSummary>;

  exportSessions(options?: EncodeCollectionOptions): string;

  clear(): Promise<void>;

  /** Release resources (waits for in-flight writes) */
  close(): Promise<void>;
}
