/**
 * Session tracker implementation
 *
 * Keeps the decoded collection in memory for reads. Every mutation is a
 * load-mutate-save cycle on the store file, so writes from other processes
 * are picked up rather than overwritten; the in-memory list is replaced by
 * whatever the cycle saved.
 *
 * @example
 * ```typescript
 * const tracker = await openTracker({ root: "./data" });
 *
 * const session = await tracker.addSession({
 *   subject: "Linear algebra",
 *   durationMinutes: 50,
 *   date: "2024-10-04",
 *   notes: "Eigenvalues, chapter 5",
 * });
 *
 * const { totalMinutes, bySubject } = tracker.stats();
 * ```
 */

import * as path from "node:path";
import { decodeCollectionWithReport, encodeCollection } from "./codec/collection.js";
import { DuplicateSessionError, SessionNotFoundError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { StudySession } from "./session.js";
import { SessionFile } from "./session-file.js";
import { computeStats, filterByDateRange } from "./stats.js";
import type {
  DateRange,
  EncodeCollectionOptions,
  ImportOptions,
  ImportSummary,
  ListSessionsOptions,
  NewSessionInput,
  SessionPatch,
  SessionStats,
  Tracker,
  TrackerOptions,
} from "./types.js";
import { parseIsoDate } from "./validation.js";

export const DEFAULT_FILE_NAME = "sessions.json";

class SessionTracker implements Tracker {
  #file: SessionFile;
  #sessions: StudySession[] = [];

  constructor(options: TrackerOptions) {
    this.#file = new SessionFile(path.join(options.root, options.fileName ?? DEFAULT_FILE_NAME), {
      layout: options.layout ?? "pretty",
      lockTimeoutMs: options.lockTimeoutMs,
    });
  }

  get filePath(): string {
    return this.#file.path;
  }

  async load(): Promise<number> {
    this.#sessions = await this.#file.load();
    return this.#sessions.length;
  }

  async addSession(input: NewSessionInput): Promise<StudySession> {
    const notes = input.notes?.trim();
    const session = StudySession.create({ ...input, notes: notes === "" ? null : notes });

    const { sessions } = await this.#file.transact((list) => {
      if (list.some((existing) => existing.equals(session))) {
        throw new DuplicateSessionError(session.id);
      }
      list.push(session);
    });

    this.#sessions = sessions;
    logger.debug("tracker.add", { id: session.id, message: session.subject });
    return session.clone();
  }

  async updateSession(id: string, patch: SessionPatch): Promise<StudySession> {
    const { value, sessions } = await this.#file.transact((list) => {
      const session = list.find((candidate) => candidate.id === id);
      if (!session) {
        throw new SessionNotFoundError(id);
      }
      return session.apply(patch).clone();
    });

    this.#sessions = sessions;
    logger.debug("tracker.update", { id });
    return value;
  }

  async deleteSession(id: string): Promise<boolean> {
    const { value, sessions } = await this.#file.transact((list) => {
      const index = list.findIndex((candidate) => candidate.id === id);
      if (index === -1) {
        return false;
      }
      list.splice(index, 1);
      return true;
    });

    this.#sessions = sessions;
    if (value) {
      logger.debug("tracker.delete", { id });
    }
    return value;
  }

  getSession(id: string): StudySession | null {
    const session = this.#sessions.find((candidate) => candidate.id === id);
    return session ? session.clone() : null;
  }

  listSessions(options: ListSessionsOptions = {}): StudySession[] {
    const range: DateRange = {
      from: options.from === undefined ? undefined : parseIsoDate(options.from, "from"),
      to: options.to === undefined ? undefined : parseIsoDate(options.to, "to"),
    };

    let sessions = filterByDateRange(this.#sessions, range);

    if (options.subject !== undefined) {
      const needle = options.subject.toLowerCase();
      sessions = sessions.filter((session) => session.subject.toLowerCase().includes(needle));
    }

    if (options.sort === "date-desc") {
      // Array#sort is stable, so same-day sessions keep file order
      sessions.sort((a, b) => (a.date === b.date ? 0 : a.date < b.date ? 1 : -1));
    }

    return sessions.map((session) => session.clone());
  }

  stats(range: DateRange = {}): SessionStats {
    return computeStats(this.listSessions(range));
  }

  async importSessions(payload: string, options: ImportOptions = {}): Promise<ImportSummary> {
    const onConflict = options.onConflict ?? "skip";
    const report = decodeCollectionWithReport(payload);

    for (const span of report.skipped) {
      logger.warn("import.record.skipped", {
        file: this.#file.path,
        message: span.reason,
        details: { index: span.index },
      });
    }

    const { value, sessions } = await this.#file.transact((list) => {
      const summary: ImportSummary = {
        added: 0,
        replaced: 0,
        duplicates: 0,
        malformed: report.skipped,
      };

      for (const incoming of report.sessions) {
        const index = list.findIndex((existing) => existing.equals(incoming));
        if (index === -1) {
          list.push(incoming);
          summary.added++;
        } else if (onConflict === "replace") {
          list[index] = incoming;
          summary.replaced++;
        } else if (onConflict === "error") {
          throw new DuplicateSessionError(incoming.id);
        } else {
          summary.duplicates++;
        }
      }

      return summary;
    });

    this.#sessions = sessions;
    logger.debug("tracker.import", {
      file: this.#file.path,
      details: { added: value.added, replaced: value.replaced, duplicates: value.duplicates },
    });
    return value;
  }

  exportSessions(options: EncodeCollectionOptions = {}): string {
    return encodeCollection(this.#sessions, { layout: options.layout ?? "compact" });
  }

  async clear(): Promise<void> {
    const { sessions } = await this.#file.transact((list) => {
      list.splice(0, list.length);
    });
    this.#sessions = sessions;
  }

  async close(): Promise<void> {
    await this.#file.idle();
  }
}

/**
 * Open a tracker and load its store file
 * @param options - Data directory and file options
 * @throws MalformedCollectionError if the store file is not an array literal
 */
export async function openTracker(options: TrackerOptions): Promise<Tracker> {
  const tracker = new SessionTracker(options);
  const count = await tracker.load();
  logger.debug("tracker.open", { file: tracker.filePath, message: `Loaded ${count} sessions` });
  return tracker;
}
