/**
 * Persistence adapter: the whole session collection in one text file
 *
 * Invariants:
 * - Every load decodes the entire file; every save rewrites it atomically
 * - A missing or blank file is an empty collection
 * - Load-mutate-save cycles run one at a time per file, in-process and across processes
 * - A cycle that leaves the collection unchanged does not touch the file
 */

import * as path from "node:path";
import { decodeCollection, encodeCollection } from "./codec/collection.js";
import { atomicWrite, readTextFile } from "./io.js";
import { FileLock, Mutex } from "./lock.js";
import { logger } from "./observability/logs.js";
import type { StudySession } from "./session.js";
import type { CollectionLayout } from "./types.js";

export interface SessionFileOptions {
  layout?: CollectionLayout;
  lockTimeoutMs?: number;
}

/**
 * One mutex per absolute file path with a cycle in flight or queued,
 * shared by every adapter in the process
 */
const mutexes = new Map<string, Mutex>();

async function withPathLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const mutex = mutexes.get(filePath) ?? new Mutex();
  mutexes.set(filePath, mutex);

  try {
    return await mutex.withLock(fn);
  } finally {
    // Released with nobody queued: forget the path
    if (!mutex.isLocked() && mutexes.get(filePath) === mutex) {
      mutexes.delete(filePath);
    }
  }
}

/**
 * Number of store files with a load-mutate-save cycle in flight or queued
 */
export function activeFileCount(): number {
  return mutexes.size;
}

export class SessionFile {
  #filePath: string;
  #layout: CollectionLayout;
  #lockTimeoutMs: number;

  constructor(filePath: string, options: SessionFileOptions = {}) {
    this.#filePath = path.resolve(filePath);
    this.#layout = options.layout ?? "pretty";
    this.#lockTimeoutMs = options.lockTimeoutMs ?? 10000;
  }

  get path(): string {
    return this.#filePath;
  }

  /**
   * Read and decode the whole file
   * @throws MalformedCollectionError if the file is not an array literal
   * @throws DocumentReadError if the file cannot be read
   */
  async load(): Promise<StudySession[]> {
    const raw = await readTextFile(this.#filePath);
    if (raw === null) {
      logger.debug("store.load", { file: this.#filePath, message: "no store file yet" });
      return [];
    }

    // Strip BOM if present
    const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    if (content.trim() === "") {
      return [];
    }

    const sessions = decodeCollection(content);
    logger.debug("store.load", {
      file: this.#filePath,
      message: `Loaded ${sessions.length} sessions from file`,
    });
    return sessions;
  }

  /**
   * Encode and atomically write the whole collection
   * @throws DocumentWriteError if the file cannot be written
   */
  async save(sessions: readonly StudySession[]): Promise<void> {
    await atomicWrite(this.#filePath, this.#encode(sessions));
    logger.debug("store.save", {
      file: this.#filePath,
      message: `Saved ${sessions.length} sessions`,
    });
  }

  /**
   * Run one load-mutate-save cycle as the only writer
   *
   * `mutate` receives a freshly loaded, mutable list; whatever it leaves in
   * the list is written back, unless the encoded collection is unchanged.
   * @returns The value returned by `mutate` and the list as saved
   */
  async transact<T>(
    mutate: (sessions: StudySession[]) => T | Promise<T>
  ): Promise<{ value: T; sessions: StudySession[] }> {
    return withPathLock(this.#filePath, async () => {
      const lock = new FileLock(this.#filePath);
      return lock.withLock(async () => {
        const sessions = await this.load();
        const before = this.#encode(sessions);

        const value = await mutate(sessions);

        const after = this.#encode(sessions);
        if (after !== before) {
          await atomicWrite(this.#filePath, after);
          logger.debug("store.save", {
            file: this.#filePath,
            message: `Saved ${sessions.length} sessions`,
          });
        }

        return { value, sessions };
      }, this.#lockTimeoutMs);
    });
  }

  /**
   * Wait until no cycle is in flight
   */
  async idle(): Promise<void> {
    await withPathLock(this.#filePath, async () => undefined);
  }

  #encode(sessions: readonly StudySession[]): string {
    return encodeCollection(sessions, { layout: this.#layout }) + "\n";
  }
}
