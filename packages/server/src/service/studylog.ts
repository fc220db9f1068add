/**
 * Session tracker service adapter
 * Wraps the @studylog/sdk tracker for tool handlers, one per data root
 */

import * as path from "node:path";
import {
  openTracker,
  type DateRange,
  type EncodeCollectionOptions,
  type ImportOptions,
  type ImportSummary,
  type ListSessionsOptions,
  type NewSessionInput,
  type SessionPatch,
  type SessionStats,
  type StudySession,
  type Tracker,
} from "@studylog/sdk";
import { logger } from "../observability/logger.js";

export class StudyLogService {
  #dataRoot: string;
  #tracker: Promise<Tracker> | null = null;

  constructor(dataRoot: string) {
    this.#dataRoot = dataRoot;
  }

  get dataRoot(): string {
    return this.#dataRoot;
  }

  /**
   * Open the tracker on first use; a failed open is retried on the next call
   */
  async #open(): Promise<Tracker> {
    if (!this.#tracker) {
      logger.info("service.init", { data_root: this.#dataRoot });
      this.#tracker = openTracker({ root: this.#dataRoot }).catch((error: unknown) => {
        this.#tracker = null;
        throw error;
      });
    }
    return this.#tracker;
  }

  /**
   * Tracker with the store file re-read, so reads see writes from other processes
   */
  async #fresh(): Promise<Tracker> {
    const tracker = await this.#open();
    await tracker.load();
    return tracker;
  }

  async add(input: NewSessionInput): Promise<StudySession> {
    return (await this.#open()).addSession(input);
  }

  /**
   * Returns null if not found (not an error)
   */
  async get(id: string): Promise<StudySession | null> {
    return (await this.#fresh()).getSession(id);
  }

  /**
   * @throws SessionNotFoundError if no session has this id
   */
  async update(id: string, patch: SessionPatch): Promise<StudySession> {
    return (await this.#open()).updateSession(id, patch);
  }

  /**
   * Idempotent - reports false when the session did not exist
   */
  async remove(id: string): Promise<boolean> {
    const removed = await (await this.#open()).deleteSession(id);
    if (!removed) {
      logger.debug("service.remove.not_found", { id });
    }
    return removed;
  }

  async list(options: ListSessionsOptions): Promise<StudySession[]> {
    return (await this.#fresh()).listSessions(options);
  }

  async stats(range: DateRange): Promise<SessionStats> {
    return (await this.#fresh()).stats(range);
  }

  async exportSessions(options: EncodeCollectionOptions): Promise<string> {
    return (await this.#fresh()).exportSessions(options);
  }

  async importSessions(payload: string, options: ImportOptions): Promise<ImportSummary> {
    return (await this.#open()).importSessions(payload, options);
  }

  async close(): Promise<void> {
    if (this.#tracker) {
      const tracker = await this.#tracker;
      await tracker.close();
      this.#tracker = null;
    }
  }
}

const services = new Map<string, StudyLogService>();

/**
 * Service for a data root, created on first use
 * @param dataRoot - Defaults to DATA_ROOT, then "./data"
 */
export function getStudyLogService(dataRoot: string = process.env.DATA_ROOT || "./data"): StudyLogService {
  const resolved = path.resolve(dataRoot);
  let service = services.get(resolved);
  if (!service) {
    service = new StudyLogService(resolved);
    services.set(resolved, service);
  }
  return service;
}

/**
 * Close and forget every service
 */
export async function closeAllServices(): Promise<void> {
  const open = [...services.values()];
  services.clear();
  await Promise.all(open.map((service) => service.close()));
}
