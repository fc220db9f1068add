/**
 * Single-writer coordination for the session store
 *
 * Two layers guard every load-mutate-save cycle:
 * - Mutex serializes cycles inside one process
 * - FileLock (exclusive create of `<file>.lock`) serializes them across processes
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError } from "./errors.js";
import { errorCode } from "./io.js";
import { logger } from "./observability/logs.js";

/**
 * Simple in-process mutex
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  isLocked(): boolean {
    return this.#locked;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

export interface FileLockOptions {
  /** Age after which a held lock is presumed abandoned (default: 30000ms) */
  staleMs?: number;
}

/**
 * Whether a process with this pid exists (EPERM means it exists but is not ours)
 */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) !== "ESRCH";
  }
}

function ownerPid(content: string): number | null {
  let info: unknown;
  try {
    info = JSON.parse(content);
  } catch {
    // Owner is still writing, or the file is damaged; age decides
    return null;
  }
  if (info && typeof info === "object" && "pid" in info && Number.isInteger(info.pid)) {
    return Number(info.pid);
  }
  return null;
}

/**
 * File-based lock using exclusive open
 *
 * A lock whose owner pid is gone, or that is older than `staleMs`, is removed
 * and acquisition retried.
 */
export class FileLock {
  #lockPath: string;
  #staleMs: number;
  #fd?: fs.FileHandle;
  #acquired = false;

  /**
   * @param targetPath - File being protected; the lock lives beside it
   */
  constructor(targetPath: string, options: FileLockOptions = {}) {
    this.#lockPath = `${targetPath}.lock`;
    this.#staleMs = options.staleMs ?? 30000;
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @param timeoutMs - Maximum time to wait for lock (default: 10000ms)
   * @param retryIntervalMs - Time between retry attempts (default: 50ms)
   * @throws LockTimeoutError if the lock is still held after timeoutMs
   */
  async acquire(timeoutMs: number = 10000, retryIntervalMs: number = 50): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      let fd: fs.FileHandle;
      try {
        // Fails with EEXIST while another writer holds the lock
        fd = await fs.open(this.#lockPath, "wx");
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw err;
        }

        if (await this.#removeIfStale()) {
          continue;
        }

        if (Date.now() - startTime > timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      try {
        // PID and timestamp let other writers detect an abandoned lock
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await fd.sync();
      } catch (err) {
        await this.#discard(fd);
        throw err;
      }

      this.#fd = fd;
      this.#acquired = true;
      return;
    }
  }

  /**
   * Remove the lock file if its owner is dead or it has outlived staleMs
   * @returns true if a stale lock was removed (or vanished meanwhile)
   */
  async #removeIfStale(): Promise<boolean> {
    let content: string;
    let inode: number;
    let ageMs: number;
    try {
      const stat = await fs.stat(this.#lockPath);
      inode = stat.ino;
      ageMs = Date.now() - stat.mtimeMs;
      content = await fs.readFile(this.#lockPath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return true;
      }
      throw err;
    }

    const pid = ownerPid(content);
    const dead = pid !== null && pid !== process.pid && !isProcessAlive(pid);
    if (!dead && ageMs <= this.#staleMs) {
      return false;
    }

    try {
      // Only remove the file we inspected, not a lock taken since
      const current = await fs.stat(this.#lockPath);
      if (current.ino !== inode) {
        return true;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        throw err;
      }
    }

    logger.warn("lock.stale.removed", {
      file: this.#lockPath,
      message: dead ? `owner process ${pid} is gone` : `lock is ${Math.round(ageMs)}ms old`,
    });
    return true;
  }

  /**
   * Close and delete a lock file that was created but never fully written
   */
  async #discard(fd: fs.FileHandle): Promise<void> {
    const failures: string[] = [];
    await fd.close().catch((err: unknown) => {
      failures.push(err instanceof Error ? err.message : String(err));
    });
    await fs.unlink(this.#lockPath).catch((err: unknown) => {
      if (errorCode(err) !== "ENOENT") {
        failures.push(err instanceof Error ? err.message : String(err));
      }
    });

    if (failures.length > 0) {
      logger.error("lock.discard.failed", { file: this.#lockPath, message: failures.join("; ") });
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up by someone else
      if (errorCode(err) !== "ENOENT") {
        logger.error("lock.release.failed", {
          file: this.#lockPath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
