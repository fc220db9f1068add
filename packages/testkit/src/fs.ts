/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openTracker } from "@studylog/sdk";
import type { Tracker, TrackerOptions } from "@studylog/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "studylog-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "studylog-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a tracker on a temporary data directory, cleaning up after
 * @param fn - Function to execute with the tracker
 * @param options - Optional tracker options (root will be overridden)
 * @returns Result of fn
 */
export async function withTempTracker<T>(
  fn: (tracker: Tracker, root: string) => Promise<T>,
  options?: Partial<TrackerOptions>
): Promise<T> {
  const root = await createTempRoot();
  let tracker: Tracker;
  try {
    tracker = await openTracker({ ...options, root });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  try {
    return await fn(tracker, root);
  } finally {
    await tracker.close();
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
