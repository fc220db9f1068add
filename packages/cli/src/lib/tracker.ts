/**
 * Tracker access for CLI commands
 */

import { openTracker, type Tracker } from "@studylog/sdk";

/**
 * Open the tracker under `root`, run `fn`, then close it
 */
export async function withTracker<T>(root: string, fn: (tracker: Tracker) => Promise<T>): Promise<T> {
  const tracker = await openTracker({ root });
  try {
    return await fn(tracker);
  } finally {
    await tracker.close();
  }
}
