import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { access, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLock } from "./lock.js";

const writes = vi.hoisted(() => ({ fail: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      if (writes.fail) {
        handle.writeFile = async () => {
          throw Object.assign(new Error("no space left on device"), { code: "ENOSPC" });
        };
      }
      return handle;
    },
  };
});

describe("FileLock owner write failure", () => {
  let testDir: string;
  let target: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "studylog-lock-cleanup-"));
    target = join(testDir, "sessions.json");
  });

  afterEach(async () => {
    writes.fail = false;
    await rm(testDir, { recursive: true, force: true });
  });

  it("should delete the half-created lock file and stay unacquired", async () => {
    writes.fail = true;
    const lock = new FileLock(target);

    await expect(lock.acquire(200, 10)).rejects.toThrow("no space left on device");

    expect(lock.isAcquired()).toBe(false);
    await expect(access(lock.lockPath)).rejects.toThrow();
  });

  it("should let the next writer in after the failure", async () => {
    writes.fail = true;
    await expect(new FileLock(target).acquire(200, 10)).rejects.toThrow();

    writes.fail = false;
    const next = new FileLock(target);
    await next.acquire(200, 10);

    expect(next.isAcquired()).toBe(true);
    await next.release();
  });
});
