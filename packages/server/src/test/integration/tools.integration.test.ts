/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real store file
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { DuplicateSessionError, SessionNotFoundError } from "@studylog/sdk";
import { createTempRoot, removeDir } from "@studylog/testkit";
import {
  addSession,
  getSession,
  updateSession,
  removeSession,
  listSessions,
  sessionStats,
  exportSessions,
  importSessions,
  executeTool,
  ToolTimeoutError,
} from "../../tools.js";
import { closeAllServices } from "../../service/studylog.js";
import { metrics } from "../../observability/metrics.js";

let testRoot: string;

const PAYLOAD =
  "[" +
  '{"id":"a-1","subject":"Math","durationMinutes":30,"date":"2024-10-01","startTime":null,"endTime":null,"notes":null},' +
  '{"id":"a-2","subject":"","durationMinutes":30,"date":"2024-10-01"},' +
  '{"id":"a-3","subject":"Art","durationMinutes":20,"date":"2024-10-02","startTime":"09:00:00","endTime":null,"notes":"sketch"}' +
  "]";

function sessionId(result: CallToolResult): string {
  const session = result.structuredContent?.session;
  if (session && typeof session === "object" && "id" in session && typeof session.id === "string") {
    return session.id;
  }
  throw new Error("result carries no session id");
}

beforeEach(async () => {
  testRoot = await createTempRoot("studylog-server-test-");
  process.env.DATA_ROOT = testRoot;
  metrics.reset();
  // Tool logs go to stderr
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await closeAllServices();
  delete process.env.DATA_ROOT;
  await removeDir(testRoot);
});

describe("Tool integration tests", () => {
  describe("add_session and get_session", () => {
    it("should store and retrieve a session", async () => {
      const added = await addSession({
        subject: "Math",
        durationMinutes: 45,
        date: "2024-10-04",
        startTime: "09:00",
      });

      expect(added.content).toEqual([{ type: "text", text: `Added session ${sessionId(added)}` }]);

      const id = sessionId(added);
      const fetched = await getSession({ id });

      expect(fetched.structuredContent).toEqual({
        session: {
          id,
          subject: "Math",
          durationMinutes: 45,
          date: "2024-10-04",
          startTime: "09:00:00",
          endTime: null,
          notes: null,
        },
      });
    });

    it("should return null for an unknown id", async () => {
      const result = await getSession({ id: "missing" });

      expect(result.structuredContent).toEqual({ session: null });
      expect(result.content).toEqual([{ type: "text", text: "Session missing not found" }]);
    });

    it("should reject invalid input before touching the store", async () => {
      await expect(addSession({ subject: "Math", durationMinutes: -5 })).rejects.toThrow();
    });
  });

  describe("update_session", () => {
    it("should change only the given fields", async () => {
      const id = sessionId(
        await addSession({ subject: "Math", durationMinutes: 45, date: "2024-10-04", notes: "ch. 3" })
      );

      const updated = await updateSession({ id, durationMinutes: 60, notes: null });

      expect(updated.structuredContent).toMatchObject({
        session: { id, subject: "Math", durationMinutes: 60, date: "2024-10-04", notes: null },
      });
    });

    it("should fail for an unknown id", async () => {
      await expect(updateSession({ id: "missing", subject: "Art" })).rejects.toBeInstanceOf(
        SessionNotFoundError
      );
    });
  });

  describe("remove_session", () => {
    it("should remove a session", async () => {
      const id = sessionId(await addSession({ subject: "Math", durationMinutes: 45, date: "2024-10-04" }));

      const removed = await removeSession({ id });
      expect(removed.structuredContent).toEqual({ removed: true });

      const fetched = await getSession({ id });
      expect(fetched.structuredContent).toEqual({ session: null });
    });

    it("should be idempotent", async () => {
      const result = await removeSession({ id: "missing" });
      expect(result.structuredContent).toEqual({ removed: false });
    });
  });

  describe("list_sessions and session_stats", () => {
    beforeEach(async () => {
      await addSession({ subject: "Math", durationMinutes: 30, date: "2024-10-01" });
      await addSession({ subject: "Physics", durationMinutes: 60, date: "2024-10-03" });
      await addSession({ subject: "Math", durationMinutes: 45, date: "2024-10-02" });
    });

    it("should list newest first", async () => {
      const result = await listSessions({});

      expect(result.structuredContent).toMatchObject({
        count: 3,
        total: 3,
        sessions: [{ date: "2024-10-03" }, { date: "2024-10-02" }, { date: "2024-10-01" }],
      });
    });

    it("should filter by subject and date range", async () => {
      const result = await listSessions({ subject: "math", from: "2024-10-02" });

      expect(result.structuredContent).toMatchObject({
        count: 1,
        sessions: [{ subject: "Math", durationMinutes: 45 }],
      });
    });

    it("should apply limit but report the total", async () => {
      const result = await listSessions({ limit: 2 });

      expect(result.structuredContent).toMatchObject({ count: 2, total: 3 });
      expect(result.content).toEqual([{ type: "text", text: "Found 3 sessions (showing 2)" }]);
    });

    it("should compute stats", async () => {
      const result = await sessionStats({});

      expect(result.structuredContent).toEqual({
        stats: {
          totalMinutes: 135,
          sessionCount: 3,
          averageMinutes: 45,
          bySubject: { Math: 75, Physics: 60 },
        },
      });
      expect(result.content).toEqual([{ type: "text", text: "3 sessions, 2h 15m total" }]);
    });

    it("should compute stats over a range", async () => {
      const result = await sessionStats({ to: "2024-10-01" });

      expect(result.structuredContent).toMatchObject({
        stats: { totalMinutes: 30, sessionCount: 1 },
      });
    });
  });

  describe("import_sessions and export_sessions", () => {
    it("should import valid records and report malformed ones", async () => {
      const result = await importSessions({ payload: PAYLOAD });

      expect(result.structuredContent).toMatchObject({
        added: 2,
        replaced: 0,
        duplicates: 0,
        malformed: [{ index: 1 }],
      });
    });

    it("should export what was imported in the compact layout", async () => {
      await importSessions({ payload: PAYLOAD });

      const result = await exportSessions({});

      expect(result.structuredContent).toEqual({
        payload:
          "[" +
          '{"id":"a-1","subject":"Math","durationMinutes":30,"date":"2024-10-01","startTime":null,"endTime":null,"notes":null},' +
          '{"id":"a-3","subject":"Art","durationMinutes":20,"date":"2024-10-02","startTime":"09:00:00","endTime":null,"notes":"sketch"}' +
          "]",
      });
    });

    it("should export an empty store as an empty array", async () => {
      const result = await exportSessions({ layout: "pretty" });
      expect(result.structuredContent).toEqual({ payload: "[]" });
    });

    it("should honor the conflict policy", async () => {
      await importSessions({ payload: PAYLOAD });

      const skipped = await importSessions({ payload: PAYLOAD });
      expect(skipped.structuredContent).toMatchObject({ added: 0, duplicates: 2 });

      const replaced = await importSessions({ payload: PAYLOAD, onConflict: "replace" });
      expect(replaced.structuredContent).toMatchObject({ added: 0, replaced: 2 });

      await expect(importSessions({ payload: PAYLOAD, onConflict: "error" })).rejects.toBeInstanceOf(
        DuplicateSessionError
      );
    });
  });

  describe("Timeouts and metrics", () => {
    it("should reject a handler that outlives its timeout", async () => {
      const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200));

      await expect(executeTool("slow_tool", 10, slow)).rejects.toBeInstanceOf(ToolTimeoutError);
      expect(metrics.getCounter("studylog.tool.errors_total", { tool: "slow_tool", err_code: "ETIMEDOUT" })).toBe(1);
    });

    it("should count calls and latency per tool", async () => {
      await getSession({ id: "missing" });
      await getSession({ id: "missing" });

      expect(metrics.getCounter("studylog.tool.calls_total", { tool: "get_session" })).toBe(2);
      expect(metrics.getHistogram("studylog.tool.latency_ms", { tool: "get_session" })?.count).toBe(2);
    });
  });
});
