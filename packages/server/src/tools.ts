/**
 * MCP tool implementations for the study session tracker
 * Every tool returns a short text summary plus the same data as structuredContent
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { errorCode, formatDuration, todayIsoDate } from "@studylog/sdk";
import {
  AddSessionInputSchema,
  GetSessionInputSchema,
  UpdateSessionInputSchema,
  RemoveSessionInputSchema,
  ListSessionsInputSchema,
  SessionStatsInputSchema,
  ExportSessionsInputSchema,
  ImportSessionsInputSchema,
  MAX_LIST_LIMIT,
} from "./schemas.js";
import { getStudyLogService } from "./service/studylog.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

const READ_TIMEOUT_MS = 2000;
const WRITE_TIMEOUT_MS = 5000;
const IMPORT_TIMEOUT_MS = 15000;

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    timeoutMs: number
  ) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Helper to wrap tool execution with timeout, logging, and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    const code = errorCode(error);
    logger.toolCall(toolName, duration, success, error, code);
    recordToolExecution(toolName, duration, success, code);
  }
}

function result(text: string, structuredContent: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text }],
    structuredContent,
  };
}

/**
 * add_session: Record a new study session
 */
export async function addSession(args: unknown): Promise<CallToolResult> {
  const input = AddSessionInputSchema.parse(args);

  return executeTool("add_session", WRITE_TIMEOUT_MS, async () => {
    const session = await getStudyLogService().add({
      ...input,
      date: input.date ?? todayIsoDate(),
    });
    return result(`Added session ${session.id}`, { session: session.toJSON() });
  });
}

/**
 * get_session: Retrieve one session by id
 */
export async function getSession(args: unknown): Promise<CallToolResult> {
  const { id } = GetSessionInputSchema.parse(args);

  return executeTool("get_session", READ_TIMEOUT_MS, async () => {
    const session = await getStudyLogService().get(id);
    return result(session ? `Found session ${id}` : `Session ${id} not found`, {
      session: session ? session.toJSON() : null,
    });
  });
}

/**
 * update_session: Change fields of an existing session
 */
export async function updateSession(args: unknown): Promise<CallToolResult> {
  const { id, ...patch } = UpdateSessionInputSchema.parse(args);

  return executeTool("update_session", WRITE_TIMEOUT_MS, async () => {
    const session = await getStudyLogService().update(id, patch);
    return result(`Updated session ${id}`, { session: session.toJSON() });
  });
}

/**
 * remove_session: Delete a session (idempotent)
 */
export async function removeSession(args: unknown): Promise<CallToolResult> {
  const { id } = RemoveSessionInputSchema.parse(args);

  return executeTool("remove_session", WRITE_TIMEOUT_MS, async () => {
    const removed = await getStudyLogService().remove(id);
    return result(removed ? `Removed session ${id}` : `Session ${id} not found`, { removed });
  });
}

/**
 * list_sessions: Newest sessions first, filtered by subject and date range
 */
export async function listSessions(args: unknown): Promise<CallToolResult> {
  const { limit, ...filters } = ListSessionsInputSchema.parse(args);

  return executeTool("list_sessions", READ_TIMEOUT_MS, async () => {
    const all = await getStudyLogService().list({ ...filters, sort: "date-desc" });
    const sessions = all.slice(0, limit).map((session) => session.toJSON());
    return result(`Found ${all.length} sessions (showing ${sessions.length})`, {
      sessions,
      count: sessions.length,
      total: all.length,
    });
  });
}

/**
 * session_stats: Totals, average and per-subject breakdown
 */
export async function sessionStats(args: unknown): Promise<CallToolResult> {
  const range = SessionStatsInputSchema.parse(args);

  return executeTool("session_stats", READ_TIMEOUT_MS, async () => {
    const stats = await getStudyLogService().stats(range);
    return result(`${stats.sessionCount} sessions, ${formatDuration(stats.totalMinutes)} total`, {
      stats,
    });
  });
}

/**
 * export_sessions: Encode every session as collection text
 */
export async function exportSessions(args: unknown): Promise<CallToolResult> {
  const { layout } = ExportSessionsInputSchema.parse(args);

  return executeTool("export_sessions", READ_TIMEOUT_MS, async () => {
    const payload = await getStudyLogService().exportSessions({ layout });
    return result(payload, { payload });
  });
}

/**
 * import_sessions: Append sessions from collection text
 */
export async function importSessions(args: unknown): Promise<CallToolResult> {
  const { payload, onConflict } = ImportSessionsInputSchema.parse(args);

  return executeTool("import_sessions", IMPORT_TIMEOUT_MS, async () => {
    const summary = await getStudyLogService().importSessions(payload, { onConflict });
    return result(
      `Imported ${summary.added} sessions: ${summary.replaced} replaced, ` +
        `${summary.duplicates} duplicates skipped, ${summary.malformed.length} malformed`,
      {
        added: summary.added,
        replaced: summary.replaced,
        duplicates: summary.duplicates,
        malformed: summary.malformed.map(({ index, offset, reason }) => ({ index, offset, reason })),
      }
    );
  });
}

const dateProperty = {
  type: "string",
  description: "Calendar date in YYYY-MM-DD form",
};

const timeProperty = {
  type: ["string", "null"],
  description: "Time of day in HH:MM or HH:MM:SS form (null clears it)",
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "add_session",
    description: "Record a study session",
    inputSchema: {
      type: "object",
      properties: {
        subject: { type: "string", description: "What was studied" },
        durationMinutes: { type: "integer", minimum: 1, description: "Length in whole minutes" },
        date: { ...dateProperty, description: "Day of the session (default: today)" },
        startTime: timeProperty,
        endTime: timeProperty,
        notes: { type: ["string", "null"], description: "Free text" },
      },
      required: ["subject", "durationMinutes"],
    },
  },
  {
    name: "get_session",
    description: "Retrieve a session by id (null when missing)",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Session id" },
      },
      required: ["id"],
    },
  },
  {
    name: "update_session",
    description: "Change fields of a session; omitted fields stay as they are",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Session id" },
        subject: { type: "string" },
        durationMinutes: { type: "integer", minimum: 1 },
        date: dateProperty,
        startTime: timeProperty,
        endTime: timeProperty,
        notes: { type: ["string", "null"], description: "Free text (null clears it)" },
      },
      required: ["id"],
    },
  },
  {
    name: "remove_session",
    description: "Remove a session (idempotent - no error if missing)",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Session id" },
      },
      required: ["id"],
    },
  },
  {
    name: "list_sessions",
    description: `List sessions newest first (limit max ${MAX_LIST_LIMIT}, default 100)`,
    inputSchema: {
      type: "object",
      properties: {
        subject: { type: "string", description: "Case-insensitive substring of the subject" },
        from: { ...dateProperty, description: "Inclusive lower date bound" },
        to: { ...dateProperty, description: "Inclusive upper date bound" },
        limit: { type: "integer", minimum: 1, maximum: MAX_LIST_LIMIT },
      },
    },
  },
  {
    name: "session_stats",
    description: "Total minutes, session count, average and per-subject totals",
    inputSchema: {
      type: "object",
      properties: {
        from: { ...dateProperty, description: "Inclusive lower date bound" },
        to: { ...dateProperty, description: "Inclusive upper date bound" },
      },
    },
  },
  {
    name: "export_sessions",
    description: "Encode all sessions as collection text",
    inputSchema: {
      type: "object",
      properties: {
        layout: {
          type: "string",
          enum: ["compact", "pretty"],
          description: "compact for the wire payload (default), pretty for one record per line",
        },
      },
    },
  },
  {
    name: "import_sessions",
    description: "Append sessions from collection text; malformed records are skipped and reported",
    inputSchema: {
      type: "object",
      properties: {
        payload: { type: "string", description: "Collection text as produced by export_sessions" },
        onConflict: {
          type: "string",
          enum: ["skip", "replace", "error"],
          description: "What to do with ids that already exist (default: skip)",
        },
      },
      required: ["payload"],
    },
  },
];

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/**
 * Tool handlers map
 */
export const toolHandlers: Record<string, ToolHandler> = {
  add_session: addSession,
  get_session: getSession,
  update_session: updateSession,
  remove_session: removeSession,
  list_sessions: listSessions,
  session_stats: sessionStats,
  export_sessions: exportSessions,
  import_sessions: importSessions,
};

/**
 * Handler for a tool name, or undefined for unknown names
 */
export function getToolHandler(name: string): ToolHandler | undefined {
  return Object.hasOwn(toolHandlers, name) ? toolHandlers[name] : undefined;
}

export const READ_ONLY_TOOLS: ReadonlySet<string> = new Set([
  "get_session",
  "list_sessions",
  "session_stats",
  "export_sessions",
]);
