/**
 * MCP server wiring for the study session tracker
 * Registers tool listing and dispatch; transports are attached by the caller
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  DuplicateSessionError,
  InvalidSessionError,
  LockTimeoutError,
  MalformedCollectionError,
  MalformedRecordError,
  SessionNotFoundError,
  errorCode,
} from "@studylog/sdk";
import { READ_ONLY_TOOLS, ToolTimeoutError, getToolHandler, toolDefinitions } from "./tools.js";
import { logger } from "./observability/logger.js";

export const SERVER_NAME = "studylog-server";
export const SERVER_VERSION = "0.1.0";

export interface CreateServerOptions {
  /** Only list and accept the read tools */
  readOnly?: boolean;
}

/**
 * Map tool errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof SessionNotFoundError || error instanceof DuplicateSessionError) {
    return { code: ErrorCode.InvalidRequest, message: error.message };
  }

  if (
    error instanceof InvalidSessionError ||
    error instanceof MalformedRecordError ||
    error instanceof MalformedCollectionError
  ) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof LockTimeoutError || error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (code === "EACCES" || code === "EPERM") {
      return { code: ErrorCode.InternalError, message: `Permission denied: ${error.message}` };
    }
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}

/**
 * Create and configure the MCP server
 */
export function createServer(options: CreateServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((t) => READ_ONLY_TOOLS.has(t.name))
      : toolDefinitions;

    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (readOnly && !READ_ONLY_TOOLS.has(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      const handler = getToolHandler(name);
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await handler(args ?? {});
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
