#!/usr/bin/env -S node --import tsx

/**
 * MCP server for studylog
 * Exposes the session tracker via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./app.js";
import { closeAllServices } from "./service/studylog.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const readOnly = process.env.MCP_STUDYLOG_READONLY === "true";
  const enabled = process.env.MCP_STUDYLOG_ENABLED !== "false";

  if (!enabled) {
    console.error("MCP studylog server is disabled (MCP_STUDYLOG_ENABLED=false)");
    process.exit(0);
  }

  const server = createServer({ readOnly });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_root: process.env.DATA_ROOT || "./data",
  });

  const shutdown = async () => {
    logger.info("server.shutdown", {});
    await server.close();
    await closeAllServices();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
