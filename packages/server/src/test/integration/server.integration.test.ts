/**
 * MCP protocol tests: a client talks to the server over an in-memory transport
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { createTempRoot, removeDir } from "@studylog/testkit";
import { createServer } from "../../app.js";
import { closeAllServices } from "../../service/studylog.js";

let testRoot: string;

async function connect(readOnly = false): Promise<{ client: Client; close: () => Promise<void> }> {
  const server = createServer({ readOnly });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);
  await client.connect(clientTransport);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

beforeEach(async () => {
  testRoot = await createTempRoot("studylog-mcp-test-");
  process.env.DATA_ROOT = testRoot;
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await closeAllServices();
  delete process.env.DATA_ROOT;
  await removeDir(testRoot);
});

describe("MCP server", () => {
  it("should list all tools in read-write mode", async () => {
    const { client, close } = await connect();

    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      "add_session",
      "get_session",
      "update_session",
      "remove_session",
      "list_sessions",
      "session_stats",
      "export_sessions",
      "import_sessions",
    ]);

    await close();
  });

  it("should round-trip a session through tool calls", async () => {
    const { client, close } = await connect();

    await client.callTool({
      name: "import_sessions",
      arguments: {
        payload:
          '[{"id":"s-1","subject":"Math","durationMinutes":45,"date":"2024-10-04","startTime":null,"endTime":null,"notes":null}]',
      },
    });

    const result = await client.callTool({ name: "get_session", arguments: { id: "s-1" } });
    expect(result).toMatchObject({
      content: [{ type: "text", text: "Found session s-1" }],
      structuredContent: { session: { id: "s-1", subject: "Math", durationMinutes: 45 } },
    });

    await close();
  });

  it("should report validation errors as InvalidParams", async () => {
    const { client, close } = await connect();

    await expect(
      client.callTool({ name: "add_session", arguments: { subject: "Math", durationMinutes: 0 } })
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });

    await close();
  });

  it("should report unknown sessions as InvalidRequest", async () => {
    const { client, close } = await connect();

    await expect(
      client.callTool({ name: "update_session", arguments: { id: "missing", subject: "Art" } })
    ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });

    await close();
  });

  it("should reject unknown tools", async () => {
    const { client, close } = await connect();

    await expect(client.callTool({ name: "toString", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });

    await close();
  });

  describe("read-only mode", () => {
    it("should list only the read tools", async () => {
      const { client, close } = await connect(true);

      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toEqual([
        "get_session",
        "list_sessions",
        "session_stats",
        "export_sessions",
      ]);

      await close();
    });

    it("should refuse write tools", async () => {
      const { client, close } = await connect(true);

      await expect(
        client.callTool({ name: "add_session", arguments: { subject: "Math", durationMinutes: 30 } })
      ).rejects.toThrow(/not available in read-only mode/);

      await close();
    });
  });
});
