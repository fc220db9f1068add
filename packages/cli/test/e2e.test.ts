/**
 * End-to-end CLI tests
 * Runs the CLI entry point in a child process
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createTempRoot, removeDir, runCli, parseJsonOutput } from "@studylog/testkit";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const CLI_ENTRY = join(__dirname, "../src/cli.ts");

describe("CLI end-to-end", { timeout: 60000 }, () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot("studylog-e2e-");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("should add, import from stdin and report stats", async () => {
    const env = { STUDYLOG_ROOT: root };

    const added = await runCli(CLI_ENTRY, ["add", "-s", "Math", "-m", "45", "-d", "2024-10-04"], { env });
    expect(added.exitCode).toBe(0);
    expect(added.stdout).toMatch(/^Added \S+$/);

    const payload =
      '[{"id":"imported-1","subject":"History","durationMinutes":30,"date":"2024-10-05","startTime":null,"endTime":null,"notes":"a, \\"quoted\\" note"}]';
    const imported = await runCli(CLI_ENTRY, ["import"], { env, input: payload });
    expect(imported.exitCode).toBe(0);
    expect(imported.stdout).toBe("Imported 1 session(s): 0 replaced, 0 duplicate(s) skipped, 0 malformed");

    const stats = await runCli(CLI_ENTRY, ["stats", "--json"], { env });
    expect(stats.exitCode).toBe(0);
    expect(parseJsonOutput(stats.stdout)).toEqual({
      totalMinutes: 75,
      sessionCount: 2,
      averageMinutes: 37.5,
      bySubject: { Math: 45, History: 30 },
    });

    const shown = await runCli(CLI_ENTRY, ["show", "imported-1"], { env });
    expect(parseJsonOutput(shown.stdout)).toMatchObject({ notes: 'a, "quoted" note' });
  });

  it("should exit 2 and print to stderr for a missing session", async () => {
    const result = await runCli(CLI_ENTRY, ["--root", root, "show", "missing"]);

    expect(result.exitCode).toBe(2);
    expect(result.stdout).toBe("");
    expect(result.stderr).toContain("Error: Session not found: missing");
  });

  it("should emit timing metrics with STUDYLOG_CLI_DEBUG=1", async () => {
    const result = await runCli(CLI_ENTRY, ["--root", root, "ls"], { env: { STUDYLOG_CLI_DEBUG: "1" } });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("No sessions found");
    expect(result.stderr).toMatch(/^metric cli\.ls duration_ms=\d+ success=true$/m);
  });

  it("should print the version", async () => {
    const result = await runCli(CLI_ENTRY, ["--version"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("0.1.0");
  });
});
