/**
 * Export and import of the session collection text
 */

import { InvalidArgumentError, type Command } from "commander";
import type { ImportConflictPolicy } from "@studylog/sdk";
import { resolveRoot, type GlobalOptions } from "../lib/env.js";
import { parseConflictPolicy } from "../lib/arg.js";
import { isStdinTTY, readStdin, readTextFromFile } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";
import { withTracker } from "../lib/tracker.js";

interface ImportCommandOptions {
  onConflict: ImportConflictPolicy;
}

async function readPayload(file: string | undefined): Promise<string> {
  if (file !== undefined) {
    return readTextFromFile(file);
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError("No input provided. Pass a file or pipe a collection to stdin");
  }

  let stdin: string;
  try {
    stdin = await readStdin();
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return stdin;
}

export function registerTransferCommands(program: Command): void {
  // Export command
  program
    .command("export")
    .description("Print the session collection")
    .option("--compact", "Single-line wire layout instead of one session per line")
    .action(async (options: { compact?: boolean }) => {
      await withTiming("cli.export", async () => {
        const opts = program.opts<GlobalOptions>();

        const text = await withTracker(resolveRoot(opts.root), async (tracker) =>
          tracker.exportSessions({ layout: options.compact ? "compact" : "pretty" })
        );

        console.log(text);
      });
    });

  // Import command
  program
    .command("import [file]")
    .description("Merge sessions from a collection file or stdin")
    .option(
      "--on-conflict <policy>",
      "What to do with sessions whose id exists: skip, replace or error",
      (v: string) => parseConflictPolicy(v),
      "skip"
    )
    .action(async (file: string | undefined, options: ImportCommandOptions) => {
      await withTiming("cli.import", async () => {
        const opts = program.opts<GlobalOptions>();
        const payload = await readPayload(file);

        const summary = await withTracker(resolveRoot(opts.root), (tracker) =>
          tracker.importSessions(payload, { onConflict: options.onConflict })
        );

        if (!opts.quiet) {
          console.log(
            `Imported ${summary.added} session(s): ${summary.replaced} replaced, ` +
              `${summary.duplicates} duplicate(s) skipped, ${summary.malformed.length} malformed`
          );
        }
      });
    });
}
