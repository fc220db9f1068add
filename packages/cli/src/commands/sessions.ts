/**
 * Session commands: add, ls, show, update, rm
 */

import { Command, InvalidArgumentError } from "commander";
import { createInterface } from "node:readline/promises";
import { SessionNotFoundError, todayIsoDate, type SessionPatch } from "@studylog/sdk";
import { resolveRoot, type GlobalOptions } from "../lib/env.js";
import {
  parseDate,
  parseMinutes,
  parseNonNegativeInt,
  parseText,
  parseTime,
} from "../lib/arg.js";
import { isStdinTTY } from "../lib/io.js";
import { formatSessionLine, printJson, printLines } from "../lib/render.js";
import { CliError } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import { withTracker } from "../lib/tracker.js";

interface FieldOptions {
  subject?: string;
  minutes?: number;
  date?: string;
  start?: string;
  end?: string;
  notes?: string;
}

interface AddOptions extends FieldOptions {
  subject: string;
  minutes: number;
}

interface UpdateOptions extends FieldOptions {
  clearStart?: boolean;
  clearEnd?: boolean;
  clearNotes?: boolean;
}

interface ListOptions {
  subject?: string;
  from?: string;
  to?: string;
  json?: boolean;
  limit?: number;
}

/**
 * Field options shared by add and update
 */
function addFieldOptions(command: Command, required: boolean): Command {
  const subjectFlags = "-s, --subject <subject>";
  const minutesFlags = "-m, --minutes <minutes>";

  if (required) {
    command
      .requiredOption(subjectFlags, "What was studied", (v: string) => parseText(v, "--subject"))
      .requiredOption(minutesFlags, "Duration in whole minutes", (v: string) => parseMinutes(v));
  } else {
    command
      .option(subjectFlags, "What was studied", (v: string) => parseText(v, "--subject"))
      .option(minutesFlags, "Duration in whole minutes", (v: string) => parseMinutes(v));
  }

  return command
    .option(
      "-d, --date <date>",
      required ? "Day of the session, YYYY-MM-DD (default: today)" : "Day of the session, YYYY-MM-DD",
      (v: string) => parseDate(v, "--date")
    )
    .option("--start <time>", "Start time, HH:MM[:SS]", (v: string) => parseTime(v, "--start"))
    .option("--end <time>", "End time, HH:MM[:SS]", (v: string) => parseTime(v, "--end"))
    .option("--notes <text>", "Free-text notes");
}

/**
 * Translate update options into a patch; `--clear-*` sets a field to null
 */
export function buildPatch(options: UpdateOptions): SessionPatch {
  const pairs: Array<[string | undefined, boolean | undefined, string]> = [
    [options.start, options.clearStart, "start"],
    [options.end, options.clearEnd, "end"],
    [options.notes, options.clearNotes, "notes"],
  ];
  for (const [value, clear, name] of pairs) {
    if (value !== undefined && clear) {
      throw new InvalidArgumentError(`Cannot use both --${name} and --clear-${name}`);
    }
  }

  const patch: SessionPatch = {};
  if (options.subject !== undefined) patch.subject = options.subject;
  if (options.minutes !== undefined) patch.durationMinutes = options.minutes;
  if (options.date !== undefined) patch.date = options.date;

  if (options.clearStart) patch.startTime = null;
  else if (options.start !== undefined) patch.startTime = options.start;

  if (options.clearEnd) patch.endTime = null;
  else if (options.end !== undefined) patch.endTime = options.end;

  if (options.clearNotes) patch.notes = null;
  else if (options.notes !== undefined) patch.notes = options.notes;

  if (Object.keys(patch).length === 0) {
    throw new InvalidArgumentError("Nothing to update; pass at least one field option");
  }

  return patch;
}

/**
 * Ask before deleting; non-interactive callers must pass --force
 */
async function confirmRemoval(id: string): Promise<void> {
  if (!isStdinTTY()) {
    throw new InvalidArgumentError("Use --force to confirm removal in non-interactive mode");
  }

  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = (await rl.question(`Remove session ${id}? (y/N) `)).trim().toLowerCase();
    if (answer !== "y") {
      throw new CliError("Aborted by user", { exitCode: 1 });
    }
  } finally {
    rl.close();
  }
}

export function registerSessionCommands(program: Command): void {
  // Add command
  addFieldOptions(
    program.command("add").description("Record a study session"),
    true
  ).action(async (options: AddOptions) => {
      await withTiming("cli.add", async () => {
        const opts = program.opts<GlobalOptions>();

        const session = await withTracker(resolveRoot(opts.root), (tracker) =>
          tracker.addSession({
            subject: options.subject,
            durationMinutes: options.minutes,
            date: options.date ?? todayIsoDate(),
            startTime: options.start ?? null,
            endTime: options.end ?? null,
            notes: options.notes ?? null,
          })
        );

        if (!opts.quiet) {
          console.log(`Added ${session.id}`);
        }
      });
    });

  // List command
  program
    .command("ls")
    .description("List sessions, newest first")
    .option("-s, --subject <text>", "Only subjects containing this text (case-insensitive)")
    .option("--from <date>", "Earliest date, inclusive", (v: string) => parseDate(v, "--from"))
    .option("--to <date>", "Latest date, inclusive", (v: string) => parseDate(v, "--to"))
    .option("--limit <n>", "Show at most n sessions", (v: string) => parseNonNegativeInt(v, "--limit"))
    .option("--json", "Output as JSON")
    .action(async (options: ListOptions) => {
      await withTiming("cli.ls", async () => {
        const opts = program.opts<GlobalOptions>();

        const sessions = await withTracker(resolveRoot(opts.root), async (tracker) =>
          tracker.listSessions({
            subject: options.subject,
            from: options.from,
            to: options.to,
            sort: "date-desc",
          })
        );
        const shown = options.limit === undefined ? sessions : sessions.slice(0, options.limit);

        if (options.json) {
          printJson(shown);
        } else if (shown.length === 0) {
          if (!opts.quiet) {
            console.log("No sessions found");
          }
        } else {
          printLines(shown.map(formatSessionLine));
        }
      });
    });

  // Show command
  program
    .command("show <id>")
    .description("Print one session as JSON")
    .action(async (id: string) => {
      await withTiming("cli.show", async () => {
        const opts = program.opts<GlobalOptions>();

        const session = await withTracker(resolveRoot(opts.root), async (tracker) => tracker.getSession(id));
        if (!session) {
          throw new SessionNotFoundError(id);
        }

        printJson(session);
      });
    });

  // Update command
  addFieldOptions(
    program.command("update <id>").description("Change fields of a session"),
    false
  )
    .option("--clear-start", "Remove the start time")
    .option("--clear-end", "Remove the end time")
    .option("--clear-notes", "Remove the notes")
    .action(async (id: string, options: UpdateOptions) => {
      await withTiming("cli.update", async () => {
        const opts = program.opts<GlobalOptions>();
        const patch = buildPatch(options);

        await withTracker(resolveRoot(opts.root), (tracker) => tracker.updateSession(id, patch));

        if (!opts.quiet) {
          console.log(`Updated ${id}`);
        }
      });
    });

  // Remove command
  program
    .command("rm <id>")
    .description("Delete a session")
    .option("-f, --force", "Skip confirmation")
    .action(async (id: string, options: { force?: boolean }) => {
      await withTiming("cli.rm", async () => {
        const opts = program.opts<GlobalOptions>();

        if (!options.force) {
          await confirmRemoval(id);
        }

        const removed = await withTracker(resolveRoot(opts.root), (tracker) => tracker.deleteSession(id));
        if (!removed) {
          throw new SessionNotFoundError(id);
        }

        if (!opts.quiet) {
          console.log(`Removed ${id}`);
        }
      });
    });
}
