/**
 * Stats command
 */

import type { Command } from "commander";
import { resolveRoot, type GlobalOptions } from "../lib/env.js";
import { parseDate } from "../lib/arg.js";
import { formatStatsLines, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { withTracker } from "../lib/tracker.js";

interface StatsOptions {
  from?: string;
  to?: string;
  json?: boolean;
}

export function registerReportCommands(program: Command): void {
  program
    .command("stats")
    .description("Show total, average and per-subject study time")
    .option("--from <date>", "Earliest date, inclusive", (v: string) => parseDate(v, "--from"))
    .option("--to <date>", "Latest date, inclusive", (v: string) => parseDate(v, "--to"))
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsOptions) => {
      await withTiming("cli.stats", async () => {
        const opts = program.opts<GlobalOptions>();

        const stats = await withTracker(resolveRoot(opts.root), async (tracker) =>
          tracker.stats({ from: options.from, to: options.to })
        );

        if (options.json) {
          printJson(stats, { raw: true });
        } else {
          printLines(formatStatsLines(stats));
        }
      });
    });
}
