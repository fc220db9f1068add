/**
 * studylog command-line program
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger } from "@studylog/sdk";
import { registerSessionCommands } from "./commands/sessions.js";
import { registerReportCommands } from "./commands/report.js";
import { registerTransferCommands } from "./commands/transfer.js";
import type { GlobalOptions } from "./lib/env.js";
import { colorize } from "./lib/render.js";
import { EXIT_OK, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Version from the package manifest beside src/ (or dist/)
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build a fresh program; parse errors throw CommanderError instead of exiting
 */
export function createProgram(): Command {
  const program = new Command();

  // Output and exit settings are inherited by commands added afterwards
  program
    .name("studylog")
    .description("studylog - record study sessions and see where the time went")
    .version(readVersion())
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program.hook("preAction", () => {
    logger.setEnabled(!program.opts<GlobalOptions>().quiet);
  });

  registerSessionCommands(program);
  registerReportCommands(program);
  registerTransferCommands(program);

  return program;
}

/**
 * Run the program on user arguments
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // commander prints its own parse errors and help; errors from actions are ours to print
    if (!(err instanceof CommanderError) || err instanceof InvalidArgumentError) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    }
    return mapSdkErrorToExitCode(err);
  }
}
