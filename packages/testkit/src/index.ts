export { createTempRoot, removeDir, withTempTracker, withTempDir } from "./fs.js";
export { runCli, parseJsonOutput, type CliResult, type CliExecOptions } from "./cli.js";
