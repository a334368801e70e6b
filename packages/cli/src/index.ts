/**
 * @tasklet/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { loadUnit } from "./unit-loader.js";
export type { LoadResult } from "./unit-loader.js";
export { parseInputs } from "./inputs.js";
export type { ParsedInputs } from "./inputs.js";
