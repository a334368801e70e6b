#!/usr/bin/env -S node --import tsx
/**
 * tasklet - coroutine runtime CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { z } from "zod";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("tasklet")
  .description("Tasklet: run compiled units on a cooperative coroutine scheduler")
  .version(pkg.version);

program
  .command("run")
  .description("Run a compiled unit")
  .argument("<file>", "Unit JSON file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--max-steps <n>", "Stop after this many coroutine resumes")
  .option("--input <name=json>", "Value for a declared input (repeatable)", collect, [])
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { trace?: string; maxSteps?: string; input?: string[]; pretty?: boolean }) => {
    process.exitCode = await runRun(file, opts);
  });

program
  .command("check")
  .description("Static validation without execution")
  .argument("<file>", "Unit JSON file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runCheck(file, opts);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    process.exitCode = await runTrace(file, opts);
  });

program
  .command("config")
  .description("Display effective configuration and where it came from")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    process.exitCode = await runConfig(opts);
  });

await program.parseAsync();
