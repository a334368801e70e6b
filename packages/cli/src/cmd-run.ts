/**
 * tasklet run - execute a compiled unit
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  InvalidInputError,
  validate,
  runUnit,
  formatDiagnostics,
  formatDiagnostic,
  resolveConfig,
} from "@tasklet/core";
import type { PrintWriter, TraceEvent } from "@tasklet/core";
import { getBuiltins } from "@tasklet/std";
import { parseInputs } from "./inputs.js";
import { loadUnit } from "./unit-loader.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOptions {
  trace?: string;
  maxSteps?: string;
  /** `name=<json>` values for the unit's declared inputs. */
  input?: string[];
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
  /** Where print() goes. Defaults to stdout. */
  print?: PrintWriter;
  /** Where an uncaught exception's traceback goes. Defaults to stderr. */
  stderr?: (text: string) => void;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  // Read unit
  let text: string;
  try {
    text = fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const loaded = loadUnit(text, file === "-" ? "<stdin>" : file);
  if (loaded.unit === null) {
    console.error(formatDiagnostics(loaded.diagnostics, pretty));
    return 2;
  }
  const unit = loaded.unit;

  const builtins = getBuiltins();
  const diags = validate(unit, { builtins: new Set(builtins.keys()) });
  if (diags.length > 0) {
    console.error(formatDiagnostics(diags, pretty, unit.source));
    return 2;
  }

  // Limits: --max-steps wins over the config file
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  for (const skip of resolved.skipped) {
    emitCliError("W_CONFIG", `Ignoring config ${skip.path}: ${skip.reason}`);
  }
  let maxSteps = resolved.config.limits.maxSteps;
  if (opts.maxSteps !== undefined) {
    const n = Number(opts.maxSteps);
    if (!Number.isInteger(n) || n < 1) {
      emitCliError("E_USAGE", `--max-steps must be a positive integer, got '${opts.maxSteps}'.`);
      return 4;
    }
    maxSteps = n;
  }

  const parsedInputs = parseInputs(opts.input ?? []);
  if ("error" in parsedInputs) {
    emitCliError("E_USAGE", parsedInputs.error);
    return 4;
  }

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }
  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  let code: number;
  try {
    const result = runUnit(unit, {
      builtins,
      print: opts.print,
      stderr: opts.stderr,
      trace: traceHandler,
      runId: crypto.randomUUID(),
      limits: maxSteps !== undefined ? { maxSteps } : {},
      inputs: parsedInputs.inputs,
    });
    code = result.exitCode;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    const errCode = e instanceof CliIoError ? "E_IO" : e instanceof InvalidInputError ? "E_INPUT" : "E_RUNTIME";
    emitCliError(errCode, msg);
    code = 4;
  }

  if (fd !== null) {
    try {
      fs.closeSync(fd);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error closing trace file: ${msg}`);
      code = 4;
    }
  }
  return code;
}
