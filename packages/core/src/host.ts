/**
 * Host boundary: runs a unit of work and reports an escaping exception.
 */
import type { BuiltinFn } from "./builtin.js";
import type { ExceptionRecord } from "./exceptions.js";
import { ScriptException } from "./exceptions.js";
import { Interpreter } from "./interpreter.js";
import type { PrintWriter } from "./print.js";
import { StdPrint } from "./print.js";
import type { SchedulerLimits, TraceEvent } from "./scheduler.js";
import { Scheduler } from "./scheduler.js";
import { formatTraceback } from "./traceback.js";
import type { Unit } from "./unit.js";
import type { Value } from "./values.js";

export interface HostOptions {
  builtins: Map<string, BuiltinFn>;
  print?: PrintWriter;
  /** Error stream. Defaults to process.stderr. */
  stderr?: (text: string) => void;
  trace?: (event: TraceEvent) => void;
  runId?: string;
  limits?: SchedulerLimits;
  /** Values for the names the unit declares in `inputs`. */
  inputs?: Readonly<Record<string, Value>>;
}

/** The provided input values do not match the unit's declared inputs. */
export class InvalidInputError extends Error {
  readonly missing: readonly string[];
  readonly unexpected: readonly string[];

  constructor(missing: readonly string[], unexpected: readonly string[]) {
    const quoted = (names: readonly string[]) => names.map((n) => `'${n}'`).join(", ");
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing ${quoted(missing)}`);
    if (unexpected.length > 0) parts.push(`unexpected ${quoted(unexpected)}`);
    super(`Invalid inputs: ${parts.join("; ")}.`);
    this.name = "InvalidInputError";
    this.missing = missing;
    this.unexpected = unexpected;
  }
}

function bindInputs(unit: Unit, provided: Readonly<Record<string, Value>>): Map<string, Value> {
  const declared = unit.inputs ?? [];
  const missing = declared.filter((name) => !Object.hasOwn(provided, name));
  const unexpected = Object.keys(provided).filter((name) => !declared.includes(name));
  if (missing.length > 0 || unexpected.length > 0) {
    throw new InvalidInputError(missing, unexpected);
  }
  return new Map(Object.entries(provided));
}

export type HostResult =
  | { exitCode: 0; value: Value }
  | { exitCode: 1; record: ExceptionRecord; traceback: string };

/**
 * Execute `unit`. An uncaught exception is written to the error stream as a
 * traceback and ends the unit with exit code 1. Host errors propagate, among
 * them InvalidInputError before anything runs.
 */
export function runUnit(unit: Unit, options: HostOptions): HostResult {
  const inputs = bindInputs(unit, options.inputs ?? {});
  const scheduler = new Scheduler({
    trace: options.trace,
    runId: options.runId,
    limits: options.limits,
  });
  const interp = new Interpreter(unit, {
    builtins: options.builtins,
    scheduler,
    print: options.print ?? new StdPrint(),
    inputs,
  });
  const stderr = options.stderr ?? ((text: string) => void process.stderr.write(text));

  try {
    return { exitCode: 0, value: interp.runModule() };
  } catch (e) {
    if (!(e instanceof ScriptException)) throw e;
    const traceback = formatTraceback(e.record);
    stderr(traceback + "\n");
    return { exitCode: 1, record: e.record, traceback };
  }
}
