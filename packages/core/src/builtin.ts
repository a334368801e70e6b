/**
 * Builtin function interface.
 */
import type { PrintWriter } from "./print.js";
import type { Scheduler } from "./scheduler.js";
import type { KeywordArgs, Signature } from "./signature.js";
import { validateArgs } from "./signature.js";
import type { Value } from "./values.js";

export interface CallContext {
  scheduler: Scheduler;
  print: PrintWriter;
  /** Call any callable value, builtin or user-defined. */
  call(fn: Value, args: Value[]): Value;
}

export interface BuiltinFn {
  name: string;
  signature: Signature;
  /**
   * Runs after `signature` has been checked; `kwargs` holds only declared
   * keywords. Failures throw ScriptException.
   */
  execute(args: Value[], ctx: CallContext, kwargs: KeywordArgs): Value;
}

export function invokeBuiltin(
  fn: BuiltinFn,
  args: Value[],
  ctx: CallContext,
  kwargs: KeywordArgs = new Map()
): Value {
  validateArgs(fn.signature, args, kwargs);
  return fn.execute(args, ctx, kwargs);
}
