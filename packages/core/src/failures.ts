/**
 * Failure kinds raised by the runtime.
 *
 * Each failure is a tagged variant with a structured payload. The exception
 * type name and the message text are derived from the payload, never stored.
 */
import type { Capability } from "./values.js";

export type ExcType =
  | "TypeError"
  | "ValueError"
  | "NameError"
  | "RuntimeError"
  | "AssertionError"
  | "SyntaxError"
  | "ResourceError";

export type Failure =
  /** A builtin argument lacks a capability its parameter requires. */
  | { tag: "ArgumentShapeError"; kindName: string; capability: Capability }
  | { tag: "Arity"; fn: string; min: number; max: number | null; given: number; message?: string }
  | { tag: "UnexpectedKeyword"; fn: string; keyword: string }
  | { tag: "DuplicateArgument"; fn: string; name: string }
  | { tag: "NestedRunError" }
  | { tag: "NoRunningLoop" }
  | { tag: "CoroutineReuse" }
  | { tag: "CoroutineBusy" }
  | { tag: "GroupAwaited" }
  | { tag: "NotAwaitable"; kindName: string }
  | { tag: "UnsupportedOperand"; op: string; left: string; right: string }
  | { tag: "UnboundName"; name: string }
  | { tag: "Assertion"; message: string | null }
  | { tag: "Budget"; limit: number }
  | { tag: "Raised"; excType: ExcType; message: string | null };

export type FailureTag = Failure["tag"];

export function excTypeOf(f: Failure): ExcType {
  switch (f.tag) {
    case "ArgumentShapeError":
    case "Arity":
    case "UnexpectedKeyword":
    case "DuplicateArgument":
    case "NotAwaitable":
    case "UnsupportedOperand":
      return "TypeError";
    case "NestedRunError":
    case "NoRunningLoop":
    case "CoroutineReuse":
    case "CoroutineBusy":
    case "GroupAwaited":
      return "RuntimeError";
    case "UnboundName":
      return "NameError";
    case "Assertion":
      return "AssertionError";
    case "Budget":
      return "ResourceError";
    case "Raised":
      return f.excType;
  }
}

function plural(n: number, word: string): string {
  return n === 1 ? `${n} ${word}` : `${n} ${word}s`;
}

function arityMessage(f: Extract<Failure, { tag: "Arity" }>): string {
  if (f.message !== undefined) return f.message;
  if (f.max === f.min) {
    if (f.min === 0) return `${f.fn}() takes no arguments (${f.given} given)`;
    if (f.min === 1) return `${f.fn}() takes exactly one argument (${f.given} given)`;
    return `${f.fn}() takes exactly ${f.min} arguments (${f.given} given)`;
  }
  if (f.given < f.min) {
    return `${f.fn}() expected at least ${plural(f.min, "argument")}, got ${f.given}`;
  }
  return `${f.fn}() expected at most ${plural(f.max ?? f.min, "argument")}, got ${f.given}`;
}

/** Message text of a failure, or null when the exception carries none. */
export function failureMessage(f: Failure): string | null {
  switch (f.tag) {
    case "ArgumentShapeError":
      return `'${f.kindName}' object is not ${f.capability}`;
    case "Arity":
      return arityMessage(f);
    case "UnexpectedKeyword":
      return `${f.fn}() got an unexpected keyword argument '${f.keyword}'`;
    case "DuplicateArgument":
      return `${f.fn}() got multiple values for argument '${f.name}'`;
    case "NestedRunError":
      return "asyncio.run() cannot be called from a running event loop";
    case "NoRunningLoop":
      return "no running event loop";
    case "CoroutineReuse":
      return "cannot reuse already awaited coroutine";
    case "CoroutineBusy":
      return "coroutine is being awaited already";
    case "GroupAwaited":
      return "join group is already being awaited";
    case "NotAwaitable":
      return `object ${f.kindName} can't be used in 'await' expression`;
    case "UnsupportedOperand":
      return `unsupported operand type(s) for ${f.op}: '${f.left}' and '${f.right}'`;
    case "UnboundName":
      return `name '${f.name}' is not defined`;
    case "Assertion":
      return f.message;
    case "Budget":
      return `step limit of ${f.limit} exceeded`;
    case "Raised":
      return f.message;
  }
}

/** The final line of a traceback: `TypeError: message`, or the bare type name. */
export function describeFailure(f: Failure): string {
  const msg = failureMessage(f);
  const type = excTypeOf(f);
  return msg === null ? type : `${type}: ${msg}`;
}
