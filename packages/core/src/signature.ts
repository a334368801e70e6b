/**
 * Argument validation for builtin calls.
 *
 * A builtin declares the shape of its positional arguments and the keyword
 * names it accepts. Validation runs
 * before the builtin body, so a rejected call has no partial effect.
 */
import type { Failure } from "./failures.js";
import { raise } from "./exceptions.js";
import type { Capability, Value } from "./values.js";
import { kindName, supports } from "./values.js";

export interface ParamShape {
  name: string;
  requires?: Capability;
}

export interface Signature {
  name: string;
  params: readonly ParamShape[];
  /** Number of leading params that must be given. Defaults to all of them. */
  required?: number;
  /** Shape applied to every argument past `params`. Unbounded when set. */
  rest?: ParamShape;
  /** Replaces the generated arity message. */
  arityMessage?: string;
  /** Keyword arguments accepted after the positionals. */
  keywords?: readonly string[];
}

export type KeywordArgs = ReadonlyMap<string, Value>;

const NO_KEYWORDS: KeywordArgs = new Map();

export function checkArgs(
  sig: Signature,
  args: readonly Value[],
  kwargs: KeywordArgs = NO_KEYWORDS
): Failure | null {
  const min = sig.required ?? sig.params.length;
  const max = sig.rest ? null : sig.params.length;
  if (args.length < min || (max !== null && args.length > max)) {
    return {
      tag: "Arity",
      fn: sig.name,
      min,
      max,
      given: args.length,
      ...(sig.arityMessage !== undefined ? { message: sig.arityMessage } : {}),
    };
  }

  for (const keyword of kwargs.keys()) {
    if (!sig.keywords?.includes(keyword)) {
      return { tag: "UnexpectedKeyword", fn: sig.name, keyword };
    }
  }

  for (let i = 0; i < args.length; i++) {
    const shape = sig.params[i] ?? sig.rest;
    const arg = args[i];
    if (!shape?.requires || !arg) continue;
    if (!supports(arg, shape.requires)) {
      return { tag: "ArgumentShapeError", kindName: kindName(arg), capability: shape.requires };
    }
  }
  return null;
}

/** Throws a ScriptException carrying the first mismatch. */
export function validateArgs(sig: Signature, args: readonly Value[], kwargs?: KeywordArgs): void {
  const failure = checkArgs(sig, args, kwargs);
  if (failure) raise(failure);
}
