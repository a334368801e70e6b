/**
 * Exception records and the call frames they accumulate while unwinding.
 */
import type { Failure } from "./failures.js";
import { describeFailure } from "./failures.js";
import type { Value } from "./values.js";
import { kindName } from "./values.js";

/** Where a call happened: enough to render one traceback block. */
export interface SourceSite {
  file: string;
  /** 1-based. */
  line: number;
  /** Frame name: "<module>" or the enclosing function. */
  name: string;
  /** The literal source line. */
  text: string;
  startCol: number;
  endCol: number;
}

export interface ArgSnapshot {
  kind: string;
}

export interface CallFrame {
  readonly operation: string;
  readonly args: readonly ArgSnapshot[];
  readonly site: SourceSite;
}

/** Immutable. Frames run outermost first; the last frame is the failing call. */
export interface ExceptionRecord {
  readonly failure: Failure;
  readonly frames: readonly CallFrame[];
}

export function makeRecord(failure: Failure, frames: readonly CallFrame[] = []): ExceptionRecord {
  return Object.freeze({ failure, frames: Object.freeze([...frames]) });
}

export function makeCallFrame(operation: string, args: readonly Value[], site: SourceSite): CallFrame {
  return Object.freeze({
    operation,
    args: Object.freeze(args.map((a) => ({ kind: kindName(a) }))),
    site,
  });
}

/** A copy of `record` with `frame` added as its new outermost frame. */
export function withOuterFrame(record: ExceptionRecord, frame: CallFrame): ExceptionRecord {
  return makeRecord(record.failure, [frame, ...record.frames]);
}

/**
 * Carries an ExceptionRecord through host code. Thrown by builtins and by
 * the scheduler; caught only where a frame is added or at the host boundary.
 */
export class ScriptException extends Error {
  readonly record: ExceptionRecord;

  constructor(record: ExceptionRecord) {
    super(describeFailure(record.failure));
    this.name = "ScriptException";
    this.record = record;
  }
}

export function raise(failure: Failure): never {
  throw new ScriptException(makeRecord(failure));
}
