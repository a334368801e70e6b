/**
 * Coroutine handles.
 *
 * A handle is an explicit state machine: a saved frame (program counter,
 * locals, pending awaitable) plus a body that knows how to continue from it.
 * Each `resume` runs the body until it awaits, returns or raises.
 */
import type { ExceptionRecord } from "./exceptions.js";
import { ScriptException, makeRecord } from "./exceptions.js";
import type { Failure } from "./failures.js";
import type { JoinGroup } from "./join-group.js";
import type { Value } from "./values.js";

export type ResumeInput =
  | { kind: "start" }
  | { kind: "value"; value: Value }
  | { kind: "throw"; record: ExceptionRecord };

export type Awaitable = CoroutineHandle | JoinGroup;

export type Step =
  | { kind: "await"; target: Awaitable }
  | { kind: "return"; value: Value }
  | { kind: "raise"; record: ExceptionRecord };

export interface SavedFrame {
  pc: number;
  locals: Map<string, Value>;
  pending: Awaitable | null;
}

export interface CoroutineBody {
  name: string;
  /**
   * Continue from `frame`. On "value" or "throw" input, `frame.pending` is
   * the awaitable that produced it and `frame.pc` still points at the await.
   */
  resume(frame: SavedFrame, input: ResumeInput): Step;
}

export type CoroutineStatus = "created" | "running" | "suspended" | "completed" | "failed";

export type Outcome =
  | { ok: true; value: Value }
  | { ok: false; record: ExceptionRecord };

export const START: ResumeInput = { kind: "start" };

let nextHandleId = 1;

export class CoroutineHandle {
  readonly id: number;
  readonly body: CoroutineBody;
  private state: CoroutineStatus = "created";
  private readonly frame: SavedFrame;
  private owner: number | null = null;
  private finished: Outcome | null = null;

  constructor(body: CoroutineBody, locals: Map<string, Value> = new Map()) {
    this.id = nextHandleId++;
    this.body = body;
    this.frame = { pc: 0, locals, pending: null };
  }

  get name(): string {
    return this.body.name;
  }

  get status(): CoroutineStatus {
    return this.state;
  }

  get pending(): Awaitable | null {
    return this.frame.pending;
  }

  get outcome(): Outcome | null {
    return this.finished;
  }

  /**
   * Reserve this handle for one scheduler slot. Returns the usage failure
   * when the handle has finished or already belongs to a slot.
   */
  claim(slot: number): Failure | null {
    if (this.state === "completed" || this.state === "failed") {
      return { tag: "CoroutineReuse" };
    }
    if (this.owner !== null || this.state !== "created") {
      return { tag: "CoroutineBusy" };
    }
    this.owner = slot;
    return null;
  }

  release(): void {
    this.owner = null;
  }

  resume(input: ResumeInput): Step {
    if (this.state === "running") {
      throw new ScriptException(makeRecord({ tag: "CoroutineBusy" }));
    }
    if (this.state === "completed" || this.state === "failed") {
      throw new ScriptException(makeRecord({ tag: "CoroutineReuse" }));
    }
    if ((input.kind === "start") !== (this.state === "created")) {
      throw new Error(
        `Coroutine '${this.name}' cannot take '${input.kind}' input while ${this.state}.`
      );
    }

    this.state = "running";
    let step: Step;
    try {
      step = this.body.resume(this.frame, input);
    } catch (e) {
      if (!(e instanceof ScriptException)) {
        this.state = "failed";
        throw e;
      }
      step = { kind: "raise", record: e.record };
    }

    switch (step.kind) {
      case "await":
        this.state = "suspended";
        this.frame.pending = step.target;
        break;
      case "return":
        this.state = "completed";
        this.frame.pending = null;
        this.finished = { ok: true, value: step.value };
        break;
      case "raise":
        this.state = "failed";
        this.frame.pending = null;
        this.finished = { ok: false, record: step.record };
        break;
    }
    return step;
  }
}

/** Build a body from a plain resume function. */
export function defineBody(
  name: string,
  resume: (frame: SavedFrame, input: ResumeInput) => Step
): CoroutineBody {
  return { name, resume };
}

export function done(value: Value): Step {
  return { kind: "return", value };
}

export function suspendOn(target: Awaitable): Step {
  return { kind: "await", target };
}

export function fail(record: ExceptionRecord): Step {
  return { kind: "raise", record };
}
