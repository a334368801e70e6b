/**
 * Tasklet Scheduler - drives coroutine handles to completion, one resume at
 * a time, on a single thread.
 */
import * as crypto from "node:crypto";
import type { Awaitable, CoroutineHandle, Outcome } from "./coroutine.js";
import { START } from "./coroutine.js";
import { ScriptException, makeRecord } from "./exceptions.js";
import type { JoinOptions, Task } from "./join-group.js";
import { JoinGroup } from "./join-group.js";
import type { Value } from "./values.js";

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "task_spawn"
  | "task_suspend"
  | "task_end"
  | "join_start"
  | "join_end"
  | "budget_exceeded";

export type TraceData = Record<string, string | number | boolean | null>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  data?: TraceData;
}

export interface SchedulerLimits {
  /** Maximum number of coroutine resumes in one run. */
  maxSteps?: number;
}

export interface SchedulerOptions {
  trace?: (event: TraceEvent) => void;
  runId?: string;
  limits?: SchedulerLimits;
}

/** State of the one active run. Exists only while `run` is on the stack. */
export interface SchedulerContext {
  readonly runId: string;
  readonly root: Task;
  readonly ready: Task[];
  steps: number;
}

export class Scheduler {
  private context: SchedulerContext | null = null;
  private nextTaskId = 1;
  private readonly options: SchedulerOptions;

  constructor(options: SchedulerOptions = {}) {
    this.options = options;
  }

  get active(): boolean {
    return this.context !== null;
  }

  /**
   * Drive `handle` to a terminal state and return its value. A failure is
   * thrown as ScriptException carrying the unformatted record.
   */
  run(handle: CoroutineHandle): Value {
    if (this.context !== null) {
      throw new ScriptException(makeRecord({ tag: "NestedRunError" }));
    }

    const root = this.makeTask(handle, 0, null);
    const claimFailure = handle.claim(root.id);
    if (claimFailure) {
      throw new ScriptException(makeRecord(claimFailure));
    }

    const ctx: SchedulerContext = {
      runId: this.options.runId ?? crypto.randomUUID(),
      root,
      ready: [root],
      steps: 0,
    };
    this.context = ctx;
    try {
      this.emit(ctx, "run_start", { coroutine: handle.name });
      this.drain(ctx);
      const outcome = root.outcome;
      if (outcome === null) {
        throw new Error(`Scheduler stalled: root task '${handle.name}' can make no progress.`);
      }
      this.emit(ctx, "run_end", {
        outcome: outcome.ok ? "ok" : "err",
        steps: ctx.steps,
      });
      if (!outcome.ok) throw new ScriptException(outcome.record);
      return outcome.value;
    } finally {
      handle.release();
      this.context = null;
    }
  }

  /**
   * Group `handles` for concurrent execution. Only valid inside a run; the
   * group starts when a coroutine awaits it.
   */
  joinAll(handles: readonly CoroutineHandle[], options?: JoinOptions): JoinGroup {
    if (this.context === null) {
      throw new ScriptException(makeRecord({ tag: "NoRunningLoop" }));
    }
    return new JoinGroup(handles, options);
  }

  private makeTask(handle: CoroutineHandle, index: number, group: JoinGroup | null): Task {
    return {
      id: this.nextTaskId++,
      index,
      group,
      state: "pending",
      chain: [handle],
      inbox: START,
      outcome: null,
    };
  }

  private drain(ctx: SchedulerContext): void {
    let task = ctx.ready.shift();
    while (task !== undefined) {
      this.step(ctx, task);
      task = ctx.ready.shift();
    }
  }

  private step(ctx: SchedulerContext, task: Task): void {
    const top = task.chain[task.chain.length - 1];
    if (top === undefined) return;

    ctx.steps++;
    const maxSteps = this.options.limits?.maxSteps;
    if (maxSteps !== undefined && ctx.steps > maxSteps) {
      this.emit(ctx, "budget_exceeded", { budget: "maxSteps", limit: maxSteps });
      throw new ScriptException(makeRecord({ tag: "Budget", limit: maxSteps }));
    }

    task.state = "running";
    const input = task.inbox;
    task.inbox = START;
    const step = top.resume(input);

    switch (step.kind) {
      case "await":
        this.suspend(ctx, task, step.target);
        return;
      case "return":
      case "raise": {
        const outcome: Outcome =
          step.kind === "return"
            ? { ok: true, value: step.value }
            : { ok: false, record: step.record };
        task.chain.pop();
        top.release();
        if (task.chain.length === 0) {
          this.finish(ctx, task, outcome);
          return;
        }
        task.inbox = outcome.ok
          ? { kind: "value", value: outcome.value }
          : { kind: "throw", record: outcome.record };
        task.state = "suspended";
        ctx.ready.push(task);
        return;
      }
    }
  }

  private suspend(ctx: SchedulerContext, task: Task, target: Awaitable): void {
    task.state = "suspended";
    if (target instanceof JoinGroup) {
      if (target.awaitedBy !== null) {
        task.inbox = { kind: "throw", record: makeRecord({ tag: "GroupAwaited" }) };
        ctx.ready.push(task);
        return;
      }
      this.startGroup(ctx, task, target);
      return;
    }

    const failure = target.claim(task.id);
    if (failure) {
      task.inbox = { kind: "throw", record: makeRecord(failure) };
    } else {
      task.chain.push(target);
    }
    this.emit(ctx, "task_suspend", { task: task.id, awaiting: target.name });
    ctx.ready.push(task);
  }

  private startGroup(ctx: SchedulerContext, parent: Task, group: JoinGroup): void {
    group.awaitedBy = parent;
    this.emit(ctx, "join_start", { task: parent.id, size: group.size });

    group.handles.forEach((handle, index) => {
      const child = this.makeTask(handle, index, group);
      group.tasks.push(child);
      this.emit(ctx, "task_spawn", { task: child.id, index, coroutine: handle.name });
      const failure = handle.claim(child.id);
      if (failure) {
        child.chain = [];
        child.state = "failed";
        child.outcome = { ok: false, record: makeRecord(failure) };
        return;
      }
      ctx.ready.push(child);
    });

    if (group.quiescent) this.settleGroup(ctx, group);
  }

  private finish(ctx: SchedulerContext, task: Task, outcome: Outcome): void {
    task.state = outcome.ok ? "completed" : "failed";
    task.outcome = outcome;
    this.emit(ctx, "task_end", {
      task: task.id,
      index: task.index,
      outcome: outcome.ok ? "ok" : "err",
    });
    const group = task.group;
    if (group !== null && group.quiescent) this.settleGroup(ctx, group);
  }

  private settleGroup(ctx: SchedulerContext, group: JoinGroup): void {
    const parent = group.awaitedBy;
    if (parent === null) return;
    const result = group.settle();
    parent.inbox = result.ok
      ? { kind: "value", value: result.value }
      : { kind: "throw", record: result.record };
    this.emit(ctx, "join_end", { task: parent.id, outcome: result.ok ? "ok" : "err" });
    ctx.ready.push(parent);
  }

  private emit(ctx: SchedulerContext, event: TraceEventType, data?: TraceData): void {
    if (this.options.trace) {
      this.options.trace({
        ts: new Date().toISOString(),
        runId: ctx.runId,
        event,
        data,
      });
    }
  }
}
