/**
 * Tasks and join groups.
 *
 * A Task is one scheduler slot: the handle it was spawned with plus the chain
 * of handles that one awaits in turn. A JoinGroup is a fixed, ordered set of
 * handles awaited together; each member gets its own Task.
 */
import type { CoroutineHandle, Outcome, ResumeInput } from "./coroutine.js";
import type { Value } from "./values.js";

export type TaskState = "pending" | "running" | "suspended" | "completed" | "failed";

export interface Task {
  readonly id: number;
  /** Position in the owning group, 0 for a root task. */
  readonly index: number;
  readonly group: JoinGroup | null;
  state: TaskState;
  /** Await chain; the last handle is the one resumed next. */
  chain: CoroutineHandle[];
  inbox: ResumeInput;
  outcome: Outcome | null;
}

export interface JoinOptions {
  /** Deliver member failures as exception values in the result list. */
  returnExceptions?: boolean;
}

export class JoinGroup {
  readonly handles: readonly CoroutineHandle[];
  readonly tasks: Task[] = [];
  readonly returnExceptions: boolean;
  awaitedBy: Task | null = null;

  constructor(handles: readonly CoroutineHandle[], options: JoinOptions = {}) {
    this.handles = Object.freeze([...handles]);
    this.returnExceptions = options.returnExceptions ?? false;
  }

  get size(): number {
    return this.handles.length;
  }

  /** True once every member task has an outcome. */
  get quiescent(): boolean {
    return this.tasks.length === this.handles.length && this.tasks.every((t) => t.outcome !== null);
  }

  /**
   * Values in submission order, or the failure of the lowest-index failed
   * member. With `returnExceptions` a failed member's slot holds its
   * exception instead. Only meaningful once quiescent.
   */
  settle(): Outcome {
    const values: Value[] = [];
    for (const task of this.tasks) {
      const outcome = task.outcome;
      if (outcome === null) {
        throw new Error(`Join group settled while task ${task.index} is ${task.state}.`);
      }
      if (outcome.ok) {
        values.push(outcome.value);
      } else if (this.returnExceptions) {
        values.push({ tag: "exception", record: outcome.record });
      } else {
        return outcome;
      }
    }
    return { ok: true, value: { tag: "list", items: values } };
  }
}
