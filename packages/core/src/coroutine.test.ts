/**
 * Tests for coroutine handles.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { CoroutineHandle, START, defineBody, done, suspendOn } from "./coroutine.js";
import { ScriptException, makeRecord, raise } from "./exceptions.js";
import { int } from "./values.js";

describe("CoroutineHandle", () => {
  it("starts in the created state", () => {
    const h = new CoroutineHandle(defineBody("c", () => done(int(1))));
    assert.equal(h.status, "created");
    assert.equal(h.name, "c");
    assert.equal(h.outcome, null);
  });

  it("completes with the returned value", () => {
    const h = new CoroutineHandle(defineBody("c", () => done(int(1))));
    assert.deepEqual(h.resume(START), { kind: "return", value: int(1) });
    assert.equal(h.status, "completed");
    assert.deepEqual(h.outcome, { ok: true, value: int(1) });
  });

  it("records the awaited target while suspended", () => {
    const child = new CoroutineHandle(defineBody("child", () => done(int(2))));
    const parent = new CoroutineHandle(
      defineBody("parent", (_frame, input) => (input.kind === "value" ? done(input.value) : suspendOn(child)))
    );
    parent.resume(START);
    assert.equal(parent.status, "suspended");
    assert.equal(parent.pending, child);
    parent.resume({ kind: "value", value: int(2) });
    assert.equal(parent.status, "completed");
    assert.equal(parent.pending, null);
  });

  it("turns a thrown script exception into a raise step", () => {
    const h = new CoroutineHandle(
      defineBody("c", () => raise({ tag: "Raised", excType: "ValueError", message: "bad" }))
    );
    const step = h.resume(START);
    assert.equal(step.kind, "raise");
    assert.equal(h.status, "failed");
  });

  it("passes a thrown input through as the failure", () => {
    const record = makeRecord({ tag: "Raised", excType: "ValueError", message: "inner" });
    const h = new CoroutineHandle(
      defineBody("c", (_frame, input) => {
        if (input.kind === "throw") return { kind: "raise", record: input.record };
        return suspendOn(new CoroutineHandle(defineBody("x", () => done(int(0)))));
      })
    );
    h.resume(START);
    h.resume({ kind: "throw", record });
    assert.deepEqual(h.outcome, { ok: false, record });
  });

  it("cannot be resumed after it finished", () => {
    const h = new CoroutineHandle(defineBody("c", () => done(int(1))));
    h.resume(START);
    assert.throws(
      () => h.resume(START),
      (err: unknown) => err instanceof ScriptException && err.record.failure.tag === "CoroutineReuse"
    );
  });

  it("rejects a value input before it started", () => {
    const h = new CoroutineHandle(defineBody("c", () => done(int(1))));
    assert.throws(() => h.resume({ kind: "value", value: int(1) }), /cannot take 'value' input while created/);
  });

  it("lets only one slot claim it", () => {
    const h = new CoroutineHandle(defineBody("c", () => done(int(1))));
    assert.equal(h.claim(1), null);
    assert.deepEqual(h.claim(2), { tag: "CoroutineBusy" });
    h.release();
    h.resume(START);
    assert.deepEqual(h.claim(3), { tag: "CoroutineReuse" });
  });
});
