/**
 * Tests for the host boundary: exit codes and traceback output.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import type { BuiltinFn } from "./builtin.js";
import { InvalidInputError, runUnit } from "./host.js";
import { CollectStringPrint } from "./print.js";
import type { TraceEvent } from "./scheduler.js";
import type { Expr, Site, Unit } from "./unit.js";
import { NONE, display, int } from "./values.js";

const at = (line: number, col: number, endCol: number): Site => ({ line, col, endCol });
const call = (callee: string, args: Expr[], site: Site): Expr => ({
  kind: "Call",
  callee: { kind: "Name", name: callee },
  args,
  at: site,
});

/** run(main): drives a coroutine on the unit's scheduler. */
const runFn: BuiltinFn = {
  name: "run",
  signature: { name: "run", params: [{ name: "main", requires: "awaitable" }] },
  execute([main], ctx) {
    return main?.tag === "coroutine" ? ctx.scheduler.run(main.handle) : NONE;
  },
};

/** consume(items): needs an iterable. */
const consumeFn: BuiltinFn = {
  name: "consume",
  signature: { name: "consume", params: [{ name: "items", requires: "iterable" }] },
  execute() {
    return NONE;
  },
};

/** show(value): prints through the unit's writer. */
const showFn: BuiltinFn = {
  name: "show",
  signature: { name: "show", params: [{ name: "value" }] },
  execute([value], ctx) {
    ctx.print.write(display(value ?? NONE));
    ctx.print.push("\n");
    return NONE;
  },
};

const builtins = new Map([
  ["run", runFn],
  ["consume", consumeFn],
  ["show", showFn],
]);

/** `inner` returns consume(<arg>); `argText` is how the argument reads in the source. */
function nestedUnit(arg: Expr = { kind: "Const", value: 5 }, argText = "5"): Unit {
  const source = [
    "async def main():",
    "    await inner()",
    "async def inner():",
    `    return consume(${argText})`,
    "run(main())",
  ].join("\n");
  return {
    file: "t.py",
    source,
    functions: [
      {
        name: "main",
        async: true,
        params: [],
        body: [{ kind: "Await", value: call("inner", [], at(2, 10, 17)), at: at(2, 4, 17) }],
      },
      {
        name: "inner",
        async: true,
        params: [],
        body: [{ kind: "Return", value: call("consume", [arg], at(4, 11, 21)) }],
      },
    ],
    module: [{ kind: "Expr", value: call("run", [call("main", [], at(5, 4, 10))], at(5, 0, 11)) }],
  };
}

describe("runUnit", () => {
  it("exits 0 with the module's value", () => {
    const print = new CollectStringPrint();
    const unit: Unit = {
      file: "t.py",
      source: "show(7)\n1",
      functions: [],
      module: [
        { kind: "Expr", value: call("show", [{ kind: "Const", value: 7 }], at(1, 0, 7)) },
        { kind: "Expr", value: { kind: "Const", value: 1 } },
      ],
    };
    const result = runUnit(unit, { builtins, print, stderr: () => assert.fail("nothing on stderr") });
    assert.deepEqual(result, { exitCode: 0, value: int(1) });
    assert.equal(print.output, "7\n");
  });

  it("writes the traceback of an uncaught exception and exits 1", () => {
    let stderr = "";
    const result = runUnit(nestedUnit(), { builtins, stderr: (text) => (stderr += text) });
    const expected = [
      "Traceback (most recent call last):",
      '  File "t.py", line 5, in <module>',
      "    run(main())",
      '  File "t.py", line 2, in main',
      "    await inner()",
      '  File "t.py", line 4, in inner',
      "    return consume(5)",
      "           ~~~~~~~~~~",
      "TypeError: 'int' object is not iterable",
    ].join("\n");
    assert.equal(result.exitCode, 1);
    assert.equal(stderr, expected + "\n");
    if (result.exitCode === 1) assert.equal(result.traceback, expected);
  });

  it("reports an unbound bare name at its enclosing call", () => {
    let stderr = "";
    const unit: Unit = {
      file: "t.py",
      source: "show(x)\nx = 1",
      functions: [],
      module: [
        { kind: "Expr", value: call("show", [{ kind: "Name", name: "x" }], at(1, 0, 7)) },
        { kind: "Assign", name: "x", value: { kind: "Const", value: 1 } },
      ],
    };
    const result = runUnit(unit, { builtins, stderr: (text) => (stderr += text) });
    assert.equal(result.exitCode, 1);
    assert.equal(
      stderr,
      [
        "Traceback (most recent call last):",
        '  File "t.py", line 1, in <module>',
        "    show(x)",
        "    ~~~~~~~",
        "NameError: name 'x' is not defined",
        "",
      ].join("\n")
    );
  });

  it("reports an unbound bare name inside a coroutine at its own frame", () => {
    let stderr = "";
    runUnit(nestedUnit({ kind: "Name", name: "y" }, "y"), { builtins, stderr: (text) => (stderr += text) });
    assert.equal(
      stderr,
      [
        "Traceback (most recent call last):",
        '  File "t.py", line 5, in <module>',
        "    run(main())",
        '  File "t.py", line 2, in main',
        "    await inner()",
        '  File "t.py", line 4, in inner',
        "    return consume(y)",
        "           ~~~~~~~~~~",
        "NameError: name 'y' is not defined",
        "",
      ].join("\n")
    );
  });

  it("falls back to the statement site for a bare name", () => {
    let stderr = "";
    const unit: Unit = {
      file: "t.py",
      source: "y = x",
      functions: [],
      module: [{ kind: "Assign", name: "y", value: { kind: "Name", name: "x" }, at: at(1, 0, 5) }],
    };
    runUnit(unit, { builtins, stderr: (text) => (stderr += text) });
    assert.equal(
      stderr,
      [
        "Traceback (most recent call last):",
        '  File "t.py", line 1, in <module>',
        "    y = x",
        "    ~~~~~",
        "NameError: name 'x' is not defined",
        "",
      ].join("\n")
    );
  });

  it("forwards trace events with the given run id", () => {
    const events: TraceEvent[] = [];
    runUnit(nestedUnit(), { builtins, stderr: () => undefined, runId: "test-run", trace: (e) => events.push(e) });
    assert.equal(events[0]?.event, "run_start");
    assert.deepEqual(events.at(-1)?.data, { outcome: "err", steps: 3 });
    assert.ok(events.every((e) => e.runId === "test-run"));
  });

  it("applies the step limit", () => {
    let stderr = "";
    runUnit(nestedUnit(), { builtins, stderr: (text) => (stderr += text), limits: { maxSteps: 1 } });
    assert.equal(stderr.trimEnd().split("\n").at(-1), "ResourceError: step limit of 1 exceeded");
  });
});

describe("runUnit inputs", () => {
  const unit: Unit = {
    file: "t.py",
    source: "show(limit)",
    inputs: ["limit"],
    functions: [],
    module: [{ kind: "Expr", value: call("show", [{ kind: "Name", name: "limit" }], at(1, 0, 11)) }],
  };

  it("binds declared inputs as globals", () => {
    const print = new CollectStringPrint();
    const result = runUnit(unit, { builtins, print, inputs: { limit: int(3) } });
    assert.deepEqual(result, { exitCode: 0, value: NONE });
    assert.equal(print.output, "3\n");
  });

  it("rejects missing inputs before running anything", () => {
    const print = new CollectStringPrint();
    assert.throws(
      () => runUnit(unit, { builtins, print }),
      (err: unknown) =>
        err instanceof InvalidInputError &&
        err.message === "Invalid inputs: missing 'limit'." &&
        err.missing.length === 1
    );
    assert.equal(print.output, "");
  });

  it("rejects inputs the unit does not declare", () => {
    assert.throws(
      () => runUnit(unit, { builtins, inputs: { other: int(1) } }),
      (err: unknown) =>
        err instanceof InvalidInputError && err.message === "Invalid inputs: missing 'limit'; unexpected 'other'."
    );
  });
});
