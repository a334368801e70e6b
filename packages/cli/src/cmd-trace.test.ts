/**
 * Tests for tasklet trace command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runTrace, summarizeTrace } from "./cmd-trace.js";

async function captureTrace(
  file: string,
  opts: { json?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runTrace(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

const GATHER_TRACE: Parameters<typeof summarizeTrace>[0] = [
  { ts: "2026-01-01T00:00:00.000Z", runId: "r1", event: "run_start", data: { coroutine: "main" } },
  { ts: "2026-01-01T00:00:00.001Z", runId: "r1", event: "join_start", data: { task: 1, size: 2 } },
  { ts: "2026-01-01T00:00:00.002Z", runId: "r1", event: "task_spawn", data: { task: 2, index: 0, coroutine: "a" } },
  { ts: "2026-01-01T00:00:00.003Z", runId: "r1", event: "task_spawn", data: { task: 3, index: 1, coroutine: "b" } },
  { ts: "2026-01-01T00:00:00.004Z", runId: "r1", event: "task_suspend", data: { task: 2, awaiting: "noop" } },
  { ts: "2026-01-01T00:00:00.005Z", runId: "r1", event: "task_end", data: { task: 3, index: 1, outcome: "err" } },
  { ts: "2026-01-01T00:00:00.006Z", runId: "r1", event: "task_end", data: { task: 2, index: 0, outcome: "ok" } },
  { ts: "2026-01-01T00:00:00.007Z", runId: "r1", event: "join_end", data: { task: 1, outcome: "err" } },
  { ts: "2026-01-01T00:00:00.008Z", runId: "r1", event: "task_end", data: { task: 1, index: 0, outcome: "err" } },
  { ts: "2026-01-01T00:00:00.010Z", runId: "r1", event: "run_end", data: { outcome: "err", steps: 6 } },
];

function writeTrace(lines: string[]): { dir: string; file: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tasklet-cli-trace-test-"));
  const file = path.join(dir, "trace.jsonl");
  fs.writeFileSync(file, lines.join("\n") + "\n", "utf-8");
  return { dir, file };
}

describe("tasklet trace summary", () => {
  it("summarizes a failed gather", () => {
    assert.deepEqual(summarizeTrace(GATHER_TRACE), {
      runId: "r1",
      totalEvents: 10,
      skippedLines: 0,
      outcome: "err",
      steps: 6,
      tasksSpawned: 2,
      joins: 1,
      suspensions: 1,
      failedTasks: 2,
      budgetExceeded: 0,
      startTime: "2026-01-01T00:00:00.000Z",
      endTime: "2026-01-01T00:00:00.010Z",
      durationMs: 10,
    });
  });

  it("marks a trace without run_end as incomplete", () => {
    const summary = summarizeTrace(GATHER_TRACE.slice(0, 3));
    assert.equal(summary?.outcome, "incomplete");
    assert.equal(summary?.durationMs, undefined);
  });

  it("returns null for no events", () => {
    assert.equal(summarizeTrace([]), null);
  });

  it("prints JSON and counts lines it could not read", async () => {
    const { dir, file } = writeTrace([...GATHER_TRACE.map((e) => JSON.stringify(e)), "not json", '{"event":1}']);
    try {
      const result = await captureTrace(file, { json: true });
      assert.equal(result.code, 0);
      const summary = JSON.parse(result.stdout) as { totalEvents: number; skippedLines: number };
      assert.equal(summary.totalEvents, 10);
      assert.equal(summary.skippedLines, 2);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("prints a human-readable summary", async () => {
    const { dir, file } = writeTrace(GATHER_TRACE.map((e) => JSON.stringify(e)));
    try {
      const result = await captureTrace(file, {});
      assert.equal(result.code, 0);
      const lines = result.stdout.split("\n");
      assert.equal(lines[0], "Trace Summary");
      assert.ok(lines.includes("  Outcome:         err"));
      assert.ok(lines.includes("  Steps:           6"));
      assert.ok(lines.includes("  Duration:        10ms"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("exits 4 when no line is a trace event", async () => {
    const { dir, file } = writeTrace(["garbage"]);
    try {
      const result = await captureTrace(file, {});
      assert.equal(result.code, 4);
      assert.equal(result.stderr, "No valid trace events found.");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
