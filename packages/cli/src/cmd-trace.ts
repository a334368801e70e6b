/**
 * tasklet trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceEventSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

type TraceLine = z.infer<typeof traceEventSchema>;

interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  outcome: "ok" | "err" | "incomplete";
  steps: number | null;
  tasksSpawned: number;
  joins: number;
  suspensions: number;
  failedTasks: number;
  budgetExceeded: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function summarizeTrace(events: TraceLine[], skippedLines = 0): TraceSummary | null {
  const first = events[0];
  if (first === undefined) return null;

  const summary: TraceSummary = {
    runId: first.runId,
    totalEvents: events.length,
    skippedLines,
    outcome: "incomplete",
    steps: null,
    tasksSpawned: 0,
    joins: 0,
    suspensions: 0,
    failedTasks: 0,
    budgetExceeded: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        summary.outcome = ev.data?.["outcome"] === "ok" ? "ok" : "err";
        const steps = ev.data?.["steps"];
        if (typeof steps === "number") summary.steps = steps;
        break;
      }
      case "task_spawn":
        summary.tasksSpawned++;
        break;
      case "join_start":
        summary.joins++;
        break;
      case "task_suspend":
        summary.suspensions++;
        break;
      case "task_end":
        if (ev.data?.["outcome"] === "err") summary.failedTasks++;
        break;
      case "budget_exceeded":
        summary.budgetExceeded++;
        summary.outcome = "err";
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  for (const line of lines) {
    const ev = parseLine(line);
    if (ev !== null) events.push(ev);
  }

  const summary = summarizeTrace(events, lines.length - events.length);
  if (summary === null) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:          ${summary.runId}`);
  console.log(`  Outcome:         ${summary.outcome}`);
  console.log(`  Total events:    ${summary.totalEvents}`);
  if (summary.steps !== null) {
    console.log(`  Steps:           ${summary.steps}`);
  }
  console.log(`  Tasks spawned:   ${summary.tasksSpawned}`);
  console.log(`  Joins:           ${summary.joins}`);
  console.log(`  Suspensions:     ${summary.suspensions}`);
  console.log(`  Failed tasks:    ${summary.failedTasks}`);
  console.log(`  Budget exceeded: ${summary.budgetExceeded}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:   ${summary.skippedLines}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:        ${summary.durationMs}ms`);
  }
  return 0;
}
