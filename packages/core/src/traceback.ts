/**
 * Traceback rendering for uncaught exceptions.
 *
 *   Traceback (most recent call last):
 *     File "main.py", line 2, in <module>
 *       map(abs, 42)
 *       ~~~~~~~~~~~~
 *   TypeError: 'int' object is not iterable
 */
import type { CallFrame, ExceptionRecord } from "./exceptions.js";
import { describeFailure } from "./failures.js";

export const TRACEBACK_HEADER = "Traceback (most recent call last):";

const INDENT = "    ";

function underline(frame: CallFrame): string | null {
  const { text, startCol, endCol } = frame.site;
  const leading = text.length - text.trimStart().length;
  const shown = text.trim().length;
  const start = Math.max(startCol - leading, 0);
  const end = Math.min(endCol - leading, shown);
  if (end <= start) return null;
  return INDENT + " ".repeat(start) + "~".repeat(end - start);
}

function renderFrame(frame: CallFrame, innermost: boolean): string[] {
  const { file, line, name, text } = frame.site;
  const lines = [`  File "${file}", line ${line}, in ${name}`, INDENT + text.trim()];
  if (innermost) {
    const marks = underline(frame);
    if (marks !== null) lines.push(marks);
  }
  return lines;
}

/** Render `record` as traceback text, lines joined by "\n", no trailing newline. */
export function formatTraceback(record: ExceptionRecord): string {
  const lines: string[] = [];
  if (record.frames.length > 0) {
    lines.push(TRACEBACK_HEADER);
    record.frames.forEach((frame, i) => {
      lines.push(...renderFrame(frame, i === record.frames.length - 1));
    });
  }
  lines.push(describeFailure(record.failure));
  return lines.join("\n");
}
