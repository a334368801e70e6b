/**
 * Diagnostics reported by unit checks and by the CLI around a run.
 * Script exceptions are not diagnostics; they render as tracebacks.
 */
import type { Site, Span } from "./unit.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  const d: Diagnostic = { code, message };
  if (span) d.span = span;
  if (hint) d.hint = hint;
  return d;
}

export function spanAt(file: string, site: Site): Span {
  return { file, line: site.line, col: site.col, endCol: site.endCol };
}

function snippet(span: Span, source: string): string[] {
  const text = source.split(/\r?\n/)[span.line - 1];
  if (text === undefined) return [];
  const gutter = String(span.line);
  const pad = " ".repeat(gutter.length);
  const width = Math.max(Math.min(span.endCol, text.length) - span.col, 1);
  return [
    `${pad} |`,
    `${gutter} | ${text}`,
    `${pad} | ${" ".repeat(span.col)}${"^".repeat(width)}`,
  ];
}

/**
 * JSON by default. Pretty output adds the location and, when the unit's
 * source is given, the offending line.
 */
export function formatDiagnostic(d: Diagnostic, pretty: boolean, source?: string): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const lines = [`error[${d.code}]: ${d.message}`];
  if (d.span) {
    lines.push(`  --> ${d.span.file}:${d.span.line}:${d.span.col + 1}`);
    if (source !== undefined) lines.push(...snippet(d.span, source));
  }
  if (d.hint) lines.push(`  hint: ${d.hint}`);
  return lines.join("\n");
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean, source?: string): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true, source)).join("\n\n");
}
