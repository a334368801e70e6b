/**
 * Tests for Tasklet diagnostics.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { makeDiag, formatDiagnostic, formatDiagnostics, spanAt } from "./diagnostics.js";

describe("Tasklet Diagnostics", () => {
  it("creates a diagnostic with all fields", () => {
    const d = makeDiag("E_TEST", "Something went wrong", spanAt("t.py", { line: 1, col: 5, endCol: 10 }), "Try fixing it");
    assert.deepEqual(d, {
      code: "E_TEST",
      message: "Something went wrong",
      span: { file: "t.py", line: 1, col: 5, endCol: 10 },
      hint: "Try fixing it",
    });
  });

  it("omits span and hint when not given", () => {
    const d = makeDiag("E_TEST", "Error message");
    assert.deepEqual(Object.keys(d), ["code", "message"]);
  });

  it("formats a diagnostic as JSON", () => {
    const out = formatDiagnostic(makeDiag("E_SITE", "Bad site"), false);
    assert.equal(out, '{"code":"E_SITE","message":"Bad site"}');
  });

  it("formats pretty output with a 1-based column and hint", () => {
    const d = makeDiag("E_AWAIT_OUTSIDE", "'await' outside function.", spanAt("t.py", { line: 3, col: 6, endCol: 11 }), "Only async functions may await.");
    assert.equal(
      formatDiagnostic(d, true),
      [
        "error[E_AWAIT_OUTSIDE]: 'await' outside function.",
        "  --> t.py:3:7",
        "  hint: Only async functions may await.",
      ].join("\n")
    );
  });

  it("shows the source line when the source is given", () => {
    const d = makeDiag("E_UNBOUND", "Unbound name 'nope'.", spanAt("t.py", { line: 2, col: 4, endCol: 8 }));
    assert.equal(
      formatDiagnostic(d, true, "x = 1\ny = nope"),
      [
        "error[E_UNBOUND]: Unbound name 'nope'.",
        "  --> t.py:2:5",
        "  |",
        "2 | y = nope",
        "  |     ^^^^",
      ].join("\n")
    );
  });

  it("formats multiple diagnostics as a JSON array", () => {
    const out = formatDiagnostics([makeDiag("E_1", "First"), makeDiag("E_2", "Second")], false);
    assert.deepEqual(JSON.parse(out), [
      { code: "E_1", message: "First" },
      { code: "E_2", message: "Second" },
    ]);
  });

  it("separates pretty diagnostics with a blank line", () => {
    const out = formatDiagnostics([makeDiag("E_1", "First"), makeDiag("E_2", "Second")], true);
    assert.equal(out, "error[E_1]: First\n\nerror[E_2]: Second");
  });
});
