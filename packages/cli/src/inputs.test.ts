/**
 * Tests for --input parsing.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { repr } from "@tasklet/core";
import { parseInputs } from "./inputs.js";

describe("parseInputs", () => {
  it("converts JSON values to runtime values", () => {
    const parsed = parseInputs(["n=3", "ratio=0.5", "name=\"ada\"", "items=[1, null, true]"]);
    assert.ok("inputs" in parsed);
    if (!("inputs" in parsed)) return;
    assert.deepEqual(
      Object.entries(parsed.inputs).map(([k, v]) => [k, repr(v)]),
      [
        ["n", "3"],
        ["ratio", "0.5"],
        ["name", "'ada'"],
        ["items", "[1, None, True]"],
      ]
    );
  });

  it("reports the first bad option", () => {
    assert.deepEqual(parseInputs(["n=1", "n=2"]), { error: "--input 'n' given more than once." });
    assert.deepEqual(parseInputs(["n"]), { error: "--input expects name=<json>, got 'n'." });
    assert.deepEqual(parseInputs(["o={}"]), {
      error: "--input 'o' must be null, a boolean, number, string or array of those.",
    });
  });
});
