/**
 * tasklet check - static validation of a unit file
 */
import * as fs from "node:fs";
import { validate, formatDiagnostics, formatDiagnostic } from "@tasklet/core";
import { getBuiltins } from "@tasklet/std";
import { loadUnit } from "./unit-loader.js";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  const pretty = !!opts.pretty;
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return 4;
  }

  const loaded = loadUnit(text, file);
  if (loaded.unit === null) {
    console.error(formatDiagnostics(loaded.diagnostics, pretty));
    return 2;
  }

  const diags = validate(loaded.unit, { builtins: new Set(getBuiltins().keys()) });
  if (diags.length > 0) {
    console.error(formatDiagnostics(diags, pretty, loaded.unit.source));
    return 2;
  }

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
