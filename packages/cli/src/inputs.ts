/**
 * `--input name=<json>` parsing for tasklet run.
 */
import { z } from "zod";
import { NONE, bool, float, int, list, str } from "@tasklet/core";
import type { Value } from "@tasklet/core";

type JsonInput = null | boolean | number | string | JsonInput[];

const jsonInputSchema: z.ZodType<JsonInput> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(jsonInputSchema)])
);

function toValue(data: JsonInput): Value {
  if (data === null) return NONE;
  if (typeof data === "boolean") return bool(data);
  if (typeof data === "number") return Number.isInteger(data) ? int(data) : float(data);
  if (typeof data === "string") return str(data);
  return list(data.map(toValue));
}

export type ParsedInputs = { inputs: Record<string, Value> } | { error: string };

/** Parse repeated `name=<json>` options. Values are JSON null, booleans, numbers, strings or arrays. */
export function parseInputs(specs: readonly string[]): ParsedInputs {
  const inputs = new Map<string, Value>();
  for (const spec of specs) {
    const eq = spec.indexOf("=");
    const name = eq > 0 ? spec.slice(0, eq) : "";
    if (name === "") {
      return { error: `--input expects name=<json>, got '${spec}'.` };
    }
    if (inputs.has(name)) {
      return { error: `--input '${name}' given more than once.` };
    }
    let data: unknown;
    try {
      data = JSON.parse(spec.slice(eq + 1));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      return { error: `--input '${name}' is not valid JSON: ${msg}` };
    }
    const parsed = jsonInputSchema.safeParse(data);
    if (!parsed.success) {
      return { error: `--input '${name}' must be null, a boolean, number, string or array of those.` };
    }
    inputs.set(name, toValue(parsed.data));
  }
  return { inputs: Object.fromEntries(inputs) };
}
