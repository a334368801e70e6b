/**
 * Unit file loading: JSON text to a checked Unit.
 */
import { z } from "zod";
import { makeDiag } from "@tasklet/core";
import type { Diagnostic, Expr, Stmt, Unit } from "@tasklet/core";

const siteSchema = z.object({
  line: z.number().int().min(1),
  col: z.number().int().min(0),
  endCol: z.number().int().min(0),
});

const exprSchema: z.ZodType<Expr> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("Const"),
      value: z.union([z.null(), z.boolean(), z.number(), z.string()]),
      float: z.boolean().optional(),
    }),
    z.object({ kind: z.literal("Name"), name: z.string().min(1), at: siteSchema.optional() }),
    z.object({ kind: z.literal("List"), elements: z.array(exprSchema) }),
    z.object({ kind: z.literal("Tuple"), elements: z.array(exprSchema) }),
    z.object({
      kind: z.literal("Binary"),
      op: z.enum(["+", "-", "*", "==", "!=", "<"]),
      left: exprSchema,
      right: exprSchema,
      at: siteSchema,
    }),
    z.object({
      kind: z.literal("Call"),
      callee: exprSchema,
      args: z.array(exprSchema),
      keywords: z.array(z.object({ name: z.string().min(1), value: exprSchema })).optional(),
      at: siteSchema,
    }),
  ])
);

const stmtSchema: z.ZodType<Stmt> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("Assign"), name: z.string().min(1), value: exprSchema, at: siteSchema.optional() }),
  z.object({ kind: z.literal("Expr"), value: exprSchema, at: siteSchema.optional() }),
  z.object({ kind: z.literal("Await"), target: z.string().min(1).optional(), value: exprSchema, at: siteSchema }),
  z.object({ kind: z.literal("Return"), value: exprSchema.optional(), at: siteSchema.optional() }),
  z.object({ kind: z.literal("Assert"), test: exprSchema, msg: exprSchema.optional(), at: siteSchema }),
]);

const unitSchema = z.object({
  file: z.string().min(1).optional(),
  source: z.string({ required_error: "A unit needs its 'source' text" }),
  inputs: z.array(z.string().min(1)).optional(),
  functions: z
    .array(
      z.object({
        name: z.string().min(1),
        async: z.boolean(),
        params: z.array(z.string().min(1)),
        body: z.array(stmtSchema),
      })
    )
    .default([]),
  module: z.array(stmtSchema),
});

export type LoadResult = { unit: Unit; diagnostics: [] } | { unit: null; diagnostics: Diagnostic[] };

/**
 * Parse and check unit JSON. `file` names the unit when the JSON does not.
 */
export function loadUnit(text: string, file: string): LoadResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { unit: null, diagnostics: [makeDiag("E_UNIT_JSON", `Unit file is not valid JSON: ${msg}`)] };
  }

  const parsed = unitSchema.safeParse(data);
  if (!parsed.success) {
    return {
      unit: null,
      diagnostics: parsed.error.issues.map((issue) =>
        makeDiag(
          "E_UNIT",
          `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`,
          undefined,
          "Units are produced by the compiler; regenerate the file."
        )
      ),
    };
  }

  const { file: declared, ...rest } = parsed.data;
  return { unit: { file: declared ?? file, ...rest }, diagnostics: [] };
}
