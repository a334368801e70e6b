/**
 * Tasklet Unit Validator
 * Checks a compiled unit for structural mistakes before it runs.
 */
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag, spanAt } from "./diagnostics.js";
import type { Expr, FunctionDecl, Site, Stmt, Unit } from "./unit.js";

export interface ValidateOptions {
  /** Names resolvable as builtins. Unknown names are only reported when given. */
  builtins?: ReadonlySet<string>;
}

interface Context {
  unit: Unit;
  lines: string[];
  diags: Diagnostic[];
  builtins?: ReadonlySet<string>;
  globals: Set<string>;
}

function checkSite(ctx: Context, site: Site): void {
  const text = ctx.lines[site.line - 1];
  if (!Number.isInteger(site.line) || text === undefined) {
    ctx.diags.push(
      makeDiag(
        "E_SITE",
        `Site line ${site.line} is outside the source (${ctx.lines.length} lines).`,
        spanAt(ctx.unit.file, site)
      )
    );
    return;
  }
  if (site.col < 0 || site.endCol < site.col || site.col > text.length) {
    ctx.diags.push(
      makeDiag(
        "E_SITE",
        `Site columns ${site.col}..${site.endCol} do not fit line ${site.line}.`,
        spanAt(ctx.unit.file, site)
      )
    );
  }
}

/** `enclosing` is the nearest site a failure in `expr` would be reported at. */
function walkExpr(ctx: Context, expr: Expr, bound: Set<string>, enclosing: Site | undefined): void {
  switch (expr.kind) {
    case "Const":
      return;
    case "Name":
      if (expr.at) checkSite(ctx, expr.at);
      if (!expr.at && !enclosing) {
        ctx.diags.push(
          makeDiag(
            "E_NO_SITE",
            `Name '${expr.name}' has no source site.`,
            undefined,
            "Give the name, or the statement that holds it, an 'at' site."
          )
        );
      }
      if (
        ctx.builtins &&
        !bound.has(expr.name) &&
        !ctx.globals.has(expr.name) &&
        !ctx.builtins.has(expr.name)
      ) {
        ctx.diags.push(
          makeDiag(
            "E_UNBOUND",
            `Unbound name '${expr.name}'.`,
            expr.at ? spanAt(ctx.unit.file, expr.at) : undefined
          )
        );
      }
      return;
    case "List":
    case "Tuple":
      for (const e of expr.elements) walkExpr(ctx, e, bound, enclosing);
      return;
    case "Binary":
      checkSite(ctx, expr.at);
      walkExpr(ctx, expr.left, bound, expr.at);
      walkExpr(ctx, expr.right, bound, expr.at);
      return;
    case "Call": {
      checkSite(ctx, expr.at);
      walkExpr(ctx, expr.callee, bound, expr.at);
      for (const a of expr.args) walkExpr(ctx, a, bound, expr.at);
      const names = new Set<string>();
      for (const k of expr.keywords ?? []) {
        if (names.has(k.name)) {
          ctx.diags.push(
            makeDiag("E_DUP_KEYWORD", `Keyword argument '${k.name}' repeated.`, spanAt(ctx.unit.file, expr.at))
          );
        }
        names.add(k.name);
        walkExpr(ctx, k.value, bound, expr.at);
      }
      return;
    }
  }
}

/** Names a statement list binds anywhere in its scope. */
function assignedNames(stmts: Stmt[]): Set<string> {
  const names = new Set<string>();
  for (const s of stmts) {
    if (s.kind === "Assign") names.add(s.name);
    if (s.kind === "Await" && s.target !== undefined) names.add(s.target);
  }
  return names;
}

function walkBody(ctx: Context, stmts: Stmt[], owner: FunctionDecl | null, bound: Set<string>): void {
  for (const s of stmts) {
    switch (s.kind) {
      case "Assign":
      case "Expr":
        if (s.at) checkSite(ctx, s.at);
        walkExpr(ctx, s.value, bound, s.at);
        break;
      case "Return":
        if (owner === null) {
          ctx.diags.push(
            makeDiag(
              "E_RETURN_OUTSIDE",
              "'return' outside function.",
              undefined,
              "Move the return into a function body."
            )
          );
        }
        if (s.at) checkSite(ctx, s.at);
        if (s.value) walkExpr(ctx, s.value, bound, s.at);
        break;
      case "Assert":
        checkSite(ctx, s.at);
        walkExpr(ctx, s.test, bound, s.at);
        if (s.msg) walkExpr(ctx, s.msg, bound, s.at);
        break;
      case "Await":
        checkSite(ctx, s.at);
        if (owner === null || !owner.async) {
          ctx.diags.push(
            makeDiag(
              "E_AWAIT_OUTSIDE",
              owner === null
                ? "'await' outside function."
                : `'await' inside non-async function '${owner.name}'.`,
              spanAt(ctx.unit.file, s.at),
              "Only async functions may await."
            )
          );
        }
        walkExpr(ctx, s.value, bound, s.at);
        break;
    }
  }
}

export function validate(unit: Unit, options: ValidateOptions = {}): Diagnostic[] {
  const ctx: Context = {
    unit,
    lines: unit.source.split(/\r?\n/),
    diags: [],
    builtins: options.builtins,
    globals: assignedNames(unit.module),
  };

  const inputs = new Set<string>();
  for (const name of unit.inputs ?? []) {
    if (inputs.has(name)) {
      ctx.diags.push(makeDiag("E_DUP_INPUT", `Duplicate input '${name}'.`));
    }
    inputs.add(name);
    ctx.globals.add(name);
  }

  const seen = new Set<string>();
  for (const fn of unit.functions) {
    if (seen.has(fn.name)) {
      ctx.diags.push(
        makeDiag(
          "E_DUP_FN",
          `Duplicate function '${fn.name}'.`,
          undefined,
          "Give each function a unique name."
        )
      );
    }
    seen.add(fn.name);
    ctx.globals.add(fn.name);
  }

  for (const fn of unit.functions) {
    const params = new Set<string>();
    for (const p of fn.params) {
      if (params.has(p)) {
        ctx.diags.push(
          makeDiag("E_DUP_PARAM", `Duplicate parameter '${p}' in function '${fn.name}'.`)
        );
      }
      params.add(p);
    }
    const bound = new Set([...params, ...assignedNames(fn.body)]);
    walkBody(ctx, fn.body, fn, bound);
  }

  walkBody(ctx, unit.module, null, new Set());
  return ctx.diags;
}
