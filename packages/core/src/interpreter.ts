/**
 * Tasklet Interpreter - executes compiled units.
 *
 * Module code and plain functions run straight through. An async function
 * call produces a coroutine handle whose body walks the function's statements
 * with the program counter and locals kept in the handle's saved frame.
 *
 * Expressions are evaluated against the nearest enclosing site, so a failure
 * in a sub-expression without a site of its own is reported at the call or
 * statement that contains it.
 */
import type { BuiltinFn, CallContext } from "./builtin.js";
import { invokeBuiltin } from "./builtin.js";
import type { Awaitable, CoroutineBody, ResumeInput, SavedFrame, Step } from "./coroutine.js";
import { CoroutineHandle, done, fail, suspendOn } from "./coroutine.js";
import type { CallFrame, SourceSite } from "./exceptions.js";
import { ScriptException, makeCallFrame, makeRecord, raise, withOuterFrame } from "./exceptions.js";
import type { Failure } from "./failures.js";
import type { PrintWriter } from "./print.js";
import type { Scheduler } from "./scheduler.js";
import type { KeywordArgs } from "./signature.js";
import type { BinaryOp, Expr, FunctionDecl, Keyword, Site, Stmt, Unit } from "./unit.js";
import { MODULE_FRAME_NAME } from "./unit.js";
import type { FunctionValue, Value } from "./values.js";
import {
  NONE,
  bool,
  display,
  float,
  int,
  isTruthy,
  kindName,
  str,
  tuple,
  valuesEqual,
} from "./values.js";

export interface ExecOptions {
  builtins: Map<string, BuiltinFn>;
  scheduler: Scheduler;
  print: PrintWriter;
  /** Bound as globals before the module runs. */
  inputs?: ReadonlyMap<string, Value>;
}

export interface Scope {
  /** Frame name shown in tracebacks. */
  name: string;
  locals: Map<string, Value>;
  mode: "module" | "sync" | "async";
}

export type StmtResult =
  | { kind: "next"; value: Value }
  | { kind: "return"; value: Value }
  | { kind: "await"; target: Awaitable };

class FunctionBody implements CoroutineBody {
  readonly name: string;

  constructor(
    private readonly interp: Interpreter,
    private readonly decl: FunctionDecl
  ) {
    this.name = decl.name;
  }

  resume(frame: SavedFrame, input: ResumeInput): Step {
    const scope: Scope = { name: this.name, locals: frame.locals, mode: "async" };
    const body = this.decl.body;

    if (input.kind !== "start") {
      const awaiting = body[frame.pc];
      if (awaiting?.kind !== "Await") {
        throw new Error(`Coroutine '${this.name}' resumed at statement ${frame.pc}, which is not an await.`);
      }
      frame.pending = null;
      if (input.kind === "throw") {
        return fail(withOuterFrame(input.record, this.interp.frameAt(scope, "await", [], awaiting.at)));
      }
      if (awaiting.target !== undefined) {
        frame.locals.set(awaiting.target, input.value);
      }
      frame.pc++;
    }

    while (frame.pc < body.length) {
      const stmt = body[frame.pc];
      if (stmt === undefined) break;
      const result = this.interp.execStmt(stmt, scope);
      if (result.kind === "return") return done(result.value);
      if (result.kind === "await") return suspendOn(result.target);
      frame.pc++;
    }
    return done(NONE);
  }
}

function numeric(v: Value): { n: number; isInt: boolean } | null {
  switch (v.tag) {
    case "int":
      return { n: v.value, isInt: true };
    case "bool":
      return { n: v.value ? 1 : 0, isInt: true };
    case "float":
      return { n: v.value, isInt: false };
    default:
      return null;
  }
}

function repeatCount(v: Value): number | null {
  return v.tag === "int" || v.tag === "bool" ? Math.max(numeric(v)?.n ?? 0, 0) : null;
}

export function applyBinary(op: BinaryOp, left: Value, right: Value): Value {
  if (op === "==") return bool(valuesEqual(left, right));
  if (op === "!=") return bool(!valuesEqual(left, right));

  const l = numeric(left);
  const r = numeric(right);
  if (l && r) {
    const wrap = (n: number): Value => (l.isInt && r.isInt ? int(n) : float(n));
    switch (op) {
      case "+": return wrap(l.n + r.n);
      case "-": return wrap(l.n - r.n);
      case "*": return wrap(l.n * r.n);
      case "<": return bool(l.n < r.n);
    }
  }

  if (op === "+") {
    if (left.tag === "str" && right.tag === "str") return str(left.value + right.value);
    if (left.tag === "list" && right.tag === "list") {
      return { tag: "list", items: [...left.items, ...right.items] };
    }
    if (left.tag === "tuple" && right.tag === "tuple") return tuple([...left.items, ...right.items]);
  }

  if (op === "*") {
    const times = repeatCount(right) ?? repeatCount(left);
    const seq = repeatCount(right) !== null ? left : right;
    if (times !== null && seq.tag === "str") return str(seq.value.repeat(times));
    if (times !== null && seq.tag === "list") {
      const items: Value[] = [];
      for (let i = 0; i < times; i++) items.push(...seq.items);
      return { tag: "list", items };
    }
  }

  if (op === "<") {
    if (left.tag === "str" && right.tag === "str") return bool(left.value < right.value);
    return raise({
      tag: "Raised",
      excType: "TypeError",
      message: `'<' not supported between instances of '${kindName(left)}' and '${kindName(right)}'`,
    });
  }

  return raise({ tag: "UnsupportedOperand", op, left: kindName(left), right: kindName(right) });
}

function quoteNames(names: string[]): string {
  const quoted = names.map((n) => `'${n}'`);
  if (quoted.length <= 1) return quoted.join("");
  if (quoted.length === 2) return `${quoted[0]} and ${quoted[1]}`;
  return `${quoted.slice(0, -1).join(", ")}, and ${quoted[quoted.length - 1]}`;
}

function userArityFailure(decl: FunctionDecl, given: number, missing = decl.params.slice(given)): Failure {
  const expected = decl.params.length;
  const base = { tag: "Arity" as const, fn: decl.name, min: expected, max: expected, given };
  if (given > expected) {
    const takes = `${expected} positional argument${expected === 1 ? "" : "s"}`;
    const were = given === 1 ? "was" : "were";
    return { ...base, message: `${decl.name}() takes ${takes} but ${given} ${were} given` };
  }
  const count = `${missing.length} required positional argument${missing.length === 1 ? "" : "s"}`;
  return { ...base, message: `${decl.name}() missing ${count}: ${quoteNames(missing)}` };
}

export class Interpreter {
  readonly unit: Unit;
  readonly ctx: CallContext;
  private readonly options: ExecOptions;
  private readonly globals = new Map<string, Value>();
  private readonly functions = new Map<string, FunctionValue>();
  private readonly lines: string[];

  constructor(unit: Unit, options: ExecOptions) {
    this.unit = unit;
    this.options = options;
    this.lines = unit.source.split(/\r?\n/);
    for (const [name, value] of options.inputs ?? []) {
      this.globals.set(name, value);
    }
    for (const decl of unit.functions) {
      this.functions.set(decl.name, { tag: "function", decl });
    }
    this.ctx = {
      scheduler: options.scheduler,
      print: options.print,
      call: (fn, args) => this.callValue(fn, args),
    };
  }

  /**
   * Execute the module statements. Returns the value of a trailing
   * expression statement, otherwise None.
   */
  runModule(): Value {
    const scope: Scope = { name: MODULE_FRAME_NAME, locals: this.globals, mode: "module" };
    let last: Value = NONE;
    for (const stmt of this.unit.module) {
      const result = this.execStmt(stmt, scope);
      if (result.kind !== "next") {
        throw new Error(`Module statement '${stmt.kind}' cannot ${result.kind}.`);
      }
      last = stmt.kind === "Expr" ? result.value : NONE;
    }
    return last;
  }

  /** A module-level binding, once `runModule` has run. */
  global(name: string): Value | undefined {
    return this.globals.get(name);
  }

  site(scope: { name: string }, at: Site): SourceSite {
    return {
      file: this.unit.file,
      line: at.line,
      name: scope.name,
      text: this.lines[at.line - 1] ?? "",
      startCol: at.col,
      endCol: at.endCol,
    };
  }

  frameAt(scope: { name: string }, operation: string, args: readonly Value[], at: Site): CallFrame {
    return makeCallFrame(operation, args, this.site(scope, at));
  }

  callValue(fn: Value, args: Value[], kwargs: KeywordArgs = new Map()): Value {
    switch (fn.tag) {
      case "builtin":
        return invokeBuiltin(fn.fn, args, this.ctx, kwargs);
      case "function":
        return this.callFunction(fn.decl, args, kwargs);
      default:
        return raise({ tag: "ArgumentShapeError", kindName: kindName(fn), capability: "callable" });
    }
  }

  private bindParams(decl: FunctionDecl, args: Value[], kwargs: KeywordArgs): Map<string, Value> {
    if (args.length > decl.params.length) {
      raise(userArityFailure(decl, args.length));
    }
    const locals = new Map<string, Value>();
    args.forEach((arg, i) => {
      const param = decl.params[i];
      if (param !== undefined) locals.set(param, arg);
    });
    for (const [name, value] of kwargs) {
      if (!decl.params.includes(name)) raise({ tag: "UnexpectedKeyword", fn: decl.name, keyword: name });
      if (locals.has(name)) raise({ tag: "DuplicateArgument", fn: decl.name, name });
      locals.set(name, value);
    }
    const missing = decl.params.filter((param) => !locals.has(param));
    if (missing.length > 0) {
      raise(userArityFailure(decl, args.length, missing));
    }
    return locals;
  }

  private callFunction(decl: FunctionDecl, args: Value[], kwargs: KeywordArgs): Value {
    const locals = this.bindParams(decl, args, kwargs);

    if (decl.async) {
      return { tag: "coroutine", handle: new CoroutineHandle(new FunctionBody(this, decl), locals) };
    }

    const scope: Scope = { name: decl.name, locals, mode: "sync" };
    for (const stmt of decl.body) {
      const result = this.execStmt(stmt, scope);
      if (result.kind === "return") return result.value;
      if (result.kind === "await") {
        throw new Error(`Function '${decl.name}' is not async but reached an await.`);
      }
    }
    return NONE;
  }

  execStmt(stmt: Stmt, scope: Scope): StmtResult {
    switch (stmt.kind) {
      case "Assign":
        scope.locals.set(stmt.name, this.evalExpr(stmt.value, scope, stmt.at));
        return { kind: "next", value: NONE };

      case "Expr":
        return { kind: "next", value: this.evalExpr(stmt.value, scope, stmt.at) };

      case "Return":
        if (scope.mode === "module") {
          return raise({ tag: "Raised", excType: "SyntaxError", message: "'return' outside function" });
        }
        return { kind: "return", value: stmt.value ? this.evalExpr(stmt.value, scope, stmt.at) : NONE };

      case "Assert": {
        const test = this.evalExpr(stmt.test, scope, stmt.at);
        if (isTruthy(test)) return { kind: "next", value: NONE };
        const message = stmt.msg ? display(this.evalExpr(stmt.msg, scope, stmt.at)) : null;
        throw new ScriptException(
          makeRecord({ tag: "Assertion", message }, [this.frameAt(scope, "assert", [test], stmt.at)])
        );
      }

      case "Await": {
        const target = this.evalExpr(stmt.value, scope, stmt.at);
        const frame = (): CallFrame => this.frameAt(scope, "await", [target], stmt.at);
        if (scope.mode !== "async") {
          throw new ScriptException(
            makeRecord(
              { tag: "Raised", excType: "SyntaxError", message: "'await' outside async function" },
              [frame()]
            )
          );
        }
        if (target.tag === "coroutine") return { kind: "await", target: target.handle };
        if (target.tag === "join_group") return { kind: "await", target: target.group };
        throw new ScriptException(makeRecord({ tag: "NotAwaitable", kindName: kindName(target) }, [frame()]));
      }
    }
  }

  private lookup(name: string, scope: Scope): Value | undefined {
    return (
      scope.locals.get(name) ??
      this.globals.get(name) ??
      this.functions.get(name) ??
      this.builtinValue(name)
    );
  }

  private builtinValue(name: string): Value | undefined {
    const fn = this.options.builtins.get(name);
    return fn ? { tag: "builtin", fn } : undefined;
  }

  private evalKeywords(keywords: readonly Keyword[], scope: Scope, at: Site): KeywordArgs {
    const kwargs = new Map<string, Value>();
    for (const keyword of keywords) {
      if (kwargs.has(keyword.name)) {
        throw new ScriptException(
          makeRecord(
            { tag: "Raised", excType: "SyntaxError", message: `keyword argument repeated: ${keyword.name}` },
            [this.frameAt(scope, "call", [], at)]
          )
        );
      }
      kwargs.set(keyword.name, this.evalExpr(keyword.value, scope, at));
    }
    return kwargs;
  }

  /** `enclosing` is the site failures fall back to when `expr` has none. */
  evalExpr(expr: Expr, scope: Scope, enclosing?: Site): Value {
    switch (expr.kind) {
      case "Const": {
        const v = expr.value;
        if (v === null) return NONE;
        if (typeof v === "boolean") return bool(v);
        if (typeof v === "string") return str(v);
        return expr.float || !Number.isInteger(v) ? float(v) : int(v);
      }

      case "Name": {
        const value = this.lookup(expr.name, scope);
        if (value !== undefined) return value;
        const site = expr.at ?? enclosing;
        const frames = site ? [this.frameAt(scope, expr.name, [], site)] : [];
        throw new ScriptException(makeRecord({ tag: "UnboundName", name: expr.name }, frames));
      }

      case "List":
        return { tag: "list", items: expr.elements.map((e) => this.evalExpr(e, scope, enclosing)) };

      case "Tuple":
        return tuple(expr.elements.map((e) => this.evalExpr(e, scope, enclosing)));

      case "Binary": {
        const left = this.evalExpr(expr.left, scope, expr.at);
        const right = this.evalExpr(expr.right, scope, expr.at);
        try {
          return applyBinary(expr.op, left, right);
        } catch (e) {
          if (e instanceof ScriptException) {
            throw new ScriptException(
              withOuterFrame(e.record, this.frameAt(scope, expr.op, [left, right], expr.at))
            );
          }
          throw e;
        }
      }

      case "Call": {
        const callee = this.evalExpr(expr.callee, scope, expr.at);
        const args = expr.args.map((a) => this.evalExpr(a, scope, expr.at));
        const kwargs = this.evalKeywords(expr.keywords ?? [], scope, expr.at);
        try {
          return this.callValue(callee, args, kwargs);
        } catch (e) {
          if (e instanceof ScriptException) {
            const operation =
              callee.tag === "builtin" ? callee.fn.name : callee.tag === "function" ? callee.decl.name : "call";
            throw new ScriptException(
              withOuterFrame(e.record, this.frameAt(scope, operation, args, expr.at))
            );
          }
          throw e;
        }
      }
    }
  }
}
