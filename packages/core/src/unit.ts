/**
 * Tasklet executable units.
 *
 * A unit is what the compiler hands to the runtime: the source text it was
 * compiled from, its function definitions and its module-level statements.
 * Awaits are lowered to statement level, so a coroutine only ever suspends
 * between statements.
 */

/** A source extent on one line; columns are 0-based, `endCol` exclusive. */
export interface Site {
  line: number;
  col: number;
  endCol: number;
}

export interface Span extends Site {
  file: string;
}

// --- Expressions ---
export interface ConstExpr {
  kind: "Const";
  value: null | boolean | number | string;
  /** Distinguishes 2.0 from 2; numbers default to int when integral. */
  float?: boolean;
}

export interface NameExpr {
  kind: "Name";
  /** Dotted names such as "asyncio.run" resolve against builtins. */
  name: string;
  at?: Site;
}

export interface ListExpr {
  kind: "List";
  elements: Expr[];
}

export interface TupleExpr {
  kind: "Tuple";
  elements: Expr[];
}

export type BinaryOp = "+" | "-" | "*" | "==" | "!=" | "<";

export interface BinaryExpr {
  kind: "Binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
  at: Site;
}

export interface Keyword {
  name: string;
  value: Expr;
}

export interface CallExpr {
  kind: "Call";
  callee: Expr;
  args: Expr[];
  /** Trailing `name=value` arguments, in source order. */
  keywords?: Keyword[];
  at: Site;
}

export type Expr = ConstExpr | NameExpr | ListExpr | TupleExpr | BinaryExpr | CallExpr;

// --- Statements ---
export interface AssignStmt {
  kind: "Assign";
  name: string;
  value: Expr;
  at?: Site;
}

export interface ExprStmt {
  kind: "Expr";
  value: Expr;
  at?: Site;
}

export interface AwaitStmt {
  kind: "Await";
  /** Local that receives the awaited result, if any. */
  target?: string;
  value: Expr;
  at: Site;
}

export interface ReturnStmt {
  kind: "Return";
  value?: Expr;
  at?: Site;
}

export interface AssertStmt {
  kind: "Assert";
  test: Expr;
  msg?: Expr;
  at: Site;
}

export type Stmt = AssignStmt | ExprStmt | AwaitStmt | ReturnStmt | AssertStmt;

// --- Definitions ---
export interface FunctionDecl {
  name: string;
  async: boolean;
  params: string[];
  body: Stmt[];
}

export interface Unit {
  file: string;
  source: string;
  /** Names the host binds as globals before the module runs. */
  inputs?: string[];
  functions: FunctionDecl[];
  module: Stmt[];
}

export const MODULE_FRAME_NAME = "<module>";

