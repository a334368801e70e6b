/**
 * Tasklet runtime values and the kinds they belong to.
 *
 * Every value has a runtime kind. A kind names the type as it appears in
 * diagnostics ("int", "list", "coroutine", ...) and declares the capabilities
 * its values support. Argument checks ask the kind, never a list of kinds.
 */
import type { BuiltinFn } from "./builtin.js";
import type { CoroutineHandle } from "./coroutine.js";
import type { ExceptionRecord } from "./exceptions.js";
import { excTypeOf, failureMessage } from "./failures.js";
import type { JoinGroup } from "./join-group.js";
import type { FunctionDecl } from "./unit.js";

export type Capability = "iterable" | "callable" | "awaitable";

export interface RuntimeKind {
  readonly name: string;
  readonly capabilities: ReadonlySet<Capability>;
  /** Required when `capabilities` contains "iterable". */
  iterate?(self: ObjectValue): Iterable<Value>;
}

// --- Value variants ---
export interface NoneValue { tag: "none" }
export interface BoolValue { tag: "bool"; value: boolean }
export interface IntValue { tag: "int"; value: number }
export interface FloatValue { tag: "float"; value: number }
export interface StrValue { tag: "str"; value: string }
export interface ListValue { tag: "list"; items: Value[] }
export interface TupleValue { tag: "tuple"; items: readonly Value[] }
export interface BuiltinValue { tag: "builtin"; fn: BuiltinFn }
export interface FunctionValue { tag: "function"; decl: FunctionDecl }
export interface CoroutineValue { tag: "coroutine"; handle: CoroutineHandle }
export interface JoinGroupValue { tag: "join_group"; group: JoinGroup }
/** A caught failure held as a value, e.g. a join result with return_exceptions. */
export interface ExceptionValue { tag: "exception"; record: ExceptionRecord }
export interface ObjectValue {
  tag: "object";
  kind: RuntimeKind;
  fields: Map<string, Value>;
}

export type Value =
  | NoneValue
  | BoolValue
  | IntValue
  | FloatValue
  | StrValue
  | ListValue
  | TupleValue
  | BuiltinValue
  | FunctionValue
  | CoroutineValue
  | JoinGroupValue
  | ExceptionValue
  | ObjectValue;

// --- Kinds ---
function kind(name: string, capabilities: Capability[] = []): RuntimeKind {
  return { name, capabilities: new Set(capabilities) };
}

const BUILTIN_KINDS: { [T in Exclude<Value["tag"], "object" | "exception">]: RuntimeKind } = {
  none: kind("NoneType"),
  bool: kind("bool"),
  int: kind("int"),
  float: kind("float"),
  str: kind("str", ["iterable"]),
  list: kind("list", ["iterable"]),
  tuple: kind("tuple", ["iterable"]),
  builtin: kind("builtin_function_or_method", ["callable"]),
  function: kind("function", ["callable"]),
  coroutine: kind("coroutine", ["awaitable"]),
  join_group: kind("_GatheringFuture", ["awaitable"]),
};

const exceptionKinds = new Map<string, RuntimeKind>();

function exceptionKind(v: ExceptionValue): RuntimeKind {
  const name = excTypeOf(v.record.failure);
  let k = exceptionKinds.get(name);
  if (k === undefined) {
    k = kind(name);
    exceptionKinds.set(name, k);
  }
  return k;
}

/**
 * Declare a kind outside the builtin set. An iterable kind must supply `iterate`.
 * Only coroutines and join groups are awaitable.
 */
export function defineKind(
  name: string,
  capabilities: Exclude<Capability, "awaitable">[],
  iterate?: (self: ObjectValue) => Iterable<Value>
): RuntimeKind {
  if (capabilities.includes("iterable") && !iterate) {
    throw new Error(`Kind '${name}' declares 'iterable' without an iterate hook.`);
  }
  return { name, capabilities: new Set(capabilities), iterate };
}

export function kindOf(v: Value): RuntimeKind {
  if (v.tag === "object") return v.kind;
  if (v.tag === "exception") return exceptionKind(v);
  return BUILTIN_KINDS[v.tag];
}

export function kindName(v: Value): string {
  return kindOf(v).name;
}

/** Capability query against the value's runtime kind. */
export function supports(v: Value, capability: Capability): boolean {
  return kindOf(v).capabilities.has(capability);
}

/**
 * Items of an iterable value. Callers check `supports(v, "iterable")` first;
 * a non-iterable value yields nothing.
 */
export function iterate(v: Value): Value[] {
  switch (v.tag) {
    case "str":
      return Array.from(v.value, (ch) => str(ch));
    case "list":
    case "tuple":
      return [...v.items];
    case "object": {
      const hook = v.kind.iterate;
      return hook && v.kind.capabilities.has("iterable") ? [...hook(v)] : [];
    }
    default:
      return [];
  }
}

// --- Constructors ---
export const NONE: NoneValue = { tag: "none" };
export const TRUE: BoolValue = { tag: "bool", value: true };
export const FALSE: BoolValue = { tag: "bool", value: false };

export function bool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

export function int(value: number): IntValue {
  return { tag: "int", value: Math.trunc(value) };
}

export function float(value: number): FloatValue {
  return { tag: "float", value };
}

export function str(value: string): StrValue {
  return { tag: "str", value };
}

export function list(items: Value[]): ListValue {
  return { tag: "list", items };
}

export function tuple(items: readonly Value[]): TupleValue {
  return { tag: "tuple", items: Object.freeze([...items]) };
}

// --- Truthiness and equality ---
export function isTruthy(v: Value): boolean {
  switch (v.tag) {
    case "none":
      return false;
    case "bool":
      return v.value;
    case "int":
    case "float":
      return v.value !== 0;
    case "str":
      return v.value !== "";
    case "list":
    case "tuple":
      return v.items.length > 0;
    default:
      return true;
  }
}

function numeric(v: Value): number | null {
  if (v.tag === "int" || v.tag === "float") return v.value;
  if (v.tag === "bool") return v.value ? 1 : 0;
  return null;
}

export function valuesEqual(a: Value, b: Value): boolean {
  const na = numeric(a);
  const nb = numeric(b);
  if (na !== null && nb !== null) return na === nb;

  switch (a.tag) {
    case "none":
      return b.tag === "none";
    case "str":
      return b.tag === "str" && a.value === b.value;
    case "list":
    case "tuple": {
      if (b.tag !== a.tag) return false;
      if (a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        const left = a.items[i];
        const right = b.items[i];
        if (!left || !right || !valuesEqual(left, right)) return false;
      }
      return true;
    }
    case "builtin":
      return b.tag === "builtin" && a.fn === b.fn;
    case "function":
      return b.tag === "function" && a.decl === b.decl;
    case "coroutine":
      return b.tag === "coroutine" && a.handle === b.handle;
    case "join_group":
      return b.tag === "join_group" && a.group === b.group;
    case "exception":
      return b.tag === "exception" && a.record === b.record;
    case "object":
      return a === b;
    default:
      return false;
  }
}

// --- Rendering ---
function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return `${n}.0`;
  return String(n);
}

function quote(s: string): string {
  const escaped = s
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t");
  if (escaped.includes("'") && !escaped.includes('"')) {
    return `"${escaped}"`;
  }
  return `'${escaped.replace(/'/g, "\\'")}'`;
}

export function repr(v: Value): string {
  switch (v.tag) {
    case "none":
      return "None";
    case "bool":
      return v.value ? "True" : "False";
    case "int":
      return String(v.value);
    case "float":
      return formatFloat(v.value);
    case "str":
      return quote(v.value);
    case "list":
      return `[${v.items.map(repr).join(", ")}]`;
    case "tuple":
      return v.items.length === 1
        ? `(${repr(v.items[0] ?? NONE)},)`
        : `(${v.items.map(repr).join(", ")})`;
    case "builtin":
      return `<built-in function ${v.fn.name}>`;
    case "function":
      return `<function ${v.decl.name}>`;
    case "coroutine":
      return `<coroutine object ${v.handle.name}>`;
    case "join_group":
      return `<_GatheringFuture size=${v.group.size}>`;
    case "exception": {
      const message = failureMessage(v.record.failure);
      return `${excTypeOf(v.record.failure)}(${message === null ? "" : quote(message)})`;
    }
    case "object":
      return `<${v.kind.name} object>`;
  }
}

/**
 * `str()` rendering: strings print bare, exceptions as their message,
 * everything else as `repr`.
 */
export function display(v: Value): string {
  if (v.tag === "str") return v.value;
  if (v.tag === "exception") return failureMessage(v.record.failure) ?? "";
  return repr(v);
}
