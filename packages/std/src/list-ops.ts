/**
 * Tasklet builtins: iteration
 * len, list, range, map, filter, sum, any, all
 *
 * Where a builtin would return a lazy iterator it returns a list instead.
 */
import {
  NONE,
  applyBinary,
  bool,
  defineKind,
  int,
  isTruthy,
  iterate,
  kindName,
  list,
  raise,
  supports,
} from "@tasklet/core";
import type { BuiltinFn, ObjectValue, Value } from "@tasklet/core";

/**
 * len(obj) -> int
 */
export const lenFn: BuiltinFn = {
  name: "len",
  signature: { name: "len", params: [{ name: "obj" }] },
  execute([obj]: Value[]): Value {
    switch (obj?.tag) {
      case "str":
        return int(Array.from(obj.value).length);
      case "list":
      case "tuple":
        return int(obj.items.length);
      case "object":
        if (obj.kind === RANGE_KIND) return int(rangeItems(obj).length);
        break;
    }
    return raise({
      tag: "Raised",
      excType: "TypeError",
      message: `object of type '${obj ? kindName(obj) : "NoneType"}' has no len()`,
    });
  },
};

/**
 * list(iterable=()) -> list
 */
export const listFn: BuiltinFn = {
  name: "list",
  signature: { name: "list", params: [{ name: "iterable", requires: "iterable" }], required: 0 },
  execute([iterable]: Value[]): Value {
    return list(iterable ? iterate(iterable) : []);
  },
};

// --- range ---
function rangeBound(fields: Map<string, Value>, key: string): number {
  const v = fields.get(key);
  return v?.tag === "int" ? v.value : 0;
}

function rangeItems(self: ObjectValue): Value[] {
  const start = rangeBound(self.fields, "start");
  const stop = rangeBound(self.fields, "stop");
  const step = rangeBound(self.fields, "step");
  const items: Value[] = [];
  if (step > 0) {
    for (let i = start; i < stop; i += step) items.push(int(i));
  } else if (step < 0) {
    for (let i = start; i > stop; i += step) items.push(int(i));
  }
  return items;
}

export const RANGE_KIND = defineKind("range", ["iterable"], rangeItems);

function asIndex(v: Value): Value {
  if (v.tag === "int") return v;
  if (v.tag === "bool") return int(v.value ? 1 : 0);
  return raise({
    tag: "Raised",
    excType: "TypeError",
    message: `'${kindName(v)}' object cannot be interpreted as an integer`,
  });
}

/**
 * range(stop) | range(start, stop[, step]) -> range
 */
export const rangeFn: BuiltinFn = {
  name: "range",
  signature: {
    name: "range",
    params: [{ name: "start" }, { name: "stop" }, { name: "step" }],
    required: 1,
  },
  execute(args: Value[]): Value {
    const bounds = args.map(asIndex);
    const [start, stop, step] =
      bounds.length === 1 ? [int(0), bounds[0] ?? int(0), int(1)] : [bounds[0], bounds[1], bounds[2] ?? int(1)];
    if (step?.tag === "int" && step.value === 0) {
      return raise({ tag: "Raised", excType: "ValueError", message: "range() arg 3 must not be zero" });
    }
    const fields = new Map<string, Value>();
    fields.set("start", start ?? int(0));
    fields.set("stop", stop ?? int(0));
    fields.set("step", step ?? int(1));
    return { tag: "object", kind: RANGE_KIND, fields };
  },
};

/**
 * map(function, iterable, *iterables) -> list
 * Stops at the shortest iterable.
 */
export const mapFn: BuiltinFn = {
  name: "map",
  signature: {
    name: "map",
    params: [
      { name: "function", requires: "callable" },
      { name: "iterable", requires: "iterable" },
    ],
    rest: { name: "iterables", requires: "iterable" },
    arityMessage: "map() must have at least two arguments.",
  },
  execute([fn, ...iterables]: Value[], ctx): Value {
    const columns = iterables.map(iterate);
    const length = Math.min(...columns.map((c) => c.length));
    const out: Value[] = [];
    for (let i = 0; i < length; i++) {
      out.push(ctx.call(fn ?? NONE, columns.map((c) => c[i] ?? NONE)));
    }
    return list(out);
  },
};

/**
 * filter(function | None, iterable) -> list
 */
export const filterFn: BuiltinFn = {
  name: "filter",
  signature: {
    name: "filter",
    params: [{ name: "function" }, { name: "iterable", requires: "iterable" }],
  },
  execute([fn, iterable]: Value[], ctx): Value {
    const predicate = fn ?? NONE;
    if (predicate.tag !== "none" && !supports(predicate, "callable")) {
      return raise({ tag: "ArgumentShapeError", kindName: kindName(predicate), capability: "callable" });
    }
    const items = iterable ? iterate(iterable) : [];
    return list(
      items.filter((item) =>
        predicate.tag === "none" ? isTruthy(item) : isTruthy(ctx.call(predicate, [item]))
      )
    );
  },
};

/**
 * sum(iterable, start=0) -> number
 */
export const sumFn: BuiltinFn = {
  name: "sum",
  signature: {
    name: "sum",
    params: [{ name: "iterable", requires: "iterable" }, { name: "start" }],
    required: 1,
  },
  execute([iterable, start]: Value[]): Value {
    if (start?.tag === "str") {
      return raise({
        tag: "Raised",
        excType: "TypeError",
        message: "sum() can't sum strings [use ''.join(seq) instead]",
      });
    }
    let acc: Value = start ?? int(0);
    for (const item of iterable ? iterate(iterable) : []) {
      acc = applyBinary("+", acc, item);
    }
    return acc;
  },
};

/**
 * any(iterable) -> bool
 */
export const anyFn: BuiltinFn = {
  name: "any",
  signature: { name: "any", params: [{ name: "iterable", requires: "iterable" }] },
  execute([iterable]: Value[]): Value {
    return bool((iterable ? iterate(iterable) : []).some(isTruthy));
  },
};

/**
 * all(iterable) -> bool
 */
export const allFn: BuiltinFn = {
  name: "all",
  signature: { name: "all", params: [{ name: "iterable", requires: "iterable" }] },
  execute([iterable]: Value[]): Value {
    return bool((iterable ? iterate(iterable) : []).every(isTruthy));
  },
};
