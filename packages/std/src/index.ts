/**
 * @tasklet/std - Tasklet builtin functions
 */
import type { BuiltinFn } from "@tasklet/core";
export { absFn } from "./math-ops.js";
export { lenFn, listFn, rangeFn, mapFn, filterFn, sumFn, anyFn, allFn, RANGE_KIND } from "./list-ops.js";
export { printFn } from "./io-ops.js";
export { asyncioRunFn, asyncioGatherFn } from "./asyncio.js";

import { absFn } from "./math-ops.js";
import { lenFn, listFn, rangeFn, mapFn, filterFn, sumFn, anyFn, allFn } from "./list-ops.js";
import { printFn } from "./io-ops.js";
import { asyncioRunFn, asyncioGatherFn } from "./asyncio.js";

/**
 * Get all builtins as a Map, keyed by the name scripts call them by.
 */
export function getBuiltins(): Map<string, BuiltinFn> {
  const fns = new Map<string, BuiltinFn>();
  for (const fn of [
    absFn,
    lenFn, listFn, rangeFn, mapFn, filterFn, sumFn, anyFn, allFn,
    printFn,
    asyncioRunFn, asyncioGatherFn,
  ]) {
    fns.set(fn.name, fn);
  }
  return fns;
}
