/**
 * Tasklet builtins: numeric operations
 * abs
 */
import { float, int, kindName, raise } from "@tasklet/core";
import type { BuiltinFn, Value } from "@tasklet/core";

/**
 * abs(x) -> int | float
 */
export const absFn: BuiltinFn = {
  name: "abs",
  signature: { name: "abs", params: [{ name: "x" }] },
  execute([x]: Value[]): Value {
    switch (x?.tag) {
      case "int":
        return int(Math.abs(x.value));
      case "bool":
        return int(x.value ? 1 : 0);
      case "float":
        return float(Math.abs(x.value));
      default:
        return raise({
          tag: "Raised",
          excType: "TypeError",
          message: `bad operand type for abs(): '${x ? kindName(x) : "NoneType"}'`,
        });
    }
  },
};
