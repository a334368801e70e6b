/**
 * Tasklet builtins: output
 */
import { NONE, display } from "@tasklet/core";
import type { BuiltinFn, Value } from "@tasklet/core";

/**
 * print(*values) -> None
 * Values are separated by a single space and followed by a newline.
 */
export const printFn: BuiltinFn = {
  name: "print",
  signature: { name: "print", params: [], rest: { name: "values" } },
  execute(args: Value[], ctx): Value {
    args.forEach((arg, i) => {
      if (i > 0) ctx.print.push(" ");
      ctx.print.write(display(arg));
    });
    ctx.print.push("\n");
    return NONE;
  },
};
