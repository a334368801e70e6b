/**
 * Tasklet builtins: the asyncio namespace
 * asyncio.run, asyncio.gather
 */
import { CoroutineHandle, defineBody, done, fail, isTruthy, kindName, raise, suspendOn } from "@tasklet/core";
import type { BuiltinFn, JoinGroup, Value } from "@tasklet/core";

/** A coroutine that awaits `group` and hands back its result. */
function awaitGroup(group: JoinGroup): CoroutineHandle {
  return new CoroutineHandle(
    defineBody("_GatheringFuture", (_frame, input) => {
      switch (input.kind) {
        case "start":
          return suspendOn(group);
        case "value":
          return done(input.value);
        case "throw":
          return fail(input.record);
      }
    })
  );
}

/**
 * asyncio.run(main) -> value
 * Runs `main` to completion on a fresh loop. Rejected inside a running loop.
 */
export const asyncioRunFn: BuiltinFn = {
  name: "asyncio.run",
  signature: { name: "asyncio.run", params: [{ name: "main", requires: "awaitable" }] },
  execute([main]: Value[], ctx): Value {
    if (main?.tag !== "coroutine") {
      return raise({
        tag: "Raised",
        excType: "ValueError",
        message: `a coroutine was expected, got ${main ? kindName(main) : "None"}`,
      });
    }
    return ctx.scheduler.run(main.handle);
  },
};

/**
 * asyncio.gather(*aws, return_exceptions=False) -> awaitable
 * Awaiting the result runs every argument concurrently and yields their
 * values in argument order. With return_exceptions a failed argument's
 * slot holds its exception.
 */
export const asyncioGatherFn: BuiltinFn = {
  name: "asyncio.gather",
  signature: {
    name: "asyncio.gather",
    params: [],
    rest: { name: "aws", requires: "awaitable" },
    keywords: ["return_exceptions"],
  },
  execute(args: Value[], ctx, kwargs): Value {
    // The signature admits only coroutines and join groups.
    const handles = args.flatMap((arg) =>
      arg.tag === "coroutine" ? [arg.handle] : arg.tag === "join_group" ? [awaitGroup(arg.group)] : []
    );
    const flag = kwargs.get("return_exceptions");
    const group = ctx.scheduler.joinAll(handles, { returnExceptions: flag !== undefined && isTruthy(flag) });
    return { tag: "join_group", group };
  },
};
