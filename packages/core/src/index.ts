/**
 * @tasklet/core - coroutine runtime and diagnostic traces
 */
export * from "./unit.js";
export * from "./diagnostics.js";
export * from "./values.js";
export * from "./failures.js";
export * from "./exceptions.js";
export { formatTraceback, TRACEBACK_HEADER } from "./traceback.js";
export { checkArgs, validateArgs } from "./signature.js";
export type { KeywordArgs, ParamShape, Signature } from "./signature.js";
export { invokeBuiltin } from "./builtin.js";
export type { BuiltinFn, CallContext } from "./builtin.js";
export { StdPrint, CollectStringPrint, NoPrint } from "./print.js";
export type { PrintWriter } from "./print.js";
export { CoroutineHandle, START, defineBody, done, fail, suspendOn } from "./coroutine.js";
export type {
  Awaitable,
  CoroutineBody,
  CoroutineStatus,
  Outcome,
  ResumeInput,
  SavedFrame,
  Step,
} from "./coroutine.js";
export { JoinGroup } from "./join-group.js";
export type { JoinOptions, Task, TaskState } from "./join-group.js";
export { Scheduler } from "./scheduler.js";
export type {
  SchedulerContext,
  SchedulerLimits,
  SchedulerOptions,
  TraceData,
  TraceEvent,
  TraceEventType,
} from "./scheduler.js";
export { Interpreter, applyBinary } from "./interpreter.js";
export type { ExecOptions } from "./interpreter.js";
export { runUnit, InvalidInputError } from "./host.js";
export type { HostOptions, HostResult } from "./host.js";
export { validate } from "./validator.js";
export type { ValidateOptions } from "./validator.js";
export { resolveConfig, loadConfig, validateConfigShape, DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
