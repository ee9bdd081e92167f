/**
 * @stackvm/core - lexer, parser, compiler and stack machine
 */
export * from "./expr.js";
export * from "./diagnostics.js";
export { Source } from "./source.js";
export { Lexer, lex, scanComments, tokenSpan } from "./lexer.js";
export type { Token, SourceComment } from "./lexer.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { arith, compareVals, isVal, saturate } from "./val.js";
export type { Val, ArithOp, ValResult } from "./val.js";
export { compile, compileExpr, compileBody } from "./compiler.js";
export type { Op } from "./compiler.js";
export { INTRINSIC_SPELLINGS, intrinsicFromName, intrinsicSpelling, isIntrinsic } from "./intrinsics.js";
export type { Intrinsic } from "./intrinsics.js";
export { cast, CAST_TARGETS } from "./cast.js";
export type { CastTarget } from "./cast.js";
export { VMError } from "./errors.js";
export { Context, Scope, ScopeItem } from "./context.js";
export { Journal } from "./journal.js";
export type { Snapshot } from "./journal.js";
export { Engine, Module, splitQualified } from "./module.js";
export type { ModuleCall, ModuleFn, ModuleLoader } from "./module.js";
export { VM, consoleOutput, whereIs } from "./vm.js";
export type {
  BindingKind,
  StackOutput,
  StepResult,
  TraceData,
  TraceEvent,
  TraceEventType,
  VMOptions,
} from "./vm.js";
export { format } from "./formatter.js";
export {
  DEFAULT_CONFIG,
  PROJECT_CONFIG_FILE,
  STD_MODULE_NAMES,
  applyOverrides,
  configSchema,
  loadConfig,
  resolveConfig,
} from "./config.js";
export type { ConfigOverrides, ResolvedConfig, StackConfig, StdModuleName } from "./config.js";
