/**
 * Query engine
 *
 * Evaluates compiled filter programs against JSON values.
 */

export { builtinNames, lookupBuiltin } from "./builtins/index.js";
export type {
  BuiltinSpec,
  DefinedBuiltin,
  Emit,
  Evaluator,
  NativeBuiltin,
} from "./builtins/index.js";
export type { Closure, LabelToken } from "./environment.js";
export { createRootEnvironment, Environment } from "./environment.js";
export * from "./errors.js";
export { callFunction, evaluate, execute, run } from "./evaluator.js";
export type { EngineContext, EngineOptions, QueryLogger } from "./options.js";
export {
  ConfigurationError,
  engineOptionsSchema,
  resolveEngineOptions,
} from "./options.js";
export * as build from "./program-builders.js";
export {
  decodeProgram,
  patternSchema,
  ProgramDecodeError,
  programNodeSchema,
} from "./program-schema.js";
export type * from "./program-types.js";
export {
  binaryOp,
  constructObject,
  deepMergeObjects,
  fromJson,
  index,
  iterate,
  MAX_STRING_LENGTH,
  mergeObjects,
  requireInteger,
  slice,
  toJson,
  unaryNegate,
} from "./value-operations.js";
export type {
  QueryArray,
  QueryObject,
  QueryType,
  QueryValue,
} from "./values.js";
export {
  compareValues,
  deepEqual,
  describeValue,
  isArray,
  isObject,
  isTruthy,
  sortedKeys,
  toJsonText,
  typeOf,
} from "./values.js";
