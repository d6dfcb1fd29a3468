import type { Environment } from "../environment.js";
import type { ProgramNode } from "../program-types.js";
import type { QueryValue } from "../values.js";

/** Receives each output of a filter, in order */
export type Emit = (value: QueryValue) => void;

export type Evaluator = (
  node: ProgramNode,
  env: Environment,
  emit: Emit,
) => void;

/**
 * A builtin implemented in TypeScript. Arguments arrive unevaluated so the
 * builtin decides how often, and against which input, to run them.
 */
export interface NativeBuiltin {
  readonly kind: "native";
  readonly name: string;
  readonly arity: number;
  apply(
    env: Environment,
    args: readonly ProgramNode[],
    emit: Emit,
    evaluate: Evaluator,
  ): void;
}

/**
 * A builtin written as a filter, called like a user-defined function.
 * Its body only sees its own parameters and other builtins.
 */
export interface DefinedBuiltin {
  readonly kind: "defined";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: ProgramNode;
}

export type BuiltinSpec = NativeBuiltin | DefinedBuiltin;
