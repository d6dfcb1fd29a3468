/**
 * Builtin registry, keyed by `name/arity`.
 * Uses a Map so names like "constructor" never resolve to prototype members.
 */

import { functionKey } from "../environment.js";
import { controlBuiltins } from "./control-builtins.js";
import { definedBuiltins } from "./defined-builtins.js";
import { objectBuiltins } from "./object-builtins.js";
import { typeBuiltins } from "./type-builtins.js";
import type { BuiltinSpec } from "./types.js";

export type {
  BuiltinSpec,
  DefinedBuiltin,
  Emit,
  Evaluator,
  NativeBuiltin,
} from "./types.js";

function arityOf(builtin: BuiltinSpec): number {
  return builtin.kind === "native" ? builtin.arity : builtin.params.length;
}

const BUILTINS = new Map<string, BuiltinSpec>(
  [
    ...controlBuiltins,
    ...typeBuiltins,
    ...objectBuiltins,
    ...definedBuiltins,
  ].map((builtin) => [functionKey(builtin.name, arityOf(builtin)), builtin]),
);

export function lookupBuiltin(
  name: string,
  arity: number,
): BuiltinSpec | undefined {
  return BUILTINS.get(functionKey(name, arity));
}

/**
 * Every builtin as `name/arity`, sorted.
 */
export function builtinNames(): string[] {
  return [...BUILTINS.keys()].sort();
}
