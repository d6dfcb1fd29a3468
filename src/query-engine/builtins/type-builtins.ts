/**
 * Type builtins: truthiness, type names and JSON text.
 */

import { isTruthy, toJsonText, typeOf } from "../values.js";
import type { BuiltinSpec } from "./types.js";

export const typeBuiltins: readonly BuiltinSpec[] = [
  {
    kind: "native",
    name: "not",
    arity: 0,
    apply(env, _args, emit) {
      emit(!isTruthy(env.subject));
    },
  },
  {
    kind: "native",
    name: "type",
    arity: 0,
    apply(env, _args, emit) {
      emit(typeOf(env.subject));
    },
  },
  {
    kind: "native",
    name: "tostring",
    arity: 0,
    apply(env, _args, emit) {
      const v = env.subject;
      emit(typeof v === "string" ? v : toJsonText(v));
    },
  },
  {
    kind: "native",
    name: "tojson",
    arity: 0,
    apply(env, _args, emit) {
      emit(toJsonText(env.subject));
    },
  },
];
