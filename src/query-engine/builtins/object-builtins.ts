/**
 * Collection builtins: length, keys, has and add.
 */

import { InvalidArgumentError } from "../errors.js";
import { binaryOp, iterate } from "../value-operations.js";
import {
  describeValue,
  isArray,
  isObject,
  type QueryValue,
  sortedKeys,
  typeOf,
} from "../values.js";
import type { BuiltinSpec } from "./types.js";

function lengthOf(v: QueryValue): number {
  if (v === null) return 0;
  if (typeof v === "number") return Math.abs(v);
  // Code points, not UTF-16 units
  if (typeof v === "string") return Array.from(v).length;
  if (isArray(v)) return v.length;
  if (isObject(v)) return v.size;
  throw new InvalidArgumentError(`${describeValue(v)} has no length`, v);
}

export const objectBuiltins: readonly BuiltinSpec[] = [
  {
    kind: "native",
    name: "length",
    arity: 0,
    apply(env, _args, emit) {
      emit(lengthOf(env.subject));
    },
  },
  {
    kind: "native",
    name: "keys",
    arity: 0,
    apply(env, _args, emit) {
      const v = env.subject;
      if (isObject(v)) {
        emit(sortedKeys(v));
      } else if (isArray(v)) {
        emit(v.map((_item, i) => i));
      } else {
        throw new InvalidArgumentError(`${describeValue(v)} has no keys`, v);
      }
    },
  },
  {
    kind: "native",
    name: "has",
    arity: 1,
    apply(env, [key], emit, evaluate) {
      const v = env.subject;
      evaluate(key, env, (k) => {
        if (isObject(v) && typeof k === "string") {
          emit(v.has(k));
        } else if (isArray(v) && typeof k === "number") {
          emit(k >= 0 && k < v.length);
        } else {
          throw new InvalidArgumentError(
            `Cannot check whether ${typeOf(v)} has a ${typeOf(k)} key`,
            k,
          );
        }
      });
    },
  },
  {
    kind: "native",
    name: "add",
    arity: 0,
    apply(env, _args, emit) {
      if (env.subject === null) {
        emit(null);
        return;
      }
      let sum: QueryValue = null;
      for (const item of iterate(env.subject)) {
        sum = binaryOp("+", sum, item);
      }
      emit(sum);
    },
  },
];
