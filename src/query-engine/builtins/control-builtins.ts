/**
 * Control builtins: generators, early termination, errors and tracing.
 */

import { BreakSignal, runStoppable } from "../control-signals.js";
import type { Environment } from "../environment.js";
import {
  ExecutionLimitError,
  InvalidArgumentError,
  UserError,
} from "../errors.js";
import { requireInteger } from "../value-operations.js";
import { describeValue, type QueryValue } from "../values.js";
import type { BuiltinSpec, Emit } from "./types.js";

function numericArgument(builtin: string, v: QueryValue): number {
  if (typeof v !== "number") {
    throw new InvalidArgumentError(
      `${builtin}: ${describeValue(v)} is not a number`,
      v,
    );
  }
  return v;
}

function emitRange(
  env: Environment,
  from: number,
  upto: number,
  emit: Emit,
): void {
  const max = env.context.limits.maxIterations;
  let count = 0;
  for (let i = from; i < upto; i++) {
    if (++count > max) {
      throw new ExecutionLimitError("maxIterations", max);
    }
    emit(i);
  }
}

export const controlBuiltins: readonly BuiltinSpec[] = [
  {
    kind: "native",
    name: "empty",
    arity: 0,
    apply() {},
  },
  {
    kind: "native",
    name: "error",
    arity: 0,
    apply(env) {
      throw new UserError(env.subject);
    },
  },
  {
    kind: "native",
    name: "error",
    arity: 1,
    apply(env, [message], _emit, evaluate) {
      evaluate(message, env, (m) => {
        throw new UserError(m);
      });
    },
  },
  {
    kind: "native",
    name: "limit",
    arity: 2,
    apply(env, [count, generator], emit, evaluate) {
      evaluate(count, env, (n) => {
        const max = requireInteger(numericArgument("limit", n));
        if (max <= 0) return;
        let taken = 0;
        runStoppable((token) => {
          evaluate(generator, env, (v) => {
            taken++;
            emit(v);
            if (taken >= max) throw new BreakSignal(token);
          });
        });
      });
    },
  },
  {
    kind: "native",
    name: "first",
    arity: 1,
    apply(env, [generator], emit, evaluate) {
      runStoppable((token) => {
        evaluate(generator, env, (v) => {
          emit(v);
          throw new BreakSignal(token);
        });
      });
    },
  },
  {
    kind: "native",
    name: "isempty",
    arity: 1,
    apply(env, [generator], emit, evaluate) {
      const produced = runStoppable((token) => {
        evaluate(generator, env, () => {
          throw new BreakSignal(token);
        });
      });
      emit(!produced);
    },
  },
  {
    kind: "native",
    name: "range",
    arity: 1,
    apply(env, [upto], emit, evaluate) {
      evaluate(upto, env, (u) => {
        emitRange(env, 0, numericArgument("range", u), emit);
      });
    },
  },
  {
    kind: "native",
    name: "range",
    arity: 2,
    apply(env, [from, upto], emit, evaluate) {
      evaluate(from, env, (f) => {
        const start = numericArgument("range", f);
        evaluate(upto, env, (u) => {
          emitRange(env, start, numericArgument("range", u), emit);
        });
      });
    },
  },
  {
    kind: "native",
    name: "debug",
    arity: 0,
    apply(env, _args, emit) {
      env.context.logger?.debug("debug", { value: env.subject });
      emit(env.subject);
    },
  },
  {
    kind: "native",
    name: "stderr",
    arity: 0,
    apply(env, _args, emit) {
      env.context.logger?.info("stderr", { value: env.subject });
      emit(env.subject);
    },
  },
  {
    kind: "native",
    name: "env",
    arity: 0,
    apply(env, _args, emit) {
      emit(new Map<string, QueryValue>(Object.entries(env.context.env)));
    },
  },
];
