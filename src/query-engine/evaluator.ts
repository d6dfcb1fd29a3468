/**
 * Query program evaluator
 *
 * Walks a compiled program against an Environment and hands every output
 * to a continuation as soon as it is produced. Nothing is collected into
 * intermediate arrays (except by `[...]`, which asks for it), so an
 * unbounded generator feeding `limit` or `first` stops as soon as enough
 * values have been taken.
 *
 * Failures are thrown. Outputs already passed to `emit` stay delivered;
 * the failure only ends the rest of the subtree's evaluation.
 */

import { lookupBuiltin } from "./builtins/index.js";
import type { Emit } from "./builtins/types.js";
import { BreakSignal } from "./control-signals.js";
import {
  type Closure,
  createRootEnvironment,
  type Environment,
} from "./environment.js";
import {
  BreakOutsideLabelError,
  ExecutionLimitError,
  isQueryExecutionError,
  isRecoverableError,
  UndefinedFunctionError,
} from "./errors.js";
import type { EngineOptions } from "./options.js";
import { literal } from "./program-builders.js";
import type {
  BinaryOpNode,
  ComparisonOperator,
  CondNode,
  DestructurePattern,
  ObjectNode,
  ObjectPatternField,
  ProgramNode,
  StringInterpNode,
} from "./program-types.js";
import {
  binaryOp,
  constructObject,
  index,
  iterate,
  slice,
  unaryNegate,
} from "./value-operations.js";
import {
  compareValues,
  deepEqual,
  isTruthy,
  type QueryValue,
  toJsonText,
} from "./values.js";

export type { Emit } from "./builtins/types.js";

/**
 * Evaluate `node` against `env`, calling `emit` once per output in the
 * order the language defines.
 */
export function evaluate(
  node: ProgramNode,
  env: Environment,
  emit: Emit,
): void {
  switch (node.type) {
    case "Identity":
      emit(env.subject);
      return;

    case "Literal":
      emit(node.value);
      return;

    case "Field":
      withBase(node.base, env, (base) => emit(index(base, node.name)));
      return;

    case "Index":
      // Key outer, base inner; the key runs against the input
      evaluate(node.index, env, (key) =>
        withBase(node.base, env, (base) => emit(index(base, key))),
      );
      return;

    case "Slice":
      withOptional(node.start, env, (start) =>
        withOptional(node.end, env, (end) =>
          withBase(node.base, env, (base) => emit(slice(base, start, end))),
        ),
      );
      return;

    case "Iterate":
      withBase(node.base, env, (base) => {
        for (const item of iterate(base)) {
          emit(item);
        }
      });
      return;

    case "Pipe":
      evaluate(node.left, env, (v) =>
        evaluate(node.right, env.withSubject(v), emit),
      );
      return;

    case "Comma":
      evaluate(node.left, env, emit);
      evaluate(node.right, env, emit);
      return;

    case "Array": {
      if (!node.elements) {
        emit([]);
        return;
      }
      const items: QueryValue[] = [];
      evaluate(node.elements, env, (v) => {
        items.push(v);
      });
      emit(items);
      return;
    }

    case "Object":
      evalObject(node, 0, [], env, emit);
      return;

    case "UnaryOp":
      evaluate(node.operand, env, (v) => emit(unaryNegate(v)));
      return;

    case "BinaryOp":
      evalBinaryOp(node, env, emit);
      return;

    case "Cond":
      evalCond(branchesOf(node), 0, node.else, env, emit);
      return;

    case "VarBind":
      evaluate(node.value, env, (v) =>
        bindPattern(env, node.pattern, v, (bound) =>
          evaluate(node.body, bound, emit),
        ),
      );
      return;

    case "VarRef":
      emit(env.lookupVariable(node.name));
      return;

    case "Def":
      evaluate(
        node.body,
        env.defineFunction(node.name, node.params, node.funcBody),
        emit,
      );
      return;

    case "Call":
      callFunction(env, node.name, node.args, emit);
      return;

    case "Try":
      evalTry(node.body, node.catch, env, emit);
      return;

    case "Optional":
      evalTry(node.expr, undefined, env, emit);
      return;

    case "Recurse":
      walk(env.subject, emit);
      return;

    case "Reduce":
      evaluate(node.init, env, (initial) => {
        let acc = initial;
        evaluate(node.source, env, (item) =>
          bindPattern(env, node.pattern, item, (bound) => {
            // An update that produces nothing resets the accumulator to null
            let next: QueryValue = null;
            evaluate(node.update, bound.withSubject(acc), (v) => {
              next = v;
            });
            acc = next;
          }),
        );
        emit(acc);
      });
      return;

    case "Foreach":
      evaluate(node.init, env, (initial) => {
        let state = initial;
        evaluate(node.source, env, (item) =>
          bindPattern(env, node.pattern, item, (bound) =>
            evaluate(node.update, bound.withSubject(state), (next) => {
              state = next;
              if (node.extract) {
                evaluate(node.extract, bound.withSubject(next), emit);
              } else {
                emit(next);
              }
            }),
          ),
        );
      });
      return;

    case "Label": {
      const { env: labelled, token } = env.bindLabel(node.name);
      try {
        evaluate(node.body, labelled, emit);
      } catch (e) {
        if (e instanceof BreakSignal && e.token === token) return;
        throw e;
      }
      return;
    }

    case "Break": {
      const token = env.lookupLabel(node.name);
      if (!token) throw new BreakOutsideLabelError(node.name);
      throw new BreakSignal(token);
    }

    case "StringInterp":
      evalInterpolation(node, node.parts.length - 1, "", env, emit);
      return;

    default: {
      const _exhaustive: never = node;
      throw new Error(
        `Unknown program node type: ${(_exhaustive as ProgramNode).type}`,
      );
    }
  }
}

function withBase(
  base: ProgramNode | undefined,
  env: Environment,
  k: Emit,
): void {
  if (base) {
    evaluate(base, env, k);
  } else {
    k(env.subject);
  }
}

function withOptional(
  node: ProgramNode | undefined,
  env: Environment,
  k: (value: QueryValue | undefined) => void,
): void {
  if (node) {
    evaluate(node, env, k);
  } else {
    k(undefined);
  }
}

/**
 * Cartesian product over the entries; the first entry is the outermost
 * loop, and within an entry the key varies slower than the value.
 */
function evalObject(
  node: ObjectNode,
  i: number,
  pairs: readonly (readonly [QueryValue, QueryValue])[],
  env: Environment,
  emit: Emit,
): void {
  if (i === node.entries.length) {
    emit(constructObject(pairs));
    return;
  }
  const entry = node.entries[i];
  const withKey = (key: QueryValue) =>
    evaluate(entry.value, env, (value) =>
      evalObject(node, i + 1, [...pairs, [key, value]], env, emit),
    );
  if (typeof entry.key === "string") {
    withKey(entry.key);
  } else {
    evaluate(entry.key, env, withKey);
  }
}

function compare(op: ComparisonOperator, l: QueryValue, r: QueryValue) {
  // Equality is structural; NaN is unequal even where it sorts
  if (op === "==") return deepEqual(l, r);
  if (op === "!=") return !deepEqual(l, r);
  const cmp = compareValues(l, r);
  switch (op) {
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    case ">":
      return cmp > 0;
    case ">=":
      return cmp >= 0;
  }
}

function evalBinaryOp(node: BinaryOpNode, env: Environment, emit: Emit) {
  const { op, left, right } = node;

  // Short-circuit for 'and' and 'or'
  if (op === "and" || op === "or") {
    evaluate(left, env, (l) => {
      if (isTruthy(l) === (op === "or")) {
        emit(op === "or");
        return;
      }
      evaluate(right, env, (r) => emit(isTruthy(r)));
    });
    return;
  }

  if (op === "//") {
    let found = false;
    let emitting = false;
    try {
      evaluate(left, env, (l) => {
        if (!isTruthy(l)) return;
        found = true;
        emitting = true;
        emit(l);
        emitting = false;
      });
    } catch (e) {
      // Errors in the left side count as "no value"
      if (emitting || !isRecoverableError(e)) throw e;
    }
    if (!found) evaluate(right, env, emit);
    return;
  }

  // Right operand outer, left operand varies fastest
  evaluate(right, env, (r) =>
    evaluate(left, env, (l) => {
      switch (op) {
        case "+":
        case "-":
        case "*":
        case "/":
        case "%":
          emit(binaryOp(op, l, r));
          return;
        default:
          emit(compare(op, l, r));
      }
    }),
  );
}

function branchesOf(node: CondNode) {
  return [{ cond: node.cond, then: node.then }, ...node.elifs];
}

function evalCond(
  branches: readonly { cond: ProgramNode; then: ProgramNode }[],
  i: number,
  otherwise: ProgramNode | undefined,
  env: Environment,
  emit: Emit,
): void {
  if (i === branches.length) {
    // jq: a missing else branch is `.`
    if (otherwise) {
      evaluate(otherwise, env, emit);
    } else {
      emit(env.subject);
    }
    return;
  }
  const branch = branches[i];
  evaluate(branch.cond, env, (c) => {
    if (isTruthy(c)) {
      evaluate(branch.then, env, emit);
    } else {
      evalCond(branches, i + 1, otherwise, env, emit);
    }
  });
}

/**
 * Errors raised by `emit` belong to the consumer downstream of the try,
 * not to the guarded body, so they are rethrown untouched.
 */
function evalTry(
  body: ProgramNode,
  handler: ProgramNode | undefined,
  env: Environment,
  emit: Emit,
): void {
  let emitting = false;
  try {
    evaluate(body, env, (v) => {
      emitting = true;
      emit(v);
      emitting = false;
    });
  } catch (e) {
    if (emitting || !isRecoverableError(e)) throw e;
    env.context.logger?.debug("caught", { kind: e.kind, message: e.message });
    if (handler) {
      evaluate(handler, env.withSubject(e.value), emit);
    }
  }
}

function walk(value: QueryValue, emit: Emit): void {
  emit(value);
  if (value !== null && typeof value === "object") {
    for (const child of iterate(value)) {
      walk(child, emit);
    }
  }
}

/**
 * The last part is the outermost loop, matching how `"a\(x)b\(y)"`
 * desugars into `"a" + x + "b" + y`.
 */
function evalInterpolation(
  node: StringInterpNode,
  i: number,
  suffix: string,
  env: Environment,
  emit: Emit,
): void {
  if (i < 0) {
    emit(suffix);
    return;
  }
  const part = node.parts[i];
  if (typeof part === "string") {
    evalInterpolation(node, i - 1, part + suffix, env, emit);
    return;
  }
  evaluate(part, env, (v) => {
    const text = typeof v === "string" ? v : toJsonText(v);
    evalInterpolation(node, i - 1, text + suffix, env, emit);
  });
}

// ============================================================================
// Destructuring
// ============================================================================

function bindPattern(
  env: Environment,
  pattern: DestructurePattern,
  value: QueryValue,
  k: (bound: Environment) => void,
): void {
  switch (pattern.type) {
    case "var":
      k(env.bindVariable(pattern.name, value));
      return;
    case "array":
      bindElements(env, pattern.elements, 0, value, k);
      return;
    case "object":
      bindFields(env, pattern.fields, 0, value, k);
      return;
  }
}

function bindElements(
  env: Environment,
  elements: readonly DestructurePattern[],
  i: number,
  value: QueryValue,
  k: (bound: Environment) => void,
): void {
  if (i === elements.length) {
    k(env);
    return;
  }
  bindPattern(env, elements[i], index(value, i), (bound) =>
    bindElements(bound, elements, i + 1, value, k),
  );
}

function bindFields(
  env: Environment,
  fields: readonly ObjectPatternField[],
  i: number,
  value: QueryValue,
  k: (bound: Environment) => void,
): void {
  if (i === fields.length) {
    k(env);
    return;
  }
  const f = fields[i];
  const next = (bound: Environment) =>
    bindFields(bound, fields, i + 1, value, k);
  const withKey = (key: QueryValue) => {
    const fieldValue = index(value, key);
    const bound = f.keyVar ? env.bindVariable(f.keyVar, fieldValue) : env;
    if (f.pattern) {
      bindPattern(bound, f.pattern, fieldValue, next);
    } else {
      next(bound);
    }
  };
  // Computed keys see the variables bound by earlier fields
  if (typeof f.key === "string") {
    withKey(f.key);
  } else {
    evaluate(f.key, env, withKey);
  }
}

// ============================================================================
// Function calls
// ============================================================================

/**
 * Resolve `name/arity` (user definitions shadow builtins) and run it
 * against the caller's subject.
 */
export function callFunction(
  env: Environment,
  name: string,
  args: readonly ProgramNode[],
  emit: Emit,
): void {
  const closure = env.lookupFunction(name, args.length);
  if (closure) {
    invokeClosure(closure, args, env, emit);
    return;
  }
  const builtin = lookupBuiltin(name, args.length);
  if (!builtin) {
    throw new UndefinedFunctionError(name, args.length);
  }
  if (builtin.kind === "native") {
    builtin.apply(env, args, emit, evaluate);
    return;
  }
  invokeClosure(
    { params: builtin.params, body: builtin.body, scope: env.detached() },
    args,
    env,
    emit,
  );
}

function invokeClosure(
  closure: Closure,
  args: readonly ProgramNode[],
  caller: Environment,
  emit: Emit,
): void {
  const callee = closure.scope.enterCall(caller.subject, caller.callDepth);
  bindArguments(closure.params, args, 0, caller, callee, (bound) =>
    evaluate(closure.body, bound, emit),
  );
}

/**
 * Filter parameters become closures over the caller's environment.
 * `$name` parameters are evaluated in the caller; each output binds both
 * `$name` and `name`, first parameter outermost.
 */
function bindArguments(
  params: readonly string[],
  args: readonly ProgramNode[],
  i: number,
  caller: Environment,
  callee: Environment,
  k: (bound: Environment) => void,
): void {
  if (i === params.length) {
    k(callee);
    return;
  }
  const param = params[i];
  const arg = args[i];
  if (param.startsWith("$")) {
    const name = param.slice(1);
    evaluate(arg, caller, (v) =>
      bindArguments(
        params,
        args,
        i + 1,
        caller,
        callee
          .bindVariable(name, v)
          .bindFilterArgument(name, literal(v), callee),
        k,
      ),
    );
    return;
  }
  bindArguments(
    params,
    args,
    i + 1,
    caller,
    callee.bindFilterArgument(param, arg, caller),
    k,
  );
}

// ============================================================================
// Entry points
// ============================================================================

function isStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && e.message.includes("call stack");
}

/**
 * Evaluate a program against a root environment. Errors that escape are
 * logged and rethrown; outputs emitted before them remain valid.
 *
 * Continuations keep every frame of a recursion through filter arguments
 * alive, so the native stack can run out before `maxCallDepth` is reached.
 * That overflow is reported as the call depth limit.
 */
export function run(env: Environment, program: ProgramNode, emit: Emit): void {
  const logger = env.context.logger;
  logger?.debug("run", { program: program.type });
  try {
    evaluate(program, env, emit);
  } catch (e) {
    const error = isStackOverflow(e)
      ? new ExecutionLimitError(
          "maxCallDepth",
          env.context.limits.maxCallDepth,
        )
      : e;
    if (isQueryExecutionError(error)) {
      logger?.info("error", { kind: error.kind, message: error.message });
    }
    throw error;
  }
}

/**
 * Run a program against one document and collect its outputs.
 */
export function execute(
  program: ProgramNode,
  value: QueryValue,
  options?: EngineOptions,
): QueryValue[] {
  const results: QueryValue[] = [];
  run(createRootEnvironment(value, options), program, (v) => {
    results.push(v);
  });
  return results;
}
