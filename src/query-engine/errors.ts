/**
 * Query Execution Errors
 *
 * The closed set of failures a filter can raise at run time. Each kind is
 * raised by exactly one primitive precondition and carries the values that
 * violated it.
 *
 * Every kind except ExecutionLimitError is recoverable: `try ... catch` and
 * the `?` operator stop its propagation. Anything that escapes a program
 * ends the evaluation of the current document only.
 */

import { deepEqual, describeValue, type QueryValue } from "./values.js";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";

export type QueryErrorKind =
  | "ObjectIndexByNonString"
  | "ArrayIndexByNonInt"
  | "SliceByNonInt"
  | "IterateOnNonIterable"
  | "IndexOnNonIndexable"
  | "SliceOnNonArrayNorString"
  | "NonIntegralNumber"
  | "UnaryOnNonNumeric"
  | "IncompatibleBinaryOperator"
  | "StringRepeatByNonUSize"
  | "DivModByZero"
  | "ObjectNonStringKey"
  | "UndefinedVariable"
  | "UndefinedFunction"
  | "UserError"
  | "BreakOutsideLabel"
  | "InvalidArgument"
  | "ExecutionLimit";

/**
 * Base class for every runtime failure of the engine.
 */
export abstract class QueryExecutionError extends Error {
  abstract readonly kind: QueryErrorKind;

  /** Whether try/catch and `?` may swallow this error */
  get recoverable(): boolean {
    return true;
  }

  /**
   * The value a catch handler receives as its input.
   * Taxonomy errors expose their message; `error(v)` exposes `v`.
   */
  get value(): QueryValue {
    return this.message;
  }

  /** Values that identify this error beyond its kind */
  abstract get details(): readonly QueryValue[];

  abstract clone(): QueryExecutionError;

  equals(other: QueryExecutionError): boolean {
    return this.kind === other.kind && deepEqual(this.details, other.details);
  }
}

export class ObjectIndexByNonStringError extends QueryExecutionError {
  readonly name = "ObjectIndexByNonStringError";
  readonly kind = "ObjectIndexByNonString";

  constructor(public readonly key: QueryValue) {
    super(`Cannot index object with ${describeValue(key)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.key];
  }

  clone(): ObjectIndexByNonStringError {
    return new ObjectIndexByNonStringError(this.key);
  }
}

export class ArrayIndexByNonIntError extends QueryExecutionError {
  readonly name = "ArrayIndexByNonIntError";
  readonly kind = "ArrayIndexByNonInt";

  constructor(public readonly key: QueryValue) {
    super(`Cannot index array with ${describeValue(key)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.key];
  }

  clone(): ArrayIndexByNonIntError {
    return new ArrayIndexByNonIntError(this.key);
  }
}

export class SliceByNonIntError extends QueryExecutionError {
  readonly name = "SliceByNonIntError";
  readonly kind = "SliceByNonInt";

  constructor(public readonly bound: QueryValue) {
    super(`Slice bounds must be integers, got ${describeValue(bound)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.bound];
  }

  clone(): SliceByNonIntError {
    return new SliceByNonIntError(this.bound);
  }
}

export class IterateOnNonIterableError extends QueryExecutionError {
  readonly name = "IterateOnNonIterableError";
  readonly kind = "IterateOnNonIterable";

  constructor(public readonly target: QueryValue) {
    super(`Cannot iterate over ${describeValue(target)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.target];
  }

  clone(): IterateOnNonIterableError {
    return new IterateOnNonIterableError(this.target);
  }
}

export class IndexOnNonIndexableError extends QueryExecutionError {
  readonly name = "IndexOnNonIndexableError";
  readonly kind = "IndexOnNonIndexable";

  constructor(
    public readonly target: QueryValue,
    public readonly key: QueryValue,
  ) {
    super(`Cannot index ${describeValue(target)} with ${describeValue(key)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.target, this.key];
  }

  clone(): IndexOnNonIndexableError {
    return new IndexOnNonIndexableError(this.target, this.key);
  }
}

export class SliceOnNonArrayNorStringError extends QueryExecutionError {
  readonly name = "SliceOnNonArrayNorStringError";
  readonly kind = "SliceOnNonArrayNorString";

  constructor(public readonly target: QueryValue) {
    super(`Cannot slice ${describeValue(target)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.target];
  }

  clone(): SliceOnNonArrayNorStringError {
    return new SliceOnNonArrayNorStringError(this.target);
  }
}

export class NonIntegralNumberError extends QueryExecutionError {
  readonly name = "NonIntegralNumberError";
  readonly kind = "NonIntegralNumber";

  constructor(public readonly number: number) {
    super(`Expected an integer but got ${describeValue(number)}`);
  }

  get details(): readonly QueryValue[] {
    return [this.number];
  }

  clone(): NonIntegralNumberError {
    return new NonIntegralNumberError(this.number);
  }
}

export class UnaryOnNonNumericError extends QueryExecutionError {
  readonly name = "UnaryOnNonNumericError";
  readonly kind = "UnaryOnNonNumeric";

  constructor(
    public readonly operator: "-",
    public readonly operand: QueryValue,
  ) {
    super(`${describeValue(operand)} cannot be negated`);
  }

  get details(): readonly QueryValue[] {
    return [this.operator, this.operand];
  }

  clone(): UnaryOnNonNumericError {
    return new UnaryOnNonNumericError(this.operator, this.operand);
  }
}

const OPERATOR_VERBS: Record<ArithmeticOperator, string> = {
  "+": "added",
  "-": "subtracted",
  "*": "multiplied",
  "/": "divided",
  "%": "divided (remainder)",
};

export class IncompatibleBinaryOperatorError extends QueryExecutionError {
  readonly name = "IncompatibleBinaryOperatorError";
  readonly kind = "IncompatibleBinaryOperator";

  constructor(
    public readonly operator: ArithmeticOperator,
    public readonly lhs: QueryValue,
    public readonly rhs: QueryValue,
  ) {
    super(
      `${describeValue(lhs)} and ${describeValue(rhs)} cannot be ${OPERATOR_VERBS[operator]}`,
    );
  }

  get details(): readonly QueryValue[] {
    return [this.operator, this.lhs, this.rhs];
  }

  clone(): IncompatibleBinaryOperatorError {
    return new IncompatibleBinaryOperatorError(
      this.operator,
      this.lhs,
      this.rhs,
    );
  }
}

export class StringRepeatByNonUSizeError extends QueryExecutionError {
  readonly name = "StringRepeatByNonUSizeError";
  readonly kind = "StringRepeatByNonUSize";

  constructor(public readonly count: number) {
    super(`Cannot repeat string ${count} times`);
  }

  get details(): readonly QueryValue[] {
    return [this.count];
  }

  clone(): StringRepeatByNonUSizeError {
    return new StringRepeatByNonUSizeError(this.count);
  }
}

export class DivModByZeroError extends QueryExecutionError {
  readonly name = "DivModByZeroError";
  readonly kind = "DivModByZero";

  constructor(
    public readonly operator: "/" | "%",
    public readonly dividend: number,
  ) {
    super(
      `${describeValue(dividend)} and number (0) cannot be ${OPERATOR_VERBS[operator]} because the divisor is zero`,
    );
  }

  get details(): readonly QueryValue[] {
    return [this.operator, this.dividend];
  }

  clone(): DivModByZeroError {
    return new DivModByZeroError(this.operator, this.dividend);
  }
}

export class ObjectNonStringKeyError extends QueryExecutionError {
  readonly name = "ObjectNonStringKeyError";
  readonly kind = "ObjectNonStringKey";

  constructor(public readonly key: QueryValue) {
    super(`Cannot use ${describeValue(key)} as object key`);
  }

  get details(): readonly QueryValue[] {
    return [this.key];
  }

  clone(): ObjectNonStringKeyError {
    return new ObjectNonStringKeyError(this.key);
  }
}

export class UndefinedVariableError extends QueryExecutionError {
  readonly name = "UndefinedVariableError";
  readonly kind = "UndefinedVariable";

  constructor(public readonly variable: string) {
    super(`$${variable} is not defined`);
  }

  get details(): readonly QueryValue[] {
    return [this.variable];
  }

  clone(): UndefinedVariableError {
    return new UndefinedVariableError(this.variable);
  }
}

export class UndefinedFunctionError extends QueryExecutionError {
  readonly name = "UndefinedFunctionError";
  readonly kind = "UndefinedFunction";

  constructor(
    public readonly functionName: string,
    public readonly arity: number,
  ) {
    super(`${functionName}/${arity} is not defined`);
  }

  get details(): readonly QueryValue[] {
    return [this.functionName, this.arity];
  }

  clone(): UndefinedFunctionError {
    return new UndefinedFunctionError(this.functionName, this.arity);
  }
}

/**
 * Raised by the `error` builtin. Keeps the raised value intact so a
 * catch handler sees it unchanged.
 */
export class UserError extends QueryExecutionError {
  readonly name = "UserError";
  readonly kind = "UserError";

  constructor(public readonly payload: QueryValue) {
    super(
      typeof payload === "string"
        ? payload
        : `${describeValue(payload)} (not a string)`,
    );
  }

  get value(): QueryValue {
    return this.payload;
  }

  get details(): readonly QueryValue[] {
    return [this.payload];
  }

  clone(): UserError {
    return new UserError(this.payload);
  }
}

export class BreakOutsideLabelError extends QueryExecutionError {
  readonly name = "BreakOutsideLabelError";
  readonly kind = "BreakOutsideLabel";

  constructor(public readonly label: string) {
    super(`$*label-${label} is not defined`);
  }

  get details(): readonly QueryValue[] {
    return [this.label];
  }

  clone(): BreakOutsideLabelError {
    return new BreakOutsideLabelError(this.label);
  }
}

/**
 * A builtin received an argument it cannot work with.
 */
export class InvalidArgumentError extends QueryExecutionError {
  readonly name = "InvalidArgumentError";
  readonly kind = "InvalidArgument";

  constructor(
    message: string,
    public readonly argument: QueryValue,
  ) {
    super(message);
  }

  get details(): readonly QueryValue[] {
    return [this.message, this.argument];
  }

  clone(): InvalidArgumentError {
    return new InvalidArgumentError(this.message, this.argument);
  }
}

/**
 * Error thrown when a filter exceeds a configured execution limit.
 * Never swallowed by try/catch or `?`.
 */
export class ExecutionLimitError extends QueryExecutionError {
  readonly name = "ExecutionLimitError";
  readonly kind = "ExecutionLimit";

  constructor(
    public readonly limit: "maxCallDepth" | "maxIterations",
    public readonly max: number,
  ) {
    super(
      limit === "maxCallDepth"
        ? `maximum call depth (${max}) exceeded`
        : `too many iterations (${max}), increase executionLimits.maxIterations`,
    );
  }

  get recoverable(): boolean {
    return false;
  }

  get details(): readonly QueryValue[] {
    return [this.limit, this.max];
  }

  clone(): ExecutionLimitError {
    return new ExecutionLimitError(this.limit, this.max);
  }
}

/**
 * Type guard for any error raised by the engine.
 */
export function isQueryExecutionError(
  error: unknown,
): error is QueryExecutionError {
  return error instanceof QueryExecutionError;
}

/**
 * Type guard for errors that try/catch and `?` are allowed to swallow.
 */
export function isRecoverableError(
  error: unknown,
): error is QueryExecutionError {
  return error instanceof QueryExecutionError && error.recoverable;
}
