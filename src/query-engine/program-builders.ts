/**
 * Factory functions for assembling program trees in code.
 *
 * Variable and label names are given without the leading `$`.
 */

import type { ArithmeticOperator } from "./errors.js";
import type {
  ArrayNode,
  BinaryOperator,
  BinaryOpNode,
  BreakNode,
  CallNode,
  CondNode,
  DefNode,
  DestructurePattern,
  FieldNode,
  ForeachNode,
  IdentityNode,
  IndexNode,
  IterateNode,
  LabelNode,
  LiteralNode,
  ObjectNode,
  ObjectPatternField,
  OptionalNode,
  ProgramNode,
  RecurseNode,
  ReduceNode,
  SliceNode,
  StringInterpNode,
  TryNode,
  UnaryOpNode,
  VarBindNode,
  VarRefNode,
} from "./program-types.js";
import type { QueryValue } from "./values.js";

export function identity(): IdentityNode {
  return { type: "Identity" };
}

export function literal(value: QueryValue): LiteralNode {
  return { type: "Literal", value };
}

export function field(name: string, base?: ProgramNode): FieldNode {
  return base ? { type: "Field", name, base } : { type: "Field", name };
}

export function index(key: ProgramNode, base?: ProgramNode): IndexNode {
  return base
    ? { type: "Index", index: key, base }
    : { type: "Index", index: key };
}

export function slice(
  start: ProgramNode | undefined,
  end: ProgramNode | undefined,
  base?: ProgramNode,
): SliceNode {
  return { type: "Slice", start, end, base };
}

export function iterate(base?: ProgramNode): IterateNode {
  return base ? { type: "Iterate", base } : { type: "Iterate" };
}

/**
 * `a | b | c`, associated to the right.
 */
export function pipe(first: ProgramNode, ...rest: ProgramNode[]): ProgramNode {
  if (rest.length === 0) return first;
  const [next, ...tail] = rest;
  return { type: "Pipe", left: first, right: pipe(next, ...tail) };
}

/**
 * `a, b, c`, associated to the right.
 */
export function comma(first: ProgramNode, ...rest: ProgramNode[]): ProgramNode {
  if (rest.length === 0) return first;
  const [next, ...tail] = rest;
  return { type: "Comma", left: first, right: comma(next, ...tail) };
}

export function array(elements?: ProgramNode): ArrayNode {
  return elements ? { type: "Array", elements } : { type: "Array" };
}

export function object(
  ...entries: [key: ProgramNode | string, value: ProgramNode][]
): ObjectNode {
  return {
    type: "Object",
    entries: entries.map(([key, value]) => ({ key, value })),
  };
}

export function negate(operand: ProgramNode): UnaryOpNode {
  return { type: "UnaryOp", op: "-", operand };
}

export function binary(
  op: BinaryOperator,
  left: ProgramNode,
  right: ProgramNode,
): BinaryOpNode {
  return { type: "BinaryOp", op, left, right };
}

export function arithmetic(
  op: ArithmeticOperator,
  left: ProgramNode,
  right: ProgramNode,
): BinaryOpNode {
  return binary(op, left, right);
}

export function cond(
  condition: ProgramNode,
  then: ProgramNode,
  otherwise?: ProgramNode,
  elifs: { cond: ProgramNode; then: ProgramNode }[] = [],
): CondNode {
  return otherwise
    ? { type: "Cond", cond: condition, then, elifs, else: otherwise }
    : { type: "Cond", cond: condition, then, elifs };
}

export function varPattern(name: string): DestructurePattern {
  return { type: "var", name };
}

export function arrayPattern(
  ...elements: DestructurePattern[]
): DestructurePattern {
  return { type: "array", elements };
}

export function objectPattern(
  ...fields: ObjectPatternField[]
): DestructurePattern {
  return { type: "object", fields };
}

/**
 * `value as $name | body`, or `value as PATTERN | body`.
 */
export function bind(
  value: ProgramNode,
  pattern: string | DestructurePattern,
  body: ProgramNode,
): VarBindNode {
  return {
    type: "VarBind",
    value,
    pattern: typeof pattern === "string" ? varPattern(pattern) : pattern,
    body,
  };
}

export function variable(name: string): VarRefNode {
  return { type: "VarRef", name };
}

export function def(
  name: string,
  params: string[],
  funcBody: ProgramNode,
  body: ProgramNode,
): DefNode {
  return { type: "Def", name, params, funcBody, body };
}

export function call(name: string, ...args: ProgramNode[]): CallNode {
  return { type: "Call", name, args };
}

export function empty(): CallNode {
  return call("empty");
}

export function tryCatch(body: ProgramNode, handler?: ProgramNode): TryNode {
  return handler
    ? { type: "Try", body, catch: handler }
    : { type: "Try", body };
}

export function optional(expr: ProgramNode): OptionalNode {
  return { type: "Optional", expr };
}

export function recurse(): RecurseNode {
  return { type: "Recurse" };
}

export function reduce(
  source: ProgramNode,
  pattern: string | DestructurePattern,
  init: ProgramNode,
  update: ProgramNode,
): ReduceNode {
  return {
    type: "Reduce",
    source,
    pattern: typeof pattern === "string" ? varPattern(pattern) : pattern,
    init,
    update,
  };
}

export function foreach(
  source: ProgramNode,
  pattern: string | DestructurePattern,
  init: ProgramNode,
  update: ProgramNode,
  extract?: ProgramNode,
): ForeachNode {
  return {
    type: "Foreach",
    source,
    pattern: typeof pattern === "string" ? varPattern(pattern) : pattern,
    init,
    update,
    extract,
  };
}

export function label(name: string, body: ProgramNode): LabelNode {
  return { type: "Label", name, body };
}

export function breakLabel(name: string): BreakNode {
  return { type: "Break", name };
}

export function interpolate(
  ...parts: (string | ProgramNode)[]
): StringInterpNode {
  return { type: "StringInterp", parts };
}
