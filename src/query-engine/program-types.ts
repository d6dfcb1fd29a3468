/**
 * Program node types
 *
 * The compiled filter tree the engine walks. Programs are produced by an
 * external compiler (or assembled with program-builders.ts) and are never
 * mutated by the engine.
 */

import type { ArithmeticOperator } from "./errors.js";
import type { QueryValue } from "./values.js";

export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type BinaryOperator =
  | ArithmeticOperator
  | ComparisonOperator
  | "and"
  | "or"
  | "//";

export type ProgramNode =
  | IdentityNode
  | LiteralNode
  | FieldNode
  | IndexNode
  | SliceNode
  | IterateNode
  | PipeNode
  | CommaNode
  | ArrayNode
  | ObjectNode
  | UnaryOpNode
  | BinaryOpNode
  | CondNode
  | VarBindNode
  | VarRefNode
  | DefNode
  | CallNode
  | TryNode
  | OptionalNode
  | RecurseNode
  | ReduceNode
  | ForeachNode
  | LabelNode
  | BreakNode
  | StringInterpNode;

export interface IdentityNode {
  readonly type: "Identity";
}

export interface LiteralNode {
  readonly type: "Literal";
  readonly value: QueryValue;
}

/** `.name`, or `base.name` */
export interface FieldNode {
  readonly type: "Field";
  readonly name: string;
  readonly base?: ProgramNode;
}

/** `.[index]`; the index expression runs against the input, not the base */
export interface IndexNode {
  readonly type: "Index";
  readonly index: ProgramNode;
  readonly base?: ProgramNode;
}

export interface SliceNode {
  readonly type: "Slice";
  readonly start?: ProgramNode;
  readonly end?: ProgramNode;
  readonly base?: ProgramNode;
}

export interface IterateNode {
  readonly type: "Iterate";
  readonly base?: ProgramNode;
}

export interface PipeNode {
  readonly type: "Pipe";
  readonly left: ProgramNode;
  readonly right: ProgramNode;
}

export interface CommaNode {
  readonly type: "Comma";
  readonly left: ProgramNode;
  readonly right: ProgramNode;
}

/** `[elements]`; absent elements is `[]` */
export interface ArrayNode {
  readonly type: "Array";
  readonly elements?: ProgramNode;
}

export interface ObjectEntry {
  readonly key: ProgramNode | string;
  readonly value: ProgramNode;
}

export interface ObjectNode {
  readonly type: "Object";
  readonly entries: readonly ObjectEntry[];
}

export interface UnaryOpNode {
  readonly type: "UnaryOp";
  readonly op: "-";
  readonly operand: ProgramNode;
}

export interface BinaryOpNode {
  readonly type: "BinaryOp";
  readonly op: BinaryOperator;
  readonly left: ProgramNode;
  readonly right: ProgramNode;
}

export interface CondNode {
  readonly type: "Cond";
  readonly cond: ProgramNode;
  readonly then: ProgramNode;
  readonly elifs: readonly {
    readonly cond: ProgramNode;
    readonly then: ProgramNode;
  }[];
  readonly else?: ProgramNode;
}

/**
 * Destructuring pattern for variable binding.
 * Variable names are stored without the leading `$`.
 */
export type DestructurePattern =
  | { readonly type: "var"; readonly name: string }
  | {
      readonly type: "array";
      readonly elements: readonly DestructurePattern[];
    }
  | {
      readonly type: "object";
      readonly fields: readonly ObjectPatternField[];
    };

/**
 * `{a: $x}` is key "a" with a var pattern; `{$a}` is key "a" with
 * keyVar "a"; `{$a: [$b]}` sets both.
 */
export interface ObjectPatternField {
  readonly key: ProgramNode | string;
  readonly keyVar?: string;
  readonly pattern?: DestructurePattern;
}

/** `value as PATTERN | body` */
export interface VarBindNode {
  readonly type: "VarBind";
  readonly value: ProgramNode;
  readonly pattern: DestructurePattern;
  readonly body: ProgramNode;
}

export interface VarRefNode {
  readonly type: "VarRef";
  readonly name: string;
}

/**
 * `def name(params): funcBody; body`. A param starting with `$` is a
 * value parameter; any other param is a filter parameter.
 */
export interface DefNode {
  readonly type: "Def";
  readonly name: string;
  readonly params: readonly string[];
  readonly funcBody: ProgramNode;
  readonly body: ProgramNode;
}

export interface CallNode {
  readonly type: "Call";
  readonly name: string;
  readonly args: readonly ProgramNode[];
}

export interface TryNode {
  readonly type: "Try";
  readonly body: ProgramNode;
  readonly catch?: ProgramNode;
}

/** `expr?` */
export interface OptionalNode {
  readonly type: "Optional";
  readonly expr: ProgramNode;
}

/** `..` */
export interface RecurseNode {
  readonly type: "Recurse";
}

export interface ReduceNode {
  readonly type: "Reduce";
  readonly source: ProgramNode;
  readonly pattern: DestructurePattern;
  readonly init: ProgramNode;
  readonly update: ProgramNode;
}

export interface ForeachNode {
  readonly type: "Foreach";
  readonly source: ProgramNode;
  readonly pattern: DestructurePattern;
  readonly init: ProgramNode;
  readonly update: ProgramNode;
  readonly extract?: ProgramNode;
}

export interface LabelNode {
  readonly type: "Label";
  readonly name: string;
  readonly body: ProgramNode;
}

export interface BreakNode {
  readonly type: "Break";
  readonly name: string;
}

export interface StringInterpNode {
  readonly type: "StringInterp";
  readonly parts: readonly (string | ProgramNode)[];
}
