/**
 * Runtime validation for programs that arrive as JSON, e.g. from a
 * compiler running in another process. Decoded trees have exactly the
 * shapes in program-types.ts and literal values are plain query values.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";
import { formatIssues } from "./options.js";
import type { DestructurePattern, ProgramNode } from "./program-types.js";
import { fromJson } from "./value-operations.js";

const literalValueSchema = z.unknown().transform((value, ctx) => {
  try {
    return fromJson(value);
  } catch (e) {
    if (!(e instanceof InvalidArgumentError)) throw e;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e.message });
    return z.NEVER;
  }
});

export const programNodeSchema: z.ZodType<
  ProgramNode,
  z.ZodTypeDef,
  unknown
> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("Identity") }),
    z.object({ type: z.literal("Literal"), value: literalValueSchema }),
    z.object({
      type: z.literal("Field"),
      name: z.string(),
      base: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Index"),
      index: programNodeSchema,
      base: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Slice"),
      start: programNodeSchema.optional(),
      end: programNodeSchema.optional(),
      base: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Iterate"),
      base: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Pipe"),
      left: programNodeSchema,
      right: programNodeSchema,
    }),
    z.object({
      type: z.literal("Comma"),
      left: programNodeSchema,
      right: programNodeSchema,
    }),
    z.object({
      type: z.literal("Array"),
      elements: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Object"),
      entries: z.array(
        z.object({
          key: z.union([z.string(), programNodeSchema]),
          value: programNodeSchema,
        }),
      ),
    }),
    z.object({
      type: z.literal("UnaryOp"),
      op: z.literal("-"),
      operand: programNodeSchema,
    }),
    z.object({
      type: z.literal("BinaryOp"),
      op: z.enum([
        "+",
        "-",
        "*",
        "/",
        "%",
        "==",
        "!=",
        "<",
        "<=",
        ">",
        ">=",
        "and",
        "or",
        "//",
      ]),
      left: programNodeSchema,
      right: programNodeSchema,
    }),
    z.object({
      type: z.literal("Cond"),
      cond: programNodeSchema,
      then: programNodeSchema,
      elifs: z
        .array(z.object({ cond: programNodeSchema, then: programNodeSchema }))
        .default([]),
      else: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("VarBind"),
      value: programNodeSchema,
      pattern: patternSchema,
      body: programNodeSchema,
    }),
    z.object({ type: z.literal("VarRef"), name: z.string() }),
    z.object({
      type: z.literal("Def"),
      name: z.string(),
      params: z.array(z.string()),
      funcBody: programNodeSchema,
      body: programNodeSchema,
    }),
    z.object({
      type: z.literal("Call"),
      name: z.string(),
      args: z.array(programNodeSchema).default([]),
    }),
    z.object({
      type: z.literal("Try"),
      body: programNodeSchema,
      catch: programNodeSchema.optional(),
    }),
    z.object({ type: z.literal("Optional"), expr: programNodeSchema }),
    z.object({ type: z.literal("Recurse") }),
    z.object({
      type: z.literal("Reduce"),
      source: programNodeSchema,
      pattern: patternSchema,
      init: programNodeSchema,
      update: programNodeSchema,
    }),
    z.object({
      type: z.literal("Foreach"),
      source: programNodeSchema,
      pattern: patternSchema,
      init: programNodeSchema,
      update: programNodeSchema,
      extract: programNodeSchema.optional(),
    }),
    z.object({
      type: z.literal("Label"),
      name: z.string(),
      body: programNodeSchema,
    }),
    z.object({ type: z.literal("Break"), name: z.string() }),
    z.object({
      type: z.literal("StringInterp"),
      parts: z.array(z.union([z.string(), programNodeSchema])),
    }),
  ]),
);

export const patternSchema: z.ZodType<
  DestructurePattern,
  z.ZodTypeDef,
  unknown
> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("var"), name: z.string() }),
    z.object({ type: z.literal("array"), elements: z.array(patternSchema) }),
    z.object({
      type: z.literal("object"),
      fields: z.array(
        z.object({
          key: z.union([z.string(), programNodeSchema]),
          keyVar: z.string().optional(),
          pattern: patternSchema.optional(),
        }),
      ),
    }),
  ]),
);

/**
 * Thrown when a JSON program does not describe a valid program tree.
 */
export class ProgramDecodeError extends Error {
  readonly name = "ProgramDecodeError";

  constructor(public readonly issues: string[]) {
    super(`Invalid program: ${issues.join("; ")}`);
  }
}

/**
 * Validate a JSON-encoded program tree.
 */
export function decodeProgram(json: unknown): ProgramNode {
  const parsed = programNodeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProgramDecodeError(formatIssues(parsed.error));
  }
  return parsed.data;
}
