import { describe, expect, it } from "vitest";
import { execute } from "./evaluator.js";
import { decodeProgram, ProgramDecodeError } from "./program-schema.js";
import { fromJson } from "./value-operations.js";

describe("decodeProgram", () => {
  it("should decode a program sent as JSON", () => {
    // .a | . + 1
    const program = decodeProgram(
      JSON.parse(
        '{"type":"Pipe","left":{"type":"Field","name":"a"},' +
          '"right":{"type":"BinaryOp","op":"+","left":{"type":"Identity"},' +
          '"right":{"type":"Literal","value":1}}}',
      ),
    );
    expect(execute(program, fromJson({ a: 2 }))).toEqual([3]);
  });

  it("should fill in optional lists", () => {
    expect(decodeProgram({ type: "Call", name: "empty" })).toEqual({
      type: "Call",
      name: "empty",
      args: [],
    });
    const cond = decodeProgram({
      type: "Cond",
      cond: { type: "Identity" },
      then: { type: "Literal", value: 1 },
    });
    expect(cond).toEqual({
      type: "Cond",
      cond: { type: "Identity" },
      then: { type: "Literal", value: 1 },
      elifs: [],
    });
  });

  it("should decode patterns and string parts", () => {
    const program = decodeProgram({
      type: "VarBind",
      value: { type: "Identity" },
      pattern: {
        type: "object",
        fields: [{ key: "a", pattern: { type: "var", name: "x" } }],
      },
      body: {
        type: "StringInterp",
        parts: ["a=", { type: "VarRef", name: "x" }],
      },
    });
    expect(execute(program, fromJson({ a: [1] }))).toEqual(["a=[1]"]);
  });

  it("should turn literal objects into query values", () => {
    const program = decodeProgram({ type: "Literal", value: { b: 1, 0: 2 } });
    const [value] = execute(program, null);
    expect(value).toEqual(
      new Map([
        ["0", 2],
        ["b", 1],
      ]),
    );
    expect(value instanceof Map && [...value.keys()]).toEqual(["0", "b"]);
  });

  it("should report missing fields with their path", () => {
    expect(() => decodeProgram({ type: "Field" })).toThrow(ProgramDecodeError);
    try {
      decodeProgram({ type: "Pipe", left: { type: "Field" }, right: {} });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ProgramDecodeError);
      if (e instanceof ProgramDecodeError) {
        expect(e.issues[0]).toBe("left.name: Required");
      }
    }
  });

  it("should reject literals with no JSON form", () => {
    try {
      decodeProgram({ type: "Literal" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ProgramDecodeError);
      if (e instanceof ProgramDecodeError) {
        expect(e.issues).toEqual([
          "value: Cannot convert undefined to a JSON value",
        ]);
      }
    }
  });

  it("should reject unknown node types and operators", () => {
    expect(() => decodeProgram({ type: "Eval" })).toThrow(ProgramDecodeError);
    expect(() =>
      decodeProgram({
        type: "BinaryOp",
        op: "**",
        left: { type: "Identity" },
        right: { type: "Identity" },
      }),
    ).toThrow(ProgramDecodeError);
  });
});
