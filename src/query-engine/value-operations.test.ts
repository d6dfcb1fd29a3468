import { describe, expect, it } from "vitest";
import {
  ArrayIndexByNonIntError,
  DivModByZeroError,
  IncompatibleBinaryOperatorError,
  IndexOnNonIndexableError,
  InvalidArgumentError,
  IterateOnNonIterableError,
  NonIntegralNumberError,
  ObjectIndexByNonStringError,
  ObjectNonStringKeyError,
  SliceByNonIntError,
  SliceOnNonArrayNorStringError,
  StringRepeatByNonUSizeError,
  UnaryOnNonNumericError,
} from "./errors.js";
import {
  binaryOp,
  constructObject,
  deepMergeObjects,
  fromJson,
  index,
  iterate,
  MAX_STRING_LENGTH,
  mergeObjects,
  requireInteger,
  slice,
  toJson,
  unaryNegate,
} from "./value-operations.js";
import {
  isObject,
  type QueryObject,
  type QueryValue,
  toJsonText,
} from "./values.js";

function obj(json: Record<string, unknown>): QueryObject {
  const value = fromJson(json);
  if (!isObject(value)) throw new Error("expected an object");
  return value;
}

describe("value operations", () => {
  describe("index", () => {
    it("should look up object keys", () => {
      expect(index(obj({ a: 1 }), "a")).toBe(1);
      expect(index(obj({ a: 1 }), "b")).toBe(null);
    });

    it("should not expose prototype members", () => {
      expect(index(obj({ a: 1 }), "constructor")).toBe(null);
      expect(index(obj({ a: 1 }), "toString")).toBe(null);
      expect(index(obj({ a: 1 }), "__proto__")).toBe(null);
    });

    it("should count negative array positions from the end", () => {
      expect(index([1, 2, 3], 0)).toBe(1);
      expect(index([1, 2, 3], -1)).toBe(3);
      expect(index([1, 2, 3], 3)).toBe(null);
      expect(index([1, 2, 3], -4)).toBe(null);
    });

    it("should yield null for any key on null", () => {
      expect(index(null, "a")).toBe(null);
      expect(index(null, 0)).toBe(null);
    });

    it("should reject non-string object keys", () => {
      expect(() => index(obj({ a: 1 }), 0)).toThrow(
        ObjectIndexByNonStringError,
      );
      expect(() => index(obj({ a: 1 }), 0)).toThrow(
        "Cannot index object with number (0)",
      );
    });

    it("should reject non-integer array indices", () => {
      expect(() => index([1], "a")).toThrow(ArrayIndexByNonIntError);
      expect(() => index([1], 0.5)).toThrow(
        "Cannot index array with number (0.5)",
      );
    });

    it("should reject scalars", () => {
      expect(() => index(true, "a")).toThrow(IndexOnNonIndexableError);
      expect(() => index("abc", 0)).toThrow(
        'Cannot index string ("abc") with number (0)',
      );
    });
  });

  describe("slice", () => {
    it("should slice arrays with clamped bounds", () => {
      expect(slice([1, 2, 3, 4], 1, 3)).toEqual([2, 3]);
      expect(slice([1, 2, 3, 4], -2)).toEqual([3, 4]);
      expect(slice([1, 2, 3, 4], undefined, 10)).toEqual([1, 2, 3, 4]);
      expect(slice([1, 2, 3, 4], 3, 1)).toEqual([]);
    });

    it("should treat null bounds as open", () => {
      expect(slice([1, 2, 3], null, 2)).toEqual([1, 2]);
      expect(slice([1, 2, 3], 1, null)).toEqual([2, 3]);
    });

    it("should slice strings by code point", () => {
      expect(slice("a\u{1F600}bc", 1, 3)).toBe("\u{1F600}b");
      expect(slice("hello", -3)).toBe("llo");
    });

    it("should reject non-integer bounds", () => {
      expect(() => slice([1, 2], "a")).toThrow(SliceByNonIntError);
      expect(() => slice([1, 2], 0, 1.5)).toThrow(
        "Slice bounds must be integers, got number (1.5)",
      );
    });

    it("should reject other types, including null", () => {
      expect(() => slice(obj({ a: 1 }), 0, 1)).toThrow(
        SliceOnNonArrayNorStringError,
      );
      expect(() => slice(null, 0, 1)).toThrow("Cannot slice null (null)");
    });
  });

  describe("iterate", () => {
    it("should yield array elements in order", () => {
      expect([...iterate([3, 1, 2])]).toEqual([3, 1, 2]);
    });

    it("should yield object values in insertion order", () => {
      expect([...iterate(obj({ b: 1, a: 2 }))]).toEqual([1, 2]);
    });

    it("should keep integer-like keys in insertion order", () => {
      const built = constructObject([
        ["b", 1],
        ["1", 2],
      ]);
      expect([...iterate(built)]).toEqual([1, 2]);
    });

    it("should be restartable", () => {
      const values = iterate(obj({ x: 1 }));
      expect([...values]).toEqual([1]);
      expect([...values]).toEqual([1]);
    });

    it("should reject scalars", () => {
      expect(() => iterate(5)).toThrow(IterateOnNonIterableError);
      expect(() => iterate(null)).toThrow("Cannot iterate over null (null)");
    });
  });

  describe("unaryNegate", () => {
    it("should negate numbers", () => {
      expect(unaryNegate(3)).toBe(-3);
    });

    it("should reject other types", () => {
      expect(() => unaryNegate("a")).toThrow(UnaryOnNonNumericError);
      expect(() => unaryNegate("a")).toThrow('string ("a") cannot be negated');
    });
  });

  describe("constructObject", () => {
    it("should let later duplicate keys win", () => {
      const built = constructObject([
        ["a", 1],
        ["b", 2],
        ["a", 3],
      ]);
      expect(toJson(built)).toEqual({ a: 3, b: 2 });
      expect([...built.keys()]).toEqual(["a", "b"]);
    });

    it("should reject non-string keys", () => {
      expect(() => constructObject([[1, 2]])).toThrow(ObjectNonStringKeyError);
      expect(() => constructObject([[1, 2]])).toThrow(
        "Cannot use number (1) as object key",
      );
    });

    it("should keep __proto__ as a plain key", () => {
      const built = constructObject([["__proto__", 1]]);
      expect([...built.keys()]).toEqual(["__proto__"]);
      expect(toJsonText(built)).toBe('{"__proto__":1}');
      expect(Object.getPrototypeOf(toJson(built))).toBe(null);
    });
  });

  describe("mergeObjects", () => {
    it("should prefer keys from the right", () => {
      expect(toJson(mergeObjects(obj({ a: 1, b: 2 }), obj({ b: 3 })))).toEqual(
        { a: 1, b: 3 },
      );
    });

    it("should append new keys after existing ones", () => {
      const merged = mergeObjects(obj({ b: 1 }), constructObject([["0", 2]]));
      expect([...merged.keys()]).toEqual(["b", "0"]);
    });
  });

  describe("deepMergeObjects", () => {
    it("should merge nested objects", () => {
      const merged = deepMergeObjects(
        obj({ a: { x: 1, y: 2 }, b: 1 }),
        obj({ a: { y: 3 }, b: {} }),
      );
      expect(toJson(merged)).toEqual({ a: { x: 1, y: 3 }, b: {} });
    });
  });

  describe("binaryOp", () => {
    it("should add by type", () => {
      expect(binaryOp("+", 1, 2)).toBe(3);
      expect(binaryOp("+", "a", "b")).toBe("ab");
      expect(binaryOp("+", [1], [2])).toEqual([1, 2]);
      expect(toJson(binaryOp("+", obj({ a: 1 }), obj({ b: 2 })))).toEqual({
        a: 1,
        b: 2,
      });
    });

    it("should treat null as the identity for addition", () => {
      expect(binaryOp("+", null, 5)).toBe(5);
      expect(binaryOp("+", "x", null)).toBe("x");
      expect(binaryOp("+", null, null)).toBe(null);
    });

    it("should report incompatible operands", () => {
      expect(() => binaryOp("+", "a", 1)).toThrow(
        IncompatibleBinaryOperatorError,
      );
      expect(() => binaryOp("+", "a", 1)).toThrow(
        'string ("a") and number (1) cannot be added',
      );
      expect(() => binaryOp("-", "a", "b")).toThrow(
        'string ("a") and string ("b") cannot be subtracted',
      );
    });

    it("should remove array elements on subtraction", () => {
      expect(binaryOp("-", [1, 2, 3, 2], [2])).toEqual([1, 3]);
      const items: QueryValue[] = [obj({ a: 1 }), obj({ a: 2 })];
      expect(toJson(binaryOp("-", items, [obj({ a: 1 })]))).toEqual([
        { a: 2 },
      ]);
    });

    it("should repeat strings in either operand order", () => {
      expect(binaryOp("*", "ab", 3)).toBe("ababab");
      expect(binaryOp("*", 2, "x")).toBe("xx");
      expect(binaryOp("*", "ab", 0)).toBe("");
    });

    it("should reject negative or fractional repeat counts", () => {
      expect(() => binaryOp("*", "ab", -1)).toThrow(
        StringRepeatByNonUSizeError,
      );
      expect(() => binaryOp("*", "ab", 1.5)).toThrow(
        "Cannot repeat string 1.5 times",
      );
    });

    it("should reject repeat counts past the longest string", () => {
      expect(() => binaryOp("*", "a", 1e10)).toThrow(
        StringRepeatByNonUSizeError,
      );
      expect(() => binaryOp("*", "ab", MAX_STRING_LENGTH)).toThrow(
        `Cannot repeat string ${MAX_STRING_LENGTH} times`,
      );
    });

    it("should deep merge objects on multiplication", () => {
      const merged = binaryOp("*", obj({ a: { b: 1 } }), obj({ a: { c: 2 } }));
      expect(toJson(merged)).toEqual({ a: { b: 1, c: 2 } });
    });

    it("should split strings on division", () => {
      expect(binaryOp("/", "a,b,c", ",")).toEqual(["a", "b", "c"]);
      expect(binaryOp("/", "", ",")).toEqual([]);
    });

    it("should split on an empty separator by code point", () => {
      expect(binaryOp("/", "a\u{1F600}", "")).toEqual(["a", "\u{1F600}"]);
    });

    it("should refuse to divide by zero", () => {
      expect(() => binaryOp("/", 1, 0)).toThrow(DivModByZeroError);
      expect(() => binaryOp("/", 1, 0)).toThrow(
        "number (1) and number (0) cannot be divided because the divisor is zero",
      );
      expect(() => binaryOp("%", 5, 0.5)).toThrow(
        "number (5) and number (0) cannot be divided (remainder) because the divisor is zero",
      );
    });

    it("should truncate operands of modulo", () => {
      expect(binaryOp("%", 7, 3)).toBe(1);
      expect(binaryOp("%", -7, 3)).toBe(-1);
      expect(binaryOp("%", 7.9, 3.2)).toBe(1);
      expect(binaryOp("%", -6, 3)).toBe(0);
    });

    it("should propagate NaN through modulo", () => {
      expect(binaryOp("%", Number.NaN, 2)).toBeNaN();
    });
  });

  describe("requireInteger", () => {
    it("should accept integers and reject fractions", () => {
      expect(requireInteger(4)).toBe(4);
      expect(() => requireInteger(2.5)).toThrow(NonIntegralNumberError);
    });
  });

  describe("fromJson", () => {
    it("should build ordered objects", () => {
      const v = fromJson(JSON.parse('{"a":{"b":[1]}}'));
      expect(v).toEqual(new Map([["a", new Map([["b", [1]]])]]));
    });

    it("should keep the order of Map input", () => {
      const v = fromJson(
        new Map<string, unknown>([
          ["z", 1],
          ["2", 2],
        ]),
      );
      expect(isObject(v) && [...v.keys()]).toEqual(["z", "2"]);
    });

    it("should reject values with no JSON form", () => {
      expect(() => fromJson(undefined)).toThrow(InvalidArgumentError);
      expect(() => fromJson({ f: () => 1 })).toThrow(
        "Cannot convert function to a JSON value",
      );
      expect(() => fromJson(new Map([[1, 1]]))).toThrow(
        "Cannot convert a number map key to a JSON object key",
      );
    });
  });

  describe("toJson", () => {
    it("should return plain data with null-prototype records", () => {
      const plain = toJson(fromJson({ a: [1, { b: null }] }));
      expect(plain).toEqual({ a: [1, { b: null }] });
      expect(Object.getPrototypeOf(plain)).toBe(null);
    });
  });
});
