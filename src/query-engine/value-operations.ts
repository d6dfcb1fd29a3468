/**
 * Query Value Operations
 *
 * The polymorphic primitives every filter bottoms out in: indexing,
 * slicing, iteration, object construction and the arithmetic operators.
 * Each one either returns a fresh value or throws the QueryExecutionError
 * tied to the precondition it checks. Inputs are never mutated.
 */

import {
  ArrayIndexByNonIntError,
  type ArithmeticOperator,
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
import { createRecord, safeSet } from "./safe-object.js";
import {
  deepEqual,
  isArray,
  isObject,
  type QueryArray,
  type QueryObject,
  type QueryValue,
} from "./values.js";

/**
 * Integrality check shared by everything that needs a whole number.
 */
export function requireInteger(n: number): number {
  if (!Number.isInteger(n)) {
    throw new NonIntegralNumberError(n);
  }
  return n;
}

/**
 * `base[key]`. Indexing null yields null for any key; negative array
 * indices count from the end; missing keys and out-of-range positions
 * yield null.
 */
export function index(base: QueryValue, key: QueryValue): QueryValue {
  if (base === null) return null;

  if (isObject(base)) {
    if (typeof key !== "string") {
      throw new ObjectIndexByNonStringError(key);
    }
    return base.get(key) ?? null;
  }

  if (isArray(base)) {
    if (typeof key !== "number" || !Number.isInteger(key)) {
      throw new ArrayIndexByNonIntError(key);
    }
    const i = key < 0 ? base.length + key : key;
    return i >= 0 && i < base.length ? base[i] : null;
  }

  throw new IndexOnNonIndexableError(base, key);
}

function sliceBound(bound: QueryValue | undefined): number | undefined {
  if (bound === undefined || bound === null) return undefined;
  if (typeof bound !== "number" || !Number.isInteger(bound)) {
    throw new SliceByNonIntError(bound);
  }
  return bound;
}

function normalizeIndex(idx: number, len: number): number {
  if (idx < 0) return Math.max(0, len + idx);
  return Math.min(idx, len);
}

/**
 * `base[start:end]` on arrays and strings. Absent or null bounds mean the
 * beginning and the end; negative bounds count from the end; everything is
 * clamped into range. Strings are sliced by code point.
 */
export function slice(
  base: QueryValue,
  start?: QueryValue,
  end?: QueryValue,
): QueryValue {
  const from = sliceBound(start);
  const to = sliceBound(end);

  if (isArray(base)) {
    const len = base.length;
    return base.slice(
      normalizeIndex(from ?? 0, len),
      normalizeIndex(to ?? len, len),
    );
  }
  if (typeof base === "string") {
    const codePoints = Array.from(base);
    const len = codePoints.length;
    return codePoints
      .slice(normalizeIndex(from ?? 0, len), normalizeIndex(to ?? len, len))
      .join("");
  }
  throw new SliceOnNonArrayNorStringError(base);
}

/**
 * The elements of an array, or the values of an object in insertion order.
 * The returned iterable can be walked any number of times.
 */
export function iterate(base: QueryValue): Iterable<QueryValue> {
  if (isArray(base)) return base;
  if (isObject(base)) {
    const obj = base;
    return {
      [Symbol.iterator]: () => obj.values(),
    };
  }
  throw new IterateOnNonIterableError(base);
}

export function unaryNegate(value: QueryValue): QueryValue {
  if (typeof value !== "number") {
    throw new UnaryOnNonNumericError("-", value);
  }
  return -value;
}

/**
 * Build an object from key/value pairs. Keys keep the position of their
 * first occurrence; later duplicates overwrite the value.
 */
export function constructObject(
  pairs: Iterable<readonly [QueryValue, QueryValue]>,
): QueryObject {
  const result = new Map<string, QueryValue>();
  for (const [key, value] of pairs) {
    if (typeof key !== "string") {
      throw new ObjectNonStringKeyError(key);
    }
    result.set(key, value);
  }
  return result;
}

/**
 * Shallow merge; keys of `b` override keys of `a`, new keys go last.
 */
export function mergeObjects(a: QueryObject, b: QueryObject): QueryObject {
  const result = new Map(a);
  for (const [key, value] of b) {
    result.set(key, value);
  }
  return result;
}

/**
 * Recursive merge used by `*`: where both sides hold objects under the
 * same key they are merged, otherwise `b` wins.
 */
export function deepMergeObjects(a: QueryObject, b: QueryObject): QueryObject {
  const result = new Map(a);
  for (const [key, incoming] of b) {
    const existing = a.get(key);
    if (existing !== undefined && isObject(existing) && isObject(incoming)) {
      result.set(key, deepMergeObjects(existing, incoming));
    } else {
      result.set(key, incoming);
    }
  }
  return result;
}

/** Longest string V8 can allocate. */
export const MAX_STRING_LENGTH = 2 ** 29 - 24;

function repeatString(s: string, count: number): string {
  if (
    !Number.isInteger(count) ||
    count < 0 ||
    s.length * count > MAX_STRING_LENGTH
  ) {
    throw new StringRepeatByNonUSizeError(count);
  }
  return s.repeat(count);
}

function splitString(s: string, separator: string): QueryArray {
  if (s === "") return [];
  // An empty separator splits into code points, never lone surrogates
  return separator === "" ? Array.from(s) : s.split(separator);
}

function add(l: QueryValue, r: QueryValue): QueryValue {
  // jq: null + x = x, x + null = x
  if (l === null) return r;
  if (r === null) return l;
  if (typeof l === "number" && typeof r === "number") return l + r;
  if (typeof l === "string" && typeof r === "string") return l + r;
  if (isArray(l) && isArray(r)) return [...l, ...r];
  if (isObject(l) && isObject(r)) return mergeObjects(l, r);
  throw new IncompatibleBinaryOperatorError("+", l, r);
}

function subtract(l: QueryValue, r: QueryValue): QueryValue {
  if (typeof l === "number" && typeof r === "number") return l - r;
  if (isArray(l) && isArray(r)) {
    return l.filter((item) => !r.some((other) => deepEqual(item, other)));
  }
  throw new IncompatibleBinaryOperatorError("-", l, r);
}

function multiply(l: QueryValue, r: QueryValue): QueryValue {
  if (typeof l === "number" && typeof r === "number") return l * r;
  if (typeof l === "string" && typeof r === "number") {
    return repeatString(l, r);
  }
  if (typeof l === "number" && typeof r === "string") {
    return repeatString(r, l);
  }
  if (isObject(l) && isObject(r)) return deepMergeObjects(l, r);
  throw new IncompatibleBinaryOperatorError("*", l, r);
}

function divide(l: QueryValue, r: QueryValue): QueryValue {
  if (typeof l === "number" && typeof r === "number") {
    if (r === 0) throw new DivModByZeroError("/", l);
    return l / r;
  }
  if (typeof l === "string" && typeof r === "string") {
    return splitString(l, r);
  }
  throw new IncompatibleBinaryOperatorError("/", l, r);
}

function modulo(l: QueryValue, r: QueryValue): QueryValue {
  if (typeof l === "number" && typeof r === "number") {
    if (Number.isNaN(l) || Number.isNaN(r)) return Number.NaN;
    // jq truncates both operands to integers; the sign follows the dividend
    const divisor = Math.trunc(r);
    if (divisor === 0) throw new DivModByZeroError("%", l);
    return (Math.trunc(l) % divisor) + 0;
  }
  throw new IncompatibleBinaryOperatorError("%", l, r);
}

/**
 * Apply an arithmetic operator. Dispatch is on the pair of operand types.
 */
export function binaryOp(
  op: ArithmeticOperator,
  lhs: QueryValue,
  rhs: QueryValue,
): QueryValue {
  switch (op) {
    case "+":
      return add(lhs, rhs);
    case "-":
      return subtract(lhs, rhs);
    case "*":
      return multiply(lhs, rhs);
    case "/":
      return divide(lhs, rhs);
    case "%":
      return modulo(lhs, rhs);
  }
}

/**
 * Convert a decoded JSON document (e.g. JSON.parse output) into a query
 * value. Objects take the key order their enumeration gives.
 */
export function fromJson(json: unknown): QueryValue {
  if (
    json === null ||
    typeof json === "boolean" ||
    typeof json === "number" ||
    typeof json === "string"
  ) {
    return json;
  }
  if (Array.isArray(json)) {
    return json.map((item: unknown) => fromJson(item));
  }
  if (json instanceof Map) {
    const result = new Map<string, QueryValue>();
    for (const [key, item] of json) {
      if (typeof key !== "string") {
        throw new InvalidArgumentError(
          `Cannot convert a ${typeof key} map key to a JSON object key`,
          null,
        );
      }
      result.set(key, fromJson(item));
    }
    return result;
  }
  if (typeof json === "object") {
    return new Map(
      Object.entries(json).map(
        ([key, item]): [string, QueryValue] => [key, fromJson(item)],
      ),
    );
  }
  throw new InvalidArgumentError(
    `Cannot convert ${typeof json} to a JSON value`,
    null,
  );
}

/**
 * Convert a query value into plain JSON data for callers. Objects become
 * null-prototype records, so "__proto__" stays an ordinary key; integer-like
 * keys enumerate first there, as in any JavaScript object.
 */
export function toJson(value: QueryValue): unknown {
  if (isArray(value)) return value.map(toJson);
  if (isObject(value)) {
    const record = createRecord<unknown>();
    for (const [key, item] of value) {
      safeSet(record, key, toJson(item));
    }
    return record;
  }
  return value;
}
