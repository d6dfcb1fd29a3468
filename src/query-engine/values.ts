/**
 * Query Value Model
 *
 * The immutable JSON values that flow through a filter. Arrays and objects
 * are shared between environments and intermediate results, so nothing in
 * the engine mutates a value after it has been built.
 *
 * Objects are Maps: they keep insertion order for every key, including
 * integer-like ones that a plain record would enumerate first.
 */

export type QueryValue =
  | null
  | boolean
  | number
  | string
  | QueryArray
  | QueryObject;

export type QueryArray = readonly QueryValue[];

export type QueryObject = ReadonlyMap<string, QueryValue>;

export type QueryType =
  | "null"
  | "boolean"
  | "number"
  | "string"
  | "array"
  | "object";

export function isArray(v: QueryValue): v is QueryArray {
  return Array.isArray(v);
}

export function isObject(v: QueryValue): v is QueryObject {
  return v instanceof Map;
}

/**
 * Check if a value is truthy in jq semantics.
 * In jq: false and null are falsy, everything else is truthy.
 */
export function isTruthy(v: QueryValue): boolean {
  return v !== false && v !== null;
}

export function typeOf(v: QueryValue): QueryType {
  if (v === null) return "null";
  if (isArray(v)) return "array";
  if (isObject(v)) return "object";
  switch (typeof v) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    default:
      return "string";
  }
}

function numberText(n: number): string {
  if (Number.isNaN(n)) return "null";
  if (!Number.isFinite(n)) {
    return JSON.stringify(n > 0 ? Number.MAX_VALUE : -Number.MAX_VALUE);
  }
  return JSON.stringify(n);
}

/**
 * Compact JSON text for a value, objects in insertion order. Non-finite
 * numbers have no JSON form; jq prints NaN as null and infinities as the
 * largest double.
 */
export function toJsonText(v: QueryValue): string {
  if (v === null) return "null";
  if (typeof v === "boolean") return v ? "true" : "false";
  if (typeof v === "number") return numberText(v);
  if (typeof v === "string") return JSON.stringify(v);
  if (isArray(v)) return `[${v.map(toJsonText).join(",")}]`;
  const fields: string[] = [];
  for (const [key, item] of v) {
    fields.push(`${JSON.stringify(key)}:${toJsonText(item)}`);
  }
  return `{${fields.join(",")}}`;
}

const MAX_DESCRIBED_LENGTH = 30;

/**
 * Describe a value for an error message in jq's `type (json)` form,
 * truncating long JSON text.
 */
export function describeValue(v: QueryValue): string {
  // Truncated by code point so surrogate pairs stay whole
  const text = Array.from(toJsonText(v));
  const shown =
    text.length > MAX_DESCRIBED_LENGTH
      ? `${text.slice(0, MAX_DESCRIBED_LENGTH - 3).join("")}...`
      : text.join("");
  return `${typeOf(v)} (${shown})`;
}

/**
 * Deep structural equality, as `==` sees it. Object key order is not
 * significant, and NaN equals nothing, itself included.
 */
export function deepEqual(a: QueryValue, b: QueryValue): boolean {
  if (typeof a === "number" && typeof b === "number") return a === b;
  if (isArray(a) && isArray(b)) {
    return (
      a.length === b.length && a.every((item, i) => deepEqual(item, b[i]))
    );
  }
  if (isObject(a) && isObject(b)) {
    if (a.size !== b.size) return false;
    for (const [key, item] of a) {
      const other = b.get(key);
      if (other === undefined || !deepEqual(item, other)) return false;
    }
    return true;
  }
  return a === b;
}

// null < false < true < numbers < strings < arrays < objects
function typeRank(v: QueryValue): number {
  if (v === null) return 0;
  if (v === false) return 1;
  if (v === true) return 2;
  if (typeof v === "number") return 3;
  if (typeof v === "string") return 4;
  if (isArray(v)) return 5;
  return 6;
}

function compareStrings(a: string, b: string): number {
  // Code point order, not UTF-16 unit order
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const x = ai.next();
    const y = bi.next();
    if (x.done || y.done) {
      if (x.done && y.done) return 0;
      return x.done ? -1 : 1;
    }
    const cx = x.value.codePointAt(0) ?? 0;
    const cy = y.value.codePointAt(0) ?? 0;
    if (cx !== cy) return cx < cy ? -1 : 1;
  }
}

function compareNumbers(a: number, b: number): number {
  // jq sorts NaN below every other number
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : -1;
  if (Number.isNaN(b)) return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Compare two values using jq's total order. Returns a negative number,
 * zero or a positive number.
 */
export function compareValues(a: QueryValue, b: QueryValue): number {
  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return ra < rb ? -1 : 1;

  if (typeof a === "number" && typeof b === "number") {
    return compareNumbers(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return compareStrings(a, b);
  }
  if (isArray(a) && isArray(b)) {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const cmp = compareValues(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
  }
  if (isObject(a) && isObject(b)) {
    // Objects: compare sorted key sets first, then values key by key
    const aKeys = sortedKeys(a);
    const bKeys = sortedKeys(b);
    const keyCmp = compareValues(aKeys, bKeys);
    if (keyCmp !== 0) return keyCmp;
    for (const key of aKeys) {
      const cmp = compareValues(a.get(key) ?? null, b.get(key) ?? null);
      if (cmp !== 0) return cmp;
    }
  }
  // Same-rank scalars left over are null, false or true
  return 0;
}

/**
 * Sorted own keys, the order jq's `keys` reports.
 */
export function sortedKeys(obj: QueryObject): string[] {
  return [...obj.keys()].sort(compareStrings);
}
