/**
 * Safe Object Utilities
 *
 * Query values handed back to callers as plain data use null-prototype
 * records. Without a prototype, every string is an ordinary own key:
 * "__proto__", "constructor" and friends cannot reach or modify
 * Object.prototype.
 */

/**
 * Create an empty null-prototype record.
 */
export function createRecord<T>(): Record<string, T> {
  const record: Record<string, T> = Object.create(null);
  return record;
}

/**
 * Set an own property as a data property.
 * defineProperty keeps "__proto__" an ordinary key even if the target
 * was created with a prototype.
 */
export function safeSet<T>(
  obj: Record<string, T>,
  key: string,
  value: T,
): void {
  Object.defineProperty(obj, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}
