/**
 * Safe Object Utilities
 *
 * Parsed JSON may carry keys like "__proto__" or "constructor" as plain
 * data. These helpers read and copy such documents through own properties
 * only, so a key never reaches or alters the prototype chain.
 */

import type { JsonObject, JsonValue } from "../types.js";

/**
 * Keys that name prototype machinery when used with plain assignment or
 * the `in` operator.
 */
const PROTOTYPE_KEYS = new Set(["__proto__", "constructor", "prototype"]);

/**
 * Check if a key is safe to use for plain property assignment.
 */
export function isSafeKey(key: string): boolean {
  return !PROTOTYPE_KEYS.has(key);
}

/**
 * Check if object has own property safely (not inherited from prototype).
 */
export function safeHasOwn(obj: object, key: string): boolean {
  return Object.hasOwn(obj, key);
}

/**
 * Get an own property of a JSON object.
 * Returns undefined for inherited properties such as `constructor`.
 */
export function safeGet(obj: JsonObject, key: string): JsonValue | undefined {
  if (safeHasOwn(obj, key)) {
    return obj[key];
  }
  return undefined;
}

/**
 * Set a property as own data, including keys that plain assignment would
 * route to the prototype (`obj["__proto__"] = v` replaces the prototype).
 */
export function safeSet(obj: JsonObject, key: string, value: JsonValue): void {
  if (isSafeKey(key)) {
    obj[key] = value;
    return;
  }
  Object.defineProperty(obj, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep copy a JSON value. The copy shares no object or array with the
 * source and keeps every own key, dangerous ones included, as data.
 */
export function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneJson);
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const key of Object.keys(value)) {
      safeSet(result, key, cloneJson(value[key]));
    }
    return result;
  }
  return value;
}
