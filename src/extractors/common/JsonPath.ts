/**
 * Helpers for walking untyped JSON payloads
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Falsy scalars, empty arrays and empty objects
 */
export function isEmptyValue(value: unknown): boolean {
  if (
    value === undefined ||
    value === null ||
    value === "" ||
    value === 0 ||
    value === false
  ) {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Walk a key path: string keys into objects (a missing key yields []),
 * numeric or digit-string indices into arrays; stops at the first step
 * that does not fit the current shape
 */
export function descendPath(
  data: unknown,
  path: readonly (string | number)[],
): unknown {
  let current = data;
  for (const step of path) {
    if (isJsonObject(current)) {
      current = current[String(step)] ?? [];
    } else if (Array.isArray(current) && /^\d+$/.test(String(step))) {
      current = current[Number(step)];
    } else {
      break;
    }
  }
  return current;
}

/**
 * Arrays as they are, a single non-empty value wrapped, anything empty as []
 */
export function toItemList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return isEmptyValue(value) ? [] : [value];
}
