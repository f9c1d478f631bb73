import { isReviewError } from "../errors";

/**
 * Recursively sanitize a value for JSON transport in action results.
 * - Date → ISO string, Map → plain object, Set → array
 * - ReviewError → its toJSON() form without the stack
 * - functions and undefined values dropped, circular references broken
 */
function serializeValue(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "function") return undefined;
  if (typeof value !== "object") return value;
  if (value instanceof Date) return value.toISOString();
  if (isReviewError(value)) {
    const { stack: _stack, ...rest } = value.toJSON();
    return rest;
  }

  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  if (Array.isArray(value)) return value.map((item) => serializeValue(item, seen));
  if (value instanceof Set) return [...value].map((item) => serializeValue(item, seen));
  if (value instanceof Map) {
    const entries: Record<string, unknown> = {};
    for (const [key, item] of value) entries[String(key)] = serializeValue(item, seen);
    return entries;
  }

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const serialized = serializeValue(item, seen);
    if (serialized !== undefined) result[key] = serialized;
  }
  return result;
}

export function safeSerialize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const seen = new WeakSet<object>([obj]);
  for (const [key, value] of Object.entries(obj)) {
    const serialized = serializeValue(value, seen);
    if (serialized !== undefined) result[key] = serialized;
  }
  return result;
}
