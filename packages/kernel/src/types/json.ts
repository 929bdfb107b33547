/**
 * Fleetwire Kernel: JSON Data Model
 *
 * Every value that crosses the module or inventory boundary is plain JSON.
 * Variables, module arguments, module results and inventory documents are all
 * expressed in these shapes; nothing richer (Dates, Maps, undefined) survives
 * a trip through a subprocess.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = ReadonlyArray<JsonValue>;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * True for a JSON mapping. Arrays and null are not mappings.
 *
 * Accepts `unknown` so it can narrow freshly parsed input as well as values
 * already typed as JsonValue.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** True when every element of `value` is a string. */
export function isStringArray(value: unknown): value is ReadonlyArray<string> {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Parse text as JSON without throwing.
 *
 * Returns `undefined` when the text is not valid JSON. JSON.parse never
 * produces `undefined`, so the sentinel is unambiguous.
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/**
 * Produce a deterministic JSON string with sorted keys at every level.
 *
 * Identical data produces identical text regardless of key insertion order,
 * which makes the output usable as hash input and for structural equality.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (isJsonObject(value)) {
    const pairs = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k] ?? null)}`);
    return '{' + pairs.join(',') + '}';
  }
  return '[' + value.map(canonicalJson).join(',') + ']';
}

/**
 * A new record without a prototype.
 *
 * Group names, host names and variable keys come from inventory files and
 * module output; on a prototype-less record `__proto__` or `constructor`
 * is an ordinary key.
 */
export function emptyRecord<T>(): Record<string, T> {
  return Object.create(null);
}

/** Own-property lookup: members inherited from Object.prototype never match. */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
