/**
 * Fleetwire Kernel: Variable Precedence Engine
 *
 * mergeVars(base, overlay) layers one variable mapping over another:
 *
 *   - scalars and sequences in `overlay` replace the key in `base` outright;
 *   - nested mappings merge key by key, recursively, so an overlay supplying
 *     one nested key keeps the sibling keys from `base`.
 *
 * Neither input is mutated and the result shares no structure with either
 * input. Applying the same group twice, or reaching it along two paths of a
 * diamond, therefore cannot leak state from one merge into another.
 *
 * Results are prototype-less records: a `__proto__` or `constructor` key is
 * ordinary data.
 *
 * Callers supply layers in ascending precedence; the merge itself has no
 * notion of where a mapping came from.
 */

import { emptyRecord, isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

export function mergeVars(base: JsonObject, overlay: JsonObject): JsonObject {
  const merged = emptyRecord<JsonValue>();

  for (const [key, value] of Object.entries(base)) {
    merged[key] = cloneJson(value);
  }

  for (const [key, value] of Object.entries(overlay)) {
    const existing = merged[key];
    merged[key] =
      isJsonObject(existing) && isJsonObject(value)
        ? mergeVars(existing, value)
        : cloneJson(value);
  }

  return merged;
}

/** Fold `layers` left to right: later layers take precedence. */
export function mergeAll(layers: ReadonlyArray<JsonObject>): JsonObject {
  return layers.reduce<JsonObject>((acc, layer) => mergeVars(acc, layer), {});
}

/** Deep copy of a JSON value. */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
  if (value === null || typeof value !== 'object') return value;
  if (isJsonObject(value)) {
    const copy = emptyRecord<JsonValue>();
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneJson(item);
    }
    return copy;
  }
  return value.map((item) => cloneJson(item));
}

/**
 * Recursively freeze a JSON value so a shared, built inventory cannot be
 * modified by one reader while another is resolving against it.
 */
export function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
