/**
 * Fleetwire Kernel: Variable Precedence Engine Tests
 *
 *   MERGE-U1: scalars in the overlay replace the base value
 *   MERGE-U2: sequences are replaced wholesale, never concatenated
 *   MERGE-U3: nested mappings merge key by key
 *   MERGE-U4: inputs are not mutated and results share no structure
 *   MERGE-U5: mergeAll folds left to right
 *   MERGE-U6: a mapping overlaid on a scalar (and vice versa) replaces it
 *   MERGE-U7: __proto__ keys from parsed JSON stay ordinary data
 */

import { describe, it, expect } from 'vitest';
import { mergeAll, mergeVars, deepFreeze } from '../src/vars/merge.js';
import type { JsonObject } from '../src/types/json.js';

describe('mergeVars', () => {
  it('MERGE-U1: overlay scalars win, non-conflicting keys union', () => {
    expect(mergeVars({ x: 0, y: 2 }, { x: 1 })).toEqual({ x: 1, y: 2 });
  });

  it('MERGE-U2: sequences are replaced entirely', () => {
    expect(mergeVars({ ports: [80, 443] }, { ports: [8080] })).toEqual({ ports: [8080] });
  });

  it('MERGE-U3: nested mappings keep sibling keys from the base', () => {
    const base: JsonObject = { ntp: { server: 'a.example', prefer: true }, tz: 'UTC' };
    const overlay: JsonObject = { ntp: { server: 'b.example' } };
    expect(mergeVars(base, overlay)).toEqual({ ntp: { server: 'b.example', prefer: true }, tz: 'UTC' });
  });

  it('MERGE-U4: frozen inputs are accepted and results are independent copies', () => {
    const base = deepFreeze<JsonObject>({ nested: { a: 1 }, list: [1, 2] });
    const overlay = deepFreeze<JsonObject>({ nested: { b: 2 } });

    const merged = mergeVars(base, overlay);
    expect(merged).toEqual({ nested: { a: 1, b: 2 }, list: [1, 2] });
    expect(merged['list']).not.toBe(base['list']);
    expect(base).toEqual({ nested: { a: 1 }, list: [1, 2] });
    expect(overlay).toEqual({ nested: { b: 2 } });
  });

  it('MERGE-U5: mergeAll equals nested pairwise merges in the same order', () => {
    const a: JsonObject = { x: 1, m: { p: 1 } };
    const b: JsonObject = { x: 2, m: { q: 2 } };
    const c: JsonObject = { m: { p: 3 } };

    expect(mergeAll([a, b, c])).toEqual(mergeVars(mergeVars(a, b), c));
    expect(mergeAll([a, b, c])).toEqual({ x: 2, m: { p: 3, q: 2 } });
    expect(mergeAll([])).toEqual({});
  });

  it('MERGE-U6: type changes between mapping and scalar replace the value', () => {
    expect(mergeVars({ v: { deep: true } }, { v: 'flat' })).toEqual({ v: 'flat' });
    expect(mergeVars({ v: 'flat' }, { v: { deep: true } })).toEqual({ v: { deep: true } });
    expect(mergeVars({ v: 1 }, { v: null })).toEqual({ v: null });
  });

  it('MERGE-U7: a __proto__ key is copied as an own key and never becomes a prototype', () => {
    const overlay: JsonObject = JSON.parse('{"__proto__":{"admin":true},"x":1}');
    const merged = mergeVars({}, overlay);

    expect(Object.keys(merged)).toEqual(['__proto__', 'x']);
    expect(Object.hasOwn(merged, 'admin')).toBe(false);
    expect(merged['admin']).toBeUndefined();
    expect(merged['__proto__']).toEqual({ admin: true });

    const again = mergeVars(merged, JSON.parse('{"__proto__":{"ops":false}}'));
    expect(again['__proto__']).toEqual({ admin: true, ops: false });
    expect(again['ops']).toBeUndefined();
  });
});
