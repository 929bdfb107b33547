/**
 * Fleetwire Kernel: Inventory Serialization
 *
 * Renders a built Inventory back into the `--list` document shape, so a
 * static inventory can be re-emitted by a dynamic source (or the CLI) and
 * parsed again by the same code path. Keys are emitted in sorted order and
 * empty parts are omitted; `_meta.hostvars` is always present so consumers
 * never fall back to per-host `--host` queries.
 */

import { emptyRecord, ownValue, type JsonObject, type JsonValue } from '../types/json.js';
import type { Inventory } from '../types/inventory.js';
import { cloneJson } from '../vars/merge.js';
import { META_KEY } from './document.js';

export function toInventoryDocument(inventory: Inventory): JsonObject {
  const doc = emptyRecord<JsonValue>();

  for (const name of Object.keys(inventory.groups).sort()) {
    const group = ownValue(inventory.groups, name);
    if (group === undefined) continue;
    const entry = emptyRecord<JsonValue>();
    if (group.hosts.length > 0) entry['hosts'] = [...group.hosts];
    if (group.children.length > 0) entry['children'] = [...group.children];
    if (Object.keys(group.vars).length > 0) entry['vars'] = cloneJson(group.vars);
    doc[name] = entry;
  }

  const hostvars = emptyRecord<JsonValue>();
  for (const host of Object.keys(inventory.hostvars).sort()) {
    const vars = ownValue(inventory.hostvars, host);
    if (vars !== undefined) hostvars[host] = cloneJson(vars);
  }
  doc[META_KEY] = { hostvars };

  return doc;
}
