/**
 * Fleetwire Kernel: Inventory Document Validation
 *
 * Static inventory files and dynamic `--list` output share one schema:
 *
 *   {
 *     "<group>": { "hosts": [..], "children": [..], "vars": { .. } },
 *     "<group>": ["host1", "host2"],            // shorthand: hosts only
 *     "_meta": { "hostvars": { "<host>": { .. } } }
 *   }
 *
 * parseInventoryDocument() is the single gate through which parsed JSON of
 * unknown shape becomes an InventoryDocument. It reports every problem it
 * finds rather than stopping at the first one.
 */

import { emptyRecord, isJsonObject, isStringArray, ownValue, type JsonObject } from '../types/json.js';
import type { GroupDocument, InventoryDocument } from '../types/inventory.js';
import type { ValidationError, ValidationResult } from '../types/validation.js';

/** Reserved top-level key carrying per-host variables. */
export const META_KEY = '_meta';

const GROUP_KEYS = new Set(['hosts', 'children', 'vars']);

/**
 * Validate a parsed JSON value as an inventory document.
 *
 * @param value - Output of JSON.parse
 * @param source - Source name, used as error context
 */
export function parseInventoryDocument(value: unknown, source: string): ValidationResult<InventoryDocument> {
  if (!isJsonObject(value)) {
    return { ok: false, errors: [{ message: 'inventory must be a JSON object', context: source }] };
  }

  const errors: ValidationError[] = [];
  const groups = emptyRecord<GroupDocument>();

  for (const [name, entry] of Object.entries(value)) {
    if (name === META_KEY) continue;
    const group = parseGroup(name, entry, source, errors);
    if (group !== null) groups[name] = group;
  }

  const hostvars = Object.hasOwn(value, META_KEY) ? parseMeta(value[META_KEY], source, errors) : null;

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: { groups, hostvars } };
}

/**
 * Validate the output of a dynamic source's `--host <name>` call.
 */
export function parseHostDocument(value: unknown, source: string, host: string): ValidationResult<JsonObject> {
  if (!isJsonObject(value)) {
    return {
      ok: false,
      errors: [{ message: 'host variables must be a JSON object', context: `${source}: --host ${host}` }],
    };
  }
  return { ok: true, value };
}

function parseGroup(
  name: string,
  entry: unknown,
  source: string,
  errors: ValidationError[],
): GroupDocument | null {
  const context = `${source}: group '${name}'`;

  if (isStringArray(entry)) {
    return { hosts: entry };
  }
  if (!isJsonObject(entry)) {
    errors.push({ message: 'group must be an object or a list of host names', context });
    return null;
  }

  let valid = true;
  for (const key of Object.keys(entry)) {
    if (!GROUP_KEYS.has(key)) {
      errors.push({ message: `unknown group key '${key}'`, context });
      valid = false;
    }
  }

  const { hosts, children, vars } = entry;
  if (hosts !== undefined && !isStringArray(hosts)) {
    errors.push({ message: "'hosts' must be a list of host names", context });
    valid = false;
  }
  if (children !== undefined && !isStringArray(children)) {
    errors.push({ message: "'children' must be a list of group names", context });
    valid = false;
  }
  if (vars !== undefined && !isJsonObject(vars)) {
    errors.push({ message: "'vars' must be an object", context });
    valid = false;
  }
  if (!valid) return null;

  return {
    hosts: isStringArray(hosts) ? hosts : undefined,
    children: isStringArray(children) ? children : undefined,
    vars: isJsonObject(vars) ? vars : undefined,
  };
}

function parseMeta(
  meta: unknown,
  source: string,
  errors: ValidationError[],
): Readonly<Record<string, JsonObject>> {
  const result = emptyRecord<JsonObject>();
  if (!isJsonObject(meta)) {
    errors.push({ message: `'${META_KEY}' must be an object`, context: source });
    return result;
  }

  const hostvars = ownValue(meta, 'hostvars');
  if (hostvars === undefined) return result;
  if (!isJsonObject(hostvars)) {
    errors.push({ message: `'${META_KEY}.hostvars' must be an object`, context: source });
    return result;
  }

  for (const [host, vars] of Object.entries(hostvars)) {
    if (isJsonObject(vars)) {
      result[host] = vars;
    } else {
      errors.push({ message: 'host variables must be an object', context: `${source}: hostvars '${host}'` });
    }
  }
  return result;
}
