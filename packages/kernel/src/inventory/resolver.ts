/**
 * Fleetwire Kernel: Host Variable Resolution
 *
 * hostVars(inventory, host) collapses the group graph into one variable
 * mapping for a host:
 *
 *   1. Applicable groups: the root group, plus every group from which the
 *      host is reachable by following children edges downward (including a
 *      group the host is a direct member of). Unrelated groups never apply.
 *   2. Order by depth, shallowest first. Depth is the longest children-path
 *      distance from the root group; a group nobody lists as a child hangs
 *      directly below the root. Equal depths order by name.
 *   3. Deep-merge each applicable group's vars once, in that order.
 *   4. Merge the host's `_meta.hostvars` entry last; it always wins.
 *
 * The walk runs over parent edges with an explicit path, so a cycle raises
 * InventoryCycleError even for an Inventory that did not come from
 * InventoryBuilder.
 */

import { InventoryCycleError, UnknownHostError } from '../errors.js';
import { emptyRecord, ownValue, type JsonObject } from '../types/json.js';
import type { Group, Inventory } from '../types/inventory.js';
import { deepFreeze, mergeVars } from '../vars/merge.js';

/** An applicable group with its depth below the root. */
export interface GroupPrecedence {
  readonly name: string;
  readonly depth: number;
}

/**
 * Index of parent edges, computed once per inventory.
 *
 * The root group is never recorded as a parent: it is the implicit parent of
 * every group and is handled separately.
 */
export function parentIndex(inventory: Inventory): ReadonlyMap<string, ReadonlyArray<string>> {
  const parents = new Map<string, string[]>();
  for (const group of Object.values(inventory.groups)) {
    if (group.name === inventory.root_group) continue;
    for (const child of group.children) {
      const list = parents.get(child) ?? [];
      list.push(group.name);
      parents.set(child, list);
    }
  }
  for (const list of parents.values()) list.sort();
  return parents;
}

/** Names of the groups listing `host` as a direct member, sorted. */
export function directGroupsOf(inventory: Inventory, host: string): ReadonlyArray<string> {
  return Object.values(inventory.groups)
    .filter((group) => group.hosts.includes(host))
    .map((group) => group.name)
    .sort();
}

/**
 * The groups whose variables apply to `host`, in ascending precedence.
 *
 * @throws {UnknownHostError} If the host is not in the inventory
 * @throws {InventoryCycleError} If a cycle is met while walking parents
 */
export function applicableGroups(
  inventory: Inventory,
  host: string,
  parents: ReadonlyMap<string, ReadonlyArray<string>> = parentIndex(inventory),
): ReadonlyArray<GroupPrecedence> {
  if (!inventory.hosts.includes(host)) {
    throw new UnknownHostError(host);
  }

  const root = inventory.root_group;
  const depths = new Map<string, number>([[root, 0]]);
  const onPath: string[] = [];

  const depthOf = (name: string): number => {
    const known = depths.get(name);
    if (known !== undefined) return known;

    const cycleStart = onPath.indexOf(name);
    if (cycleStart !== -1) {
      // The path runs child -> parent; report it parent -> child.
      throw new InventoryCycleError([...onPath.slice(cycleStart), name].reverse());
    }

    onPath.push(name);
    let deepestParent = 0;
    for (const parent of parents.get(name) ?? []) {
      deepestParent = Math.max(deepestParent, depthOf(parent));
    }
    onPath.pop();

    const depth = deepestParent + 1;
    depths.set(name, depth);
    return depth;
  };

  for (const name of directGroupsOf(inventory, host)) depthOf(name);

  return [...depths.entries()]
    .map(([name, depth]) => ({ name, depth }))
    .sort((a, b) => a.depth - b.depth || compareNames(a.name, b.name));
}

/**
 * Resolve the final variable mapping for one host.
 *
 * @throws {UnknownHostError} If the host is not in the inventory
 * @throws {InventoryCycleError} If a cycle is met while walking parents
 */
export function hostVars(
  inventory: Inventory,
  host: string,
  parents?: ReadonlyMap<string, ReadonlyArray<string>>,
): JsonObject {
  let vars: JsonObject = {};
  for (const { name } of applicableGroups(inventory, host, parents)) {
    const group: Group | undefined = ownValue(inventory.groups, name);
    if (group !== undefined) vars = mergeVars(vars, group.vars);
  }
  return mergeVars(vars, ownValue(inventory.hostvars, host) ?? {});
}

/**
 * Per-inventory host variable cache.
 *
 * One resolver is bound to one inventory for its whole life; resolving
 * against a rebuilt inventory means constructing a new resolver, so stale
 * entries cannot outlive the data they were computed from.
 *
 * Entries are keyed per host and computed synchronously, so concurrent
 * callers resolving different hosts never contend on a shared lock.
 * Returned mappings are frozen and may be shared between callers.
 */
export class HostVarsResolver {
  private readonly cache: Map<string, JsonObject> = new Map();
  private readonly parents: ReadonlyMap<string, ReadonlyArray<string>>;

  constructor(readonly inventory: Inventory) {
    this.parents = parentIndex(inventory);
  }

  hostVars(host: string): JsonObject {
    const cached = this.cache.get(host);
    if (cached !== undefined) return cached;
    const vars = deepFreeze(hostVars(this.inventory, host, this.parents));
    this.cache.set(host, vars);
    return vars;
  }

  /** Resolve every host in the inventory, keyed by host name. */
  allHostVars(): Readonly<Record<string, JsonObject>> {
    const result = emptyRecord<JsonObject>();
    for (const host of this.inventory.hosts) {
      result[host] = this.hostVars(host);
    }
    return result;
  }

  /** Drop every cached entry. */
  clear(): void {
    this.cache.clear();
  }
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
