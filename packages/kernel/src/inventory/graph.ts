/**
 * Fleetwire Kernel: Inventory Graph Rendering
 *
 * Plain-text tree of the group graph in the familiar `--graph` layout:
 *
 *   @all:
 *     |--@production:
 *     |  |--@webservers:
 *     |  |  |--web1
 *     |--db1
 *
 * Under the root: its declared children plus every group that no other
 * group lists as a child, then hosts that belong to no group at all.
 * A group reached along two paths is printed under both.
 */

import type { Inventory } from '../types/inventory.js';
import { ownValue } from '../types/json.js';
import { directGroupsOf, parentIndex } from './resolver.js';

export function renderInventoryGraph(inventory: Inventory, groupName: string = inventory.root_group): string {
  const root = inventory.root_group;
  const parents = parentIndex(inventory);
  const lines: string[] = [];

  const childGroupsOf = (name: string): ReadonlyArray<string> => {
    const declared = ownValue(inventory.groups, name)?.children ?? [];
    if (name !== root) return declared;
    const orphans = Object.keys(inventory.groups).filter(
      (g) => g !== root && (parents.get(g) ?? []).length === 0,
    );
    return [...new Set([...declared, ...orphans])].sort();
  };

  const hostsOf = (name: string): ReadonlyArray<string> => {
    const direct = ownValue(inventory.groups, name)?.hosts ?? [];
    if (name !== root) return direct;
    const ungrouped = inventory.hosts.filter((host) =>
      directGroupsOf(inventory, host).every((g) => g === root),
    );
    return [...new Set([...direct, ...ungrouped])].sort();
  };

  const walk = (name: string, prefix: string): void => {
    const childPrefix = prefix === '' ? '  |--' : prefix.replace(/\|--$/, '|  |--');
    for (const child of childGroupsOf(name)) {
      lines.push(`${childPrefix}@${child}:`);
      walk(child, childPrefix);
    }
    for (const host of hostsOf(name)) {
      lines.push(`${childPrefix}${host}`);
    }
  };

  lines.push(`@${groupName}:`);
  walk(groupName, '');
  return lines.join('\n');
}
