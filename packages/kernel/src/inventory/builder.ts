/**
 * Fleetwire Kernel: Inventory Builder
 *
 * Accumulates inventory documents in source order and produces the frozen
 * Inventory for one resolution pass.
 *
 * Merge rules when a later document names a group an earlier one declared:
 *   - hosts:    set union
 *   - children: set union
 *   - vars:     overlaid with mergeVars (later non-mapping values win,
 *               nested mappings merge)
 * `_meta.hostvars` entries for the same host are overlaid the same way.
 *
 * build() validates the finished graph: the root group is created if no
 * document declared it, children naming undeclared groups become empty
 * groups, and any cycle in the children relation is rejected.
 */

import { InventoryCycleError } from '../errors.js';
import { emptyRecord, ownValue, type JsonObject } from '../types/json.js';
import type { Group, Inventory, InventoryDocument } from '../types/inventory.js';
import { deepFreeze, mergeVars } from '../vars/merge.js';

/** Default name of the implicit top-level group. */
export const DEFAULT_ROOT_GROUP = 'all';

interface MutableGroup {
  readonly hosts: Set<string>;
  readonly children: Set<string>;
  vars: JsonObject;
}

export class InventoryBuilder {
  private readonly groups: Map<string, MutableGroup> = new Map();
  private readonly hostvars: Map<string, JsonObject> = new Map();

  constructor(private readonly rootGroup: string = DEFAULT_ROOT_GROUP) {}

  /** Merge one document over everything added so far. */
  addDocument(doc: InventoryDocument): this {
    for (const [name, entry] of Object.entries(doc.groups)) {
      const group = this.group(name);
      for (const host of entry.hosts ?? []) group.hosts.add(host);
      for (const child of entry.children ?? []) group.children.add(child);
      if (entry.vars !== undefined) group.vars = mergeVars(group.vars, entry.vars);
    }

    for (const [host, vars] of Object.entries(doc.hostvars ?? {})) {
      this.hostvars.set(host, mergeVars(this.hostvars.get(host) ?? {}, vars));
    }
    return this;
  }

  /**
   * Produce the frozen inventory.
   *
   * @throws {InventoryCycleError} If the children relation contains a cycle
   */
  build(): Inventory {
    this.group(this.rootGroup);
    for (const group of [...this.groups.values()]) {
      for (const child of group.children) this.group(child);
    }

    const groups = emptyRecord<Group>();
    const hosts = new Set<string>(this.hostvars.keys());
    for (const name of [...this.groups.keys()].sort()) {
      const g = this.groups.get(name);
      if (g === undefined) continue;
      for (const host of g.hosts) hosts.add(host);
      groups[name] = Object.freeze({
        name,
        hosts: Object.freeze([...g.hosts].sort()),
        children: Object.freeze([...g.children].sort()),
        vars: deepFreeze(g.vars),
      });
    }

    assertAcyclic(groups);

    const hostvars = emptyRecord<JsonObject>();
    for (const host of [...this.hostvars.keys()].sort()) {
      const vars = this.hostvars.get(host);
      if (vars !== undefined) hostvars[host] = deepFreeze(vars);
    }

    return Object.freeze({
      root_group: this.rootGroup,
      groups: Object.freeze(groups),
      hosts: Object.freeze([...hosts].sort()),
      hostvars: Object.freeze(hostvars),
    });
  }

  private group(name: string): MutableGroup {
    let group = this.groups.get(name);
    if (group === undefined) {
      group = { hosts: new Set(), children: new Set(), vars: {} };
      this.groups.set(name, group);
    }
    return group;
  }
}

/** Build an inventory from documents in source order. */
export function buildInventory(
  docs: ReadonlyArray<InventoryDocument>,
  rootGroup: string = DEFAULT_ROOT_GROUP,
): Inventory {
  const builder = new InventoryBuilder(rootGroup);
  for (const doc of docs) builder.addDocument(doc);
  return builder.build();
}

/**
 * Reject any cycle in the children relation.
 *
 * Depth-first walk with an explicit path stack: revisiting a group that is
 * on the current path is a cycle; revisiting one that is already finished
 * is a diamond and is skipped.
 *
 * @throws {InventoryCycleError} Naming the cycle, first group repeated at the end
 */
export function assertAcyclic(groups: Readonly<Record<string, Group>>): void {
  const finished = new Set<string>();
  const onPath = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): void => {
    if (finished.has(name)) return;
    if (onPath.has(name)) {
      throw new InventoryCycleError([...path.slice(path.indexOf(name)), name]);
    }
    onPath.add(name);
    path.push(name);
    for (const child of ownValue(groups, name)?.children ?? []) visit(child);
    path.pop();
    onPath.delete(name);
    finished.add(name);
  };

  for (const name of Object.keys(groups).sort()) visit(name);
}
