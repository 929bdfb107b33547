/**
 * Fleetwire Kernel: Inventory Types
 *
 * Two shapes live here:
 *
 *   - InventoryDocument: the wire format shared by static inventory files and
 *     the `--list` output of dynamic inventory executables. Validated by
 *     parseInventoryDocument() before anything else touches it.
 *   - Inventory: the built, frozen group/host graph for one resolution pass.
 *
 * Resolved host variables are never stored on either shape; they are derived
 * on demand by the resolver.
 */

import type { JsonObject } from './json.js';

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

/** One group entry of an inventory document, after validation. */
export interface GroupDocument {
  readonly hosts?: ReadonlyArray<string> | undefined;
  readonly children?: ReadonlyArray<string> | undefined;
  readonly vars?: JsonObject | undefined;
}

/**
 * A validated inventory document.
 *
 * `groups` holds every top-level key except `_meta`. A group written in the
 * shorthand list form (`"web": ["web1", "web2"]`) is normalized to
 * `{ hosts: [...] }` during validation.
 *
 * `hostvars` is `null` when the document carried no `_meta` key at all.
 * That distinction matters for dynamic sources: only a source that omits
 * `_meta` is queried per host with `--host`.
 */
export interface InventoryDocument {
  readonly groups: Readonly<Record<string, GroupDocument>>;
  readonly hostvars: Readonly<Record<string, JsonObject>> | null;
}

// ---------------------------------------------------------------------------
// Built graph
// ---------------------------------------------------------------------------

/** A named collection of hosts, child groups and variables. */
export interface Group {
  readonly name: string;
  /** Direct host members, sorted. */
  readonly hosts: ReadonlyArray<string>;
  /** Direct child group names, sorted. */
  readonly children: ReadonlyArray<string>;
  readonly vars: JsonObject;
}

/**
 * The group/host graph for one resolution pass.
 *
 * Invariants (established by InventoryBuilder.build()):
 * - `groups[root_group]` exists.
 * - Every name in any group's `children` is a key of `groups`.
 * - The children relation is acyclic.
 * - `hosts` is the sorted union of every group's direct members and every
 *   key of `hostvars`.
 * - The whole structure is frozen.
 */
export interface Inventory {
  readonly root_group: string;
  readonly groups: Readonly<Record<string, Group>>;
  readonly hosts: ReadonlyArray<string>;
  readonly hostvars: Readonly<Record<string, JsonObject>>;
}
