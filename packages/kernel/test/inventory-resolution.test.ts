/**
 * Fleetwire Kernel: Host Variable Resolution Tests
 *
 *   RES-U1: descendant group vars override the root group's
 *   RES-U2: _meta.hostvars always win over group vars
 *   RES-U3: diamond inheritance applies the shared group exactly once
 *   RES-U4: a children cycle is rejected with InventoryCycleError
 *   RES-U5: webservers/production layering: production < webservers < hostvars
 *   RES-U6: equal-depth groups are applied in name order
 *   RES-U7: unrelated sibling groups never apply
 *   RES-U8: a group reachable along a longer path ranks by its deepest depth
 *   RES-U9: unknown host raises UnknownHostError
 *   RES-U10: HostVarsResolver caches per host and returns frozen mappings
 *   RES-U11: later sources overlay earlier ones when merged
 *   RES-U12: a custom root group name is honored
 *   RES-U13: group and host names shadowing Object.prototype resolve as data
 *
 * Pure: documents are built in memory, no I/O.
 */

import { describe, it, expect } from 'vitest';
import { buildInventory } from '../src/inventory/builder.js';
import { applicableGroups, hostVars, HostVarsResolver } from '../src/inventory/resolver.js';
import { InventoryCycleError, UnknownHostError } from '../src/errors.js';
import type { Group, Inventory, InventoryDocument } from '../src/types/inventory.js';

function doc(groups: InventoryDocument['groups'], hostvars: InventoryDocument['hostvars'] = null): InventoryDocument {
  return { groups, hostvars };
}

describe('hostVars', () => {
  it('RES-U1: leaf group overrides the root group, non-conflicting keys union', () => {
    const inventory = buildInventory([
      doc({
        all: { children: ['g'], vars: { x: 0, y: 2 } },
        g: { hosts: ['h'], vars: { x: 1 } },
      }),
    ]);
    expect(hostVars(inventory, 'h')).toEqual({ x: 1, y: 2 });
  });

  it('RES-U1b: the root group applies even when it does not list the group as a child', () => {
    const inventory = buildInventory([
      doc({
        all: { vars: { x: 0, y: 2 } },
        g: { hosts: ['h'], vars: { x: 1 } },
      }),
    ]);
    expect(hostVars(inventory, 'h')).toEqual({ x: 1, y: 2 });
  });

  it('RES-U2: hostvars beat every group variable', () => {
    const inventory = buildInventory([
      doc(
        {
          all: { children: ['g'], vars: { x: 0, y: 2 } },
          g: { hosts: ['h'], vars: { x: 1 } },
        },
        { h: { x: 9 } },
      ),
    ]);
    expect(hostVars(inventory, 'h')).toEqual({ x: 9, y: 2 });
  });

  it('RES-U3: diamond inheritance contributes the shared group once', () => {
    const inventory = buildInventory([
      doc({
        all: { children: ['left', 'right'] },
        left: { children: ['shared'], vars: { side: 'left', conf: { from_left: true } } },
        right: { children: ['shared'], vars: { side: 'right', conf: { from_right: true } } },
        shared: { hosts: ['h'], vars: { conf: { shared: true }, packages: ['nginx'] } },
      }),
    ]);

    expect(applicableGroups(inventory, 'h')).toEqual([
      { name: 'all', depth: 0 },
      { name: 'left', depth: 1 },
      { name: 'right', depth: 1 },
      { name: 'shared', depth: 2 },
    ]);
    expect(hostVars(inventory, 'h')).toEqual({
      side: 'right',
      conf: { from_left: true, from_right: true, shared: true },
      packages: ['nginx'],
    });
  });

  it('RES-U4: A child of B and B child of A fails the build', () => {
    const build = () =>
      buildInventory([
        doc({
          A: { children: ['B'], hosts: ['h'] },
          B: { children: ['A'] },
        }),
      ]);

    expect(build).toThrow(InventoryCycleError);
    try {
      build();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(InventoryCycleError);
      expect((err as InventoryCycleError).cycle).toEqual(['A', 'B', 'A']);
      expect((err as InventoryCycleError).message).toBe('Inventory group cycle detected: A -> B -> A');
    }
  });

  it('RES-U4b: resolution over a hand-built cyclic inventory still terminates with InventoryCycleError', () => {
    const group = (name: string, children: string[], hosts: string[] = []): Group => ({
      name,
      hosts,
      children,
      vars: {},
    });
    const inventory: Inventory = {
      root_group: 'all',
      groups: { all: group('all', []), A: group('A', ['B'], ['h']), B: group('B', ['A']) },
      hosts: ['h'],
      hostvars: {},
    };

    expect(() => hostVars(inventory, 'h')).toThrow(InventoryCycleError);
  });

  it('RES-U5: production vars sit beneath webservers vars and web1 hostvars', () => {
    const inventory = buildInventory([
      doc(
        {
          webservers: { hosts: ['web1', 'web2', 'web3'], vars: { http_port: 8080, tier: 'web' } },
          production: { children: ['webservers'], vars: { env: 'prod', tier: 'prod', http_port: 80 } },
        },
        { web1: { http_port: 8443 } },
      ),
    ]);

    expect(applicableGroups(inventory, 'web1').map((g) => g.name)).toEqual(['all', 'production', 'webservers']);
    expect(hostVars(inventory, 'web1')).toEqual({ env: 'prod', tier: 'web', http_port: 8443 });
    expect(hostVars(inventory, 'web2')).toEqual({ env: 'prod', tier: 'web', http_port: 8080 });
  });

  it('RES-U6: groups at the same depth apply in ascending name order', () => {
    const inventory = buildInventory([
      doc({
        zeta: { hosts: ['h'], vars: { winner: 'zeta' } },
        alpha: { hosts: ['h'], vars: { winner: 'alpha', only_alpha: 1 } },
      }),
    ]);
    expect(hostVars(inventory, 'h')).toEqual({ winner: 'zeta', only_alpha: 1 });
  });

  it('RES-U7: sibling groups that do not contain the host are ignored', () => {
    const inventory = buildInventory([
      doc({
        all: { children: ['web', 'db'] },
        web: { hosts: ['web1'], vars: { role: 'web' } },
        db: { hosts: ['db1'], vars: { role: 'db', backup: true } },
      }),
    ]);
    expect(hostVars(inventory, 'web1')).toEqual({ role: 'web' });
  });

  it('RES-U8: depth is the longest path from the root', () => {
    // `site` is a direct child of the root and also a grandchild via region.
    const inventory = buildInventory([
      doc({
        all: { children: ['region', 'site'] },
        region: { children: ['site'], vars: { dc: 'region' } },
        site: { hosts: ['h'], vars: { dc: 'site' } },
      }),
    ]);
    expect(applicableGroups(inventory, 'h')).toEqual([
      { name: 'all', depth: 0 },
      { name: 'region', depth: 1 },
      { name: 'site', depth: 2 },
    ]);
    expect(hostVars(inventory, 'h')).toEqual({ dc: 'site' });
  });

  it('RES-U9: unknown host', () => {
    const inventory = buildInventory([doc({ web: { hosts: ['web1'] } })]);
    expect(() => hostVars(inventory, 'nope')).toThrow(UnknownHostError);
  });

  it('RES-U10: resolver caches each host and hands out frozen mappings', () => {
    const inventory = buildInventory([doc({ web: { hosts: ['web1', 'web2'], vars: { nested: { a: 1 } } } })]);
    const resolver = new HostVarsResolver(inventory);

    const first = resolver.hostVars('web1');
    expect(resolver.hostVars('web1')).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first['nested'])).toBe(true);
    expect(resolver.allHostVars()).toEqual({ web1: { nested: { a: 1 } }, web2: { nested: { a: 1 } } });

    resolver.clear();
    expect(resolver.hostVars('web1')).not.toBe(first);
  });

  it('RES-U11: multiple sources merge hosts, children and vars in order', () => {
    const inventory = buildInventory([
      doc({ web: { hosts: ['web1'], vars: { port: 80, tls: { enabled: false, cert: 'a.pem' } } } }, { web1: { a: 1 } }),
      doc({ web: { hosts: ['web2'], vars: { port: 443, tls: { enabled: true } } } }, { web1: { b: 2 } }),
    ]);

    expect(inventory.groups['web']?.hosts).toEqual(['web1', 'web2']);
    expect(hostVars(inventory, 'web1')).toEqual({ port: 443, tls: { enabled: true, cert: 'a.pem' }, a: 1, b: 2 });
  });

  it('RES-U12: root group name comes from configuration', () => {
    const inventory = buildInventory(
      [doc({ everything: { vars: { base: true } }, web: { hosts: ['web1'] } })],
      'everything',
    );
    expect(inventory.root_group).toBe('everything');
    expect(inventory.groups['all']).toBeUndefined();
    expect(hostVars(inventory, 'web1')).toEqual({ base: true });
  });

  it('RES-U13: __proto__ and constructor are ordinary group and host names', () => {
    const groups: InventoryDocument['groups'] = JSON.parse(
      '{"__proto__":{"hosts":["h1"],"vars":{"role":"proto"}},"constructor":{"children":["__proto__"],"vars":{"role":"ctor","tier":1}}}',
    );
    const inventory = buildInventory([doc(groups, JSON.parse('{"h1":{"__proto__":{"admin":true}}}'))]);

    const vars = hostVars(inventory, 'h1');
    expect(vars['role']).toBe('proto');
    expect(vars['tier']).toBe(1);
    expect(vars['admin']).toBeUndefined();
    expect(Object.keys(vars)).toEqual(['role', 'tier', '__proto__']);
    expect(() => hostVars(inventory, 'constructor')).toThrow(UnknownHostError);
    expect(() => hostVars(inventory, 'toString')).toThrow(UnknownHostError);
  });
});
