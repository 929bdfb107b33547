/**
 * Fleetwire Kernel: Host Pattern Selection
 *
 * Selects hosts from an inventory with the usual fleet-tool pattern syntax:
 *
 *   all, *            every host
 *   web1              a host by name
 *   webservers        every host in a group or any of its descendants
 *   web*, db[12]      glob over host names (* ? [...])
 *   ~^web\d+$         regular expression over host names
 *   a:b  a,b          union
 *   a:&b              intersection
 *   a:!b              exclusion
 *
 * Terms are applied left to right. Colons inside brackets do not split.
 * A name that matches neither a group nor a host selects nothing.
 */

import { HostPatternError } from '../errors.js';
import type { Inventory } from '../types/inventory.js';
import { ownValue } from '../types/json.js';

/**
 * Return the sorted host names matched by `pattern`.
 *
 * @throws {HostPatternError} If a `~regex` term does not compile
 */
export function selectHosts(inventory: Inventory, pattern: string): ReadonlyArray<string> {
  let selected = new Set<string>();

  for (const raw of splitPattern(pattern.trim())) {
    const term = raw.trim();
    if (term === '') continue;

    if (term.startsWith('&')) {
      const other = matchTerm(inventory, term.slice(1), pattern);
      selected = new Set([...selected].filter((host) => other.has(host)));
    } else if (term.startsWith('!')) {
      for (const host of matchTerm(inventory, term.slice(1), pattern)) selected.delete(host);
    } else {
      for (const host of matchTerm(inventory, term, pattern)) selected.add(host);
    }
  }

  return [...selected].sort();
}

/** Every host reachable from `groupName` through direct membership or children. */
export function hostsInGroup(inventory: Inventory, groupName: string): ReadonlySet<string> {
  if (groupName === inventory.root_group) return new Set(inventory.hosts);

  const hosts = new Set<string>();
  const seen = new Set<string>();
  const stack = [groupName];
  while (stack.length > 0) {
    const name = stack.pop();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    const group = ownValue(inventory.groups, name);
    if (group === undefined) continue;
    for (const host of group.hosts) hosts.add(host);
    stack.push(...group.children);
  }
  return hosts;
}

function matchTerm(inventory: Inventory, term: string, pattern: string): ReadonlySet<string> {
  if (term === 'all' || term === '*') return new Set(inventory.hosts);

  if (term.startsWith('~')) {
    let regex: RegExp;
    try {
      regex = new RegExp(term.slice(1));
    } catch (err: unknown) {
      throw new HostPatternError(pattern, err instanceof Error ? err.message : String(err));
    }
    return new Set(inventory.hosts.filter((host) => regex.test(host)));
  }

  if (/[*?[]/.test(term)) {
    let regex: RegExp;
    try {
      regex = globToRegExp(term);
    } catch (err: unknown) {
      throw new HostPatternError(pattern, err instanceof Error ? err.message : String(err));
    }
    return new Set(inventory.hosts.filter((host) => regex.test(host)));
  }

  if (ownValue(inventory.groups, term) !== undefined) return hostsInGroup(inventory, term);
  if (inventory.hosts.includes(term)) return new Set([term]);
  return new Set();
}

/**
 * Split on `:` and `,` outside brackets.
 *
 * Inside a `~regex` term, braces, parentheses and backslash escapes also
 * hold the separators back, so `~^web\d{1,2}$` stays one term.
 */
export function splitPattern(pattern: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let regex = isRegexTerm(pattern, 0);
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (regex && ch === '\\') {
      i++;
    } else if (ch === '[' || (regex && (ch === '{' || ch === '('))) {
      depth++;
    } else if (ch === ']' || (regex && (ch === '}' || ch === ')'))) {
      depth = Math.max(0, depth - 1);
    } else if ((ch === ':' || ch === ',') && depth === 0) {
      parts.push(pattern.slice(start, i));
      start = i + 1;
      regex = isRegexTerm(pattern, start);
    }
  }
  parts.push(pattern.slice(start));
  return parts;
}

function isRegexTerm(pattern: string, at: number): boolean {
  return /^[!&]?~/.test(pattern.slice(at, at + 2));
}

/**
 * Translate a shell-style glob into an anchored RegExp.
 *
 * Bracket expressions pass through unchanged; everything else outside them
 * is escaped.
 *
 * @throws {SyntaxError} If a bracket expression is malformed
 */
export function globToRegExp(glob: string): RegExp {
  let source = '^';
  let inBracket = false;
  for (const ch of glob) {
    if (inBracket) {
      source += ch === '\\' ? '\\\\' : ch;
      if (ch === ']') inBracket = false;
    } else if (ch === '[') {
      source += ch;
      inBracket = true;
    } else if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else {
      source += ch.replace(/[.+^${}()|\\/\]-]/g, '\\$&');
    }
  }
  return new RegExp(source + '$');
}
