/**
 * Fleetwire Runtime Host: Inventory Sources
 *
 * Every source produces one InventoryDocument. Which way it does so is
 * chosen by the `kind` tag, never by inspecting the value at runtime:
 *
 *   static    a JSON file on disk, read and validated
 *   document  an already-parsed value supplied by the caller, validated
 *   dynamic   an executable run through the module channel with `--list`
 *
 * A dynamic source whose `--list` output has no `_meta` key is asked for
 * each host's variables with `--host <name>`. When `_meta` is present it is
 * authoritative and `--host` is never called.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  InventorySchemaError,
  InventorySourceError,
  emptyRecord,
  parseHostDocument,
  parseInventoryDocument,
  tryParseJson,
  type InventoryDocument,
  type JsonObject,
  type ModuleCallResult,
  type ModuleRef,
} from '@fleetwire/kernel';
import type { ModuleChannel } from '../module/channel.js';

export type InventorySource =
  | { readonly kind: 'static'; readonly path: string }
  | { readonly kind: 'document'; readonly name: string; readonly document: unknown }
  | { readonly kind: 'dynamic'; readonly module: ModuleRef };

export interface SourceLoadContext {
  readonly channel: ModuleChannel;
  /** Concurrency bound for per-host `--host` queries. */
  readonly forks: number;
}

/** Human-readable name used in errors and logs. */
export function sourceName(source: InventorySource): string {
  switch (source.kind) {
    case 'static':
      return source.path;
    case 'document':
      return source.name;
    case 'dynamic':
      return typeof source.module === 'string' ? source.module : source.module.path;
  }
}

const documentIds = new WeakMap<object, number>();
let nextDocumentId = 0;

function documentIdentity(document: unknown): string {
  if (typeof document !== 'object' || document === null) return `${typeof document}:${String(document)}`;
  let id = documentIds.get(document);
  if (id === undefined) {
    id = ++nextDocumentId;
    documentIds.set(document, id);
  }
  return `#${id}`;
}

/**
 * Memoization key: equal keys load the same document.
 *
 * In-memory documents key on the object itself as well as the name, so two
 * different documents sharing a name are both loaded.
 */
export function sourceKey(source: InventorySource): string {
  switch (source.kind) {
    case 'static':
      return `static:${resolve(source.path)}`;
    case 'document':
      return `document:${source.name}:${documentIdentity(source.document)}`;
    case 'dynamic': {
      const module = typeof source.module === 'string' ? { path: source.module } : source.module;
      return `dynamic:${module.interpreter ?? ''}:${resolve(module.path)}`;
    }
  }
}

/**
 * Load and validate one source.
 *
 * @throws {InventorySourceError} On any failure; the cause is attached
 */
export async function loadSourceDocument(
  source: InventorySource,
  context: SourceLoadContext,
): Promise<InventoryDocument> {
  switch (source.kind) {
    case 'static':
      return loadStatic(source.path);
    case 'document':
      return validate(source.document, source.name);
    case 'dynamic':
      return loadDynamic(source.module, context);
  }
}

async function loadStatic(path: string): Promise<InventoryDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new InventorySourceError(path, 'cannot read file', { cause: err });
  }
  const parsed = tryParseJson(text);
  if (parsed === undefined) {
    throw new InventorySourceError(path, 'file is not valid JSON', { stdout: text });
  }
  return validate(parsed, path);
}

async function loadDynamic(module: ModuleRef, context: SourceLoadContext): Promise<InventoryDocument> {
  const name = typeof module === 'string' ? module : module.path;
  const listed = await invokeSource(module, ['--list'], context, name);
  const doc = validate(listed.data, name);
  if (doc.hostvars !== null) return doc;

  const hosts = [...new Set(Object.values(doc.groups).flatMap((group) => group.hosts ?? []))].sort();
  const outcomes = await context.channel.invokeMany(
    hosts.map((host) => ({ module, args: {}, options: { argv: ['--host', host] } })),
    context.forks,
  );

  const hostvars = emptyRecord<JsonObject>();
  for (const [index, host] of hosts.entries()) {
    const outcome = outcomes[index];
    if (outcome === undefined || outcome.status === 'rejected') {
      throw new InventorySourceError(name, `--host ${host} could not be launched`, {
        cause: outcome?.reason,
      });
    }
    checkInvocation(outcome.value, name, `--host ${host}`);
    const vars = parseHostDocument(outcome.value.data, name, host);
    if (!vars.ok) {
      throw new InventorySourceError(name, `--host ${host} returned invalid output`, {
        cause: new InventorySchemaError(name, vars.errors),
      });
    }
    hostvars[host] = vars.value;
  }
  return { groups: doc.groups, hostvars };
}

async function invokeSource(
  module: ModuleRef,
  argv: ReadonlyArray<string>,
  context: SourceLoadContext,
  name: string,
): Promise<ModuleCallResult> {
  let result: ModuleCallResult;
  try {
    result = await context.channel.invoke(module, {}, { argv });
  } catch (err: unknown) {
    throw new InventorySourceError(name, `${argv.join(' ')} could not be launched`, { cause: err });
  }
  checkInvocation(result, name, argv.join(' '));
  return result;
}

function checkInvocation(result: ModuleCallResult, name: string, call: string): void {
  if (!result.failed) return;
  throw new InventorySourceError(name, `${call} failed: ${result.msg}`, {
    exitCode: result.exit_code,
    stdout: result.stdout,
    stderr: result.stderr,
    cause: result.error ?? undefined,
  });
}

function validate(value: unknown, name: string): InventoryDocument {
  const result = parseInventoryDocument(value, name);
  if (!result.ok) {
    throw new InventorySourceError(name, 'invalid inventory document', {
      cause: new InventorySchemaError(name, result.errors),
    });
  }
  return result.value;
}
