/**
 * Fleetwire Runtime Host: Inventory Resolver
 *
 * resolve(sources) loads every source, merges the documents in the order
 * given and builds the frozen Inventory; hostVars(inventory, host) then
 * resolves one host against it.
 *
 * All work happens inside a ResolutionPass. Within one pass each source is
 * loaded at most once: concurrent and repeated resolve() calls share the
 * same in-flight or finished load, so a dynamic source's executable runs
 * once per pass. invalidate() forgets the loaded documents; the next
 * resolve() reads every source again and builds a fresh Inventory, and host
 * variables are then resolved against that new Inventory.
 *
 * A failed source either fails the whole resolve() (`onSourceError: 'fail'`,
 * the default) or is left out (`onSourceError: 'skip'`). resolveReport()
 * returns the sources left out by that call alone; `pass.skipped` is the
 * report of the most recently finished call.
 */

import {
  DEFAULT_ROOT_GROUP,
  HostVarsResolver,
  InventorySourceError,
  buildInventory,
  type Inventory,
  type InventoryDocument,
  type InventorySourceLog,
  type JsonObject,
  type LogSink,
} from '@fleetwire/kernel';
import type { ModuleChannel } from '../module/channel.js';
import { loadSourceDocument, sourceKey, sourceName, type InventorySource } from './sources.js';

export interface InventoryResolverOptions {
  readonly channel: ModuleChannel;
  readonly rootGroup?: string | undefined;
  /** Bound for per-host `--host` queries against dynamic sources. */
  readonly forks?: number | undefined;
  readonly onSourceError?: 'fail' | 'skip' | undefined;
  readonly sink?: LogSink | undefined;
}

/** One resolve() outcome together with the sources it left out. */
export interface ResolutionReport {
  readonly inventory: Inventory;
  readonly skipped: ReadonlyArray<InventorySourceError>;
}

export class InventoryResolver {
  constructor(private readonly options: InventoryResolverOptions) {}

  /** Start a new pass with an empty source memo. */
  openPass(): ResolutionPass {
    return new ResolutionPass(this.options);
  }

  /** One-shot convenience: resolve in a fresh pass. */
  resolve(sources: ReadonlyArray<InventorySource>): Promise<Inventory> {
    return this.openPass().resolve(sources);
  }
}

export class ResolutionPass {
  private documents: Map<string, Promise<InventoryDocument>> = new Map();
  private readonly resolvers: WeakMap<Inventory, HostVarsResolver> = new WeakMap();
  private lastSkipped: ReadonlyArray<InventorySourceError> = Object.freeze([]);

  constructor(private readonly options: InventoryResolverOptions) {}

  /** Sources left out of the most recently finished resolve(). */
  get skipped(): ReadonlyArray<InventorySourceError> {
    return this.lastSkipped;
  }

  /**
   * Load, merge and build.
   *
   * @throws {InventorySourceError} When a source fails and errors are not skipped
   * @throws {InventoryCycleError} When the merged group graph has a cycle
   */
  async resolve(sources: ReadonlyArray<InventorySource>): Promise<Inventory> {
    const report = await this.resolveReport(sources);
    return report.inventory;
  }

  /** resolve(), also returning the sources this call skipped. */
  async resolveReport(sources: ReadonlyArray<InventorySource>): Promise<ResolutionReport> {
    const settled = await Promise.allSettled(sources.map((source) => this.load(source)));

    const skipped: InventorySourceError[] = [];
    const docs: InventoryDocument[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        docs.push(outcome.value);
        continue;
      }
      const reason: unknown = outcome.reason;
      if (this.options.onSourceError === 'skip' && reason instanceof InventorySourceError) {
        skipped.push(reason);
        continue;
      }
      throw reason;
    }

    const inventory = buildInventory(docs, this.options.rootGroup ?? DEFAULT_ROOT_GROUP);
    this.lastSkipped = Object.freeze(skipped);
    return { inventory, skipped: this.lastSkipped };
  }

  /**
   * Resolved variables for one host, cached per inventory and host.
   *
   * @throws {UnknownHostError} If the host is not in the inventory
   */
  hostVars(inventory: Inventory, host: string): JsonObject {
    let resolver = this.resolvers.get(inventory);
    if (resolver === undefined) {
      resolver = new HostVarsResolver(inventory);
      this.resolvers.set(inventory, resolver);
    }
    return resolver.hostVars(host);
  }

  /** Forget loaded documents so the next resolve() reads every source again. */
  invalidate(): void {
    this.documents = new Map();
  }

  private load(source: InventorySource): Promise<InventoryDocument> {
    const key = sourceKey(source);
    const existing = this.documents.get(key);
    if (existing !== undefined) return existing;

    const loading = this.loadAndLog(source);
    this.documents.set(key, loading);
    return loading;
  }

  private async loadAndLog(source: InventorySource): Promise<InventoryDocument> {
    const name = sourceName(source);
    try {
      const doc = await loadSourceDocument(source, {
        channel: this.options.channel,
        forks: this.options.forks ?? 1,
      });
      this.log(name, 'loaded', null);
      return doc;
    } catch (err: unknown) {
      const status = this.options.onSourceError === 'skip' ? 'skipped' : 'failed';
      this.log(name, status, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  private log(source: string, status: InventorySourceLog['status'], error: string | null): void {
    this.options.sink?.append({
      kind: 'inventory_source',
      source,
      status,
      error,
      timestamp: new Date().toISOString(),
    });
  }
}
