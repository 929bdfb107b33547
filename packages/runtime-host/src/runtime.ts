/**
 * Fleetwire Runtime Host: Runtime Assembly
 *
 * Wires a resolved FleetwireConfig into the concrete collaborators: a JSONL
 * log sink under `<home>/logs`, a module channel and an inventory resolver
 * sharing that sink.
 */

import type { LogSink } from '@fleetwire/kernel';
import type { FleetwireConfig } from './config.js';
import { logsDir } from './config.js';
import { InventoryResolver } from './inventory/resolver.js';
import { FileLogSink } from './logging/file-log-sink.js';
import { FileLogIO } from './logging/log-io.js';
import { ModuleChannel } from './module/channel.js';

export interface FleetwireRuntime {
  readonly config: FleetwireConfig;
  readonly sink: LogSink;
  readonly channel: ModuleChannel;
  readonly inventory: InventoryResolver;
}

export interface CreateRuntimeOptions {
  /** Replaces the file sink, e.g. with one backed by MemoryLogIO. */
  readonly sink?: LogSink | undefined;
  readonly onSourceError?: 'fail' | 'skip' | undefined;
}

export function createRuntime(config: FleetwireConfig, options: CreateRuntimeOptions = {}): FleetwireRuntime {
  const sink = options.sink ?? new FileLogSink(new FileLogIO(logsDir(config)));
  const channel = new ModuleChannel({
    argsEnvVar: config.argsEnvVar,
    timeoutMs: config.timeoutMs,
    killGraceMs: config.killGraceMs,
    sink,
  });
  const inventory = new InventoryResolver({
    channel,
    rootGroup: config.rootGroup,
    forks: config.forks,
    onSourceError: options.onSourceError,
    sink,
  });
  return { config, sink, channel, inventory };
}
