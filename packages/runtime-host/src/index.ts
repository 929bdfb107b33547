/**
 * @fleetwire/runtime-host
 *
 * Side-effectful implementations behind the @fleetwire/kernel interfaces:
 * subprocess execution, the module invocation channel, inventory sources
 * and resolution passes, configuration and JSONL logging.
 *
 * No kernel code imports from this package.
 */

// Exec adapter
export { NodeExecAdapter } from './adapters/exec.js';

// Module invocation
export type { ModuleChannelOptions, InvokeOptions, ModuleCall } from './module/channel.js';
export { ModuleChannel, toCommand } from './module/channel.js';
export { runBounded } from './module/pool.js';

// Inventory
export type { InventorySource, SourceLoadContext } from './inventory/sources.js';
export { loadSourceDocument, sourceKey, sourceName } from './inventory/sources.js';
export type { InventoryResolverOptions, ResolutionReport } from './inventory/resolver.js';
export { InventoryResolver, ResolutionPass } from './inventory/resolver.js';

// Configuration
export type { FleetwireConfig, ResolveConfigOptions } from './config.js';
export { CONFIG_DEFAULTS, CONFIG_ENV_VARS, logsDir, resolveFleetwireConfig } from './config.js';

// Logging
export type { LogIO } from './logging/log-io.js';
export { FileLogIO, MemoryLogIO } from './logging/log-io.js';
export { FileLogSink, INVENTORY_LOG, INVOCATION_LOG } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

// Assembly
export type { FleetwireRuntime, CreateRuntimeOptions } from './runtime.js';
export { createRuntime } from './runtime.js';
