/**
 * @fleetwire/kernel
 *
 * Fleetwire kernel: the module-invocation contract and the inventory
 * resolver, as pure logic.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API.
 * node:crypto is used for argument hashing (pure computation, not I/O).
 *
 * Subprocess execution, inventory file and executable loading, configuration
 * and log persistence live in @fleetwire/runtime-host.
 */

// Types
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types/json.js';
export {
  canonicalJson,
  emptyRecord,
  isJsonObject,
  isStringArray,
  ownValue,
  tryParseJson,
} from './types/json.js';

export type { Group, GroupDocument, Inventory, InventoryDocument } from './types/inventory.js';

export type {
  InvocationOutcome,
  ModuleCallResult,
  ModuleCommand,
  ModuleProcessOutput,
  ModuleRef,
} from './types/module.js';

export type { ValidationError, ValidationResult } from './types/validation.js';

export type { InventorySourceLog, LogEntry, ModuleInvocationLog } from './types/log.js';

// Errors
export {
  ConfigError,
  DecodeError,
  FleetwireError,
  HostPatternError,
  InventoryCycleError,
  InventorySchemaError,
  InventorySourceError,
  ModuleLaunchError,
  ProtocolError,
  TimeoutError,
  UnknownHostError,
} from './errors.js';

// Module invocation contract
export type { DecodedModuleArgs } from './codec/module-args.js';
export {
  DEFAULT_ARGS_ENV_VAR,
  decodeModuleArgs,
  encodeModuleArgs,
  readModuleArgs,
} from './codec/module-args.js';
export {
  extractResultObject,
  interpretModuleOutput,
  resultOutcome,
  timeoutResult,
} from './module/result.js';

// Variable precedence engine
export { cloneJson, deepFreeze, mergeAll, mergeVars } from './vars/merge.js';

// Inventory
export { META_KEY, parseHostDocument, parseInventoryDocument } from './inventory/document.js';
export { DEFAULT_ROOT_GROUP, InventoryBuilder, assertAcyclic, buildInventory } from './inventory/builder.js';
export type { GroupPrecedence } from './inventory/resolver.js';
export {
  HostVarsResolver,
  applicableGroups,
  directGroupsOf,
  hostVars,
  parentIndex,
} from './inventory/resolver.js';
export { toInventoryDocument } from './inventory/serialize.js';
export { globToRegExp, hostsInGroup, selectHosts, splitPattern } from './inventory/patterns.js';
export { renderInventoryGraph } from './inventory/graph.js';

// Adapter interfaces (implementations live in runtime-host)
export type { ExecAdapter, ExecOptions, ExecOutcome } from './adapters/index.js';

// Logging (sink implementations live in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { computeArgsHash } from './logging/hash.js';
