/**
 * Fleetwire Kernel: Log Entry Types
 *
 * Entries recorded for every module invocation and every inventory source
 * load. Argument values are never part of an entry: only a SHA-256 of their
 * canonical JSON, which is enough to correlate repeated calls without
 * writing secrets to disk.
 */

import type { InvocationOutcome } from './module.js';

export interface ModuleInvocationLog {
  readonly kind: 'module_invocation';
  /** Module path as given to the channel. */
  readonly module: string;
  readonly args_hash: string;
  readonly exit_code: number | null;
  readonly outcome: InvocationOutcome;
  /** Error class name (`ProtocolError`, `TimeoutError`, ...) or null. */
  readonly error_kind: string | null;
  readonly duration_ms: number;
  /** ISO 8601 timestamp of completion. */
  readonly timestamp: string;
}

export interface InventorySourceLog {
  readonly kind: 'inventory_source';
  readonly source: string;
  readonly status: 'loaded' | 'skipped' | 'failed';
  readonly error: string | null;
  readonly timestamp: string;
}

export type LogEntry = ModuleInvocationLog | InventorySourceLog;
