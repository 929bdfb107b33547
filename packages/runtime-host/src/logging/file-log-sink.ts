/**
 * Fleetwire Runtime Host: JSONL Log Sink
 *
 * Implements LogSink from @fleetwire/kernel. Each entry becomes one JSON
 * line with a ULID `event_id`, routed by kind:
 *
 *   module_invocation → invocations.jsonl
 *   inventory_source  → inventory.jsonl
 */

import type { LogEntry, LogSink } from '@fleetwire/kernel';
import type { LogIO } from './log-io.js';
import { ulid } from './ulid.js';

export const INVOCATION_LOG = 'invocations.jsonl';
export const INVENTORY_LOG = 'inventory.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly io: LogIO) {}

  append(entry: LogEntry): void {
    const logfile = entry.kind === 'module_invocation' ? INVOCATION_LOG : INVENTORY_LOG;
    this.io.appendLine(logfile, JSON.stringify({ event_id: ulid(), ...entry }));
  }
}
