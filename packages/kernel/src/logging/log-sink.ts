/**
 * Fleetwire Kernel: Log Sink Interface
 *
 * The kernel owns the entry types and this interface; concrete sinks live
 * in the runtime host and are injected at construction time. Components that
 * accept a sink treat it as optional: no sink, no logging.
 */

import type { LogEntry } from '../types/log.js';

/**
 * A sink that receives and persists log entries.
 *
 * append() completes before the caller continues, so an entry is durable
 * before the result it describes is returned. Implementations must not
 * silently discard entries.
 */
export interface LogSink {
  append(entry: LogEntry): void;
}
