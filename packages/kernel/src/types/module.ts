/**
 * Fleetwire Kernel: Module Invocation Types
 *
 * A module is an external executable. Nothing about it is trusted beyond
 * the documented contract: one JSON object on stdout, free-form stderr, and
 * an exit code.
 */

import type { JsonObject } from './json.js';
import type { ProtocolError, TimeoutError } from '../errors.js';

/**
 * How to launch a module.
 *
 * When `interpreter` is set the channel runs `interpreter path ...argv`
 * instead of executing `path` directly, mirroring a per-host interpreter
 * setting. A bare string is shorthand for `{ path }`.
 */
export interface ModuleCommand {
  readonly path: string;
  readonly interpreter?: string | undefined;
}

export type ModuleRef = string | ModuleCommand;

/** Raw process outcome handed to the result interpreter. */
export interface ModuleProcessOutput {
  readonly stdout: string;
  readonly stderr: string;
  /** `null` when the process was terminated by a signal. */
  readonly exit_code: number | null;
  readonly duration_ms: number;
}

/**
 * The structured outcome of one module invocation. Immutable once produced.
 *
 * A result is a failure when any of the following hold:
 * - `exit_code` is not 0
 * - the module's JSON carried `failed: true`
 * - `error` is set (unparseable output or timeout)
 *
 * Output on stderr never marks a result failed by itself.
 */
export interface ModuleCallResult {
  readonly changed: boolean;
  readonly failed: boolean;
  readonly msg: string;
  /** The module's full result object, module-specific keys included. `{}` when unparseable. */
  readonly data: JsonObject;
  readonly stdout: string;
  readonly stderr: string;
  readonly exit_code: number | null;
  readonly error: ProtocolError | TimeoutError | null;
  readonly duration_ms: number;
}

/** Outcome label used in invocation log entries. */
export type InvocationOutcome = 'ok' | 'changed' | 'failed';
