/**
 * Fleetwire Kernel: Error Types
 *
 * Every failure the channel or resolver can surface has its own class so
 * callers can branch with `instanceof` and read the diagnostic fields
 * without parsing messages.
 *
 * Only DecodeError is recoverable locally: a malformed or missing argument
 * payload degrades to an empty mapping and the error is reported as a value.
 * ProtocolError and TimeoutError are carried on a failed ModuleCallResult.
 * The rest are thrown.
 */

import type { ValidationError } from './types/validation.js';

export class FleetwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FleetwireError';
  }
}

/** The module argument payload could not be decoded. Never thrown by the decoder. */
export class DecodeError extends FleetwireError {
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** Module stdout did not contain a JSON result object. */
export class ProtocolError extends FleetwireError {
  constructor(
    message: string,
    readonly stdout: string,
    readonly stderr: string,
    readonly exitCode: number | null,
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** Module exceeded its deadline and was terminated. Carries output captured so far. */
export class TimeoutError extends FleetwireError {
  constructor(
    readonly timeoutMs: number,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(`Module timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** The module executable could not be started at all. */
export class ModuleLaunchError extends FleetwireError {
  constructor(
    readonly modulePath: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch module '${modulePath}': ${detail}`, { cause });
    this.name = 'ModuleLaunchError';
  }
}

/** The children relation of the group graph contains a cycle. */
export class InventoryCycleError extends FleetwireError {
  /** Group names along the cycle; the first name is repeated at the end. */
  readonly cycle: ReadonlyArray<string>;

  constructor(cycle: ReadonlyArray<string>) {
    super(`Inventory group cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'InventoryCycleError';
    this.cycle = cycle;
  }
}

/** An inventory document failed structural validation. */
export class InventorySchemaError extends FleetwireError {
  constructor(
    readonly source: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    const lines = errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message));
    super(`Invalid inventory from '${source}':\n  ${lines.join('\n  ')}`);
    this.name = 'InventorySchemaError';
  }
}

/** An inventory source could not be loaded. */
export class InventorySourceError extends FleetwireError {
  constructor(
    readonly source: string,
    message: string,
    readonly details: {
      readonly exitCode?: number | null | undefined;
      readonly stdout?: string | undefined;
      readonly stderr?: string | undefined;
      readonly cause?: unknown;
    } = {},
  ) {
    super(`Inventory source '${source}' failed: ${message}`, { cause: details.cause });
    this.name = 'InventorySourceError';
  }
}

export class UnknownHostError extends FleetwireError {
  constructor(readonly host: string) {
    super(`Host '${host}' is not in the inventory`);
    this.name = 'UnknownHostError';
  }
}

export class HostPatternError extends FleetwireError {
  constructor(
    readonly pattern: string,
    message: string,
  ) {
    super(`Invalid host pattern '${pattern}': ${message}`);
    this.name = 'HostPatternError';
  }
}

export class ConfigError extends FleetwireError {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`Invalid configuration for '${key}': ${message}`);
    this.name = 'ConfigError';
  }
}
