/**
 * Options and helpers common to every command.
 */

import { InvalidArgumentError, type Command } from 'commander'
import {
  createRuntime,
  resolveFleetwireConfig,
  type FleetwireConfig,
  type FleetwireRuntime,
} from '@fleetwire/runtime-host'
import { t } from '../theme.js'

export type GlobalOptions = {
  home?: string
  config?: string
  timeout?: number
  forks?: number
}

export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return n
}

/** Runtime built from flags, FLEETWIRE_* variables and the config file. */
export function runtimeFor(
  command: Command,
  extra: Partial<FleetwireConfig> = {},
  onSourceError: 'fail' | 'skip' = 'fail',
): FleetwireRuntime {
  const globals = command.optsWithGlobals<GlobalOptions>()
  const config = resolveFleetwireConfig({
    configFile: globals.config,
    overrides: {
      ...extra,
      ...(globals.home !== undefined ? { home: globals.home } : {}),
      ...(globals.timeout !== undefined ? { timeoutMs: globals.timeout } : {}),
      ...(globals.forks !== undefined ? { forks: globals.forks } : {}),
    },
  })
  return createRuntime(config, { onSourceError })
}

/** Print an error and mark the process failed. */
export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err)
  // eslint-disable-next-line no-console
  console.error(`${t.red('error:')} ${message}`)
  if (err instanceof Error && err.cause instanceof Error) {
    // eslint-disable-next-line no-console
    console.error(t.muted(`  caused by: ${err.cause.message}`))
  }
  process.exitCode = 1
}
