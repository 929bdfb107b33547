/**
 * Plain-text rendering and argument parsing shared by the commands.
 *
 * Nothing here writes to the terminal or applies colour; commands do that.
 */

import {
  emptyRecord,
  isJsonObject,
  resultOutcome,
  tryParseJson,
  type JsonObject,
  type ModuleCallResult,
} from '@fleetwire/kernel'
import type { InventorySource } from '@fleetwire/runtime-host'

const OUTCOME_LABELS = {
  ok: 'SUCCESS',
  changed: 'CHANGED',
  failed: 'FAILED',
} as const

/** `<module> | CHANGED | rc=0` */
export function formatResultHeader(module: string, result: ModuleCallResult): string {
  const rc = result.exit_code === null ? 'killed' : String(result.exit_code)
  return `${module} | ${OUTCOME_LABELS[resultOutcome(result)]} | rc=${rc}`
}

/** The module's result object, or just its message when it produced none. */
export function formatResultBody(result: ModuleCallResult): string {
  const body: JsonObject = Object.keys(result.data).length > 0 ? result.data : { msg: result.msg }
  return JSON.stringify(body, null, 2)
}

/**
 * Parse `--args`: a JSON object, or space-separated `key=value` pairs whose
 * values are kept as strings.
 */
export function parseModuleArgs(text: string): JsonObject {
  const trimmed = text.trim()
  if (trimmed === '') return {}

  if (trimmed.startsWith('{')) {
    const parsed = tryParseJson(trimmed)
    if (!isJsonObject(parsed)) throw new Error('--args must be a JSON object')
    return parsed
  }

  const args = emptyRecord<string>()
  for (const pair of trimmed.split(/\s+/)) {
    const eq = pair.indexOf('=')
    if (eq <= 0) throw new Error(`--args entry '${pair}' is not key=value`)
    args[pair.slice(0, eq)] = pair.slice(eq + 1)
  }
  return args
}

/** `*.json` files are static inventories; anything else is run as an executable. */
export function classifySource(path: string, interpreter?: string): InventorySource {
  if (path.toLowerCase().endsWith('.json')) return { kind: 'static', path }
  return { kind: 'dynamic', module: interpreter === undefined ? path : { path, interpreter } }
}
