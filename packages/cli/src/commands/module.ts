/**
 * fleetwire module: Invoke one module locally
 *
 * Runs the module under the invocation contract and prints its outcome:
 *
 *   /opt/modules/ping | SUCCESS | rc=0
 *   { "changed": false, "ping": "pong" }
 *
 * Exits with status 2 when the module failed.
 */

import { Command } from 'commander'
import { resultOutcome } from '@fleetwire/kernel'
import { formatResultBody, formatResultHeader, parseModuleArgs } from '../format.js'
import { outcomeColor, t } from '../theme.js'
import { reportError, runtimeFor } from './shared.js'

interface ModuleOptions {
  args: string
  interpreter?: string
  json?: boolean
}

export const moduleCommand = new Command('module')
  .description('Invoke a module executable and print its result')
  .argument('<path>', 'Module executable')
  .option('-a, --args <args>', 'Module arguments: a JSON object or key=value pairs', '')
  .option('--interpreter <path>', 'Run the module with this interpreter')
  .option('--json', 'Print the full call result as JSON')
  .action(async (path: string, options: ModuleOptions, command: Command) => {
    try {
      const args = parseModuleArgs(options.args)
      const runtime = runtimeFor(command)
      const module = options.interpreter === undefined ? path : { path, interpreter: options.interpreter }
      const result = await runtime.channel.invoke(module, args)

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          changed: result.changed,
          failed: result.failed,
          msg: result.msg,
          exit_code: result.exit_code,
          duration_ms: result.duration_ms,
          error: result.error?.name ?? null,
          data: result.data,
          stderr: result.stderr,
        }, null, 2))
      } else {
        // eslint-disable-next-line no-console
        console.log(outcomeColor(resultOutcome(result))(formatResultHeader(path, result)))
        // eslint-disable-next-line no-console
        console.log(formatResultBody(result))
        if (result.stderr !== '') {
          // eslint-disable-next-line no-console
          console.error(t.muted(result.stderr.trimEnd()))
        }
      }

      if (result.failed) process.exitCode = 2
    } catch (err: unknown) {
      reportError(err)
    }
  })
