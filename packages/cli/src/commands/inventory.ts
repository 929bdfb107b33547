/**
 * fleetwire inventory: Resolve inventory sources
 *
 * Sources are merged in the order given. `*.json` files are read as static
 * inventories; other paths are run as dynamic inventory executables with
 * `--list` (and `--host <name>` when they return no `_meta`).
 *
 *   fleetwire inventory -i hosts.json cloud.py --list
 *   fleetwire inventory -i hosts.json --host web1
 *   fleetwire inventory -i hosts.json --graph [group]
 *   fleetwire inventory -i hosts.json --hosts 'web*:!web3'
 */

import { Command } from 'commander'
import { ownValue, renderInventoryGraph, selectHosts, toInventoryDocument } from '@fleetwire/kernel'
import { classifySource } from '../format.js'
import { t } from '../theme.js'
import { reportError, runtimeFor } from './shared.js'

interface InventoryOptions {
  inventory: string[]
  interpreter?: string
  list?: boolean
  host?: string
  graph?: string | boolean
  hosts?: string
  rootGroup?: string
  skipFailed?: boolean
}

export const inventoryCommand = new Command('inventory')
  .description('Resolve inventory sources and show groups, hosts or host variables')
  .requiredOption('-i, --inventory <source...>', 'Inventory file (*.json) or executable, in merge order')
  .option('--interpreter <path>', 'Interpreter for dynamic inventory executables')
  .option('--list', 'Print the merged inventory as JSON (default)')
  .option('--host <name>', 'Print the resolved variables of one host')
  .option('--graph [group]', 'Print the group tree, from the root or the given group')
  .option('--hosts <pattern>', 'Print the hosts matching a pattern, one per line')
  .option('--root-group <name>', 'Name of the implicit top-level group')
  .option('--skip-failed', 'Continue without sources that fail to load')
  .action(async (options: InventoryOptions, command: Command) => {
    try {
      const runtime = runtimeFor(
        command,
        options.rootGroup !== undefined ? { rootGroup: options.rootGroup } : {},
        options.skipFailed === true ? 'skip' : 'fail',
      )
      const pass = runtime.inventory.openPass()
      const sources = options.inventory.map((path) => classifySource(path, options.interpreter))
      const { inventory, skipped: skippedSources } = await pass.resolveReport(sources)

      for (const skipped of skippedSources) {
        // eslint-disable-next-line no-console
        console.error(`${t.amber('warning:')} ${skipped.message}`)
      }

      if (options.host !== undefined) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(pass.hostVars(inventory, options.host), null, 2))
        return
      }

      if (options.graph !== undefined) {
        const group = typeof options.graph === 'string' ? options.graph : undefined
        if (group !== undefined && ownValue(inventory.groups, group) === undefined) {
          throw new Error(`Group '${group}' is not in the inventory`)
        }
        // eslint-disable-next-line no-console
        console.log(renderInventoryGraph(inventory, group))
        return
      }

      if (options.hosts !== undefined) {
        for (const host of selectHosts(inventory, options.hosts)) {
          // eslint-disable-next-line no-console
          console.log(host)
        }
        return
      }

      // eslint-disable-next-line no-console
      console.log(JSON.stringify(toInventoryDocument(inventory), null, 2))
    } catch (err: unknown) {
      reportError(err)
    }
  })
