/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/fleetwire.ts.
 */

import { program } from 'commander'
import { inventoryCommand } from './inventory.js'
import { moduleCommand } from './module.js'
import { parsePositiveInt } from './shared.js'

program
  .name('fleetwire')
  .description('Invoke fleet modules and resolve dynamic inventories.')
  .version('0.1.0')
  .option('--home <dir>', 'Fleetwire home directory (config.json, logs/)')
  .option('--config <file>', 'Config file to read instead of <home>/config.json')
  .option('--timeout <ms>', 'Per-invocation deadline in milliseconds', parsePositiveInt)
  .option('--forks <n>', 'Maximum concurrent module processes', parsePositiveInt)

program.addCommand(inventoryCommand)
program.addCommand(moduleCommand)

export { program }
