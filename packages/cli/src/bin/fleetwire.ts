#!/usr/bin/env -S node --import tsx
/**
 * bin/fleetwire.ts: entry point for the `fleetwire` CLI command.
 */

import { program } from '../commands/index.js'

await program.parseAsync()
