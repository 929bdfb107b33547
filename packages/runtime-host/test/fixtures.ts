/**
 * Paths to the fixture modules and inventories, plus small helpers shared by
 * the runtime-host tests.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LogEntry, LogSink, ModuleCommand } from '@fleetwire/kernel';

export function fixturePath(relative: string): string {
  return fileURLToPath(new URL(`./fixtures/${relative}`, import.meta.url));
}

/** A fixture script run under the node binary executing the tests. */
export function fixtureModule(name: string): ModuleCommand {
  return { path: fixturePath(`modules/${name}`), interpreter: process.execPath };
}

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `fleetwire-${prefix}-`));
}

export class RecordingSink implements LogSink {
  readonly entries: LogEntry[] = [];

  append(entry: LogEntry): void {
    this.entries.push(entry);
  }
}
