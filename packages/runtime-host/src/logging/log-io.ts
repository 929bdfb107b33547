/**
 * Fleetwire Runtime Host: Log I/O
 *
 * Append-only line storage behind the JSONL log sink.
 *
 *   FileLogIO   appends to `<logsDir>/<file>`, creating the directory on demand
 *   MemoryLogIO keeps lines in memory for tests and embedded use
 *
 * Writes are synchronous so an entry is on disk before the caller moves on.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface LogIO {
  /** Append one line; a newline is added after it. */
  appendLine(logfile: string, line: string): void;
  /** Raw file content, or '' when the file does not exist. */
  readRaw(logfile: string): string;
}

export class FileLogIO implements LogIO {
  constructor(private readonly logsDir: string) {}

  appendLine(logfile: string, line: string): void {
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(join(this.logsDir, logfile), line + '\n', 'utf-8');
  }

  readRaw(logfile: string): string {
    try {
      return readFileSync(join(this.logsDir, logfile), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

export class MemoryLogIO implements LogIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfile: string, line: string): void {
    const lines = this.logs.get(logfile) ?? [];
    lines.push(line);
    this.logs.set(logfile, lines);
  }

  /** Lines appended to one log file. Test helper; not part of LogIO. */
  readLines(logfile: string): ReadonlyArray<string> {
    return this.logs.get(logfile) ?? [];
  }

  readRaw(logfile: string): string {
    const lines = this.logs.get(logfile) ?? [];
    // Same layout FileLogIO produces: every line newline-terminated.
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
