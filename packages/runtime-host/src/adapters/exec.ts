/**
 * Fleetwire Runtime Host: Subprocess Execution Adapter
 *
 * Implements the ExecAdapter interface from @fleetwire/kernel with
 * node:child_process.spawn.
 *
 * Each call owns its own child and pipes; stdin is closed so a module that
 * waits for input sees EOF instead of hanging.
 *
 * Deadline handling:
 *   1. At `timeoutMs` the child receives SIGTERM.
 *   2. If it has not exited `killGraceMs` later it receives SIGKILL and the
 *      call settles immediately with whatever output was captured. The pipes
 *      are destroyed so a grandchild holding them open cannot delay the
 *      caller.
 *
 * Exit is tracked separately from pipe closure. A module that exits but
 * leaves a background process holding its stdout (a daemon it started)
 * settles with its own exit code once the pipes have had a short drain
 * window; the call is only `timedOut` when the module itself was still
 * running at the deadline.
 */

import { spawn } from 'node:child_process';
import type { ExecAdapter, ExecOptions, ExecOutcome } from '@fleetwire/kernel';

/** Lower bound on how long pipes may drain after the process has exited. */
const MIN_DRAIN_MS = 100;

export class NodeExecAdapter implements ExecAdapter {
  /**
   * Spawn a subprocess and collect its stdout/stderr.
   *
   * @throws {Error} If the process cannot be started (ENOENT, EACCES)
   */
  run(command: string, args: ReadonlyArray<string>, options: ExecOptions): Promise<ExecOutcome> {
    const startedAt = performance.now();

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        env: { ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let settled = false;
      let exit: { code: number | null; signal: string | null } | undefined;
      let deadlineTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      let drainTimer: NodeJS.Timeout | undefined;

      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      const clearTimers = (): void => {
        clearTimeout(deadlineTimer);
        clearTimeout(killTimer);
        clearTimeout(drainTimer);
      };

      const finish = (exitCode: number | null, signal: string | null): void => {
        if (settled) return;
        settled = true;
        clearTimers();
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          timedOut,
          durationMs: Math.round(performance.now() - startedAt),
        });
      };

      const destroyPipes = (): void => {
        child.stdout.destroy();
        child.stderr.destroy();
      };

      if (options.timeoutMs !== undefined) {
        deadlineTimer = setTimeout(() => {
          if (exit !== undefined) return;
          timedOut = true;
          child.kill('SIGTERM');
          killTimer = setTimeout(() => {
            destroyPipes();
            if (exit === undefined) {
              child.kill('SIGKILL');
              finish(null, 'SIGKILL');
            } else {
              finish(exit.code, exit.signal);
            }
          }, options.killGraceMs);
        }, options.timeoutMs);
      }

      child.on('exit', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        exit = { code: exitCode, signal };
        clearTimeout(deadlineTimer);
        // After a deadline the pending kill timer already bounds the wait.
        if (timedOut) return;
        // 'close' normally follows at once; if something else still holds
        // the pipes, stop waiting for it after the drain window.
        drainTimer = setTimeout(() => {
          destroyPipes();
          finish(exitCode, signal);
        }, Math.max(options.killGraceMs, MIN_DRAIN_MS));
      });

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        finish(exitCode, signal);
      });

      child.on('error', (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimers();
        reject(err);
      });
    });
  }
}
