/**
 * Fleetwire Kernel: Adapter Interfaces
 *
 * Subprocess execution is a side effect, so the kernel only defines its
 * shape. The module channel is written against this interface; the Node.js
 * implementation lives in @fleetwire/runtime-host and tests may inject an
 * in-process stand-in.
 */

export interface ExecOptions {
  /** Complete environment for the child. Nothing is inherited implicitly. */
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Deadline after which the child is sent SIGTERM. No deadline when omitted. */
  readonly timeoutMs?: number | undefined;
  /** Delay between SIGTERM and SIGKILL once the deadline has passed. */
  readonly killGraceMs: number;
}

export interface ExecOutcome {
  /** `null` when the process ended by signal or never reported an exit. */
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

/**
 * Runs one subprocess to completion.
 *
 * Implementations must:
 * - give every call its own process and streams;
 * - capture stdout and stderr in full;
 * - settle no later than `timeoutMs + killGraceMs` (plus scheduling slack),
 *   even when the child's streams stay open;
 * - reject only when the process could not be started.
 */
export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options: ExecOptions): Promise<ExecOutcome>;
}
