/**
 * Fleetwire Runtime Host: Module Invocation Channel
 *
 * invoke(module, args) runs one module executable under the invocation
 * contract:
 *
 *   in:  arguments as base64-encoded JSON in one environment variable
 *        (name fixed per channel, `ANSIBLE_MODULE_ARGS` by default)
 *   out: one JSON object on stdout, stderr captured in full, exit code
 *
 * The channel is configured through its constructor only. Two channels with
 * different variable names or deadlines can run side by side in one process.
 *
 * Failures of the module itself (non-zero exit, `failed: true`, unparseable
 * output, timeout) come back as a failed ModuleCallResult. Only a module
 * that cannot be launched at all rejects, with ModuleLaunchError.
 */

import {
  DEFAULT_ARGS_ENV_VAR,
  ModuleLaunchError,
  computeArgsHash,
  encodeModuleArgs,
  interpretModuleOutput,
  resultOutcome,
  timeoutResult,
  type ExecAdapter,
  type ExecOutcome,
  type JsonObject,
  type LogSink,
  type ModuleCallResult,
  type ModuleCommand,
  type ModuleRef,
} from '@fleetwire/kernel';
import { NodeExecAdapter } from '../adapters/exec.js';
import { runBounded } from './pool.js';

export interface ModuleChannelOptions {
  /** Environment variable carrying the encoded arguments. */
  readonly argsEnvVar?: string | undefined;
  /** Default per-invocation deadline. */
  readonly timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL after a deadline. */
  readonly killGraceMs: number;
  /**
   * Environment every module starts from. The argument variable is always
   * overwritten. Defaults to the host process environment.
   */
  readonly baseEnv?: Readonly<Record<string, string | undefined>> | undefined;
  readonly sink?: LogSink | undefined;
  readonly exec?: ExecAdapter | undefined;
}

export interface InvokeOptions {
  /** Overrides the channel's default deadline for this call. */
  readonly timeoutMs?: number | undefined;
  /** Extra command-line arguments, e.g. `--list` for inventory sources. */
  readonly argv?: ReadonlyArray<string> | undefined;
}

export interface ModuleCall {
  readonly module: ModuleRef;
  readonly args: JsonObject;
  readonly options?: InvokeOptions | undefined;
}

export class ModuleChannel {
  readonly argsEnvVar: string;
  private readonly exec: ExecAdapter;

  constructor(private readonly options: ModuleChannelOptions) {
    this.argsEnvVar = options.argsEnvVar ?? DEFAULT_ARGS_ENV_VAR;
    this.exec = options.exec ?? new NodeExecAdapter();
  }

  /**
   * Run one module and interpret its output.
   *
   * @throws {ModuleLaunchError} If the executable cannot be started
   */
  async invoke(module: ModuleRef, args: JsonObject, options: InvokeOptions = {}): Promise<ModuleCallResult> {
    const command = toCommand(module);
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const argv = options.argv ?? [];
    const executable = command.interpreter ?? command.path;
    const execArgs = command.interpreter !== undefined ? [command.path, ...argv] : [...argv];

    const env = {
      ...(this.options.baseEnv ?? process.env),
      [this.argsEnvVar]: encodeModuleArgs(args),
    };

    let outcome: ExecOutcome;
    try {
      outcome = await this.exec.run(executable, execArgs, {
        env,
        timeoutMs,
        killGraceMs: this.options.killGraceMs,
      });
    } catch (err: unknown) {
      throw new ModuleLaunchError(command.path, err);
    }

    const result = outcome.timedOut
      ? timeoutResult(
          timeoutMs,
          { stdout: outcome.stdout, stderr: outcome.stderr, exit_code: outcome.exitCode },
          outcome.durationMs,
        )
      : interpretModuleOutput({
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          exit_code: outcome.exitCode,
          duration_ms: outcome.durationMs,
        });

    this.options.sink?.append({
      kind: 'module_invocation',
      module: command.path,
      args_hash: computeArgsHash(args),
      exit_code: result.exit_code,
      outcome: resultOutcome(result),
      error_kind: result.error?.name ?? null,
      duration_ms: result.duration_ms,
      timestamp: new Date().toISOString(),
    });

    return result;
  }

  /**
   * Run many calls with at most `forks` processes alive at once.
   *
   * Each call has its own deadline; a timeout or launch failure in one call
   * leaves the others untouched. Outcomes are returned in input order.
   */
  invokeMany(
    calls: ReadonlyArray<ModuleCall>,
    forks: number,
  ): Promise<Array<PromiseSettledResult<ModuleCallResult>>> {
    return runBounded(calls, forks, (call) => this.invoke(call.module, call.args, call.options));
  }
}

export function toCommand(module: ModuleRef): ModuleCommand {
  return typeof module === 'string' ? { path: module } : module;
}
