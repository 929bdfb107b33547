/**
 * Fleetwire Kernel: Module Result Interpretation
 *
 * Turns the raw stdout/stderr/exit code of a finished module process into a
 * ModuleCallResult. Pure: the runtime host does the spawning and hands the
 * captured output here.
 *
 * Reading rules:
 * - The canonical result is one JSON object on stdout: the first non-blank
 *   line that starts with `{`. Any preamble before it (interpreter banners,
 *   stray prints) is ignored. If that line alone does not parse, the text from
 *   that line to the end of stdout is tried, which accepts a pretty-printed
 *   object.
 * - No parseable object → ProtocolError with the raw output attached.
 * - The exit code is recorded exactly as the process returned it.
 */

import { ProtocolError, TimeoutError } from '../errors.js';
import { isJsonObject, tryParseJson, type JsonObject } from '../types/json.js';
import type { InvocationOutcome, ModuleCallResult, ModuleProcessOutput } from '../types/module.js';

/** Interpret the output of a module process that ran to completion. */
export function interpretModuleOutput(output: ModuleProcessOutput): ModuleCallResult {
  const data = extractResultObject(output.stdout);

  if (data === null) {
    const error = new ProtocolError(
      describeProtocolFailure(output),
      output.stdout,
      output.stderr,
      output.exit_code,
    );
    return freezeResult({
      changed: false,
      failed: true,
      msg: error.message,
      data: {},
      stdout: output.stdout,
      stderr: output.stderr,
      exit_code: output.exit_code,
      error,
      duration_ms: output.duration_ms,
    });
  }

  const failed = data['failed'] === true || output.exit_code !== 0;

  return freezeResult({
    changed: data['changed'] === true,
    failed,
    msg: resultMessage(data, output.exit_code),
    data,
    stdout: output.stdout,
    stderr: output.stderr,
    exit_code: output.exit_code,
    error: null,
    duration_ms: output.duration_ms,
  });
}

/**
 * Build the failed result for a module that was terminated at its deadline.
 *
 * Whatever stdout and stderr were captured before termination are attached
 * to both the result and the TimeoutError.
 */
export function timeoutResult(
  timeoutMs: number,
  captured: { readonly stdout: string; readonly stderr: string; readonly exit_code: number | null },
  durationMs: number,
): ModuleCallResult {
  const error = new TimeoutError(timeoutMs, captured.stdout, captured.stderr);
  return freezeResult({
    changed: false,
    failed: true,
    msg: error.message,
    data: {},
    stdout: captured.stdout,
    stderr: captured.stderr,
    exit_code: captured.exit_code,
    error,
    duration_ms: durationMs,
  });
}

/** Outcome label for logs and summaries. */
export function resultOutcome(result: ModuleCallResult): InvocationOutcome {
  if (result.failed) return 'failed';
  return result.changed ? 'changed' : 'ok';
}

/**
 * Locate and parse the result object in module stdout.
 *
 * Returns null when stdout holds no JSON object.
 */
export function extractResultObject(stdout: string): JsonObject | null {
  const lines = stdout.split(/\r?\n/);
  const start = lines.findIndex((line) => line.trimStart().startsWith('{'));
  if (start === -1) return null;

  const firstLine = tryParseJson(lines[start] ?? '');
  if (isJsonObject(firstLine)) return firstLine;

  const rest = tryParseJson(lines.slice(start).join('\n'));
  return isJsonObject(rest) ? rest : null;
}

/** The module's own `msg`, or a note about the exit code when it gave none. */
function resultMessage(data: JsonObject, exitCode: number | null): string {
  const msg = data['msg'];
  if (typeof msg === 'string') return msg;
  if (exitCode !== 0 && data['failed'] !== true) {
    return `Module exited with code ${String(exitCode)}`;
  }
  return '';
}

function describeProtocolFailure(output: ModuleProcessOutput): string {
  const head = output.stdout.trim().slice(0, 200);
  if (head === '') {
    return `Module produced no JSON output (exit code ${String(output.exit_code)})`;
  }
  return `Module output is not a JSON object (exit code ${String(output.exit_code)}): ${head}`;
}

function freezeResult(result: ModuleCallResult): ModuleCallResult {
  return Object.freeze(result);
}
