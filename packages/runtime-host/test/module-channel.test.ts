/**
 * Fleetwire Runtime Host: ModuleChannel Tests
 *
 * Runs the fixture modules under test/fixtures/modules through real
 * subprocesses, except where a fake ExecAdapter makes timing deterministic.
 *
 *   CHAN-U1:  arguments arrive through the argument variable, base64-encoded
 *   CHAN-U2:  a second channel can use a different variable
 *   CHAN-U3:  stderr is captured in full and does not mark failure
 *   CHAN-U4:  a non-zero exit code fails the call and is recorded verbatim
 *   CHAN-U5:  `failed: true` fails the call even with exit code 0
 *   CHAN-U6:  non-JSON stdout yields a ProtocolError
 *   CHAN-U7:  a preamble before the result object is ignored
 *   CHAN-U8:  a pretty-printed result object is accepted
 *   CHAN-U9:  a deadline yields a TimeoutError with the partial output
 *   CHAN-U10: a module ignoring SIGTERM is killed after the grace period
 *   CHAN-U11: a missing executable rejects with ModuleLaunchError
 *   CHAN-U15: a module that exits while a background process holds its
 *             stdout settles with its own exit code and result
 *   CHAN-U12: invokeMany keeps input order and the forks bound
 *   CHAN-U13: one timeout in invokeMany leaves the other calls intact
 *   CHAN-U14: every invocation is logged without argument values
 */

import { describe, it, expect } from 'vitest';
import {
  ModuleLaunchError,
  ProtocolError,
  TimeoutError,
  computeArgsHash,
  type ExecAdapter,
  type ExecOptions,
  type ExecOutcome,
} from '@fleetwire/kernel';
import { ModuleChannel } from '../src/module/channel.js';
import { RecordingSink, fixtureModule } from './fixtures.js';

const echo = fixtureModule('echo.mjs');

function makeChannel(overrides: Partial<ConstructorParameters<typeof ModuleChannel>[0]> = {}): ModuleChannel {
  return new ModuleChannel({ timeoutMs: 10_000, killGraceMs: 500, ...overrides });
}

/** Fake adapter: every call takes `delayMs`; calls whose args include `--hang` time out. */
class FakeExecAdapter implements ExecAdapter {
  inFlight = 0;
  peak = 0;
  readonly seen: string[] = [];

  constructor(private readonly delayMs: number) {}

  async run(command: string, args: ReadonlyArray<string>, _options: ExecOptions): Promise<ExecOutcome> {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    this.seen.push(args.join(' '));
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    this.inFlight--;

    const hang = args.includes('--hang');
    return {
      exitCode: hang ? null : 0,
      signal: hang ? 'SIGTERM' : null,
      stdout: hang ? '' : JSON.stringify({ changed: false, msg: `${command} ${args.join(' ')}` }) + '\n',
      stderr: '',
      timedOut: hang,
      durationMs: this.delayMs,
    };
  }
}

describe('ModuleChannel.invoke', () => {
  it('CHAN-U1: delivers arguments through ANSIBLE_MODULE_ARGS', async () => {
    const result = await makeChannel().invoke(echo, { msg: 'hello', changed: true, packages: ['nginx'] });

    expect(result.failed).toBe(false);
    expect(result.changed).toBe(true);
    expect(result.msg).toBe('hello');
    expect(result.data['args']).toEqual({ msg: 'hello', changed: true, packages: ['nginx'] });
    expect(result.exit_code).toBe(0);
    expect(result.error).toBeNull();
  });

  it('CHAN-U2: honours a custom argument variable', async () => {
    const channel = makeChannel({ argsEnvVar: 'FLEETWIRE_TEST_ARGS' });
    const result = await channel.invoke(echo, { msg: 'custom' }, { argv: ['FLEETWIRE_TEST_ARGS'] });

    expect(channel.argsEnvVar).toBe('FLEETWIRE_TEST_ARGS');
    expect(result.msg).toBe('custom');
  });

  it('CHAN-U3: captures stderr without failing', async () => {
    const result = await makeChannel().invoke(echo, { stderr: 'warning: deprecated option\n' });

    expect(result.failed).toBe(false);
    expect(result.stderr).toBe('warning: deprecated option\n');
  });

  it('CHAN-U4: fails on a non-zero exit code', async () => {
    const result = await makeChannel().invoke(echo, { exit_code: 3, msg: 'partial apply' });

    expect(result.failed).toBe(true);
    expect(result.exit_code).toBe(3);
    expect(result.msg).toBe('partial apply');
    expect(result.error).toBeNull();
  });

  it('CHAN-U5: fails on failed: true with exit code 0', async () => {
    const result = await makeChannel().invoke(echo, { failed: true, msg: 'package not found' });

    expect(result.failed).toBe(true);
    expect(result.exit_code).toBe(0);
    expect(result.msg).toBe('package not found');
  });

  it('CHAN-U6: reports non-JSON output as a ProtocolError', async () => {
    const result = await makeChannel().invoke(fixtureModule('garbage.mjs'), {});

    expect(result.failed).toBe(true);
    expect(result.error).toBeInstanceOf(ProtocolError);
    expect(result.msg).toBe('Module output is not a JSON object (exit code 0): this is not json');
    expect(result.stdout).toBe('this is not json\n');
  });

  it('CHAN-U7: ignores a preamble before the result', async () => {
    const result = await makeChannel().invoke(echo, { preamble: 'interpreter banner', msg: 'after banner' });

    expect(result.failed).toBe(false);
    expect(result.msg).toBe('after banner');
    expect(result.stdout.startsWith('interpreter banner\n')).toBe(true);
  });

  it('CHAN-U8: accepts a pretty-printed result', async () => {
    const result = await makeChannel().invoke(echo, { pretty: true, msg: 'indented' });

    expect(result.failed).toBe(false);
    expect(result.msg).toBe('indented');
  });

  it('CHAN-U9: times out with partial output', async () => {
    const result = await makeChannel({ timeoutMs: 1000 }).invoke(fixtureModule('slow.mjs'), { sleep_ms: 20_000 });

    expect(result.failed).toBe(true);
    expect(result.error).toBeInstanceOf(TimeoutError);
    expect(result.msg).toBe('Module timed out after 1000ms');
    expect(result.stdout).toBe('partial output\n');
    expect(result.stderr).toBe('still working\n');
    expect(result.exit_code).toBeNull();
  });

  it('CHAN-U10: kills a module that ignores SIGTERM', async () => {
    const channel = makeChannel({ timeoutMs: 1000, killGraceMs: 300 });
    const result = await channel.invoke(fixtureModule('slow.mjs'), { sleep_ms: 20_000, ignore_term: true });

    expect(result.error).toBeInstanceOf(TimeoutError);
    expect(result.stdout).toBe('partial output\n');
    expect(result.duration_ms).toBeLessThan(5000);
  });

  it('CHAN-U11: rejects with ModuleLaunchError for a missing executable', async () => {
    await expect(makeChannel().invoke('/nonexistent/fleetwire-module', {})).rejects.toBeInstanceOf(
      ModuleLaunchError,
    );
  });
});

describe('ModuleChannel.invoke: background processes', () => {
  it('CHAN-U15: settles on module exit when a child keeps stdout open', async () => {
    const channel = makeChannel({ timeoutMs: 2000, killGraceMs: 200 });
    const result = await channel.invoke(fixtureModule('daemon.mjs'), { linger_ms: 5000 });

    expect(result.error).toBeNull();
    expect(result.failed).toBe(false);
    expect(result.changed).toBe(true);
    expect(result.msg).toBe('service started');
    expect(result.exit_code).toBe(0);
    expect(result.duration_ms).toBeLessThan(2000);
  });
});

describe('ModuleChannel.invokeMany', () => {
  it('CHAN-U12: bounds concurrency and keeps order', async () => {
    const exec = new FakeExecAdapter(20);
    const channel = makeChannel({ exec });
    const calls = ['a', 'b', 'c', 'd', 'e'].map((name) => ({ module: `/bin/${name}`, args: { name } }));

    const outcomes = await channel.invokeMany(calls, 2);

    expect(exec.peak).toBe(2);
    expect(outcomes.map((o) => (o.status === 'fulfilled' ? o.value.msg : 'rejected'))).toEqual([
      '/bin/a ',
      '/bin/b ',
      '/bin/c ',
      '/bin/d ',
      '/bin/e ',
    ]);
  });

  it('CHAN-U13: isolates a timed-out call', async () => {
    const channel = makeChannel({ exec: new FakeExecAdapter(5), timeoutMs: 250 });
    const outcomes = await channel.invokeMany(
      [
        { module: '/bin/first', args: {} },
        { module: '/bin/stuck', args: {}, options: { argv: ['--hang'] } },
        { module: '/bin/last', args: {} },
      ],
      3,
    );

    const results = outcomes.map((o) => (o.status === 'fulfilled' ? o.value : null));
    expect(results[0]?.failed).toBe(false);
    expect(results[1]?.error).toBeInstanceOf(TimeoutError);
    expect(results[1]?.msg).toBe('Module timed out after 250ms');
    expect(results[2]?.failed).toBe(false);
  });
});

describe('ModuleChannel logging', () => {
  it('CHAN-U14: logs each invocation with an argument hash only', async () => {
    const sink = new RecordingSink();
    const channel = makeChannel({ sink, exec: new FakeExecAdapter(1) });
    const args = { password: 'test-secret' };

    await channel.invoke({ path: '/opt/modules/user', interpreter: '/usr/bin/python3' }, args);

    expect(sink.entries).toHaveLength(1);
    const entry = sink.entries[0];
    expect(entry).toMatchObject({
      kind: 'module_invocation',
      module: '/opt/modules/user',
      args_hash: computeArgsHash(args),
      exit_code: 0,
      outcome: 'ok',
      error_kind: null,
      duration_ms: 1,
    });
    expect(JSON.stringify(entry)).not.toContain('test-secret');
  });
});
