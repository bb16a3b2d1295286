import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CommandResult, CommandRunner } from '@botkeeper/command';
import { loadConfig, type BotkeeperConfig } from '../config/botkeeper-config';
import { ProcessControlError } from '../errors';
import { PidProcessControl, SystemdProcessControl, parseActiveState } from './process-control';

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    durationMs: 5,
    timedOut: false,
    aborted: false,
    ...overrides,
  };
}

/** Answers each call with the next queued result and records the argv. */
function scriptedRunner(results: CommandResult[]) {
  const calls: string[][] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push([command, ...args]);
    const next = results.shift();
    if (!next) throw new Error(`unexpected command: ${command} ${args.join(' ')}`);
    return next;
  };
  return { run, calls };
}

describe('parseActiveState', () => {
  it.each([
    ['active\n', 'Running'],
    ['activating', 'Starting'],
    ['reloading', 'Starting'],
    ['inactive', 'Stopped'],
    ['failed', 'Stopped'],
    ['deactivating', 'Stopped'],
    ['', 'Unknown'],
    ['maintenance', 'Unknown'],
  ] as const)('maps %j to %s', (output, expected) => {
    expect(parseActiveState(output)).toBe(expected);
  });
});

describe('SystemdProcessControl', () => {
  let dir: string;
  let config: BotkeeperConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'botkeeper-pc-'));
    config = loadConfig({ BOT_DIR: dir }, dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the state from the word is-active prints, whatever its exit code', async () => {
    const { run, calls } = scriptedRunner([result({ exitCode: 3, stdout: 'inactive\n' })]);
    const control = new SystemdProcessControl(config.process, run);

    await expect(control.state()).resolves.toBe('Stopped');
    expect(calls).toEqual([['systemctl', 'is-active', 'ktrade-bot']]);
  });

  it('reports Unknown when systemctl cannot be run', async () => {
    const { run } = scriptedRunner([result({ exitCode: null, spawnError: 'spawn systemctl ENOENT' })]);
    const control = new SystemdProcessControl(config.process, run);

    await expect(control.state()).resolves.toBe('Unknown');
  });

  it('prefixes non-interactive sudo when configured', async () => {
    const sudoConfig = loadConfig({ BOT_DIR: dir, SYSTEMCTL_SUDO: 'true', SYSTEMD_UNIT: 'bot' }, dir);
    const { run, calls } = scriptedRunner([result({ stdout: 'active' })]);
    const control = new SystemdProcessControl(sudoConfig.process, run);

    await control.state();

    expect(calls).toEqual([['sudo', '-n', 'systemctl', 'is-active', 'bot']]);
  });

  it('raises a ProcessControlError when start fails', async () => {
    const { run } = scriptedRunner([result({ exitCode: 1, stderr: 'Job for ktrade-bot.service failed.\n' })]);
    const control = new SystemdProcessControl(config.process, run);

    const err = await control.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProcessControlError);
    expect(err).toHaveProperty(
      'message',
      'systemctl start ktrade-bot failed: exit code 1: Job for ktrade-bot.service failed.',
    );
  });

  it('sends the requested signal through systemctl kill', async () => {
    const { run, calls } = scriptedRunner([result(), result()]);
    const control = new SystemdProcessControl(config.process, run);

    await control.signal('graceful');
    await control.signal('forced');

    expect(calls).toEqual([
      ['systemctl', 'kill', '--signal=SIGTERM', 'ktrade-bot'],
      ['systemctl', 'kill', '--signal=SIGKILL', 'ktrade-bot'],
    ]);
  });

  it('derives uptime from the monotonic activation timestamp', async () => {
    const { run } = scriptedRunner([result({ stdout: '4000000000\n' })]);
    const control = new SystemdProcessControl(config.process, run, { hostUptime: () => 5000 });

    await expect(control.uptimeSeconds()).resolves.toBe(1000);
  });

  it('has no uptime for a unit that never became active', async () => {
    const { run } = scriptedRunner([result({ stdout: '0\n' })]);
    const control = new SystemdProcessControl(config.process, run, { hostUptime: () => 5000 });

    await expect(control.uptimeSeconds()).resolves.toBeNull();
  });
});

describe('PidProcessControl', () => {
  let dir: string;
  let config: BotkeeperConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'botkeeper-pc-'));
    config = loadConfig({ BOT_DIR: dir, PROCESS_CONTROL: 'pid' }, dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function makeControl(results: CommandResult[], kill: (pid: number, sig: NodeJS.Signals) => void = (_pid: number, _sig: NodeJS.Signals) => undefined) {
    const runner = scriptedRunner(results);
    const launches: string[] = [];
    const control = new PidProcessControl(config.process, config.botDir, config.logDir, runner.run, {
      kill,
      launch: async (command, cwd) => {
        launches.push(`${cwd}$ ${command}`);
      },
    });
    return { control, calls: runner.calls, launches };
  }

  it('is Stopped when pgrep finds nothing', async () => {
    const { control, calls } = makeControl([result({ exitCode: 1 })]);

    await expect(control.state()).resolves.toBe('Stopped');
    expect(calls).toEqual([['pgrep', '-f', 'run_bot.py']]);
  });

  it('is Running when pgrep lists a pid', async () => {
    const { control } = makeControl([result({ stdout: '4242\n' })]);

    await expect(control.state()).resolves.toBe('Running');
  });

  it('is Unknown when pgrep itself fails', async () => {
    const { control } = makeControl([result({ exitCode: 2, stderr: 'pgrep: invalid option' })]);

    await expect(control.state()).resolves.toBe('Unknown');
  });

  it('signals every matching pid and ignores ones that already exited', async () => {
    const sent: string[] = [];
    const kill = (pid: number, sig: NodeJS.Signals) => {
      if (pid === 11) throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
      sent.push(`${pid}:${sig}`);
    };
    const { control } = makeControl([result({ stdout: '10\n11\n12\n' })], kill);

    await control.signal('graceful');

    expect(sent).toEqual(['10:SIGTERM', '12:SIGTERM']);
  });

  it('launches the start command from the bot directory', async () => {
    const { control, launches } = makeControl([]);

    await control.start();

    expect(launches).toEqual([`${dir}$ python scripts/run_bot.py`]);
  });

  it('reports the oldest matching process age', async () => {
    const { control, calls } = makeControl([
      result({ stdout: '10\n12\n' }),
      result({ stdout: '   95\n  400\n' }),
    ]);

    await expect(control.uptimeSeconds()).resolves.toBe(400);
    expect(calls[1]).toEqual(['ps', '-o', 'etimes=', '-p', '10,12']);
  });
});
