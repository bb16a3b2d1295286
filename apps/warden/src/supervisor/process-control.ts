import { spawn } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import { uptime } from 'os';
import { dirname, join } from 'path';
import type { CommandResult, CommandRunner } from '@botkeeper/command';
import { isErrnoException } from '@botkeeper/durable-file';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { ProcessControlError } from '../errors';

export type ProcessState = 'Stopped' | 'Starting' | 'Running' | 'Unknown';

export type StopSignal = 'graceful' | 'forced';

/**
 * OS-level control of the bot. Every call queries the service/process table
 * afresh; nothing is cached.
 */
export interface ProcessControl {
  /** Human-readable target, e.g. `systemd unit ktrade-bot`. */
  readonly target: string;
  state(): Promise<ProcessState>;
  /** Requests a start. Resolves once the request is accepted, not once the bot is Running. */
  start(): Promise<void>;
  signal(kind: StopSignal): Promise<void>;
  /** Seconds since the current instance started; null when stopped or unknown. */
  uptimeSeconds(): Promise<number | null>;
}

const QUERY_TIMEOUT_MS = 10_000;

function describeFailure(result: CommandResult): string {
  if (result.spawnError) return result.spawnError;
  if (result.timedOut) return `timed out after ${result.durationMs}ms`;
  const detail = result.stderr.trim() || result.stdout.trim();
  return `exit code ${result.exitCode ?? result.signal}${detail ? `: ${detail}` : ''}`;
}

/** `systemctl is-active` output → state. */
export function parseActiveState(output: string): ProcessState {
  switch (output.trim()) {
    case 'active':
      return 'Running';
    case 'activating':
    case 'reloading':
      return 'Starting';
    case 'inactive':
    case 'failed':
    case 'deactivating':
      return 'Stopped';
    default:
      return 'Unknown';
  }
}

export interface SystemdProcessControlOptions {
  /** Host uptime in seconds (default: `os.uptime`). */
  hostUptime?: () => number;
}

export class SystemdProcessControl implements ProcessControl {
  readonly target: string;
  private readonly hostUptime: () => number;

  constructor(
    private readonly config: BotkeeperConfig['process'],
    private readonly run: CommandRunner,
    opts: SystemdProcessControlOptions = {},
  ) {
    this.target = `systemd unit ${config.systemdUnit}`;
    this.hostUptime = opts.hostUptime ?? uptime;
  }

  async state(): Promise<ProcessState> {
    // is-active exits non-zero for anything but active; the printed word is what counts
    const result = await this.systemctl(['is-active', this.config.systemdUnit], QUERY_TIMEOUT_MS);
    if (result.spawnError || result.timedOut) return 'Unknown';
    return parseActiveState(result.stdout);
  }

  async start(): Promise<void> {
    const result = await this.systemctl(['start', this.config.systemdUnit], this.config.startTimeoutMs);
    if (result.exitCode !== 0) {
      throw new ProcessControlError(`systemctl start ${this.config.systemdUnit} failed: ${describeFailure(result)}`);
    }
  }

  async signal(kind: StopSignal): Promise<void> {
    const sig = kind === 'graceful' ? 'SIGTERM' : 'SIGKILL';
    const result = await this.systemctl(
      ['kill', `--signal=${sig}`, this.config.systemdUnit],
      QUERY_TIMEOUT_MS,
    );
    if (result.exitCode !== 0) {
      throw new ProcessControlError(`systemctl kill --signal=${sig} failed: ${describeFailure(result)}`);
    }
  }

  async uptimeSeconds(): Promise<number | null> {
    const result = await this.systemctl(
      ['show', '--property=ActiveEnterTimestampMonotonic', '--value', this.config.systemdUnit],
      QUERY_TIMEOUT_MS,
    );
    if (result.exitCode !== 0) return null;
    // microseconds since boot; 0 means the unit never entered active
    const enteredUs = Number(result.stdout.trim());
    if (!Number.isFinite(enteredUs) || enteredUs <= 0) return null;
    return Math.max(0, Math.round(this.hostUptime() - enteredUs / 1_000_000));
  }

  private systemctl(args: string[], timeoutMs: number): Promise<CommandResult> {
    return this.config.sudo
      ? this.run('sudo', ['-n', 'systemctl', ...args], { timeoutMs })
      : this.run('systemctl', args, { timeoutMs });
  }
}

export interface PidProcessControlOptions {
  kill?: (pid: number, signal: NodeJS.Signals) => void;
  /** Spawns the start command detached. */
  launch?: (command: string, cwd: string, logFile: string) => Promise<void>;
}

/** Starts `command` through the shell in its own session, output appended to `logFile`. */
export function launchDetached(command: string, cwd: string, logFile: string): Promise<void> {
  mkdirSync(dirname(logFile), { recursive: true });
  const fd = openSync(logFile, 'a');
  return new Promise<void>((resolve, reject) => {
    const child = spawn('sh', ['-c', command], {
      cwd,
      detached: true,
      stdio: ['ignore', fd, fd],
    });
    child.once('spawn', () => {
      closeSync(fd);
      child.unref();
      resolve();
    });
    child.once('error', (err) => {
      closeSync(fd);
      reject(new ProcessControlError(`Failed to launch "${command}": ${err.message}`, { cause: err }));
    });
  });
}

/** Process-table control for hosts without systemd: `pgrep -f` finds the bot. */
export class PidProcessControl implements ProcessControl {
  readonly target: string;
  private readonly kill: (pid: number, signal: NodeJS.Signals) => void;
  private readonly launch: (command: string, cwd: string, logFile: string) => Promise<void>;

  constructor(
    private readonly config: BotkeeperConfig['process'],
    private readonly botDir: string,
    private readonly logDir: string,
    private readonly run: CommandRunner,
    opts: PidProcessControlOptions = {},
  ) {
    this.target = `process matching "${config.pattern}"`;
    this.kill = opts.kill ?? ((pid, signal) => process.kill(pid, signal));
    this.launch = opts.launch ?? launchDetached;
  }

  /** null when the process table could not be queried. */
  async findPids(): Promise<number[] | null> {
    const result = await this.run('pgrep', ['-f', this.config.pattern], { timeoutMs: QUERY_TIMEOUT_MS });
    // pgrep: 0 = matches, 1 = none
    if (result.exitCode === 1) return [];
    if (result.exitCode !== 0) return null;
    return result.stdout
      .split('\n')
      .map((line) => parseInt(line.trim(), 10))
      .filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== process.pid);
  }

  async state(): Promise<ProcessState> {
    const pids = await this.findPids();
    if (pids === null) return 'Unknown';
    return pids.length > 0 ? 'Running' : 'Stopped';
  }

  async start(): Promise<void> {
    await this.launch(this.config.startCommand, this.botDir, join(this.logDir, 'bot.out.log'));
  }

  async signal(kind: StopSignal): Promise<void> {
    const pids = await this.findPids();
    if (pids === null) throw new ProcessControlError(`Could not query the process table for ${this.target}`);
    const sig: NodeJS.Signals = kind === 'graceful' ? 'SIGTERM' : 'SIGKILL';
    for (const pid of pids) {
      try {
        this.kill(pid, sig);
      } catch (err: unknown) {
        // already gone
        if (isErrnoException(err) && err.code === 'ESRCH') continue;
        throw new ProcessControlError(`Failed to send ${sig} to pid ${pid}`, { cause: err });
      }
    }
  }

  async uptimeSeconds(): Promise<number | null> {
    const pids = await this.findPids();
    if (!pids || pids.length === 0) return null;
    const result = await this.run('ps', ['-o', 'etimes=', '-p', pids.join(',')], { timeoutMs: QUERY_TIMEOUT_MS });
    if (result.exitCode !== 0) return null;
    const ages = result.stdout
      .split('\n')
      .map((line) => parseInt(line.trim(), 10))
      .filter((n) => Number.isInteger(n) && n >= 0);
    return ages.length > 0 ? Math.max(...ages) : null;
  }
}
