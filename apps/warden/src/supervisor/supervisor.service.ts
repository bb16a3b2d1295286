import { join } from 'path';
import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import type { Clock } from '../clock';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { BOTKEEPER_CONFIG, CLOCK, PROCESS_CONTROL, RESTART_RECORD_FILE, STATE_POLL_INTERVAL_MS } from '../constants';
import { ProcessControlError, errorMessage } from '../errors';
import type { ProcessControl, ProcessState } from './process-control';
import { RestartRecordStore, type RestartRecord } from './restart-record';

// after SIGKILL the kernel reaps almost immediately; this only covers systemd bookkeeping
const FORCED_STOP_WAIT_MS = 5_000;

export interface RecoveryOptions {
  /** Send an alert for the outcome (default true). */
  notify?: boolean;
  /** Skip the action while inside the cool-down window (default false). */
  respectCooldown?: boolean;
}

export type EnsureRunningResult = 'already-running' | 'started' | 'cooldown';
export type RestartResult = 'restarted' | 'cooldown';
export type StopResult = 'stopped' | 'not-running';

export interface SupervisorStatus {
  state: ProcessState;
  target: string;
  uptimeSeconds: number | null;
  lastRestart: RestartRecord | null;
  cooldownRemainingMs: number;
}

/**
 * Idempotent start/stop/restart of the bot. Every decision starts from a
 * fresh state query; the only thing carried between invocations is the
 * restart record that backs the cool-down.
 */
@Injectable()
export class SupervisorService {
  private readonly restarts: RestartRecordStore;

  constructor(
    @Inject(BOTKEEPER_CONFIG) private readonly config: BotkeeperConfig,
    @Inject(PROCESS_CONTROL) private readonly control: ProcessControl,
    @Inject(AlertDispatcher) private readonly alerts: AlertDispatcher,
    @Inject(CLOCK) private readonly clock: Clock,
    @InjectPinoLogger(SupervisorService.name) private readonly logger: PinoLogger,
  ) {
    this.restarts = new RestartRecordStore(join(config.stateDir, RESTART_RECORD_FILE));
  }

  state(): Promise<ProcessState> {
    return this.control.state();
  }

  uptimeSeconds(): Promise<number | null> {
    return this.control.uptimeSeconds();
  }

  async status(): Promise<SupervisorStatus> {
    const state = await this.control.state();
    const uptimeSeconds = state === 'Running' ? await this.control.uptimeSeconds() : null;
    return {
      state,
      target: this.control.target,
      uptimeSeconds,
      lastRestart: this.restarts.read(),
      cooldownRemainingMs: this.cooldownRemainingMs(),
    };
  }

  cooldownRemainingMs(): number {
    return this.restarts.cooldownRemainingMs(this.clock.now(), this.config.process.restartCooldownMs);
  }

  /**
   * Starts the bot unless it is already Running or Starting. Repeated calls
   * against a live bot do nothing and send nothing.
   */
  async ensureRunning(
    reason = 'Bot process was not running',
    opts: RecoveryOptions = {},
  ): Promise<EnsureRunningResult> {
    const { notify = true, respectCooldown = false } = opts;
    const state = await this.control.state();
    if (state === 'Running' || state === 'Starting') {
      this.logger.debug({ state }, 'Bot already running');
      return 'already-running';
    }
    if (respectCooldown && this.inCooldown(reason)) return 'cooldown';

    this.logger.warn({ state, reason, target: this.control.target }, 'Starting bot');
    this.restarts.write(this.clock.now(), reason);
    try {
      await this.startAndWait();
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Bot failed to start');
      if (notify) {
        await this.alerts.send({
          subject: 'Start Failed',
          body: `*Reason:* ${reason}\n*Error:* ${errorMessage(err)}\nManual intervention required.`,
          severity: 'Urgent',
        });
      }
      throw err;
    }

    this.logger.info({ target: this.control.target }, 'Bot started');
    if (notify) {
      await this.alerts.send({
        subject: 'Bot Started',
        body: `*Reason:* ${reason}\nThe bot was found ${state === 'Unknown' ? 'in an unknown state' : 'stopped'} and has been started.`,
        severity: 'Urgent',
      });
    }
    return 'started';
  }

  /** Graceful stop, forced stop if needed, then start. */
  async restart(reason: string, opts: RecoveryOptions = {}): Promise<RestartResult> {
    const { notify = true, respectCooldown = false } = opts;
    if (respectCooldown && this.inCooldown(reason)) return 'cooldown';

    this.logger.warn({ reason, target: this.control.target }, 'Restarting bot');
    // recorded before acting so a failing restart also backs off
    this.restarts.write(this.clock.now(), reason);
    try {
      await this.stopProcess();
      await this.startAndWait();
    } catch (err) {
      this.logger.error({ err: errorMessage(err), reason }, 'Bot restart failed');
      if (notify) {
        await this.alerts.send({
          subject: 'Restart Failed',
          body: `*Reason:* ${reason}\n*Error:* ${errorMessage(err)}\nManual intervention required.`,
          severity: 'Urgent',
        });
      }
      throw err;
    }

    this.logger.info({ reason }, 'Bot restarted');
    if (notify) {
      await this.alerts.send({
        subject: 'Bot Restarted',
        body: `*Reason:* ${reason}\nThe bot has been restarted automatically.`,
        severity: 'Informational',
      });
    }
    return 'restarted';
  }

  async stop(): Promise<StopResult> {
    const state = await this.control.state();
    if (state === 'Stopped') return 'not-running';
    await this.stopProcess();
    this.logger.info({ target: this.control.target }, 'Bot stopped');
    return 'stopped';
  }

  private inCooldown(reason: string): boolean {
    const remainingMs = this.cooldownRemainingMs();
    if (remainingMs <= 0) return false;
    this.logger.info(
      { reason, remainingSeconds: Math.ceil(remainingMs / 1000) },
      'Restart suppressed: inside cool-down window',
    );
    return true;
  }

  /** Ends with a fresh state query; throws when the bot survives the forced signal. */
  private async stopProcess(): Promise<void> {
    const initial = await this.control.state();
    if (initial === 'Stopped') return;

    await this.control.signal('graceful');
    const afterGraceful = await this.waitForState((s) => s === 'Stopped', this.config.process.stopGraceMs);
    if (afterGraceful === 'Stopped') return;

    this.logger.warn(
      { state: afterGraceful, graceMs: this.config.process.stopGraceMs },
      'Bot did not stop gracefully, sending forced termination',
    );
    await this.control.signal('forced');
    const final = await this.waitForState((s) => s === 'Stopped', FORCED_STOP_WAIT_MS);
    if (final !== 'Stopped') {
      throw new ProcessControlError(`${this.control.target} still ${final} after forced termination`);
    }
  }

  private async startAndWait(): Promise<void> {
    await this.control.start();
    const state = await this.waitForState((s) => s === 'Running', this.config.process.startTimeoutMs);
    if (state !== 'Running') {
      throw new ProcessControlError(
        `${this.control.target} did not reach Running within ${Math.round(this.config.process.startTimeoutMs / 1000)}s (last state: ${state})`,
      );
    }
  }

  private async waitForState(done: (s: ProcessState) => boolean, timeoutMs: number): Promise<ProcessState> {
    const deadline = this.clock.now().getTime() + timeoutMs;
    for (;;) {
      const state = await this.control.state();
      if (done(state) || this.clock.now().getTime() >= deadline) return state;
      await this.clock.sleep(STATE_POLL_INTERVAL_MS);
    }
  }
}
