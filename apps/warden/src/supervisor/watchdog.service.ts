import { Inject, Injectable, OnApplicationShutdown } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { HeartbeatMonitor } from '@botkeeper/heartbeat';
import { PeriodicWorkerMixin } from '@botkeeper/worker-core';
import type { Clock } from '../clock';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { BOTKEEPER_CONFIG, CLOCK, LOCK_FACTORY, WATCHDOG_LOCK } from '../constants';
import { ProcessControlError } from '../errors';
import type { LockFactory } from '../providers/lock.provider';
import { SupervisorService } from './supervisor.service';

export type WatchdogOutcome =
  | 'healthy'
  | 'starting'
  | 'grace'
  | 'started'
  | 'restarted'
  | 'cooldown'
  | 'skipped-locked'
  | 'unknown'
  | 'failed';

/**
 * One watchdog tick: heartbeat classification plus the supervisor action it
 * calls for. Ticks never overlap; a tick that finds the lock held is a no-op.
 */
@Injectable()
export class WatchdogService extends PeriodicWorkerMixin implements OnApplicationShutdown {
  protected readonly intervalMs: number;
  protected readonly initialDelayMs = 0;

  constructor(
    @Inject(BOTKEEPER_CONFIG) private readonly config: BotkeeperConfig,
    @Inject(SupervisorService) private readonly supervisor: SupervisorService,
    @Inject(HeartbeatMonitor) private readonly heartbeat: HeartbeatMonitor,
    @Inject(LOCK_FACTORY) private readonly locks: LockFactory,
    @Inject(CLOCK) private readonly clock: Clock,
    @InjectPinoLogger(WatchdogService.name) protected readonly logger: PinoLogger,
  ) {
    super();
    this.intervalMs = config.watchdog.intervalMs;
  }

  onApplicationShutdown(): Promise<void> {
    return this.stop();
  }

  runCycle(): Promise<WatchdogOutcome> {
    return this.tick();
  }

  async tick(now: Date = this.clock.now()): Promise<WatchdogOutcome> {
    const lock = this.locks(WATCHDOG_LOCK, this.config.watchdog.lockTtlSeconds);
    if (!(await lock.acquire())) {
      this.logger.info('Watchdog lock held by another tick, skipping');
      return 'skipped-locked';
    }
    try {
      const outcome = await this.check(now);
      this.logger.info({ outcome }, 'Watchdog tick complete');
      return outcome;
    } catch (err) {
      // the supervisor has already alerted; the next tick tries again
      if (err instanceof ProcessControlError) {
        this.logger.error({ err: err.message }, 'Watchdog recovery failed');
        return 'failed';
      }
      throw err;
    } finally {
      await lock.release();
    }
  }

  private async check(now: Date): Promise<WatchdogOutcome> {
    const state = await this.supervisor.state();
    switch (state) {
      case 'Stopped': {
        const result = await this.supervisor.ensureRunning('Bot process was not running', { respectCooldown: true });
        return result === 'already-running' ? 'healthy' : result;
      }
      case 'Starting':
        this.logger.info('Bot is starting, not checking heartbeat');
        return 'starting';
      case 'Unknown':
        this.logger.warn('Bot state could not be determined, taking no action');
        return 'unknown';
      case 'Running':
        return this.checkHeartbeat(now);
    }
  }

  private async checkHeartbeat(now: Date): Promise<WatchdogOutcome> {
    const beat = this.heartbeat.classify(now);
    const threshold = this.heartbeat.threshold;

    if (beat.status === 'Fresh') {
      this.logger.debug({ ageSeconds: beat.ageSeconds }, 'Heartbeat fresh');
      return 'healthy';
    }

    if (beat.status === 'Stale') {
      const age = Math.round(beat.ageSeconds ?? 0);
      this.logger.warn({ ageSeconds: age, threshold }, 'Heartbeat stale');
      return this.supervisor.restart(`Heartbeat stale: last beat ${age}s ago (threshold ${threshold}s)`, {
        respectCooldown: true,
      });
    }

    // Missing: the bot may still be booting
    const uptime = await this.supervisor.uptimeSeconds();
    const grace = this.config.startupGraceSeconds;
    if (uptime === null || uptime <= grace) {
      this.logger.info({ uptimeSeconds: uptime, graceSeconds: grace }, 'Heartbeat missing, within startup grace');
      return 'grace';
    }
    this.logger.warn({ uptimeSeconds: uptime, graceSeconds: grace }, 'Heartbeat missing past startup grace');
    return this.supervisor.restart(`Heartbeat missing after ${uptime}s of uptime (grace ${grace}s)`, {
      respectCooldown: true,
    });
  }
}
