import { join } from 'path';
import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { validate } from 'node-cron';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { BOTKEEPER_CONFIG, OPTIMIZER_LABEL, SCHEDULER, WATCHDOG_LABEL } from '../constants';
import { ConfigError } from '../errors';
import { LABEL_RE, applyEntries, parseEntries, stripLabel } from './crontab-lines';
import type { ScheduleEntry, Scheduler } from './schedule.types';

export function validateEntry(entry: ScheduleEntry): void {
  if (!LABEL_RE.test(entry.label)) {
    throw new ConfigError(`Invalid schedule label "${entry.label}"`);
  }
  const fields = entry.expression.trim().split(/\s+/);
  if (fields.length !== 5 || !validate(entry.expression)) {
    throw new ConfigError(`Invalid cron expression for ${entry.label}: "${entry.expression}"`);
  }
  if (!entry.command.trim() || /[\r\n]/.test(entry.command)) {
    throw new ConfigError(`Invalid command for ${entry.label}`);
  }
}

/**
 * Label-keyed install/remove over the host scheduler. Every change is one
 * read followed by one whole-table write.
 */
@Injectable()
export class ScheduleRegistrarService {
  constructor(
    @Inject(BOTKEEPER_CONFIG) private readonly config: BotkeeperConfig,
    @Inject(SCHEDULER) private readonly scheduler: Scheduler,
    @InjectPinoLogger(ScheduleRegistrarService.name) private readonly logger: PinoLogger,
  ) {}

  defaultEntries(): ScheduleEntry[] {
    const { cli, watchdogCron, optimizerCron } = this.config.schedule;
    const logFile = join(this.config.logDir, 'cron.log');
    return [
      {
        label: WATCHDOG_LABEL,
        expression: watchdogCron,
        command: `${cli} watchdog >> ${logFile} 2>&1`,
        description: 'heartbeat check and recovery',
      },
      {
        label: OPTIMIZER_LABEL,
        expression: optimizerCron,
        command: `${cli} optimize >> ${logFile} 2>&1`,
        description: 'daily optimization run after market close',
      },
    ];
  }

  /** Replaces every label in `entries`; an invalid entry aborts before anything is written. */
  async install(entries: readonly ScheduleEntry[] = this.defaultEntries()): Promise<ScheduleEntry[]> {
    entries.forEach(validateEntry);
    const current = await this.scheduler.read();
    await this.scheduler.write(applyEntries(current, entries));
    this.logger.info({ labels: entries.map((e) => e.label) }, 'Schedule installed');
    return [...entries];
  }

  /** Returns how many entries were removed. The table is left untouched when there were none. */
  async remove(label: string): Promise<number> {
    const current = await this.scheduler.read();
    const removed = parseEntries(current, label).length;
    const next = stripLabel(current, label);
    if (next.length === current.length) return 0;
    await this.scheduler.write(next);
    this.logger.info({ label, removed }, 'Schedule removed');
    return removed;
  }

  async list(label?: string): Promise<ScheduleEntry[]> {
    return parseEntries(await this.scheduler.read(), label);
  }
}
