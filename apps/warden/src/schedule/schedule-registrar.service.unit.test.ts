import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { rmSync } from 'fs';
import { ConfigError } from '../errors';
import { makeBotDir, makeConfig, makeLogger } from '../test/fakes';
import { ScheduleRegistrarService } from './schedule-registrar.service';
import type { ScheduleEntry, Scheduler } from './schedule.types';

class InMemoryScheduler implements Scheduler {
  writes = 0;

  constructor(public lines: string[] = []) {}

  async read(): Promise<string[]> {
    return [...this.lines];
  }

  async write(lines: string[]): Promise<void> {
    this.writes++;
    this.lines = [...lines];
  }
}

const WATCHDOG: ScheduleEntry = {
  label: 'watchdog',
  expression: '*/5 * * * *',
  command: '/opt/botkeeper watchdog',
};

describe('ScheduleRegistrarService', () => {
  let botDir: string;
  let scheduler: InMemoryScheduler;
  let registrar: ScheduleRegistrarService;

  beforeEach(() => {
    botDir = makeBotDir();
    scheduler = new InMemoryScheduler(['MAILTO=ops@example.test', '0 3 * * * /usr/bin/backup']);
    registrar = new ScheduleRegistrarService(
      makeConfig(botDir, { BOTKEEPER_CLI: '/opt/botkeeper' }),
      scheduler,
      makeLogger(),
    );
  });

  afterEach(() => {
    rmSync(botDir, { recursive: true, force: true });
  });

  it('appends the entry after existing lines', async () => {
    await registrar.install([WATCHDOG]);

    expect(scheduler.lines).toEqual([
      'MAILTO=ops@example.test',
      '0 3 * * * /usr/bin/backup',
      '*/5 * * * * /opt/botkeeper watchdog # botkeeper:watchdog',
    ]);
  });

  it('leaves exactly one labelled block when installed twice', async () => {
    await registrar.install([WATCHDOG]);
    await registrar.install([{ ...WATCHDOG, expression: '*/10 * * * *' }]);

    expect(scheduler.lines).toEqual([
      'MAILTO=ops@example.test',
      '0 3 * * * /usr/bin/backup',
      '*/10 * * * * /opt/botkeeper watchdog # botkeeper:watchdog',
    ]);
    await expect(registrar.list('watchdog')).resolves.toEqual([{ ...WATCHDOG, expression: '*/10 * * * *' }]);
  });

  it('writes the table once per install', async () => {
    await registrar.install([WATCHDOG, { ...WATCHDOG, label: 'other' }]);

    expect(scheduler.writes).toBe(1);
  });

  it('installs the default watchdog and optimizer entries with descriptions', async () => {
    await registrar.install();

    const logFile = `${botDir}/logs/cron.log`;
    expect(scheduler.lines.slice(2)).toEqual([
      '# botkeeper:watchdog heartbeat check and recovery',
      `*/5 * * * * /opt/botkeeper watchdog >> ${logFile} 2>&1 # botkeeper:watchdog`,
      '# botkeeper:optimizer daily optimization run after market close',
      `30 16 * * 1-5 /opt/botkeeper optimize >> ${logFile} 2>&1 # botkeeper:optimizer`,
    ]);
    const listed = await registrar.list();
    expect(listed.map((e) => [e.label, e.expression, e.description])).toEqual([
      ['watchdog', '*/5 * * * *', 'heartbeat check and recovery'],
      ['optimizer', '30 16 * * 1-5', 'daily optimization run after market close'],
    ]);
  });

  it('refuses an invalid expression without touching the table', async () => {
    await expect(
      registrar.install([WATCHDOG, { ...WATCHDOG, label: 'broken', expression: '61 * * * *' }]),
    ).rejects.toBeInstanceOf(ConfigError);

    expect(scheduler.writes).toBe(0);
  });

  it('refuses six-field expressions', async () => {
    await expect(registrar.install([{ ...WATCHDOG, expression: '0 */5 * * * *' }])).rejects.toThrow(
      'Invalid cron expression for watchdog: "0 */5 * * * *"',
    );
  });

  it('refuses labels that could not be matched back', async () => {
    await expect(registrar.install([{ ...WATCHDOG, label: 'two words' }])).rejects.toThrow(
      'Invalid schedule label "two words"',
    );
  });

  it('removes only the lines carrying the label', async () => {
    await registrar.install();

    await expect(registrar.remove('watchdog')).resolves.toBe(1);

    expect(scheduler.lines[0]).toBe('MAILTO=ops@example.test');
    expect(scheduler.lines[1]).toBe('0 3 * * * /usr/bin/backup');
    expect((await registrar.list()).map((e) => e.label)).toEqual(['optimizer']);
  });

  it('does not rewrite the table when the label is absent', async () => {
    await expect(registrar.remove('watchdog')).resolves.toBe(0);
    expect(scheduler.writes).toBe(0);
  });

  it('does not treat a similar label as the same one', async () => {
    scheduler.lines.push('* * * * * other # botkeeper:watchdog-2');
    await registrar.install([WATCHDOG]);

    await registrar.remove('watchdog');

    expect(scheduler.lines).toContain('* * * * * other # botkeeper:watchdog-2');
  });
});
