import type { CommandRunner } from '@botkeeper/command';
import type { Scheduler } from './schedule.types';

const CRONTAB_TIMEOUT_MS = 10_000;

/** The invoking user's crontab. */
export class CrontabScheduler implements Scheduler {
  constructor(private readonly run: CommandRunner) {}

  async read(): Promise<string[]> {
    const result = await this.run('crontab', ['-l'], { timeoutMs: CRONTAB_TIMEOUT_MS });
    if (result.exitCode === 0) {
      return result.stdout.split('\n').filter((line, i, all) => i < all.length - 1 || line !== '');
    }
    // a user without a crontab gets exit 1 and "no crontab for <user>"
    if (result.exitCode === 1 && /no crontab/i.test(result.stderr)) return [];
    throw new Error(`crontab -l failed: ${result.spawnError ?? (result.stderr.trim() || `exit code ${result.exitCode}`)}`);
  }

  async write(lines: string[]): Promise<void> {
    const input = lines.length > 0 ? lines.join('\n') + '\n' : '';
    const result = await this.run('crontab', ['-'], { input, timeoutMs: CRONTAB_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      throw new Error(`crontab - failed: ${result.spawnError ?? (result.stderr.trim() || `exit code ${result.exitCode}`)}`);
    }
  }
}
