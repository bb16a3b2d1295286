import { readJsonRecord, writeJsonRecord } from '@botkeeper/durable-file';

/** Cool-down state: when the last automated or operator restart happened. */
export interface RestartRecord {
  /** ISO-8601. */
  lastRestartAt: string;
  reason: string;
}

function isRestartRecord(value: unknown): value is RestartRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'lastRestartAt' in value &&
    typeof value.lastRestartAt === 'string' &&
    'reason' in value &&
    typeof value.reason === 'string' &&
    !Number.isNaN(Date.parse(value.lastRestartAt))
  );
}

export class RestartRecordStore {
  constructor(readonly path: string) {}

  /** A missing or corrupt record reads as "never restarted". */
  read(): RestartRecord | null {
    const value = readJsonRecord(this.path);
    return isRestartRecord(value) ? value : null;
  }

  write(at: Date, reason: string): void {
    writeJsonRecord(this.path, { lastRestartAt: at.toISOString(), reason } satisfies RestartRecord);
  }

  /** Milliseconds left in the cool-down window, 0 when outside it. */
  cooldownRemainingMs(now: Date, cooldownMs: number): number {
    const record = this.read();
    if (!record) return 0;
    const elapsed = now.getTime() - Date.parse(record.lastRestartAt);
    // a record from the future (clock moved back) does not block recovery
    if (elapsed < 0) return 0;
    return Math.max(0, cooldownMs - elapsed);
  }
}
