/** One labelled periodic trigger. The label is the identity: installs replace by label. */
export interface ScheduleEntry {
  label: string;
  /** Five-field cron expression. */
  expression: string;
  command: string;
  description?: string;
}

/** The host scheduler's table, read and written whole. */
export interface Scheduler {
  read(): Promise<string[]>;
  write(lines: string[]): Promise<void>;
}
