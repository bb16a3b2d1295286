import { ProcessControlError } from '../errors';

export const ExitCode = {
  Ok: 0,
  Error: 1,
  AlreadyRunning: 2,
  NotRunning: 3,
  ProcessControlFailed: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForError(err: unknown): ExitCode {
  return err instanceof ProcessControlError ? ExitCode.ProcessControlFailed : ExitCode.Error;
}
