import type { HeartbeatMonitor } from '@botkeeper/heartbeat';
import type { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import type { Clock } from '../clock';
import type { OptimizerService } from '../optimizer/optimizer.service';
import type { ScheduleRegistrarService } from '../schedule/schedule-registrar.service';
import type { ScheduleEntry } from '../schedule/schedule.types';
import type { SupervisorService } from '../supervisor/supervisor.service';
import type { WatchdogService } from '../supervisor/watchdog.service';
import { errorMessage } from '../errors';
import { ExitCode, exitCodeForError } from './exit-codes';
import { formatStatus } from './format';

export type WriteLine = (line: string) => void;

export interface CommandIo {
  out: WriteLine;
  err: WriteLine;
}

const OPERATOR_REASON = 'Operator request';

async function guarded(io: CommandIo, action: () => Promise<ExitCode>): Promise<ExitCode> {
  try {
    return await action();
  } catch (err) {
    io.err(errorMessage(err));
    return exitCodeForError(err);
  }
}

export function startCommand(supervisor: SupervisorService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    const result = await supervisor.ensureRunning(OPERATOR_REASON, { notify: false });
    if (result === 'already-running') {
      io.out('Bot is already running');
      return ExitCode.AlreadyRunning;
    }
    io.out('Bot started');
    return ExitCode.Ok;
  });
}

export function stopCommand(supervisor: SupervisorService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    if ((await supervisor.stop()) === 'not-running') {
      io.out('Bot is not running');
      return ExitCode.NotRunning;
    }
    io.out('Bot stopped');
    return ExitCode.Ok;
  });
}

export function restartCommand(supervisor: SupervisorService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    await supervisor.restart(OPERATOR_REASON, { notify: false });
    io.out('Bot restarted');
    return ExitCode.Ok;
  });
}

export function statusCommand(
  supervisor: SupervisorService,
  heartbeat: HeartbeatMonitor,
  clock: Clock,
  io: CommandIo,
): Promise<ExitCode> {
  return guarded(io, async () => {
    const status = await supervisor.status();
    formatStatus(status, heartbeat.classify(clock.now()), heartbeat.threshold).forEach(io.out);
    if (status.state === 'Stopped') return ExitCode.NotRunning;
    return status.state === 'Unknown' ? ExitCode.Error : ExitCode.Ok;
  });
}

export function watchdogCommand(watchdog: WatchdogService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    const outcome = await watchdog.tick();
    io.out(`Watchdog: ${outcome}`);
    return outcome === 'failed' ? ExitCode.ProcessControlFailed : ExitCode.Ok;
  });
}

export function optimizeCommand(optimizer: OptimizerService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    const run = await optimizer.runCycle();
    if (!run) {
      io.out('Another optimization run is in progress, skipping');
      return ExitCode.Ok;
    }
    io.out(`Optimization ${run.outcome}${run.reportPath ? `: ${run.reportPath}` : ''}`);
    if (run.error) io.err(run.error);
    return run.outcome === 'Failed' ? ExitCode.Error : ExitCode.Ok;
  });
}

function describeEntry(entry: ScheduleEntry): string {
  return `${entry.label}\t${entry.expression}\t${entry.command}`;
}

export function scheduleInstallCommand(registrar: ScheduleRegistrarService, io: CommandIo): Promise<ExitCode> {
  return guarded(io, async () => {
    const installed = await registrar.install();
    installed.forEach((e) => io.out(`installed ${describeEntry(e)}`));
    return ExitCode.Ok;
  });
}

export function scheduleRemoveCommand(
  registrar: ScheduleRegistrarService,
  labels: readonly string[],
  io: CommandIo,
): Promise<ExitCode> {
  return guarded(io, async () => {
    const targets = labels.length > 0 ? labels : registrar.defaultEntries().map((e) => e.label);
    for (const label of targets) {
      io.out(`removed ${await registrar.remove(label)} entry(ies) labelled ${label}`);
    }
    return ExitCode.Ok;
  });
}

export function scheduleListCommand(
  registrar: ScheduleRegistrarService,
  label: string | undefined,
  io: CommandIo,
): Promise<ExitCode> {
  return guarded(io, async () => {
    const entries = await registrar.list(label);
    if (entries.length === 0) io.out('No scheduled entries');
    entries.forEach((e) => io.out(describeEntry(e)));
    return ExitCode.Ok;
  });
}

export function alertCommand(
  alerts: AlertDispatcher,
  input: { subject: string; body: string; urgent: boolean },
  io: CommandIo,
): Promise<ExitCode> {
  return guarded(io, async () => {
    const delivery = await alerts.send({
      subject: input.subject,
      body: input.body,
      severity: input.urgent ? 'Urgent' : 'Informational',
    });
    io.out(delivery === 'delivered' ? 'Alert delivered' : 'Alert written to the fallback log');
    return ExitCode.Ok;
  });
}
