import { Command } from 'commander';
import type { INestApplicationContext } from '@nestjs/common';
import { HeartbeatMonitor } from '@botkeeper/heartbeat';
import { AlertDispatcher } from '../alerts/alert-dispatcher.service';
import type { Clock } from '../clock';
import { CLOCK } from '../constants';
import { OptimizerService } from '../optimizer/optimizer.service';
import { ScheduleRegistrarService } from '../schedule/schedule-registrar.service';
import { SupervisorService } from '../supervisor/supervisor.service';
import { WatchdogService } from '../supervisor/watchdog.service';
import {
  alertCommand,
  optimizeCommand,
  restartCommand,
  scheduleInstallCommand,
  scheduleListCommand,
  scheduleRemoveCommand,
  startCommand,
  statusCommand,
  stopCommand,
  watchdogCommand,
  type CommandIo,
} from './commands';
import type { ExitCode } from './exit-codes';

export interface CliRuntime {
  io: CommandIo;
  /** Runs one command in a fresh application context, then closes it. */
  run(handler: (app: INestApplicationContext) => Promise<ExitCode>): Promise<void>;
  /** Boots the application context and leaves it up until a shutdown signal. */
  serve(handler: (app: INestApplicationContext) => void): Promise<void>;
}

export interface CliProgramContext {
  version: string;
  runtime: CliRuntime;
}

export function createCliProgram(ctx: CliProgramContext): Command {
  const { io } = ctx.runtime;
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => io.out(str.replace(/\n$/, '')),
    writeErr: (str) => io.err(str.replace(/\n$/, '')),
  });

  program
    .name('botkeeper')
    .description('Keeps a trading bot alive, alerts on trouble and runs the nightly optimization cycle')
    .version(ctx.version);

  registerProcessCommands(program, ctx.runtime);
  registerWatchdogCommand(program, ctx.runtime);
  registerOptimizeCommand(program, ctx.runtime);
  registerScheduleCommands(program, ctx.runtime);
  registerAlertCommand(program, ctx.runtime);

  return program;
}

function registerProcessCommands(program: Command, runtime: CliRuntime): void {
  program
    .command('start')
    .description('Start the bot unless it is already running')
    .action(() => runtime.run((app) => startCommand(app.get(SupervisorService), runtime.io)));

  program
    .command('stop')
    .description('Stop the bot, escalating to a forced stop after the grace period')
    .action(() => runtime.run((app) => stopCommand(app.get(SupervisorService), runtime.io)));

  program
    .command('restart')
    .description('Stop then start the bot')
    .action(() => runtime.run((app) => restartCommand(app.get(SupervisorService), runtime.io)));

  program
    .command('status')
    .description('Show process state, uptime, heartbeat and the last restart')
    .action(() =>
      runtime.run((app) =>
        statusCommand(app.get(SupervisorService), app.get(HeartbeatMonitor), app.get<Clock>(CLOCK), runtime.io),
      ),
    );
}

function registerWatchdogCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('watchdog')
    .description('Check the heartbeat once and recover the bot if needed')
    .option('--daemon', 'keep checking on the configured interval until stopped')
    .action((opts: { daemon?: boolean }) => {
      if (opts.daemon) {
        return runtime.serve((app) => app.get(WatchdogService).start());
      }
      return runtime.run((app) => watchdogCommand(app.get(WatchdogService), runtime.io));
    });
}

function registerOptimizeCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('optimize')
    .description('Run one optimization cycle')
    .action(() => runtime.run((app) => optimizeCommand(app.get(OptimizerService), runtime.io)));
}

function registerScheduleCommands(program: Command, runtime: CliRuntime): void {
  const schedule = program.command('schedule').description('Manage the recurring entries in the crontab');

  schedule
    .command('install')
    .description('Install or replace the watchdog and optimizer entries')
    .action(() => runtime.run((app) => scheduleInstallCommand(app.get(ScheduleRegistrarService), runtime.io)));

  schedule
    .command('remove')
    .argument('[label]', 'entry label; all managed entries when omitted')
    .description('Remove managed entries')
    .action((label: string | undefined) =>
      runtime.run((app) => scheduleRemoveCommand(app.get(ScheduleRegistrarService), label ? [label] : [], runtime.io)),
    );

  schedule
    .command('list')
    .argument('[label]', 'only entries with this label')
    .description('List managed entries')
    .action((label: string | undefined) =>
      runtime.run((app) => scheduleListCommand(app.get(ScheduleRegistrarService), label, runtime.io)),
    );
}

function registerAlertCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('alert')
    .argument('<subject>')
    .argument('<body>')
    .option('--urgent', 'send as urgent')
    .description('Send an alert through the configured channel')
    .action((subject: string, body: string, opts: { urgent?: boolean }) =>
      runtime.run((app) =>
        alertCommand(app.get(AlertDispatcher), { subject, body, urgent: opts.urgent === true }, runtime.io),
      ),
    );
}
