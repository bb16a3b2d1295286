import { Module, Provider } from '@nestjs/common';
import type { CommandRunner } from '@botkeeper/command';
import { COMMAND_RUNNER, SCHEDULER } from '../constants';
import { CrontabScheduler } from './crontab.scheduler';
import { ScheduleRegistrarService } from './schedule-registrar.service';
import type { Scheduler } from './schedule.types';

const SchedulerProvider: Provider<Scheduler> = {
  provide: SCHEDULER,
  inject: [COMMAND_RUNNER],
  useFactory: (run: CommandRunner) => new CrontabScheduler(run),
};

@Module({
  providers: [SchedulerProvider, ScheduleRegistrarService],
  exports: [ScheduleRegistrarService],
})
export class ScheduleModule {}
