import { Module, Provider } from '@nestjs/common';
import type { CommandRunner } from '@botkeeper/command';
import { HeartbeatMonitor } from '@botkeeper/heartbeat';
import { AlertsModule } from '../alerts/alerts.module';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import { BOTKEEPER_CONFIG, COMMAND_RUNNER, PROCESS_CONTROL } from '../constants';
import { PidProcessControl, SystemdProcessControl, type ProcessControl } from './process-control';
import { SupervisorService } from './supervisor.service';
import { WatchdogService } from './watchdog.service';

const ProcessControlProvider: Provider<ProcessControl> = {
  provide: PROCESS_CONTROL,
  inject: [BOTKEEPER_CONFIG, COMMAND_RUNNER],
  useFactory: (config: BotkeeperConfig, run: CommandRunner) =>
    config.process.control === 'pid'
      ? new PidProcessControl(config.process, config.botDir, config.logDir, run)
      : new SystemdProcessControl(config.process, run),
};

const HeartbeatMonitorProvider: Provider<HeartbeatMonitor> = {
  provide: HeartbeatMonitor,
  inject: [BOTKEEPER_CONFIG],
  useFactory: (config: BotkeeperConfig) =>
    new HeartbeatMonitor({ path: config.heartbeatPath, maxAgeSeconds: config.heartbeatMaxAgeSeconds }),
};

@Module({
  imports: [AlertsModule],
  providers: [ProcessControlProvider, HeartbeatMonitorProvider, SupervisorService, WatchdogService],
  exports: [SupervisorService, WatchdogService, HeartbeatMonitor],
})
export class SupervisorModule {}
