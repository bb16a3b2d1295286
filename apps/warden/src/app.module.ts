import { DynamicModule, Module } from '@nestjs/common';
import { workerLoggerModule } from '@botkeeper/worker-core';
import { AlertsModule } from './alerts/alerts.module';
import type { BotkeeperConfig } from './config/botkeeper-config';
import { ConfigModule } from './config/config.module';
import { OptimizerModule } from './optimizer/optimizer.module';
import { ProvidersModule } from './providers/providers.module';
import { ScheduleModule } from './schedule/schedule.module';
import { SupervisorModule } from './supervisor/supervisor.module';

@Module({})
export class AppModule {
  static register(config: BotkeeperConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        workerLoggerModule({ logDir: config.logDir }),
        ConfigModule.forRoot(config),
        ProvidersModule,
        AlertsModule,
        SupervisorModule,
        ScheduleModule,
        OptimizerModule,
      ],
    };
  }
}
