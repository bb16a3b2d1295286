import { Module } from '@nestjs/common';
import { MetricsService } from '@botkeeper/worker-core';
import { AlertDispatcher } from './alert-dispatcher.service';

@Module({
  providers: [MetricsService, AlertDispatcher],
  exports: [MetricsService, AlertDispatcher],
})
export class AlertsModule {}
