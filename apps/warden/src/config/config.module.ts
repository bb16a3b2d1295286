import { DynamicModule, Global, Module } from '@nestjs/common';
import { BOTKEEPER_CONFIG, CLOCK } from '../constants';
import { systemClock } from '../clock';
import { loadConfig, type BotkeeperConfig } from './botkeeper-config';

@Global()
@Module({})
export class ConfigModule {
  /** Pass a config that was already validated, or let the module read `process.env`. */
  static forRoot(config?: BotkeeperConfig): DynamicModule {
    return {
      module: ConfigModule,
      providers: [
        config
          ? { provide: BOTKEEPER_CONFIG, useValue: config }
          : { provide: BOTKEEPER_CONFIG, useFactory: () => loadConfig() },
        { provide: CLOCK, useValue: systemClock },
      ],
      exports: [BOTKEEPER_CONFIG, CLOCK],
    };
  }
}
