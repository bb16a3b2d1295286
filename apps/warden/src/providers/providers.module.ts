import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import type Redis from 'ioredis';
import { REDIS } from '../constants';
import { CommandRunnerProvider } from './command-runner.provider';
import { LockFactoryProvider } from './lock.provider';
import { RedisProvider } from './redis.provider';

@Global()
@Module({
  providers: [RedisProvider, LockFactoryProvider, CommandRunnerProvider],
  exports: [LockFactoryProvider, CommandRunnerProvider],
})
export class ProvidersModule implements OnApplicationShutdown {
  constructor(@Inject(REDIS) private readonly redis: Redis | null) {}

  onApplicationShutdown() {
    this.redis?.disconnect();
  }
}
