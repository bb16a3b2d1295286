import { Provider } from '@nestjs/common';
import Redis from 'ioredis';
import { BOTKEEPER_CONFIG, REDIS } from '../constants';
import type { BotkeeperConfig } from '../config/botkeeper-config';

/** Only connects when the redis lock backend is selected. */
export const RedisProvider: Provider<Redis | null> = {
  provide: REDIS,
  inject: [BOTKEEPER_CONFIG],
  useFactory: (config: BotkeeperConfig) => {
    if (config.lock.backend !== 'redis' || !config.lock.redisUrl) return null;
    return new Redis(config.lock.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
  },
};
