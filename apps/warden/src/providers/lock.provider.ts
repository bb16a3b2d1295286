import { hostname } from 'os';
import { join } from 'path';
import { Provider } from '@nestjs/common';
import type Redis from 'ioredis';
import { FileLock, RedisLock, type JobLock, type RedisLockClient } from '@botkeeper/distributed-lock';
import { BOTKEEPER_CONFIG, LOCK_FACTORY, REDIS } from '../constants';
import type { BotkeeperConfig } from '../config/botkeeper-config';

/** Builds the lock guarding one job type. */
export type LockFactory = (name: string, ttlSeconds: number) => JobLock;

export function redisLockClient(redis: Redis): RedisLockClient {
  return {
    set: (key, value, mode, ttlSeconds, flag) => redis.set(key, value, mode, ttlSeconds, flag),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
  };
}

export function createLockFactory(config: BotkeeperConfig, redis: Redis | null): LockFactory {
  const owner = (name: string) => `${name}:${hostname()}:${process.pid}`;
  if (config.lock.backend === 'redis' && redis) {
    const client = redisLockClient(redis);
    return (name, ttlSeconds) => new RedisLock(client, `botkeeper:lock:${name}`, owner(name), ttlSeconds);
  }
  return (name, ttlSeconds) => new FileLock(join(config.stateDir, 'locks', `${name}.lock`), owner(name), ttlSeconds);
}

export const LockFactoryProvider: Provider<LockFactory> = {
  provide: LOCK_FACTORY,
  inject: [BOTKEEPER_CONFIG, REDIS],
  useFactory: createLockFactory,
};
