import { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';

export function createRedis(opts: { host: string; port: number }): Redis {
  const redis = new Redis({
    host: opts.host,
    port: opts.port,
    // Cache and alert ledger calls are best effort; fail fast instead of queueing forever
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error');
  });

  return redis;
}
