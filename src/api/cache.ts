import { createHash } from 'node:crypto';
import type { Redis } from 'ioredis';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const DEFAULT_TTL_SECONDS = 300;

/** Serialized JSON response bodies keyed by route parts. Misses and failures both read as null. */
export interface ResponseCache {
  get(parts: string[]): Promise<string | null>;
  set(parts: string[], body: string): Promise<void>;
}

function buildKey(parts: string[]): string {
  return `api:${parts.join(':')}`;
}

export function createResponseCache(redis: Redis, ttlSeconds = DEFAULT_TTL_SECONDS): ResponseCache {
  return {
    async get(parts) {
      try {
        return await redis.get(buildKey(parts));
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, 'Cache get failed');
        return null;
      }
    },

    async set(parts, body) {
      try {
        await redis.set(buildKey(parts), body, 'EX', ttlSeconds);
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, 'Cache set failed');
      }
    },
  };
}

export function computeETag(body: string): string {
  const hash = createHash('md5').update(body).digest('hex');
  return `"${hash}"`;
}
