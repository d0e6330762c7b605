import type { Redis } from 'ioredis';
import type { AlertLedger } from '../types/services.js';
import type { ValueBet } from '../types/value-bet.js';

const PREFIX = 'alert:sent:';
const TTL_SECONDS = 86400; // 24 hours

export function alertKey(bet: ValueBet): string {
  return `${bet.fixtureId}:${bet.marketKey}:${bet.bookmaker.toLowerCase()}`;
}

export function createRedisAlertLedger(redis: Redis): AlertLedger {
  return {
    async isSent(key: string): Promise<boolean> {
      return (await redis.exists(`${PREFIX}${key}`)) === 1;
    },
    async markSent(key: string): Promise<void> {
      await redis.set(`${PREFIX}${key}`, '1', 'EX', TTL_SECONDS);
    },
  };
}
