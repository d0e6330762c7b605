import type { Redis } from 'ioredis';
import type { AppConfig } from './config.js';
import { createSql, type Sql } from './db/pool.js';
import { createRedis } from './db/redis.js';
import { createBetRepository } from './db/queries.js';
import { createFootballDataProvider } from './providers/index.js';
import { createTelegramClient, type TelegramClient } from './notifications/telegram-client.js';
import { createRedisAlertLedger } from './notifications/alert-dedup.js';
import { createTelegramNotifier } from './notifications/notifier.js';
import { createPipeline, type Pipeline } from './pipeline/orchestrator.js';
import type { BetRepository, Notifier } from './types/services.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

export interface Services {
  config: AppConfig;
  sql: Sql;
  redis: Redis;
  repository: BetRepository;
  telegram: TelegramClient;
  notifier: Notifier;
  pipeline: Pipeline;
  close(): Promise<void>;
}

/** Wires the production collaborators. Nothing connects until first use. */
export function createServices(config: AppConfig): Services {
  const sql = createSql(config.databaseUrl);
  const redis = createRedis(config.redis);
  const repository = createBetRepository(sql);
  const provider = createFootballDataProvider(config.providers);
  const telegram = createTelegramClient(config.telegram);
  const notifier = createTelegramNotifier({
    client: telegram,
    ledger: createRedisAlertLedger(redis),
    topBetsCount: config.telegram.topBetsCount,
  });
  const pipeline = createPipeline({ config: config.pipeline, provider, repository, notifier });

  if (!telegram.enabled) {
    logger.warn('Telegram bot token or chat id missing, notifications disabled');
  }

  return {
    config,
    sql,
    redis,
    repository,
    telegram,
    notifier,
    pipeline,
    async close() {
      await sql.end({ timeout: 5 });
      try {
        await redis.quit();
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, 'Redis quit failed');
      }
    },
  };
}
