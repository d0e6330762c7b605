#!/usr/bin/env node
import { loadConfig, type AppConfig } from './config.js';
import { createServices, type Services } from './bootstrap.js';
import { createServer } from './api/server.js';
import { createResponseCache } from './api/cache.js';
import { createPipelineQueue } from './scheduler/queues.js';
import { enqueueJob, startScheduler } from './scheduler/index.js';
import { JOB_NAMES } from './scheduler/constants.js';
import { createPipelineWorker } from './workers/pipeline-worker.js';
import { createCommandHandler } from './notifications/commands.js';
import { startCommandListener, type CommandListener } from './notifications/command-listener.js';
import { logger } from './utils/logger.js';

const MODES = ['run', 'refresh', 'settle', 'schedule'] as const;
type Mode = (typeof MODES)[number];

function parseMode(arg: string | undefined): Mode | null {
  if (arg === undefined) return 'run';
  return MODES.find((mode) => mode === arg) ?? null;
}

async function runOnce(services: Services, mode: Exclude<Mode, 'schedule'>): Promise<void> {
  const { pipeline, notifier } = services;
  try {
    switch (mode) {
      case 'run': {
        const outcome = await pipeline.runValueBetEngine('cli');
        if (outcome.status === 'completed') {
          const { bets, errors } = outcome.summary;
          logger.info({ bets: bets.length, errors: errors.length }, 'Run finished');
        }
        break;
      }
      case 'refresh': {
        const { teamsUpdated, errors } = await pipeline.refreshTeamStats();
        await notifier.sendErrorDigest(errors);
        logger.info({ teamsUpdated, errors: errors.length }, 'Refresh finished');
        break;
      }
      case 'settle': {
        const { checked, settled } = await pipeline.settlePendingBets();
        logger.info({ checked, settled }, 'Settlement finished');
        break;
      }
    }
  } finally {
    await services.close();
  }
}

async function runScheduled(services: Services, config: AppConfig): Promise<void> {
  const { pipeline, notifier, repository, telegram, redis, sql } = services;

  const queue = createPipelineQueue(config.redis);
  await startScheduler(queue, config.schedule);

  const worker = createPipelineWorker(config.redis, pipeline, notifier);
  logger.info('Worker started: pipeline-worker');

  let listener: CommandListener | null = null;
  if (telegram.enabled && config.telegram.chatId) {
    listener = startCommandListener({
      client: telegram,
      authorizedChatId: config.telegram.chatId,
      pollTimeoutSec: config.telegram.pollTimeoutSec,
      handle: createCommandHandler({
        repository,
        getStatus: () => pipeline.getStatus(),
        triggerRun: () => enqueueJob(queue, JOB_NAMES.RUN_PIPELINE),
        triggerRefresh: () => enqueueJob(queue, JOB_NAMES.REFRESH_STATS),
      }),
    });
  }

  const server = await createServer({
    repository,
    cache: createResponseCache(redis),
    getStatus: () => pipeline.getStatus(),
    healthCheck: {
      database: async () => (await sql`SELECT 1 AS ok`).length === 1,
      redis: async () => (await redis.ping()) === 'PONG',
    },
  });
  await server.listen({ port: config.port, host: '0.0.0.0' });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await listener?.stop();
    await worker.close();
    await queue.close();
    await services.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

async function main(): Promise<void> {
  const mode = parseMode(process.argv[2]);
  if (!mode) {
    logger.error({ arg: process.argv[2], modes: MODES }, 'Unknown mode');
    process.exit(1);
  }

  const config = loadConfig();
  const services = createServices(config);
  logger.info({ mode, leagues: config.pipeline.leagues }, 'Starting value-bet-engine...');

  if (mode === 'schedule') {
    await runScheduled(services, config);
  } else {
    await runOnce(services, mode);
  }
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
