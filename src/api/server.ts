import Fastify from 'fastify';
import { healthRoutes, type HealthCheck } from './routes/health.js';
import { betsRoutes } from './routes/bets.js';
import type { ResponseCache } from './cache.js';
import type { BetRepository } from '../types/services.js';
import type { WorkerStatus } from '../types/pipeline.js';
import { loggerOptions } from '../utils/logger.js';

export interface ServerDeps {
  repository: BetRepository;
  cache: ResponseCache;
  getStatus: () => WorkerStatus;
  healthCheck: HealthCheck;
  now?: () => Date;
}

export async function createServer(deps: ServerDeps) {
  const app = Fastify({ logger: loggerOptions });

  await app.register(healthRoutes, { check: deps.healthCheck });
  await app.register(betsRoutes, {
    prefix: '/api',
    repository: deps.repository,
    cache: deps.cache,
    getStatus: deps.getStatus,
    now: deps.now,
  });

  return app;
}
