import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { BetRepository } from '../../types/services.js';
import type { WorkerStatus } from '../../types/pipeline.js';
import { computeETag, type ResponseCache } from '../cache.js';
import { todayDateString } from '../../utils/date.js';

export interface BetsRouteOptions {
  repository: BetRepository;
  cache: ResponseCache;
  getStatus: () => WorkerStatus;
  now?: () => Date;
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().catch(20).transform((n) => Math.min(Math.max(n, 1), 100)),
});

const STATS_CACHE_KEY = ['stats'];

export const betsRoutes: FastifyPluginAsync<BetsRouteOptions> = async (app, opts) => {
  const now = opts.now ?? (() => new Date());

  // GET /api/bets: most recent value bets
  app.get('/bets', async (request) => {
    const { limit } = listQuerySchema.parse(request.query ?? {});
    const data = await opts.repository.listRecentBets(limit);
    return { data, count: data.length };
  });

  // GET /api/live: bets on today's fixtures
  app.get('/live', async () => {
    const date = todayDateString(now());
    const data = await opts.repository.listBetsForDate(date);
    return { date, data, count: data.length };
  });

  // GET /api/stats: performance aggregates, cached
  app.get('/stats', async (request, reply) => {
    let body = await opts.cache.get(STATS_CACHE_KEY);
    if (!body) {
      body = JSON.stringify(await opts.repository.aggregateStats());
      await opts.cache.set(STATS_CACHE_KEY, body);
    }

    const etag = computeETag(body);
    if (request.headers['if-none-match'] === etag) {
      return reply.status(304).send();
    }
    void reply.header('Cache-Control', 'public, max-age=300');
    void reply.header('ETag', etag);
    void reply.type('application/json');
    return reply.send(body);
  });

  app.get('/status', async () => opts.getStatus());
};
