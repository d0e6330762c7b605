import type { FastifyPluginAsync } from 'fastify';

export interface HealthCheck {
  database(): Promise<boolean>;
  redis(): Promise<boolean>;
}

export interface HealthRouteOptions {
  check: HealthCheck;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  app.get('/health', async () => {
    const [database, redis] = await Promise.all([
      opts.check.database().catch(() => false),
      opts.check.redis().catch(() => false),
    ]);
    return {
      status: database ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        database: database ? 'up' : 'down',
        redis: redis ? 'up' : 'down',
      },
    };
  });
};
