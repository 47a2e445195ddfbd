import type { FastifyPluginAsync } from 'fastify';
import type { Result } from '@invoice-intake/utils';

export interface HealthRoutesOptions {
  version: string;
  /** Readiness probe for the database. */
  pingDatabase?: () => Promise<Result<void, Error>>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, opts) => {
  app.get(
    '/',
    {
      schema: {
        tags: ['health'],
        summary: 'Basic health check',
      },
    },
    async () => {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        version: opts.version,
      };
    }
  );

  app.get(
    '/ready',
    {
      schema: {
        tags: ['health'],
        summary: 'Readiness check (checks the database)',
      },
    },
    async (_request, reply) => {
      const database = opts.pingDatabase ? await opts.pingDatabase() : null;
      const checks = { database: database === null || database.ok };

      if (database !== null && !database.ok) {
        return reply.status(503).send({
          status: 'unhealthy',
          checks,
          error: database.error.message,
        });
      }

      return { status: 'ready', checks };
    }
  );

  app.get(
    '/live',
    {
      schema: {
        tags: ['health'],
        summary: 'Liveness check',
      },
    },
    async () => {
      return { status: 'alive' };
    }
  );
};
