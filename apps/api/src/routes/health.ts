import type { FastifyPluginAsync } from 'fastify';

/**
 * Health check routes
 *
 * GET /health reports the process uptime and, when a database probe is
 * configured, whether storage answers.
 */

export interface HealthRoutesOptions {
  /** Resolves when storage is reachable */
  checkDatabase?: () => Promise<void>;
}

interface HealthResponse {
  status: 'ok' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    database: 'ok' | 'error' | 'not_configured';
  };
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
  fastify.get(
    '/health',
    {
      schema: {
        tags: ['Health'],
        summary: 'Liveness and storage check',
      },
    },
    async (request, reply) => {
      let database: HealthResponse['checks']['database'] = 'not_configured';

      if (options.checkDatabase) {
        try {
          await options.checkDatabase();
          database = 'ok';
        } catch (error) {
          request.log.error({ err: error }, 'Database health check failed');
          database = 'error';
        }
      }

      const body: HealthResponse = {
        status: database === 'error' ? 'unhealthy' : 'ok',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        checks: { database },
      };

      return reply.status(body.status === 'ok' ? 200 : 503).send(body);
    }
  );
};
