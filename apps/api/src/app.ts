import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ValidationError, isOperationalError, toSafeErrorResponse } from '@clinistock/core';
import type { ReplenishmentParameters } from '@clinistock/types';
import correlationPlugin from './plugins/correlation.js';
import { healthRoutes, replenishmentRoutes, reportRoutes, stockRoutes } from './routes/index.js';
import { createApiServices, type ApiRepositories } from './services.js';

/**
 * Clinistock API
 *
 * HTTP surface over the replenishment core: demand rebuild, verification,
 * reports and the stock ledger.
 */

export interface BuildAppOptions {
  repositories: ApiRepositories;
  /** Fallback replenishment parameters for keys missing from storage */
  defaults?: ReplenishmentParameters;
  /** `false` disables request logging */
  logLevel?: string | false;
  corsOrigins?: string[] | false;
  /** Resolves when storage is reachable; used by GET /health */
  checkDatabase?: () => Promise<void>;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      options.logLevel === false
        ? false
        : {
            level: options.logLevel ?? 'info',
            serializers: {
              req(request) {
                return {
                  method: request.method,
                  url: request.url,
                  remoteAddress: request.ip,
                };
              },
              res(reply) {
                return {
                  statusCode: reply.statusCode,
                };
              },
            },
          },
  });

  await fastify.register(correlationPlugin);

  await fastify.register(helmet, {
    // JSON API, the docs page carries its own CSP
    contentSecurityPolicy: false,
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Clinistock API',
        version: '0.1.0',
        description:
          'Continuous-review replenishment for clinical stock: demand statistics, safety stock, reorder points and urgency.',
      },
      tags: [
        { name: 'Health', description: 'Health checks' },
        { name: 'Demand', description: 'Demand series and statistics' },
        { name: 'Stock', description: 'Entries, exits and lots' },
        { name: 'Catalog', description: 'Products and consumption dimensions' },
        { name: 'Replenishment', description: 'Verification and parameters' },
        { name: 'Reports', description: 'Rupture, expiry, consumption and order lists' },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  await fastify.register(cors, {
    origin: options.corsOrigins ?? false,
    methods: ['GET', 'POST', 'PUT'],
  });

  // Plugins copy the handlers in force when they are registered, so these come before the routes
  fastify.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId;

    if (isOperationalError(error)) {
      const safe = error.toSafeError();
      if (safe.statusCode >= 500) {
        request.log.error({ correlationId, err: error }, 'Operation failed');
      } else {
        request.log.warn({ correlationId, code: safe.code }, safe.message);
      }
      return reply.status(safe.statusCode).send({
        ...safe,
        ...(error instanceof ValidationError && error.details !== undefined
          ? { details: error.details }
          : {}),
      });
    }

    // Framework client errors (malformed JSON, unsupported media type)
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      request.log.warn({ correlationId, code: error.code }, error.message);
      return reply.status(statusCode).send({
        code: error.code,
        message: error.message,
        statusCode,
      });
    }

    request.log.error({ correlationId, err: error }, 'Unhandled error');
    const safe = toSafeErrorResponse(error);
    return reply.status(safe.statusCode).send(safe);
  });

  // Not found handler
  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
    });
  });

  const services = createApiServices(options.repositories, options.defaults);

  await fastify.register(healthRoutes, { checkDatabase: options.checkDatabase });
  await fastify.register(replenishmentRoutes, { services });
  await fastify.register(reportRoutes, { services });
  await fastify.register(stockRoutes, { services });

  return fastify;
}
