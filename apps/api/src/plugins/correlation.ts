/**
 * Tags every request with a correlation id
 *
 * The id comes from the x-correlation-id header when it is a plain token,
 * otherwise a fresh UUID. It is echoed on the response and bound to the
 * request logger.
 */

import { type FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateCorrelationId } from '@clinistock/core';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

// Caller-supplied ids are echoed into headers and logs, so only short tokens pass
const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

function incomingId(header: string | string[] | undefined): string | undefined {
  return typeof header === 'string' && ACCEPTED_ID.test(header) ? header : undefined;
}

const correlationPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request, reply) => {
    const correlationId = incomingId(request.headers[CORRELATION_HEADER]) ?? generateCorrelationId();

    request.correlationId = correlationId;
    void reply.header(CORRELATION_HEADER, correlationId);
    request.log = request.log.child({ correlationId });
  });
};

export default fp(correlationPlugin, {
  name: 'correlation',
  fastify: '5.x',
});
