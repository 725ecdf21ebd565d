/**
 * @fileoverview Stock Ledger and Catalog Routes
 *
 * Endpoints:
 * - POST /entries             - Record an entry
 * - POST /exits               - Record an exit
 * - POST /lots?replace=       - Register lots (replace reloads the snapshot)
 * - POST /catalog/products    - Import products
 * - POST /catalog/dimensions  - Import consumption dimensions
 *
 * @module api/routes/stock
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { parseInput } from '@clinistock/domain';
import type { ServiceRoutesOptions } from './replenishment.js';

const BatchBodySchema = z.array(z.unknown());

const LotsQuerySchema = z.object({
  replace: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export const stockRoutes: FastifyPluginAsync<ServiceRoutesOptions> = async (
  fastify,
  { services }
) => {
  fastify.post(
    '/entries',
    { schema: { tags: ['Stock'], summary: 'Record a stock entry' } },
    async (request, reply) => {
      const entry = await services.ledger.recordEntry(request.body);
      return reply.status(201).send(entry);
    }
  );

  fastify.post(
    '/exits',
    { schema: { tags: ['Stock'], summary: 'Record a stock exit' } },
    async (request, reply) => {
      const exit = await services.ledger.recordExit(request.body);
      return reply.status(201).send(exit);
    }
  );

  fastify.post(
    '/lots',
    { schema: { tags: ['Stock'], summary: 'Register lots in the stock snapshot' } },
    async (request) => {
      const { replace } = parseInput(LotsQuerySchema, request.query, 'lots query');
      const lots = parseInput(BatchBodySchema, request.body, 'lots body');
      return { written: await services.ledger.registerLots(lots, { replace }) };
    }
  );

  fastify.post(
    '/catalog/products',
    { schema: { tags: ['Catalog'], summary: 'Import products' } },
    async (request) => {
      const products = parseInput(BatchBodySchema, request.body, 'products body');
      return { written: await services.catalog.importProducts(products) };
    }
  );

  fastify.post(
    '/catalog/dimensions',
    { schema: { tags: ['Catalog'], summary: 'Import consumption dimensions' } },
    async (request) => {
      const dimensions = parseInput(BatchBodySchema, request.body, 'dimensions body');
      return { written: await services.catalog.importDimensions(dimensions) };
    }
  );
};
