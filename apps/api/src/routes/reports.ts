/**
 * @fileoverview Report Routes
 *
 * Thin filters over the verification report and the stored demand.
 *
 * @module api/routes/reports
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { parseInput } from '@clinistock/domain';
import { YearMonthSchema } from '@clinistock/types';
import type { ServiceRoutesOptions } from './replenishment.js';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const RuptureQuerySchema = z.object({
  horizonDays: z.coerce.number().nonnegative().optional(),
});

const ExpiringQuerySchema = z.object({
  windowDays: z.coerce.number().nonnegative().optional(),
  byLot: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  today: z.string().trim().min(1).optional(),
});

const TopConsumptionQuerySchema = z.object({
  from: YearMonthSchema,
  to: YearMonthSchema,
  limit: z.coerce.number().int().min(0).optional(),
});

// ============================================================================
// ROUTES
// ============================================================================

export const reportRoutes: FastifyPluginAsync<ServiceRoutesOptions> = async (
  fastify,
  { services }
) => {
  fastify.get(
    '/reports/rupture',
    { schema: { tags: ['Reports'], summary: 'Products at risk of stock rupture' } },
    async (request) => {
      const query = parseInput(RuptureQuerySchema, request.query, 'rupture query');
      return { data: await services.reports.ruptureAlert(query.horizonDays) };
    }
  );

  fastify.get(
    '/reports/expiring',
    { schema: { tags: ['Reports'], summary: 'Lots or products close to expiry' } },
    async (request) => {
      const query = parseInput(ExpiringQuerySchema, request.query, 'expiry query');
      const options = { windowDays: query.windowDays, today: query.today };

      return {
        data: query.byLot
          ? await services.reports.expiringLots(options)
          : await services.reports.expiringProducts(options),
      };
    }
  );

  fastify.get(
    '/reports/top-consumption',
    { schema: { tags: ['Reports'], summary: 'Highest monthly consumption in a range' } },
    async (request) => {
      const query = parseInput(TopConsumptionQuerySchema, request.query, 'consumption query');
      return { data: await services.reports.topConsumption(query.from, query.to, query.limit) };
    }
  );

  fastify.get(
    '/reports/replenishment',
    { schema: { tags: ['Reports'], summary: 'Products to order, most urgent first' } },
    async () => ({ data: await services.reports.replenishmentList() })
  );
};
