/**
 * @fileoverview Replenishment API Routes
 *
 * Endpoints:
 * - POST /demand/rebuild     - Regenerate daily and monthly demand
 * - GET  /demand/statistics  - Mean and std of daily demand per product and unit
 * - GET  /stock/consolidated - Lot totals per product in both scales
 * - GET  /verification       - Per-product report sorted by urgency
 * - GET  /parameters         - Effective replenishment parameters
 * - PUT  /parameters         - Store any subset of the parameters
 *
 * @module api/routes/replenishment
 */

import type { FastifyPluginAsync } from 'fastify';
import { createLogger } from '@clinistock/core';
import type { ApiServices } from '../services.js';

const logger = createLogger({ name: 'replenishment-routes' });

export interface ServiceRoutesOptions {
  services: ApiServices;
}

export const replenishmentRoutes: FastifyPluginAsync<ServiceRoutesOptions> = async (
  fastify,
  { services }
) => {
  fastify.post(
    '/demand/rebuild',
    { schema: { tags: ['Demand'], summary: 'Rebuild demand series from the exit log' } },
    async () => {
      const result = await services.replenishment.rebuildDemand();
      logger.info({ accepted: result.accepted }, 'Demand rebuild requested over HTTP');

      return {
        dailyRows: result.daily.length,
        monthlyRows: result.monthly.length,
        accepted: result.accepted,
        skipped: result.skipped,
      };
    }
  );

  fastify.get(
    '/demand/statistics',
    { schema: { tags: ['Demand'], summary: 'Daily demand statistics' } },
    async () => ({ data: await services.replenishment.demandStatistics() })
  );

  fastify.get(
    '/stock/consolidated',
    { schema: { tags: ['Stock'], summary: 'Stock consolidated per product' } },
    async () => ({ data: await services.replenishment.consolidatedStock() })
  );

  fastify.get(
    '/verification',
    { schema: { tags: ['Replenishment'], summary: 'Replenishment verification report' } },
    async () => ({ data: await services.replenishment.runVerification() })
  );

  fastify.get(
    '/parameters',
    { schema: { tags: ['Replenishment'], summary: 'Effective replenishment parameters' } },
    async () => services.replenishment.getParameters()
  );

  fastify.put(
    '/parameters',
    { schema: { tags: ['Replenishment'], summary: 'Update replenishment parameters' } },
    async (request) => {
      await services.catalog.updateParameters(request.body);
      return services.replenishment.getParameters();
    }
  );
};
