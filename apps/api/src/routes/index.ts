export { healthRoutes, type HealthRoutesOptions } from './health.js';
export { replenishmentRoutes, type ServiceRoutesOptions } from './replenishment.js';
export { reportRoutes } from './reports.js';
export { stockRoutes } from './stock.js';
