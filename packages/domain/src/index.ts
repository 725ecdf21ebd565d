/**
 * @clinistock/domain
 * Replenishment calculation core and its services
 */

export * from './replenishment/index.js';
