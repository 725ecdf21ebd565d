/**
 * @fileoverview Catalog Service
 *
 * Catalog imports (products and their consumption dimensions) and updates
 * to the global replenishment parameters.
 *
 * @module domain/replenishment/catalog-service
 */

import { ValidationError, createLogger } from '@clinistock/core';
import {
  ConsumptionDimensionSchema,
  ProductSchema,
  ReplenishmentParametersSchema,
  type ReplenishmentParameters,
} from '@clinistock/types';
import type { CatalogServiceDeps, ICatalogRepository, IParameterStore } from './interfaces.js';
import { encodeParameters } from './parameters.js';
import { duplicateKeys, parseInput } from './validation.js';

const logger = createLogger({ name: 'catalog-service' });

export class CatalogService {
  private readonly catalog: ICatalogRepository;
  private readonly parameters: IParameterStore;

  constructor(deps: CatalogServiceDeps) {
    this.catalog = deps.catalog;
    this.parameters = deps.parameters;
  }

  /**
   * One product per code within an import
   */
  async importProducts(inputs: readonly unknown[]): Promise<number> {
    const products = inputs.map((input, index) =>
      parseInput(ProductSchema, input, `product at index ${index}`)
    );

    const duplicates = duplicateKeys(products.map((product) => product.code));
    if (duplicates.length > 0) {
      throw new ValidationError('Duplicate products', { codes: duplicates });
    }
    const written = await this.catalog.upsertProducts(products);
    logger.info({ products: written }, 'Products imported');
    return written;
  }

  /**
   * Dimensions must reference known products, one per code
   */
  async importDimensions(inputs: readonly unknown[]): Promise<number> {
    const dimensions = inputs.map((input, index) =>
      parseInput(ConsumptionDimensionSchema, input, `dimension at index ${index}`)
    );

    const codes = dimensions.map((dimension) => dimension.code);
    const duplicates = duplicateKeys(codes);
    if (duplicates.length > 0) {
      throw new ValidationError('Duplicate consumption dimensions', { codes: duplicates });
    }

    const known = new Set((await this.catalog.getProducts()).map((product) => product.code));
    const orphans = codes.filter((code) => !known.has(code));
    if (orphans.length > 0) {
      throw new ValidationError('Consumption dimensions reference unknown products', {
        codes: orphans,
      });
    }

    const written = await this.catalog.upsertDimensions(dimensions);
    logger.info({ dimensions: written }, 'Consumption dimensions imported');
    return written;
  }

  /**
   * Store any subset of the global parameters
   */
  async updateParameters(input: unknown): Promise<Partial<ReplenishmentParameters>> {
    const values = parseInput(ReplenishmentParametersSchema.partial(), input, 'parameters');
    await this.parameters.setRawParameters(encodeParameters(values));
    logger.info({ parameters: values }, 'Parameters updated');
    return values;
  }
}

export function createCatalogService(deps: CatalogServiceDeps): CatalogService {
  return new CatalogService(deps);
}
