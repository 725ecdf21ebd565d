/**
 * @fileoverview PostgreSQL Catalog Repository (Infrastructure Layer)
 *
 * Products (`produto`) and their consumption dimensions (`dim_consumo`).
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** - it implements the ICatalogRepository port
 * defined in the domain layer.
 *
 * @module @clinistock/infrastructure/repositories/postgres-catalog-repository
 */

import {
  batchInsert,
  createLogger,
  toDatabaseError,
  withTransaction,
  type DatabasePool,
} from '@clinistock/core';
import type { ICatalogRepository } from '@clinistock/domain';
import type { ConsumptionDimension, Product } from '@clinistock/types';
import {
  fromConsumptionTypeCode,
  numberOrNull,
  textOrNull,
  toConsumptionTypeCode,
} from './postgres-mappers.js';

const logger = createLogger({ name: 'postgres-catalog-repository' });

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface ProductRow {
  codigo: string;
  nome: string | null;
  categoria: string | null;
  controle_lotes: boolean | null;
  controle_validade: boolean | null;
  lote_min: string | number | null;
  lote_mult: string | number | null;
  quantidade_minima: string | number | null;
}

interface DimensionRow {
  codigo: string;
  tipo_consumo: string | null;
  unidade_apresentacao: string | null;
  unidade_clinica: string | null;
  fator_conversao: string | number | null;
  via_aplicacao: string | null;
  observacao: string | null;
}

const PRODUCT_COLUMNS = [
  'codigo',
  'nome',
  'categoria',
  'controle_lotes',
  'controle_validade',
  'lote_min',
  'lote_mult',
  'quantidade_minima',
] as const;

const DIMENSION_COLUMNS = [
  'codigo',
  'tipo_consumo',
  'unidade_apresentacao',
  'unidade_clinica',
  'fator_conversao',
  'via_aplicacao',
  'observacao',
] as const;

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

export class PostgresCatalogRepository implements ICatalogRepository {
  constructor(private readonly pool: DatabasePool) {}

  async getProducts(): Promise<Product[]> {
    try {
      const result = await this.pool.query<ProductRow>(
        `SELECT ${PRODUCT_COLUMNS.join(', ')} FROM produto ORDER BY codigo`
      );
      return result.rows.map((row) => this.rowToProduct(row));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load products');
      throw toDatabaseError('getProducts', error);
    }
  }

  async getProduct(code: string): Promise<Product | null> {
    try {
      const result = await this.pool.query<ProductRow>(
        `SELECT ${PRODUCT_COLUMNS.join(', ')} FROM produto WHERE codigo = $1`,
        [code]
      );
      const row = result.rows[0];
      return row ? this.rowToProduct(row) : null;
    } catch (error) {
      logger.error({ err: error, code }, 'Failed to load product');
      throw toDatabaseError('getProduct', error);
    }
  }

  async getDimensions(): Promise<ConsumptionDimension[]> {
    try {
      const result = await this.pool.query<DimensionRow>(
        `SELECT ${DIMENSION_COLUMNS.join(', ')} FROM dim_consumo ORDER BY codigo`
      );
      return result.rows.map((row) => this.rowToDimension(row));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load consumption dimensions');
      throw toDatabaseError('getDimensions', error);
    }
  }

  async upsertProducts(products: readonly Product[]): Promise<number> {
    try {
      return await withTransaction(this.pool, (tx) =>
        batchInsert(tx, products, {
          table: 'produto',
          columns: PRODUCT_COLUMNS,
          getValues: (product) => [
            product.code,
            product.name,
            product.category,
            product.lotTracking,
            product.expiryTracking,
            product.lotMinimum,
            product.lotMultiple,
            product.minimumQuantity,
          ],
          onConflict: {
            columns: ['codigo'],
            action: 'DO UPDATE',
            updateColumns: PRODUCT_COLUMNS.slice(1),
          },
        })
      );
    } catch (error) {
      logger.error({ err: error, count: products.length }, 'Failed to upsert products');
      throw toDatabaseError('upsertProducts', error);
    }
  }

  async upsertDimensions(dimensions: readonly ConsumptionDimension[]): Promise<number> {
    try {
      return await withTransaction(this.pool, (tx) =>
        batchInsert(tx, dimensions, {
          table: 'dim_consumo',
          columns: DIMENSION_COLUMNS,
          getValues: (dimension) => [
            dimension.code,
            toConsumptionTypeCode(dimension.consumptionType),
            dimension.presentationUnit,
            dimension.clinicalUnit,
            dimension.conversionFactor,
            dimension.administrationRoute,
            dimension.notes,
          ],
          onConflict: {
            columns: ['codigo'],
            action: 'DO UPDATE',
            updateColumns: DIMENSION_COLUMNS.slice(1),
          },
        })
      );
    } catch (error) {
      logger.error({ err: error, count: dimensions.length }, 'Failed to upsert dimensions');
      throw toDatabaseError('upsertDimensions', error);
    }
  }

  // ============================================================================
  // MAPPERS
  // ============================================================================

  private rowToProduct(row: ProductRow): Product {
    return {
      code: row.codigo,
      name: textOrNull(row.nome) ?? row.codigo,
      category: textOrNull(row.categoria),
      lotTracking: row.controle_lotes ?? false,
      expiryTracking: row.controle_validade ?? false,
      lotMinimum: numberOrNull(row.lote_min),
      lotMultiple: numberOrNull(row.lote_mult),
      minimumQuantity: numberOrNull(row.quantidade_minima),
    };
  }

  private rowToDimension(row: DimensionRow): ConsumptionDimension {
    return {
      code: row.codigo,
      consumptionType: fromConsumptionTypeCode(row.tipo_consumo),
      presentationUnit: textOrNull(row.unidade_apresentacao),
      clinicalUnit: textOrNull(row.unidade_clinica),
      conversionFactor: numberOrNull(row.fator_conversao),
      administrationRoute: textOrNull(row.via_aplicacao),
      notes: textOrNull(row.observacao),
    };
  }
}

export function createPostgresCatalogRepository(pool: DatabasePool): PostgresCatalogRepository {
  return new PostgresCatalogRepository(pool);
}
