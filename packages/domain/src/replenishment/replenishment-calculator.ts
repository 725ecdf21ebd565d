/**
 * @fileoverview Replenishment Calculator
 *
 * Turns one product's stock, demand statistics and the global parameters
 * into a report row. Parameters arrive as an explicit object; nothing here
 * reads stored or ambient state.
 *
 * @module domain/replenishment/replenishment-calculator
 */

import {
  Option,
  type ConsolidatedStock,
  type ConsumptionDimension,
  type DemandStatistics,
  type Product,
  type ReplenishmentParameters,
  type ReplenishmentRow,
} from '@clinistock/types';
import {
  coverageDays,
  leadTimeDemandMean,
  leadTimeDemandStdDev,
  reorderPoint,
  safetyStock,
  shortfall,
  zScore,
} from './formulas.js';
import { applyLotPolicy, classifyStatus } from './policies.js';
import { convert, normalizeUnit, targetUnitOf, unitConversionOf } from './unit-converter.js';

export interface ReplenishmentInput {
  readonly product: Product;
  readonly dimension: ConsumptionDimension;
  readonly stock: ConsolidatedStock;
  readonly statistics: Pick<DemandStatistics, 'mean' | 'stdDev'>;
}

/**
 * Current stock in the dimension's target scale
 */
export function targetStockOf(
  dimension: ConsumptionDimension,
  stock: ConsolidatedStock
): number {
  return dimension.consumptionType === 'fractional_dose'
    ? stock.clinicalQuantity
    : stock.presentationQuantity;
}

/**
 * Compute the full replenishment row for one product
 *
 * @throws ValidationError when the service level is outside (0, 1)
 */
export function calculateReplenishment(
  input: ReplenishmentInput,
  parameters: ReplenishmentParameters
): ReplenishmentRow {
  const { product, dimension, stock, statistics } = input;
  const { leadTimeMeanDays, leadTimeStdDevDays } = parameters;

  const z = zScore(parameters.serviceLevel);
  const currentStock = targetStockOf(dimension, stock);

  const muDL = leadTimeDemandMean(statistics.mean, leadTimeMeanDays);
  const sigmaDL = leadTimeDemandStdDev(
    statistics.mean,
    statistics.stdDev,
    leadTimeMeanDays,
    leadTimeStdDevDays
  );
  const ss = safetyStock(z, sigmaDL);
  const rop = reorderPoint(muDL, ss);
  const need = shortfall(rop, currentStock);
  const suggested = applyLotPolicy(need, product);

  const conversion = unitConversionOf(dimension);
  const fractional = dimension.consumptionType === 'fractional_dose';

  // The target-scale suggestion carries over to the other scale, re-rounded there
  const otherUnit = fractional ? conversion.presentationUnit : conversion.clinicalUnit;
  const crossSuggestion = Option.toNullable(
    Option.map(convert(suggested, targetUnitOf(dimension), otherUnit, conversion), (quantity) =>
      applyLotPolicy(quantity, product)
    )
  );

  return {
    code: product.code,
    name: product.name,
    consumptionType: dimension.consumptionType,
    targetUnit: targetUnitOf(dimension),
    presentationUnit: normalizeUnit(dimension.presentationUnit),
    clinicalUnit: normalizeUnit(dimension.clinicalUnit),
    currentStock,
    demandMean: statistics.mean,
    demandStdDev: statistics.stdDev,
    leadTimeMeanDays,
    leadTimeStdDevDays,
    zScore: z,
    leadTimeDemandMean: muDL,
    leadTimeDemandStdDev: sigmaDL,
    safetyStock: ss,
    reorderPoint: rop,
    shortfall: need,
    suggestedClinicalQuantity: fractional ? suggested : crossSuggestion,
    suggestedPresentationQuantity: fractional ? crossSuggestion : suggested,
    coverageDays: coverageDays(currentStock, statistics.mean),
    status: classifyStatus(currentStock, ss, rop),
    gap: null,
  };
}

/**
 * VERIFY row for a product without a consumption dimension
 */
export function missingDimensionRow(product: Product): ReplenishmentRow {
  return {
    code: product.code,
    name: product.name,
    consumptionType: null,
    targetUnit: null,
    presentationUnit: null,
    clinicalUnit: null,
    currentStock: null,
    demandMean: null,
    demandStdDev: null,
    leadTimeMeanDays: null,
    leadTimeStdDevDays: null,
    zScore: null,
    leadTimeDemandMean: null,
    leadTimeDemandStdDev: null,
    safetyStock: null,
    reorderPoint: null,
    shortfall: null,
    suggestedClinicalQuantity: null,
    suggestedPresentationQuantity: null,
    coverageDays: null,
    status: 'VERIFY',
    gap: 'missing_consumption_dimension',
  };
}

/**
 * VERIFY row for a product with no demand statistics in its target unit
 */
export function missingStatisticsRow(
  product: Product,
  dimension: ConsumptionDimension,
  stock: ConsolidatedStock,
  parameters: ReplenishmentParameters
): ReplenishmentRow {
  return {
    ...missingDimensionRow(product),
    consumptionType: dimension.consumptionType,
    targetUnit: targetUnitOf(dimension),
    presentationUnit: normalizeUnit(dimension.presentationUnit),
    clinicalUnit: normalizeUnit(dimension.clinicalUnit),
    currentStock: targetStockOf(dimension, stock),
    leadTimeMeanDays: parameters.leadTimeMeanDays,
    leadTimeStdDevDays: parameters.leadTimeStdDevDays,
    gap: 'missing_demand_statistics',
  };
}
