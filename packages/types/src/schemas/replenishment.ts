/**
 * Replenishment Schema Definitions
 * Catalog, transaction log, lot snapshot and demand records for the
 * clinical stock replenishment core, plus the computed report rows.
 *
 * Optional source columns are modelled as `null` (never omitted) so that
 * "missing" and "zero" stay distinct all the way through the calculations.
 */

import { z } from 'zod';

// =============================================================================
// Consumption Type
// =============================================================================

export const ConsumptionTypeSchema = z.enum([
  'fractional_dose', // demand tracked in the clinical unit (e.g. ML)
  'single_dose', // demand tracked in the presentation unit (e.g. FR)
  'excluded', // dropped from every computation
]);
export type ConsumptionType = z.infer<typeof ConsumptionTypeSchema>;

// =============================================================================
// Catalog
// =============================================================================

const OptionalText = z.string().trim().min(1).nullable().default(null);
const OptionalNumber = z.number().finite().nullable().default(null);

export const ProductSchema = z.object({
  code: z.string().trim().min(1, 'Product code is required'),
  name: z.string().trim().min(1, 'Product name is required'),
  category: OptionalText,
  lotTracking: z.boolean().default(false),
  expiryTracking: z.boolean().default(false),
  lotMinimum: OptionalNumber,
  lotMultiple: OptionalNumber,
  minimumQuantity: OptionalNumber,
});
export type Product = z.infer<typeof ProductSchema>;
export type ProductInput = z.input<typeof ProductSchema>;

export const ConsumptionDimensionSchema = z.object({
  code: z.string().trim().min(1),
  consumptionType: ConsumptionTypeSchema,
  presentationUnit: OptionalText,
  clinicalUnit: OptionalText,
  /** Multiplier from presentation unit to clinical unit */
  conversionFactor: OptionalNumber,
  administrationRoute: OptionalText,
  notes: OptionalText,
});
export type ConsumptionDimension = z.infer<typeof ConsumptionDimensionSchema>;
export type ConsumptionDimensionInput = z.input<typeof ConsumptionDimensionSchema>;

// =============================================================================
// Transaction Log
// =============================================================================

const RawDate = z.string().trim().min(1, 'Date is required');
const RawQuantity = z.string().trim().min(1, 'Quantity is required');

export const EntryRecordSchema = z.object({
  date: RawDate,
  code: z.string().trim().min(1),
  rawQuantity: RawQuantity,
  lot: OptionalText,
  expiryDate: OptionalText,
  unitPrice: OptionalNumber,
  invoiceNumber: OptionalText,
  representative: OptionalText,
  responsible: OptionalText,
  paid: z.boolean().default(false),
});
export type EntryRecord = z.infer<typeof EntryRecordSchema>;
export type EntryRecordInput = z.input<typeof EntryRecordSchema>;

export const ExitRecordSchema = z.object({
  date: RawDate,
  code: z.string().trim().min(1),
  rawQuantity: RawQuantity,
  lot: OptionalText,
  expiryDate: OptionalText,
  cost: OptionalNumber,
  patient: OptionalText,
  responsible: OptionalText,
  /** Waste, not consumption: never contributes to demand */
  discarded: z.boolean().default(false),
});
export type ExitRecord = z.infer<typeof ExitRecordSchema>;
export type ExitRecordInput = z.input<typeof ExitRecordSchema>;

// =============================================================================
// Lot Snapshot
// =============================================================================

/**
 * A lot as registered: raw quantity strings in both scales
 */
export const LotRegistrationSchema = z.object({
  code: z.string().trim().min(1),
  lot: z.string().trim().min(1),
  presentationQuantityRaw: OptionalText,
  clinicalQuantityRaw: OptionalText,
  entryDate: OptionalText,
  expiryDate: OptionalText,
});
export type LotRegistration = z.infer<typeof LotRegistrationSchema>;
export type LotRegistrationInput = z.input<typeof LotRegistrationSchema>;

export interface LotSnapshot {
  readonly code: string;
  readonly lot: string;
  readonly presentationQuantityRaw: string | null;
  readonly clinicalQuantityRaw: string | null;
  readonly entryDate: string | null;
  readonly expiryDate: string | null;
  readonly presentationQuantity: number | null;
  readonly presentationUnit: string | null;
  readonly clinicalQuantity: number | null;
  readonly clinicalUnit: string | null;
}

export interface ConsolidatedStock {
  readonly code: string;
  readonly presentationQuantity: number;
  readonly presentationUnit: string | null;
  readonly clinicalQuantity: number;
  readonly clinicalUnit: string | null;
}

// =============================================================================
// Demand
// =============================================================================

export interface DailyDemand {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly code: string;
  readonly unit: string;
  readonly total: number;
}

export interface MonthlyDemand {
  /** YYYY-MM */
  readonly yearMonth: string;
  readonly code: string;
  readonly unit: string;
  readonly total: number;
}

export interface DemandStatistics {
  readonly code: string;
  readonly unit: string;
  /** Mean daily demand over days with recorded consumption */
  readonly mean: number;
  /** Population standard deviation, 0 below two observations */
  readonly stdDev: number;
  readonly observations: number;
}

// =============================================================================
// Parameters
// =============================================================================

export const ReplenishmentParametersSchema = z.object({
  serviceLevel: z
    .number()
    .gt(0, 'Service level must be greater than 0')
    .lt(1, 'Service level must be less than 1'),
  leadTimeMeanDays: z.number().finite().nonnegative(),
  leadTimeStdDevDays: z.number().finite().nonnegative(),
});
export type ReplenishmentParameters = z.infer<typeof ReplenishmentParametersSchema>;

/** Stored parameter keys, string-encoded in the key/value table */
export const PARAMETER_KEYS = {
  serviceLevel: 'nivel_servico',
  leadTimeMeanDays: 'mu_t_dias_uteis',
  leadTimeStdDevDays: 'sigma_t_dias_uteis',
} as const satisfies Record<keyof ReplenishmentParameters, string>;

// =============================================================================
// Verification Report
// =============================================================================

export const UrgencyStatusSchema = z.enum(['CRITICAL', 'REPLENISH', 'OK', 'VERIFY']);
export type UrgencyStatus = z.infer<typeof UrgencyStatusSchema>;

export const VerificationGapSchema = z.enum([
  'missing_consumption_dimension',
  'missing_demand_statistics',
]);
export type VerificationGap = z.infer<typeof VerificationGapSchema>;

export interface ReplenishmentRow {
  readonly code: string;
  readonly name: string;
  readonly consumptionType: ConsumptionType | null;
  readonly targetUnit: string | null;
  readonly presentationUnit: string | null;
  readonly clinicalUnit: string | null;
  readonly currentStock: number | null;
  readonly demandMean: number | null;
  readonly demandStdDev: number | null;
  readonly leadTimeMeanDays: number | null;
  readonly leadTimeStdDevDays: number | null;
  readonly zScore: number | null;
  readonly leadTimeDemandMean: number | null;
  readonly leadTimeDemandStdDev: number | null;
  readonly safetyStock: number | null;
  readonly reorderPoint: number | null;
  readonly shortfall: number | null;
  /** Suggested order in the clinical unit */
  readonly suggestedClinicalQuantity: number | null;
  /** Suggested order in the presentation unit */
  readonly suggestedPresentationQuantity: number | null;
  readonly coverageDays: number | null;
  readonly status: UrgencyStatus;
  readonly gap: VerificationGap | null;
}

// =============================================================================
// Reports
// =============================================================================

export interface ExpiringLotRow {
  readonly code: string;
  readonly lot: string;
  readonly expiryDate: string;
  readonly presentationQuantity: number;
  readonly presentationUnit: string | null;
  readonly clinicalQuantity: number;
  readonly clinicalUnit: string | null;
}

export interface ExpiringProductRow {
  readonly code: string;
  readonly earliestExpiry: string;
  readonly lotCount: number;
  readonly presentationQuantity: number;
  readonly presentationUnit: string | null;
  readonly clinicalQuantity: number;
  readonly clinicalUnit: string | null;
}

export interface TopConsumptionRow {
  readonly code: string;
  readonly name: string | null;
  readonly total: number;
}

export const YearMonthSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Expected YYYY-MM');
