/**
 * @clinistock/types
 * Shared Zod schemas and TypeScript types for the replenishment core
 */

export {
  // Option
  Some,
  None,
  Option,
  isSome,
  isNone,
} from './lib/option.js';

export {
  ConsumptionTypeSchema,
  ProductSchema,
  ConsumptionDimensionSchema,
  EntryRecordSchema,
  ExitRecordSchema,
  LotRegistrationSchema,
  ReplenishmentParametersSchema,
  UrgencyStatusSchema,
  VerificationGapSchema,
  YearMonthSchema,
  PARAMETER_KEYS,
  type ConsumptionType,
  type Product,
  type ProductInput,
  type ConsumptionDimension,
  type ConsumptionDimensionInput,
  type EntryRecord,
  type EntryRecordInput,
  type ExitRecord,
  type ExitRecordInput,
  type LotRegistration,
  type LotRegistrationInput,
  type LotSnapshot,
  type ConsolidatedStock,
  type DailyDemand,
  type MonthlyDemand,
  type DemandStatistics,
  type ReplenishmentParameters,
  type UrgencyStatus,
  type VerificationGap,
  type ReplenishmentRow,
  type ExpiringLotRow,
  type ExpiringProductRow,
  type TopConsumptionRow,
} from './schemas/replenishment.js';
