/**
 * Service wiring for the HTTP surface
 */

import {
  createCatalogService,
  createReplenishmentReportService,
  createReplenishmentService,
  createStockLedgerService,
  type CatalogService,
  type ICatalogRepository,
  type IDemandRepository,
  type IParameterStore,
  type IStockLedgerRepository,
  type ReplenishmentReportService,
  type ReplenishmentService,
  type StockLedgerService,
} from '@clinistock/domain';
import type { ReplenishmentParameters } from '@clinistock/types';

export interface ApiRepositories {
  readonly catalog: ICatalogRepository;
  readonly ledger: IStockLedgerRepository;
  readonly demand: IDemandRepository;
  readonly parameters: IParameterStore;
}

export interface ApiServices {
  readonly replenishment: ReplenishmentService;
  readonly reports: ReplenishmentReportService;
  readonly ledger: StockLedgerService;
  readonly catalog: CatalogService;
}

export function createApiServices(
  repositories: ApiRepositories,
  defaults?: ReplenishmentParameters
): ApiServices {
  const replenishment = createReplenishmentService(
    repositories,
    defaults ? { defaults } : undefined
  );

  return {
    replenishment,
    reports: createReplenishmentReportService({
      replenishment,
      catalog: repositories.catalog,
      ledger: repositories.ledger,
      demand: repositories.demand,
    }),
    ledger: createStockLedgerService(repositories),
    catalog: createCatalogService(repositories),
  };
}
